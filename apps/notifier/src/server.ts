import { existsSync } from "node:fs";
import Fastify, { type FastifyInstance } from "fastify";
import helmet from "@fastify/helmet";
import type { AppEnv } from "./lib/env.js";
import { getEnv, requireSheetCredentials, requireSmtpCredentials } from "./lib/env.js";
import { systemClock, type Clock } from "./lib/clock.js";
import { createDbPool } from "./lib/db.js";
import { ConfigError } from "./lib/errors.js";
import { loggerOptions } from "./lib/logger.js";
import { workshopDetailsFromEnv } from "./lib/email-templates.js";
import { policyFromEnv } from "./lib/reminder-policy.js";
import { scheduleFromEnv } from "./lib/workshop-schedule.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerReminderRoutes } from "./routes/reminders.js";
import { PgSentRecordsRepo } from "./repos/sent-records-repo.js";
import { FileSentRecordsRepo } from "./repos/file-sent-records-repo.js";
import type { SentRecordsRepo } from "./repos/sent-records-repo.js";
import { GoogleSheetsRosterSource, RosterFetcher, rosterOptionsFromEnv } from "./services/roster-fetcher.js";
import { SmtpMailer, type Mailer } from "./services/mailer.js";
import { ReminderDispatcher } from "./services/reminder-dispatcher.js";
import { ReminderScheduler } from "./services/scheduler.js";

interface AppDependencies {
  env?: AppEnv;
  clock?: Clock;
  store?: SentRecordsRepo;
  roster?: Pick<RosterFetcher, "fetch">;
  mailer?: Mailer;
}

export async function buildApp(deps: AppDependencies = {}): Promise<FastifyInstance> {
  const env = deps.env ?? getEnv(process.env);

  const app = Fastify({
    logger: loggerOptions(env),
  });

  await app.register(helmet);

  const closers: Array<() => Promise<void> | void> = [];
  const releaseResources = async (): Promise<void> => {
    for (const close of closers.splice(0).reverse()) {
      await close();
    }
  };

  const store = deps.store ?? (await (async () => {
    if (env.DATABASE_URL) {
      const db = createDbPool(env.DATABASE_URL);
      closers.push(() => db.end());
      return new PgSentRecordsRepo(db);
    }

    app.log.warn({ file: env.SENT_RECORDS_FILE }, "DATABASE_URL is not set; tracking sent reminders in a JSON file.");
    return FileSentRecordsRepo.open(env.SENT_RECORDS_FILE);
  })());

  let inlineImagePath = env.WORKSHOP_IMAGE_PATH;
  if (inlineImagePath && !existsSync(inlineImagePath)) {
    app.log.warn({ path: inlineImagePath }, "WORKSHOP_IMAGE_PATH does not exist; sending without inline image.");
    inlineImagePath = undefined;
  }

  const clock = deps.clock ?? systemClock;
  let roster: Pick<RosterFetcher, "fetch">;
  let mailer: Mailer;
  try {
    roster = deps.roster ?? new RosterFetcher(
      new GoogleSheetsRosterSource(requireSheetCredentials(env)),
      rosterOptionsFromEnv(env),
      clock,
    );

    if (deps.mailer) {
      mailer = deps.mailer;
    } else {
      const smtp = new SmtpMailer(requireSmtpCredentials(env), { inlineImagePath });
      closers.push(() => smtp.close());
      mailer = smtp;
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      app.log.fatal({ code: error.code, variables: error.variables }, error.message);
    } else {
      app.log.fatal({ err: error }, "failed to build collaborators");
    }
    await releaseResources();
    await app.close();
    throw error;
  }

  const dispatcher = new ReminderDispatcher({
    roster,
    mailer,
    store,
    clock,
    logger: app.log,
    policy: policyFromEnv(env),
    schedule: scheduleFromEnv(env),
    workshop: { ...workshopDetailsFromEnv(env), hasInlineImage: Boolean(inlineImagePath) },
  });

  const scheduler = new ReminderScheduler(dispatcher, {
    intervalMs: env.POLL_INTERVAL_SECONDS * 1000,
    logger: app.log,
  });

  app.decorate("reminders", { dispatcher, store, scheduler });
  app.addHook("onClose", async () => {
    await scheduler.stop();
    await releaseResources();
  });

  await registerHealthRoutes(app);
  await registerReminderRoutes(app, {
    cronDispatchSecret: env.CRON_DISPATCH_SECRET,
  });

  return app;
}
