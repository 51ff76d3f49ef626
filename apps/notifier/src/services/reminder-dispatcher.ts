import type { Candidate, ReminderKind, TickSummary } from "@workshop-reminders/contracts";
import type { Clock } from "../lib/clock.js";
import { renderReminderEmail, type RenderContext, type WorkshopDetails } from "../lib/email-templates.js";
import { errorMessage, FetchError } from "../lib/errors.js";
import { buildEvent } from "../lib/events.js";
import type { Logger } from "../lib/logger.js";
import { duePlan, type ReminderPolicy } from "../lib/reminder-policy.js";
import { upcomingSessions, type WorkshopSchedule } from "../lib/workshop-schedule.js";
import type { SentRecordsRepo } from "../repos/sent-records-repo.js";
import type { Mailer } from "./mailer.js";
import type { RosterFetcher } from "./roster-fetcher.js";

export interface ReminderDispatcherDeps {
  roster: Pick<RosterFetcher, "fetch">;
  mailer: Mailer;
  store: SentRecordsRepo;
  clock: Clock;
  logger: Logger;
  policy: ReminderPolicy;
  workshop: WorkshopDetails;
  /** When set, confirmations list the next sessions. */
  schedule?: WorkshopSchedule | null;
}

const listedSessions = 3;

type SendOutcome = "sent" | "failed" | "unrecorded";

export class ReminderDispatcher {
  private inFlight: Promise<TickSummary> | null = null;
  private lastSummary: TickSummary | null = null;

  public constructor(private readonly deps: ReminderDispatcherDeps) {}

  public get lastTick(): TickSummary | null {
    return this.lastSummary;
  }

  /** Runs one tick. A call made while a tick is running shares that tick's result. */
  public runTick(): Promise<TickSummary> {
    if (!this.inFlight) {
      this.inFlight = this.tick().finally(() => {
        this.inFlight = null;
      });
    }

    return this.inFlight;
  }

  private async tick(): Promise<TickSummary> {
    const { logger, clock } = this.deps;
    const startedAt = clock();
    const summary: TickSummary = {
      startedAt: startedAt.toISOString(),
      candidates: 0,
      skippedRows: 0,
      sent: 0,
      failed: 0,
      unrecorded: 0,
      fetchFailed: false,
    };

    let candidates: Candidate[];
    try {
      const roster = await this.deps.roster.fetch();
      candidates = roster.candidates;
      summary.candidates = roster.candidates.length;
      summary.skippedRows = roster.skipped.length;

      for (const skipped of roster.skipped) {
        logger.warn({ row: skipped.row, reason: skipped.reason }, "roster row skipped");
      }
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }

      summary.fetchFailed = true;
      logger.warn(
        buildEvent("roster_fetch_failed", { code: error.code, message: error.message }, clock()),
        "roster fetch failed; retrying next tick",
      );
      return this.finish(summary);
    }

    const context: RenderContext = {
      upcomingSessions: this.deps.schedule ? upcomingSessions(this.deps.schedule, startedAt, listedSessions) : [],
    };

    for (const candidate of candidates) {
      const alreadySent = await this.deps.store.listKinds(candidate.email);
      const plan = duePlan(candidate, clock(), this.deps.policy, alreadySent);

      for (const kind of plan) {
        const outcome = await this.deliver(candidate, kind, context);
        summary[outcome] += 1;
      }
    }

    return this.finish(summary);
  }

  private async deliver(candidate: Candidate, kind: ReminderKind, context: RenderContext): Promise<SendOutcome> {
    const { logger, clock } = this.deps;
    const email = renderReminderEmail(kind, candidate, this.deps.workshop, context);

    let messageId: string | null;
    try {
      const receipt = await this.deps.mailer.send({ to: candidate.email, ...email });
      messageId = receipt.messageId;
    } catch (error) {
      logger.warn(
        buildEvent("reminder_failed", { email: candidate.email, kind, message: errorMessage(error, "send_failed") }, clock()),
        "reminder send failed; retrying next tick",
      );
      return "failed";
    }

    const sentAt = clock();
    try {
      await this.deps.store.record({
        candidateEmail: candidate.email,
        reminderKind: kind,
        workshopTime: candidate.workshopTime.toISOString(),
        messageId,
        sentAt: sentAt.toISOString(),
      });
    } catch (error) {
      logger.error(
        { email: candidate.email, kind, err: error },
        "reminder sent but not recorded; it may be sent again",
      );
      return "unrecorded";
    }

    logger.info(buildEvent("reminder_sent", { email: candidate.email, kind, messageId }, sentAt), "reminder sent");
    return "sent";
  }

  private finish(summary: TickSummary): TickSummary {
    this.lastSummary = summary;
    this.deps.logger.info(buildEvent("tick_completed", summary, this.deps.clock()), "tick completed");
    return summary;
  }
}
