import type { SentRecordsRepo } from "../repos/sent-records-repo.js";
import type { ReminderDispatcher } from "../services/reminder-dispatcher.js";
import type { ReminderScheduler } from "../services/scheduler.js";

declare module "fastify" {
  interface FastifyInstance {
    reminders: {
      dispatcher: ReminderDispatcher;
      store: SentRecordsRepo;
      scheduler: ReminderScheduler;
    };
  }
}
