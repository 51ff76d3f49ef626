export type { EventEnvelope, EventType } from "./events.js";
export type { Candidate, ReminderKind, SentRecord, TickSummary } from "./reminders.js";
