export type ReminderKind = "confirmation" | "day_of_reminder" | "one_hour_reminder" | "starting_now";

export interface Candidate {
  name: string;
  email: string;
  workshopTime: Date;
}

export interface SentRecord {
  candidateEmail: string;
  reminderKind: ReminderKind;
  workshopTime: string;
  messageId: string | null;
  sentAt: string;
}

export interface TickSummary {
  startedAt: string;
  candidates: number;
  skippedRows: number;
  sent: number;
  failed: number;
  unrecorded: number;
  fetchFailed: boolean;
}
