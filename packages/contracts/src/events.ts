export type EventType =
  | "reminder_sent"
  | "reminder_failed"
  | "roster_fetch_failed"
  | "tick_completed";

export interface EventEnvelope<TData = unknown> {
  event_type: EventType;
  occurred_at: string;
  data: TData;
}
