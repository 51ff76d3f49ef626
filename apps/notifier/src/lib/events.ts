import type { EventEnvelope, EventType } from "@workshop-reminders/contracts";

export function buildEvent<TData>(eventType: EventType, data: TData, occurredAt: Date): EventEnvelope<TData> {
  return {
    event_type: eventType,
    occurred_at: occurredAt.toISOString(),
    data,
  };
}
