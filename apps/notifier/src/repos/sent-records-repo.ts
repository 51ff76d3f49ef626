import type { ReminderKind, SentRecord } from "@workshop-reminders/contracts";
import type { DbClient } from "../lib/db.js";
import { normalizeEmail } from "../lib/email-address.js";
import { reminderKinds } from "../lib/reminder-policy.js";

export interface SentRecordsRepo {
  listKinds(candidateEmail: string): Promise<Set<ReminderKind>>;
  /** Returns `false` when the (email, kind) pair was already recorded. */
  record(record: SentRecord): Promise<boolean>;
  list(limit?: number): Promise<SentRecord[]>;
  count(): Promise<number>;
}

export function parseReminderKind(value: unknown): ReminderKind {
  const kind = reminderKinds.find((item) => item === value);
  if (!kind) {
    throw new Error(`unknown_reminder_kind: ${String(value)}`);
  }
  return kind;
}

function mapRow(row: Record<string, unknown>): SentRecord {
  return {
    candidateEmail: String(row.candidate_email),
    reminderKind: parseReminderKind(row.reminder_kind),
    workshopTime: new Date(String(row.workshop_time)).toISOString(),
    messageId: row.message_id == null ? null : String(row.message_id),
    sentAt: new Date(String(row.sent_at)).toISOString(),
  };
}

export class PgSentRecordsRepo implements SentRecordsRepo {
  public constructor(private readonly db: DbClient) {}

  public async listKinds(candidateEmail: string): Promise<Set<ReminderKind>> {
    const result = await this.db.query(
      `select reminder_kind
       from sent_records
       where candidate_email = $1`,
      [normalizeEmail(candidateEmail)],
    );

    return new Set(result.rows.map((row: Record<string, unknown>) => parseReminderKind(row.reminder_kind)));
  }

  public async record(record: SentRecord): Promise<boolean> {
    const result = await this.db.query(
      `insert into sent_records (
         candidate_email, reminder_kind, workshop_time, message_id, sent_at
       ) values ($1, $2, $3, $4, $5)
       on conflict (candidate_email, reminder_kind) do nothing`,
      [
        normalizeEmail(record.candidateEmail),
        record.reminderKind,
        record.workshopTime,
        record.messageId,
        record.sentAt,
      ],
    );

    return result.rowCount === 1;
  }

  public async list(limit = 100): Promise<SentRecord[]> {
    const result = await this.db.query(
      `select *
       from sent_records
       order by sent_at desc
       limit $1`,
      [limit],
    );

    return result.rows.map(mapRow);
  }

  public async count(): Promise<number> {
    const result = await this.db.query(`select count(*) as total from sent_records`);
    return Number(result.rows[0]?.total ?? 0);
  }
}
