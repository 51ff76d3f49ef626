import type { ReminderKind, SentRecord } from "@workshop-reminders/contracts";
import { normalizeEmail } from "../lib/email-address.js";
import type { SentRecordsRepo } from "./sent-records-repo.js";

export class MemorySentRecordsRepo implements SentRecordsRepo {
  protected readonly records = new Map<string, SentRecord>();

  public constructor(initial: SentRecord[] = []) {
    for (const record of initial) {
      this.insert(record);
    }
  }

  public async listKinds(candidateEmail: string): Promise<Set<ReminderKind>> {
    const email = normalizeEmail(candidateEmail);
    const kinds = new Set<ReminderKind>();

    for (const record of this.records.values()) {
      if (record.candidateEmail === email) {
        kinds.add(record.reminderKind);
      }
    }

    return kinds;
  }

  public async record(record: SentRecord): Promise<boolean> {
    return this.insert(record) !== null;
  }

  public async list(limit = 100): Promise<SentRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => b.sentAt.localeCompare(a.sentAt))
      .slice(0, limit);
  }

  public async count(): Promise<number> {
    return this.records.size;
  }

  /** Returns the stored key, or `null` if the pair already existed. */
  protected insert(record: SentRecord): string | null {
    const candidateEmail = normalizeEmail(record.candidateEmail);
    const key = `${candidateEmail}:${record.reminderKind}`;

    if (this.records.has(key)) {
      return null;
    }

    this.records.set(key, { ...record, candidateEmail });
    return key;
  }
}
