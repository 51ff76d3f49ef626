import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { SentRecord } from "@workshop-reminders/contracts";
import { reminderKinds } from "../lib/reminder-policy.js";
import { MemorySentRecordsRepo } from "./memory-sent-records-repo.js";

const sentRecordSchema = z.object({
  candidateEmail: z.string().min(1),
  reminderKind: z.enum(reminderKinds),
  workshopTime: z.string(),
  messageId: z.string().nullable(),
  sentAt: z.string(),
});

const fileSchema = z.object({
  version: z.literal(1),
  records: z.array(sentRecordSchema),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Sent records kept in a JSON file. The whole file is loaded once on open
 * and rewritten through a temp file + rename after every insert.
 */
export class FileSentRecordsRepo extends MemorySentRecordsRepo {
  private constructor(
    private readonly filePath: string,
    initial: SentRecord[],
  ) {
    super(initial);
  }

  public static async open(filePath: string): Promise<FileSentRecordsRepo> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return new FileSentRecordsRepo(filePath, []);
      }
      throw error;
    }

    const parsed = fileSchema.parse(JSON.parse(raw));
    return new FileSentRecordsRepo(filePath, parsed.records);
  }

  public override async record(record: SentRecord): Promise<boolean> {
    const key = this.insert(record);
    if (key === null) {
      return false;
    }

    try {
      await this.flush();
    } catch (error) {
      this.records.delete(key);
      throw error;
    }

    return true;
  }

  private async flush(): Promise<void> {
    const body = JSON.stringify({ version: 1, records: [...this.records.values()] }, null, 2);
    const tempPath = `${this.filePath}.tmp`;

    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tempPath, body, "utf8");
    await rename(tempPath, this.filePath);
  }
}
