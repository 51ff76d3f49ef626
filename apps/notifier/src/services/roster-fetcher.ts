import { subMinutes } from "date-fns";
import { google, type sheets_v4 } from "googleapis";
import { z } from "zod";
import type { Candidate } from "@workshop-reminders/contracts";
import type { AppEnv, SheetCredentials } from "../lib/env.js";
import { systemClock, type Clock } from "../lib/clock.js";
import { isEmailAddress, normalizeEmail } from "../lib/email-address.js";
import { ConfigError, errorMessage, FetchError } from "../lib/errors.js";
import { scheduleFromEnv, upcomingSessions, type WorkshopSchedule } from "../lib/workshop-schedule.js";
import { parseWorkshopTime } from "../lib/workshop-time.js";

const sheetsScopes = ["https://www.googleapis.com/auth/spreadsheets.readonly"];
const fallbackName = "Participant";

export interface RosterSource {
  /** Raw cell grid, header row first. */
  fetchRows(): Promise<string[][]>;
}

const serviceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
});

function readServiceAccount(json: string): z.infer<typeof serviceAccountSchema> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ConfigError(["GOOGLE_SERVICE_ACCOUNT_JSON"], { reason: "not valid JSON", cause: error });
  }

  const parsed = serviceAccountSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(["GOOGLE_SERVICE_ACCOUNT_JSON"], {
      reason: "expected a service account key with client_email and private_key",
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export class GoogleSheetsRosterSource implements RosterSource {
  private readonly sheets: sheets_v4.Sheets;

  /** @throws ConfigError when the service account JSON is unusable. */
  public constructor(private readonly credentials: SheetCredentials) {
    const account = readServiceAccount(credentials.serviceAccountJson);
    const auth = new google.auth.JWT({
      email: account.client_email,
      key: account.private_key,
      scopes: sheetsScopes,
    });

    this.sheets = google.sheets({ version: "v4", auth });
  }

  public async fetchRows(): Promise<string[][]> {
    const response = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.credentials.sheetId,
      range: this.credentials.sheetName,
      valueRenderOption: "FORMATTED_VALUE",
    });

    const values: unknown[][] = response.data.values ?? [];
    return values.map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
  }
}

export interface RosterOptions {
  nameHeader: string;
  emailHeader: string;
  workshopTimeHeader: string;
  timeZone: string;
  /** date-fns `parse` patterns for the sheet's own timestamp format. */
  timeFormats?: string[];
  defaultWorkshopTime?: string;
  /** Rows without a time of their own fall back to the next session of this schedule. */
  schedule?: WorkshopSchedule | null;
  /** How long a started session still counts as the next one. */
  sessionGraceMinutes?: number;
}

export function rosterOptionsFromEnv(env: AppEnv): RosterOptions {
  return {
    nameHeader: env.SHEET_NAME_HEADER,
    emailHeader: env.SHEET_EMAIL_HEADER,
    workshopTimeHeader: env.SHEET_WORKSHOP_TIME_HEADER,
    timeZone: env.WORKSHOP_TIMEZONE,
    timeFormats: env.SHEET_WORKSHOP_TIME_FORMATS,
    defaultWorkshopTime: env.WORKSHOP_DATETIME,
    schedule: scheduleFromEnv(env),
    sessionGraceMinutes: env.STARTING_NOW_WINDOW_MINUTES,
  };
}

export type SkipReason = "missing_email" | "invalid_email" | "missing_workshop_time" | "invalid_workshop_time" | "duplicate_email";

export interface SkippedRow {
  /** 1-based sheet row number, header included. */
  row: number;
  reason: SkipReason;
}

export interface Roster {
  candidates: Candidate[];
  skipped: SkippedRow[];
}

function headerIndex(header: string[], name: string): number {
  const wanted = name.trim().toLowerCase();
  return header.findIndex((cell) => cell.trim().toLowerCase() === wanted);
}

function cellAt(row: string[], index: number): string {
  return index >= 0 ? (row[index] ?? "").trim() : "";
}

function nextScheduledSession(options: RosterOptions, now: Date): Date | null {
  if (!options.schedule) {
    return null;
  }

  const from = subMinutes(now, options.sessionGraceMinutes ?? 0);
  return upcomingSessions(options.schedule, from, 1)[0] ?? null;
}

/**
 * Maps a sheet grid to candidates. Only a missing email column is fatal;
 * individual bad rows are skipped and reported.
 *
 * A row's workshop time comes from its own cell, then `defaultWorkshopTime`,
 * then the schedule's next session as seen from `now`.
 */
export function parseRoster(rows: string[][], options: RosterOptions, now: Date = new Date()): Roster {
  const [header, ...body] = rows;
  if (!header) {
    return { candidates: [], skipped: [] };
  }

  const emailColumn = headerIndex(header, options.emailHeader);
  if (emailColumn < 0) {
    throw new FetchError("roster_malformed", `Sheet has no "${options.emailHeader}" column`);
  }

  const nameColumn = headerIndex(header, options.nameHeader);
  const timeColumn = headerIndex(header, options.workshopTimeHeader);
  const timeOptions = { timeZone: options.timeZone, formats: options.timeFormats };
  const scheduled = nextScheduledSession(options, now);

  const candidates: Candidate[] = [];
  const skipped: SkippedRow[] = [];
  const seen = new Set<string>();

  body.forEach((row, offset) => {
    const rowNumber = offset + 2;
    const rawEmail = cellAt(row, emailColumn);

    if (!rawEmail) {
      // Trailing blank rows are common in form-backed sheets.
      if (row.every((cell) => cell.trim() === "")) {
        return;
      }
      skipped.push({ row: rowNumber, reason: "missing_email" });
      return;
    }

    const email = normalizeEmail(rawEmail);
    if (!isEmailAddress(email)) {
      skipped.push({ row: rowNumber, reason: "invalid_email" });
      return;
    }

    const rawTime = cellAt(row, timeColumn) || options.defaultWorkshopTime?.trim() || "";
    if (!rawTime && !scheduled) {
      skipped.push({ row: rowNumber, reason: "missing_workshop_time" });
      return;
    }

    const workshopTime = rawTime ? parseWorkshopTime(rawTime, timeOptions) : scheduled;
    if (!workshopTime) {
      skipped.push({ row: rowNumber, reason: "invalid_workshop_time" });
      return;
    }

    if (seen.has(email)) {
      skipped.push({ row: rowNumber, reason: "duplicate_email" });
      return;
    }
    seen.add(email);

    candidates.push({
      name: cellAt(row, nameColumn) || fallbackName,
      email,
      workshopTime,
    });
  });

  return { candidates, skipped };
}

export class RosterFetcher {
  public constructor(
    private readonly source: RosterSource,
    private readonly options: RosterOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  /** @throws FetchError when the source fails or the sheet shape is unusable. */
  public async fetch(): Promise<Roster> {
    let rows: string[][];
    try {
      rows = await this.source.fetchRows();
    } catch (error) {
      throw new FetchError("roster_fetch_failed", errorMessage(error, "roster source failed"), { cause: error });
    }

    return parseRoster(rows, this.options, this.clock());
  }
}
