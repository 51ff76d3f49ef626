import { z } from "zod";
import { ConfigError } from "./errors.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected HH:mm");

const weekdayNames = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"];

function parseWeekdays(value: string): number[] | null {
  const days = new Set<number>();
  for (const part of value.split(",")) {
    const index = weekdayNames.indexOf(part.trim().slice(0, 3).toLowerCase());
    if (index === -1) {
      return null;
    }
    days.add(index);
  }
  return [...days].sort((a, b) => a - b);
}

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(8080),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  SMTP_HOST: z.string().min(1).default("smtp.gmail.com"),
  SMTP_PORT: z.coerce.number().int().positive().default(465),
  SMTP_SECURE: booleanFlag.default("true"),
  SENDER_EMAIL: z.string().email().optional(),
  SENDER_PASSWORD: z.string().min(1).optional(),
  SENDER_NAME: z.string().min(1).default("Workshop Team"),

  GOOGLE_SERVICE_ACCOUNT_JSON: z.string().min(2).optional(),
  SHEET_ID: z.string().min(1).optional(),
  SHEET_NAME: z.string().min(1).default("New Responses"),
  SHEET_NAME_HEADER: z.string().min(1).default("Name"),
  SHEET_EMAIL_HEADER: z.string().min(1).default("Email"),
  SHEET_WORKSHOP_TIME_HEADER: z.string().min(1).default("Workshop Time"),
  SHEET_WORKSHOP_TIME_FORMATS: z
    .string()
    .min(1)
    .default("M/d/yyyy H:mm:ss|M/d/yyyy H:mm")
    .transform((value) => value.split("|").map((format) => format.trim()).filter(Boolean)),

  POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  REMINDER_LEAD_MINUTES: z.coerce.number().int().positive().default(60),
  STARTING_NOW_WINDOW_MINUTES: z.coerce.number().int().min(0).default(10),
  DAY_OF_REMINDER_TIME: clockTime.optional(),

  WORKSHOP_TITLE: z.string().min(1).default("Workshop"),
  WORKSHOP_URL: z.string().url().optional(),
  WORKSHOP_DATETIME: z.string().min(1).optional(),
  WORKSHOP_TIMEZONE: z
    .string()
    .min(1)
    .default("Asia/Kolkata")
    .refine(isKnownTimeZone, { message: "Unknown IANA time zone" }),
  WORKSHOP_DAYS: z
    .string()
    .transform((value, ctx) => {
      const days = parseWeekdays(value);
      if (!days) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected weekdays like tue,fri,sun" });
        return z.NEVER;
      }
      return days;
    })
    .optional(),
  WORKSHOP_START_TIME: clockTime.default("20:00"),
  WORKSHOP_IMAGE_PATH: z.string().min(1).optional(),

  SENT_RECORDS_FILE: z.string().min(1).default("data/sent-records.json"),
  DATABASE_URL: z.string().url().optional(),
  CRON_DISPATCH_SECRET: z.string().min(8).optional(),
});

export type AppEnv = z.infer<typeof envSchema>;

// Blank entries (`KEY=` in .env) count as unset.
export function getEnv(input: NodeJS.ProcessEnv): AppEnv {
  const present = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== ""));
  return envSchema.parse(present);
}

export interface SmtpCredentials {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  senderName: string;
}

export interface SheetCredentials {
  serviceAccountJson: string;
  sheetId: string;
  sheetName: string;
}

export function requireSmtpCredentials(env: AppEnv): SmtpCredentials {
  const missing = [
    env.SENDER_EMAIL ? null : "SENDER_EMAIL",
    env.SENDER_PASSWORD ? null : "SENDER_PASSWORD",
  ].filter((name): name is string => name !== null);

  if (!env.SENDER_EMAIL || !env.SENDER_PASSWORD) {
    throw new ConfigError(missing);
  }

  return {
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    user: env.SENDER_EMAIL,
    password: env.SENDER_PASSWORD,
    senderName: env.SENDER_NAME,
  };
}

export function requireSheetCredentials(env: AppEnv): SheetCredentials {
  const missing = [
    env.GOOGLE_SERVICE_ACCOUNT_JSON ? null : "GOOGLE_SERVICE_ACCOUNT_JSON",
    env.SHEET_ID ? null : "SHEET_ID",
  ].filter((name): name is string => name !== null);

  if (!env.GOOGLE_SERVICE_ACCOUNT_JSON || !env.SHEET_ID) {
    throw new ConfigError(missing);
  }

  return {
    serviceAccountJson: env.GOOGLE_SERVICE_ACCOUNT_JSON,
    sheetId: env.SHEET_ID,
    sheetName: env.SHEET_NAME,
  };
}
