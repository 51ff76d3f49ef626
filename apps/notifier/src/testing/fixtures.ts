import type { Candidate } from "@workshop-reminders/contracts";
import type { Clock } from "../lib/clock.js";
import type { AppEnv } from "../lib/env.js";
import { getEnv } from "../lib/env.js";
import type { Logger } from "../lib/logger.js";
import { SendError } from "../lib/errors.js";
import type { MailMessage, MailReceipt, Mailer } from "../services/mailer.js";
import type { Roster } from "../services/roster-fetcher.js";

const noop = (): void => {};

export const silentLogger: Logger = {
  fatal: noop,
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
};

export function testEnv(overrides: NodeJS.ProcessEnv = {}): AppEnv {
  return getEnv({
    NODE_ENV: "test",
    WORKSHOP_TITLE: "Intro Workshop",
    WORKSHOP_URL: "https://meet.example.test/intro",
    CRON_DISPATCH_SECRET: "test-cron-secret",
    ...overrides,
  });
}

/** A clock that only moves when told to. */
export class ManualClock {
  private current: Date;

  public constructor(start: string) {
    this.current = new Date(start);
  }

  public readonly now: Clock = () => new Date(this.current.getTime());

  public set(iso: string): void {
    this.current = new Date(iso);
  }

  public advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }
}

export class RecordingMailer implements Mailer {
  public readonly sent: MailMessage[] = [];
  public failFor = new Set<string>();

  public async send(message: MailMessage): Promise<MailReceipt> {
    if (this.failFor.has(message.to)) {
      throw new SendError(message.to, "smtp unavailable");
    }

    this.sent.push(message);
    return { messageId: `<msg-${this.sent.length}@test>` };
  }

  public subjectsFor(email: string): string[] {
    return this.sent.filter((message) => message.to === email).map((message) => message.subject);
  }
}

export class StaticRoster {
  public failure: Error | null = null;

  public constructor(public candidates: Candidate[]) {}

  public async fetch(): Promise<Roster> {
    if (this.failure) {
      throw this.failure;
    }

    return { candidates: this.candidates, skipped: [] };
  }
}

export function candidate(email: string, workshopTime: string, name = "Asha Rao"): Candidate {
  return { name, email, workshopTime: new Date(workshopTime) };
}
