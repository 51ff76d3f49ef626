import type { Candidate, ReminderKind } from "@workshop-reminders/contracts";
import type { AppEnv } from "./env.js";
import { isWithinDayOfWindow, isWithinLeadWindow, isWithinStartWindow } from "./workshop-time.js";

export const reminderKinds = [
  "confirmation",
  "day_of_reminder",
  "one_hour_reminder",
  "starting_now",
] as const satisfies readonly ReminderKind[];

export interface ReminderPolicy {
  leadMinutes: number;
  startingNowWindowMinutes: number;
  /** Local `HH:mm` for the morning-of email; `null` turns it off. */
  dayOfTime: string | null;
  timeZone: string;
}

export function policyFromEnv(env: AppEnv): ReminderPolicy {
  return {
    leadMinutes: env.REMINDER_LEAD_MINUTES,
    startingNowWindowMinutes: env.STARTING_NOW_WINDOW_MINUTES,
    dayOfTime: env.DAY_OF_REMINDER_TIME ?? null,
    timeZone: env.WORKSHOP_TIMEZONE,
  };
}

function isDue(kind: ReminderKind, candidate: Candidate, now: Date, policy: ReminderPolicy): boolean {
  switch (kind) {
    case "confirmation":
      return true;
    case "day_of_reminder":
      return (
        policy.dayOfTime !== null &&
        isWithinDayOfWindow(now, candidate.workshopTime, {
          time: policy.dayOfTime,
          timeZone: policy.timeZone,
          leadMinutes: policy.leadMinutes,
        })
      );
    case "one_hour_reminder":
      return isWithinLeadWindow(now, candidate.workshopTime, policy.leadMinutes);
    case "starting_now":
      return isWithinStartWindow(now, candidate.workshopTime, policy.startingNowWindowMinutes);
  }
}

/**
 * Reminder kinds owed to `candidate` at `now`, in send order.
 * Kinds in `alreadySent` are never returned.
 */
export function duePlan(
  candidate: Candidate,
  now: Date,
  policy: ReminderPolicy,
  alreadySent: ReadonlySet<ReminderKind>,
): ReminderKind[] {
  return reminderKinds.filter((kind) => !alreadySent.has(kind) && isDue(kind, candidate, now, policy));
}
