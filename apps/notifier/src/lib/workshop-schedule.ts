import { addDays, isAfter } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";
import type { AppEnv } from "./env.js";

/** A workshop that repeats on fixed weekdays at the same local start time. */
export interface WorkshopSchedule {
  /** 0 = Sunday ... 6 = Saturday, in `timeZone`. */
  days: readonly number[];
  /** Local `HH:mm`. */
  startTime: string;
  timeZone: string;
}

export function scheduleFromEnv(env: AppEnv): WorkshopSchedule | null {
  if (!env.WORKSHOP_DAYS || env.WORKSHOP_DAYS.length === 0) {
    return null;
  }

  return {
    days: env.WORKSHOP_DAYS,
    startTime: env.WORKSHOP_START_TIME,
    timeZone: env.WORKSHOP_TIMEZONE,
  };
}

/**
 * The next `count` session starts strictly after `from`, earliest first.
 * Calendar days are walked in the schedule's zone, so a session always lands
 * on its local weekday and local start time across DST changes.
 */
export function upcomingSessions(schedule: WorkshopSchedule, from: Date, count: number): Date[] {
  if (count <= 0 || schedule.days.length === 0) {
    return [];
  }

  const sessions: Date[] = [];
  // Noon UTC on the local calendar day keeps day stepping clear of offset edges.
  let cursor = new Date(`${formatInTimeZone(from, schedule.timeZone, "yyyy-MM-dd")}T12:00:00Z`);

  // One spare week absorbs sessions earlier today that have already passed.
  const limit = 7 * (Math.ceil(count / schedule.days.length) + 1);
  for (let step = 0; step < limit && sessions.length < count; step += 1) {
    const day = cursor.toISOString().slice(0, 10);
    if (schedule.days.includes(cursor.getUTCDay())) {
      const start = fromZonedTime(`${day}T${schedule.startTime}:00`, schedule.timeZone);
      if (isAfter(start, from)) {
        sessions.push(start);
      }
    }
    cursor = addDays(cursor, 1);
  }

  return sessions;
}
