import { addMinutes, isBefore, isValid, parse, parseISO, subMinutes } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";

const zonedPattern = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;

const isoWallClockFormats = [
  "yyyy-MM-dd HH:mm",
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm",
  "yyyy-MM-dd'T'HH:mm:ss",
];

export interface WorkshopTimeOptions {
  /** IANA zone that wall-clock values are read in. */
  timeZone: string;
  /** Extra date-fns `parse` patterns, e.g. the sheet's locale format `M/d/yyyy H:mm:ss`. */
  formats?: string[];
}

/**
 * Parses a workshop start time from a sheet cell or the environment.
 *
 * Values with an explicit offset (or `Z`) are taken as is. Wall-clock values
 * (ISO without offset, or one of `options.formats`) are read in
 * `options.timeZone`, daylight saving included. Anything else, including a
 * bare date, yields `null`.
 */
export function parseWorkshopTime(value: string, options: WorkshopTimeOptions): Date | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  if (zonedPattern.test(trimmed)) {
    const parsed = parseISO(trimmed);
    return isValid(parsed) ? parsed : null;
  }

  const reference = new Date(0);
  for (const pattern of [...isoWallClockFormats, ...(options.formats ?? [])]) {
    const wallClock = parse(trimmed, pattern, reference);
    if (isValid(wallClock)) {
      const zoned = fromZonedTime(wallClock, options.timeZone);
      return isValid(zoned) ? zoned : null;
    }
  }

  return null;
}

/** `HH:mm` on the workshop's calendar day in `timeZone`. */
export function sameDayAt(workshopTime: Date, time: string, timeZone: string): Date {
  const day = formatInTimeZone(workshopTime, timeZone, "yyyy-MM-dd");
  return fromZonedTime(`${day}T${time}:00`, timeZone);
}

/** `now` falls in `[workshopTime - leadMinutes, workshopTime)`. */
export function isWithinLeadWindow(now: Date, workshopTime: Date, leadMinutes: number): boolean {
  const opensAt = subMinutes(workshopTime, leadMinutes);
  return !isBefore(now, opensAt) && isBefore(now, workshopTime);
}

/**
 * `now` falls in `[dayOfTime on the workshop day, workshopTime - leadMinutes)`.
 * Empty when the day-of time is already inside the lead window.
 */
export function isWithinDayOfWindow(
  now: Date,
  workshopTime: Date,
  options: { time: string; timeZone: string; leadMinutes: number },
): boolean {
  const opensAt = sameDayAt(workshopTime, options.time, options.timeZone);
  const closesAt = subMinutes(workshopTime, options.leadMinutes);
  return !isBefore(now, opensAt) && isBefore(now, closesAt);
}

/** `now` falls in `[workshopTime, workshopTime + windowMinutes)`; a zero window never matches. */
export function isWithinStartWindow(now: Date, workshopTime: Date, windowMinutes: number): boolean {
  if (windowMinutes <= 0) {
    return false;
  }

  const closesAt = addMinutes(workshopTime, windowMinutes);
  return !isBefore(now, workshopTime) && isBefore(now, closesAt);
}
