import type { Candidate, ReminderKind } from "@workshop-reminders/contracts";
import type { AppEnv } from "./env.js";

export const workshopImageCid = "workshop-image";

export interface WorkshopDetails {
  title: string;
  url?: string;
  timeZone: string;
  leadMinutes: number;
  hasInlineImage: boolean;
}

export interface RenderContext {
  /** Listed in the confirmation when the workshop repeats on a schedule. */
  upcomingSessions?: readonly Date[];
}

export interface RenderedEmail {
  subject: string;
  html: string;
  text: string;
}

export function workshopDetailsFromEnv(env: AppEnv): WorkshopDetails {
  return {
    title: env.WORKSHOP_TITLE,
    url: env.WORKSHOP_URL,
    timeZone: env.WORKSHOP_TIMEZONE,
    leadMinutes: env.REMINDER_LEAD_MINUTES,
    hasInlineImage: Boolean(env.WORKSHOP_IMAGE_PATH),
  };
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** e.g. `Friday, August 15, 2025, 3:00 PM (Asia/Kolkata)` */
export function formatWorkshopTime(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    weekday: "long",
    month: "long",
    day: "numeric",
    year: "numeric",
    hour: "numeric",
    minute: "2-digit",
    hour12: true,
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((item) => item.type === type)?.value ?? "";

  return `${part("weekday")}, ${part("month")} ${part("day")}, ${part("year")}, ${part("hour")}:${part("minute")} ${part("dayPeriod")} (${timeZone})`;
}

export function formatLead(minutes: number): string {
  if (minutes % 60 === 0) {
    const hours = minutes / 60;
    return hours === 1 ? "1 hour" : `${hours} hours`;
  }

  return minutes === 1 ? "1 minute" : `${minutes} minutes`;
}

interface Copy {
  subject: string;
  heading: string;
  intro: string;
}

function copyFor(kind: ReminderKind, workshop: WorkshopDetails): Copy {
  switch (kind) {
    case "confirmation":
      return {
        subject: `Your ${workshop.title} registration is confirmed`,
        heading: "Registration Confirmed",
        intro: `You are confirmed for ${workshop.title}.`,
      };
    case "day_of_reminder":
      return {
        subject: `Reminder: ${workshop.title} starts today`,
        heading: "See You Today",
        intro: `${workshop.title} is on today.`,
      };
    case "one_hour_reminder": {
      const lead = formatLead(workshop.leadMinutes);
      return {
        subject: `Reminder: ${workshop.title} starts in ${lead}`,
        heading: "Workshop Reminder",
        intro: `${workshop.title} starts in ${lead}.`,
      };
    }
    case "starting_now":
      return {
        subject: `${workshop.title} is starting now`,
        heading: "Starting Now",
        intro: `${workshop.title} is starting now. Don't miss it!`,
      };
  }
}

export function renderReminderEmail(
  kind: ReminderKind,
  candidate: Candidate,
  workshop: WorkshopDetails,
  context: RenderContext = {},
): RenderedEmail {
  const copy = copyFor(kind, workshop);
  const when = formatWorkshopTime(candidate.workshopTime, workshop.timeZone);
  const sessions =
    kind === "confirmation"
      ? (context.upcomingSessions ?? []).map((session) => formatWorkshopTime(session, workshop.timeZone))
      : [];

  const html = [
    "<html>",
    "<body>",
    `<h2>${escapeHtml(copy.heading)}</h2>`,
    `<p>Dear <b>${escapeHtml(candidate.name)}</b>,</p>`,
    `<p>${escapeHtml(copy.intro)}</p>`,
    `<p>${escapeHtml(when)}</p>`,
    sessions.length > 0 ? "<p>Upcoming sessions:</p>" : "",
    sessions.length > 0 ? `<ul>${sessions.map((item) => `<li>${escapeHtml(item)}</li>`).join("")}</ul>` : "",
    workshop.url ? `<p><a href="${escapeHtml(workshop.url)}">Join here</a></p>` : "",
    workshop.hasInlineImage
      ? `<img src="cid:${workshopImageCid}" alt="${escapeHtml(workshop.title)}" style="max-width:500px; height:auto;">`
      : "",
    "<p>Reply to this email if you have any questions.</p>",
    "</body>",
    "</html>",
  ]
    .filter((line) => line.length > 0)
    .join("\n");

  const text = [
    `Dear ${candidate.name},`,
    "",
    copy.intro,
    when,
    ...(sessions.length > 0 ? ["", "Upcoming sessions:", ...sessions.map((item) => `- ${item}`)] : []),
    ...(workshop.url ? [`Join here: ${workshop.url}`] : []),
    "",
    "Reply to this email if you have any questions.",
  ].join("\n");

  return { subject: copy.subject, html, text };
}
