import { z } from "zod";

const emailSchema = z.string().email();

/** Candidate identity: trimmed and lower-cased. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function isEmailAddress(value: string): boolean {
  return emailSchema.safeParse(value).success;
}
