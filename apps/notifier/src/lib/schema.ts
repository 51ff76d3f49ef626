import { readFile } from "node:fs/promises";

export const schemaUrl = new URL("../../db/schema.sql", import.meta.url);

export interface SqlRunner {
  query(sql: string): Promise<unknown>;
}

export function readSchema(): Promise<string> {
  return readFile(schemaUrl, "utf8");
}

/** Creates or updates the `sent_records` table. Safe to run repeatedly. */
export async function applySchema(db: SqlRunner): Promise<void> {
  await db.query(await readSchema());
}
