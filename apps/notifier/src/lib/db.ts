import { Pool } from "pg";

export type DbClient = Pool;

export function createDbPool(databaseUrl: string): DbClient {
  return new Pool({
    connectionString: databaseUrl,
    application_name: "workshop-reminders",
    max: 2,
  });
}
