import dotenv from "dotenv";
import { createDbPool } from "../lib/db.js";
import { getEnv } from "../lib/env.js";
import { ConfigError } from "../lib/errors.js";
import { applySchema } from "../lib/schema.js";

dotenv.config();

const env = getEnv(process.env);
if (!env.DATABASE_URL) {
  throw new ConfigError(["DATABASE_URL"]);
}

const db = createDbPool(env.DATABASE_URL);
try {
  await applySchema(db);
  console.log("sent_records schema applied");
} finally {
  await db.end();
}
