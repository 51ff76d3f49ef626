import type { FastifyBaseLogger, FastifyServerOptions } from "fastify";
import type { AppEnv } from "./env.js";

export type Logger = Pick<FastifyBaseLogger, "fatal" | "error" | "warn" | "info" | "debug">;

export function loggerOptions(env: AppEnv): FastifyServerOptions["logger"] {
  if (env.NODE_ENV === "test") {
    return false;
  }

  return { level: env.LOG_LEVEL };
}
