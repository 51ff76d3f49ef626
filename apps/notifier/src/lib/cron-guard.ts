import { timingSafeEqual } from "node:crypto";
import type { FastifyReply, FastifyRequest } from "fastify";

function secretsMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireCronSecret(secret: string | undefined) {
  return async function checkCronSecret(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    if (!secret) {
      return reply.code(503).send({ error: "dispatch_secret_not_configured" });
    }

    const header = request.headers["x-cron-secret"];
    if (typeof header !== "string" || !secretsMatch(secret, header)) {
      return reply.code(401).send({ error: "unauthorized" });
    }
  };
}
