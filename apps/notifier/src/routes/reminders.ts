import type { FastifyInstance } from "fastify";
import { z, ZodError } from "zod";
import { requireCronSecret } from "../lib/cron-guard.js";

interface ReminderRouteDeps {
  cronDispatchSecret?: string;
}

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export async function registerReminderRoutes(app: FastifyInstance, deps: ReminderRouteDeps): Promise<void> {
  const guard = requireCronSecret(deps.cronDispatchSecret);

  app.post("/internal/reminders/dispatch", { preHandler: [guard] }, async (request, reply) => {
    try {
      const summary = await app.reminders.dispatcher.runTick();
      return reply.send(summary);
    } catch (error) {
      request.log.error({ err: error }, "manual dispatch failed");
      return reply.code(500).send({ error: "dispatch_failed" });
    }
  });

  app.get("/internal/reminders/sent", { preHandler: [guard] }, async (request, reply) => {
    try {
      const query = listQuerySchema.parse(request.query ?? {});
      const [items, total] = await Promise.all([
        app.reminders.store.list(query.limit),
        app.reminders.store.count(),
      ]);
      return reply.send({ items, total });
    } catch (error) {
      if (error instanceof ZodError) {
        return reply.code(400).send({ error: "validation_error", details: error.flatten() });
      }

      request.log.error({ err: error }, "listing sent records failed");
      return reply.code(500).send({ error: "sent_records_unavailable" });
    }
  });
}
