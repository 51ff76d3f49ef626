import type { FastifyInstance } from "fastify";

export async function registerHealthRoutes(app: FastifyInstance): Promise<void> {
  app.get("/health", async () => {
    return {
      status: "ok",
      service: "workshop-reminders",
      ts: new Date().toISOString(),
    };
  });

  app.get("/ready", async () => {
    const lastTick = app.reminders.dispatcher.lastTick;

    return {
      status: lastTick ? "ready" : "starting",
      checks: {
        scheduler: app.reminders.scheduler.isRunning,
        lastTickAt: lastTick?.startedAt ?? null,
      },
    };
  });
}
