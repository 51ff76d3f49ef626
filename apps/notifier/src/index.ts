import dotenv from "dotenv";
import { getEnv } from "./lib/env.js";
import { buildApp } from "./server.js";

dotenv.config();

const env = getEnv(process.env);
const app = await buildApp({ env });

await app.listen({
  host: "0.0.0.0",
  port: env.PORT,
});

app.reminders.scheduler.start();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ err: error }, "shutdown failed");
        process.exit(1);
      },
    );
  });
}
