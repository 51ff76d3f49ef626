import test from "node:test";
import assert from "node:assert/strict";
import { buildApp } from "../server.js";
import { ConfigError } from "../lib/errors.js";
import { MemorySentRecordsRepo } from "../repos/memory-sent-records-repo.js";
import { candidate, ManualClock, RecordingMailer, StaticRoster, testEnv } from "../testing/fixtures.js";

const cronHeaders = { "x-cron-secret": "test-cron-secret" };

async function buildTestApp(overrides: NodeJS.ProcessEnv = {}) {
  const mailer = new RecordingMailer();
  const app = await buildApp({
    env: testEnv(overrides),
    clock: new ManualClock("2025-08-15T12:00:00Z").now,
    store: new MemorySentRecordsRepo(),
    roster: new StaticRoster([
      candidate("asha@example.test", "2025-08-15T14:00:00Z"),
      candidate("ravi@example.test", "2025-08-15T12:30:00Z", "Ravi Kumar"),
    ]),
    mailer,
  });

  return { app, mailer };
}

test("dispatch runs one tick and returns its summary", async () => {
  const { app, mailer } = await buildTestApp();

  try {
    const dispatch = await app.inject({
      method: "POST",
      url: "/internal/reminders/dispatch",
      headers: cronHeaders,
    });

    assert.equal(dispatch.statusCode, 200);
    assert.deepEqual(dispatch.json(), {
      startedAt: "2025-08-15T12:00:00.000Z",
      candidates: 2,
      skippedRows: 0,
      sent: 3,
      failed: 0,
      unrecorded: 0,
      fetchFailed: false,
    });
    assert.equal(mailer.sent.length, 3);

    const again = await app.inject({
      method: "POST",
      url: "/internal/reminders/dispatch",
      headers: cronHeaders,
    });
    assert.equal((again.json() as { sent: number }).sent, 0);
  } finally {
    await app.close();
  }
});

test("sent records are listed newest first with a total", async () => {
  const { app } = await buildTestApp();

  try {
    await app.inject({ method: "POST", url: "/internal/reminders/dispatch", headers: cronHeaders });

    const listed = await app.inject({
      method: "GET",
      url: "/internal/reminders/sent?limit=2",
      headers: cronHeaders,
    });

    assert.equal(listed.statusCode, 200);
    const payload = listed.json() as { items: unknown[]; total: number };
    assert.equal(payload.items.length, 2);
    assert.equal(payload.total, 3);

    const invalid = await app.inject({
      method: "GET",
      url: "/internal/reminders/sent?limit=abc",
      headers: cronHeaders,
    });
    assert.equal(invalid.statusCode, 400);
    assert.equal((invalid.json() as { error: string }).error, "validation_error");
  } finally {
    await app.close();
  }
});

test("internal routes reject a missing or wrong cron secret", async () => {
  const { app, mailer } = await buildTestApp();

  try {
    const missing = await app.inject({ method: "POST", url: "/internal/reminders/dispatch" });
    assert.equal(missing.statusCode, 401);
    assert.deepEqual(missing.json(), { error: "unauthorized" });

    const wrong = await app.inject({
      method: "GET",
      url: "/internal/reminders/sent",
      headers: { "x-cron-secret": "not-the-secret" },
    });
    assert.equal(wrong.statusCode, 401);
    assert.equal(mailer.sent.length, 0);
  } finally {
    await app.close();
  }
});

test("internal routes are unavailable without a configured secret", async () => {
  const { app } = await buildTestApp({ CRON_DISPATCH_SECRET: undefined });

  try {
    const response = await app.inject({
      method: "POST",
      url: "/internal/reminders/dispatch",
      headers: cronHeaders,
    });

    assert.equal(response.statusCode, 503);
    assert.deepEqual(response.json(), { error: "dispatch_secret_not_configured" });
  } finally {
    await app.close();
  }
});

test("buildApp halts on missing credentials when no collaborators are injected", async () => {
  await assert.rejects(
    buildApp({ env: testEnv(), store: new MemorySentRecordsRepo() }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.deepEqual(error.variables, ["GOOGLE_SERVICE_ACCOUNT_JSON", "SHEET_ID"]);
      return true;
    },
  );
});

test("buildApp halts when the service account JSON cannot be read", async () => {
  await assert.rejects(
    buildApp({
      env: testEnv({ GOOGLE_SERVICE_ACCOUNT_JSON: "{not json", SHEET_ID: "sheet-1" }),
      store: new MemorySentRecordsRepo(),
      mailer: new RecordingMailer(),
    }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.equal(error.code, "config_invalid");
      assert.deepEqual(error.variables, ["GOOGLE_SERVICE_ACCOUNT_JSON"]);
      return true;
    },
  );
});
