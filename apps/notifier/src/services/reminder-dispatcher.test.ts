import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { SentRecord } from "@workshop-reminders/contracts";
import type { WorkshopDetails } from "../lib/email-templates.js";
import type { WorkshopSchedule } from "../lib/workshop-schedule.js";
import { FetchError } from "../lib/errors.js";
import { FileSentRecordsRepo } from "../repos/file-sent-records-repo.js";
import { MemorySentRecordsRepo } from "../repos/memory-sent-records-repo.js";
import type { SentRecordsRepo } from "../repos/sent-records-repo.js";
import { candidate, ManualClock, RecordingMailer, silentLogger, StaticRoster } from "../testing/fixtures.js";
import { ReminderDispatcher } from "./reminder-dispatcher.js";

const workshop: WorkshopDetails = {
  title: "Intro Workshop",
  url: "https://meet.example.test/intro",
  timeZone: "UTC",
  leadMinutes: 60,
  hasInlineImage: false,
};

const confirmation = "Your Intro Workshop registration is confirmed";
const reminder = "Reminder: Intro Workshop starts in 1 hour";
const startingNow = "Intro Workshop is starting now";

function setup(options: { store?: SentRecordsRepo; roster?: StaticRoster; schedule?: WorkshopSchedule } = {}) {
  const clock = new ManualClock("2025-08-15T12:00:00Z");
  const mailer = new RecordingMailer();
  const store = options.store ?? new MemorySentRecordsRepo();
  const roster =
    options.roster ??
    new StaticRoster([
      candidate("asha@example.test", "2025-08-15T14:00:00Z"),
      candidate("ravi@example.test", "2025-08-15T12:30:00Z", "Ravi Kumar"),
    ]);

  const dispatcher = new ReminderDispatcher({
    roster,
    mailer,
    store,
    clock: clock.now,
    logger: silentLogger,
    policy: { leadMinutes: 60, startingNowWindowMinutes: 10, dayOfTime: null, timeZone: "UTC" },
    workshop,
    schedule: options.schedule,
  });

  return { clock, mailer, store, roster, dispatcher };
}

test("confirmation is sent exactly once across many ticks", async () => {
  const { clock, mailer, dispatcher } = setup();

  const first = await dispatcher.runTick();
  assert.equal(first.sent, 3);

  for (let i = 0; i < 5; i += 1) {
    clock.advanceMinutes(1);
    await dispatcher.runTick();
  }

  assert.deepEqual(mailer.subjectsFor("asha@example.test"), [confirmation]);
  assert.equal(mailer.subjectsFor("ravi@example.test").filter((subject) => subject === confirmation).length, 1);
});

test("a workshop two hours out gets no reminder on this tick", async () => {
  const { mailer, dispatcher } = setup();

  await dispatcher.runTick();

  assert.deepEqual(mailer.subjectsFor("asha@example.test"), [confirmation]);
});

test("a workshop thirty minutes out gets exactly one reminder", async () => {
  const { clock, mailer, dispatcher } = setup();

  await dispatcher.runTick();
  clock.advanceMinutes(5);
  await dispatcher.runTick();

  assert.deepEqual(mailer.subjectsFor("ravi@example.test"), [confirmation, reminder]);
});

test("reminders follow the workshop timeline and are never repeated", async () => {
  const { clock, mailer, dispatcher } = setup();

  for (const at of ["12:00:00", "12:59:59", "13:00:00", "13:30:00", "14:00:00", "14:09:00", "14:20:00"]) {
    clock.set(`2025-08-15T${at}Z`);
    await dispatcher.runTick();
  }

  assert.deepEqual(mailer.subjectsFor("asha@example.test"), [confirmation, reminder, startingNow]);
  assert.equal(mailer.sent.find((message) => message.subject === reminder && message.to === "asha@example.test")?.text.split("\n")[3], "Friday, August 15, 2025, 2:00 PM (UTC)");
});

test("records carry the message id, workshop time and send time", async () => {
  const { store, dispatcher } = setup({
    roster: new StaticRoster([candidate("asha@example.test", "2025-08-15T14:00:00Z")]),
  });

  await dispatcher.runTick();

  assert.deepEqual(await store.list(), [
    {
      candidateEmail: "asha@example.test",
      reminderKind: "confirmation",
      workshopTime: "2025-08-15T14:00:00.000Z",
      messageId: "<msg-1@test>",
      sentAt: "2025-08-15T12:00:00.000Z",
    },
  ]);
});

test("a failed send is retried on the next tick", async () => {
  const { mailer, store, dispatcher } = setup();
  mailer.failFor.add("asha@example.test");

  const first = await dispatcher.runTick();
  assert.equal(first.failed, 1);
  assert.equal(first.sent, 2);
  assert.deepEqual(await store.listKinds("asha@example.test"), new Set());

  mailer.failFor.clear();
  const second = await dispatcher.runTick();
  assert.equal(second.failed, 0);
  assert.equal(second.sent, 1);
  assert.deepEqual(mailer.subjectsFor("asha@example.test"), [confirmation]);
});

test("a roster fetch failure is reported and nothing is sent", async () => {
  const roster = new StaticRoster([candidate("asha@example.test", "2025-08-15T14:00:00Z")]);
  roster.failure = new FetchError("roster_fetch_failed", "quota exceeded");
  const { mailer, dispatcher } = setup({ roster });

  const summary = await dispatcher.runTick();

  assert.deepEqual(summary, {
    startedAt: "2025-08-15T12:00:00.000Z",
    candidates: 0,
    skippedRows: 0,
    sent: 0,
    failed: 0,
    unrecorded: 0,
    fetchFailed: true,
  });
  assert.equal(dispatcher.lastTick, summary);
  assert.equal(mailer.sent.length, 0);

  roster.failure = null;
  assert.equal((await dispatcher.runTick()).sent, 1);
});

class FlakyStore extends MemorySentRecordsRepo {
  public failures = 1;

  public override async record(record: SentRecord): Promise<boolean> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error("disk full");
    }
    return super.record(record);
  }
}

test("a send that cannot be recorded is counted and may be repeated", async () => {
  const store = new FlakyStore();
  const { mailer, dispatcher } = setup({
    store,
    roster: new StaticRoster([candidate("asha@example.test", "2025-08-15T14:00:00Z")]),
  });

  const first = await dispatcher.runTick();
  assert.equal(first.unrecorded, 1);
  assert.equal(first.sent, 0);

  const second = await dispatcher.runTick();
  assert.equal(second.sent, 1);

  await dispatcher.runTick();
  assert.deepEqual(mailer.subjectsFor("asha@example.test"), [confirmation, confirmation]);
});

test("overlapping dispatch calls share one tick", async () => {
  const { mailer, dispatcher } = setup();

  const [a, b] = await Promise.all([dispatcher.runTick(), dispatcher.runTick()]);

  assert.equal(a, b);
  assert.equal(mailer.sent.length, 3);
});

test("replaying the roster after a restart does not resend persisted reminders", async () => {
  const dir = await mkdtemp(join(tmpdir(), "reminders-"));
  const file = join(dir, "sent-records.json");

  try {
    const before = setup({ store: await FileSentRecordsRepo.open(file) });
    await before.dispatcher.runTick();
    assert.equal(before.mailer.sent.length, 3);

    const after = setup({ store: await FileSentRecordsRepo.open(file) });
    const summary = await after.dispatcher.runTick();

    assert.equal(summary.sent, 0);
    assert.equal(after.mailer.sent.length, 0);
    assert.equal(await after.store.count(), 3);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("confirmations of a recurring workshop list the next sessions", async () => {
  const { mailer, dispatcher } = setup({
    roster: new StaticRoster([candidate("asha@example.test", "2025-08-15T14:00:00Z")]),
    schedule: { days: [0, 2, 5], startTime: "14:00", timeZone: "UTC" },
  });

  await dispatcher.runTick();

  const [sent] = mailer.sent;
  assert.equal(sent?.subject, confirmation);
  assert.deepEqual(sent?.text.split("\n").slice(4, 9), [
    "",
    "Upcoming sessions:",
    "- Friday, August 15, 2025, 2:00 PM (UTC)",
    "- Sunday, August 17, 2025, 2:00 PM (UTC)",
    "- Tuesday, August 19, 2025, 2:00 PM (UTC)",
  ]);
});
