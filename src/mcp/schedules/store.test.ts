import test from "node:test";
import assert from "node:assert/strict";
import Database from "better-sqlite3";
import { StorageError } from "../../errors.js";
import { ScheduleStore } from "./store.js";
import type { NewReminder } from "./types.js";

const T0 = new Date("2025-01-01T10:00:00.000Z");

function openStore(start = T0): { store: ScheduleStore; setNow: (d: Date) => void } {
  let now = start;
  const store = new ScheduleStore(new Database(":memory:"), { clock: () => now });
  return { store, setNow: (d) => (now = d) };
}

function reminder(overrides: Partial<NewReminder> = {}): NewReminder {
  return {
    agentId: "agent-1",
    message: "stretch",
    scheduleType: "once",
    scheduleValue: "2025-01-01T11:00:00Z",
    nextRun: new Date("2025-01-01T11:00:00.000Z"),
    maxRepetitions: null,
    ...overrides
  };
}

test("ScheduleStore: create assigns ids and get reads the row back", () => {
  const { store } = openStore();
  assert.equal(store.create(reminder()), 1);
  assert.equal(store.create(reminder({ message: "drink water" })), 2);

  assert.deepEqual(store.get(1), {
    id: 1,
    agentId: "agent-1",
    message: "stretch",
    scheduleType: "once",
    scheduleValue: "2025-01-01T11:00:00Z",
    nextRun: new Date("2025-01-01T11:00:00.000Z"),
    active: true,
    maxRepetitions: null,
    repetitionCount: 0,
    lastRun: null,
    createdAt: T0
  });
  assert.equal(store.get(99), null);
});

test("ScheduleStore: list filters by agent and activity, ordered by next run", () => {
  const { store } = openStore();
  store.create(reminder({ nextRun: new Date("2025-01-01T13:00:00.000Z") }));
  store.create(reminder({ agentId: "agent-2", nextRun: new Date("2025-01-01T12:00:00.000Z") }));
  store.create(reminder({ nextRun: new Date("2025-01-01T11:00:00.000Z") }));
  store.cancel(3);

  assert.deepEqual(store.list().map((r) => r.id), [2, 1]);
  assert.deepEqual(store.list({ activeOnly: false }).map((r) => r.id), [3, 2, 1]);
  assert.deepEqual(store.list({ agentId: "agent-1", activeOnly: false }).map((r) => r.id), [3, 1]);
  assert.deepEqual(store.list({ activeOnly: false, limit: 2 }).map((r) => r.id), [3, 2]);
});

test("ScheduleStore: due returns active reminders at or before now", () => {
  const { store } = openStore();
  store.create(reminder({ nextRun: new Date("2025-01-01T10:00:00.000Z") }));
  store.create(reminder({ nextRun: new Date("2025-01-01T09:00:00.000Z") }));
  store.create(reminder({ nextRun: new Date("2025-01-01T10:00:01.000Z") }));
  store.create(reminder({ nextRun: new Date("2025-01-01T08:00:00.000Z") }));
  store.cancel(4);

  assert.deepEqual(store.due(T0).map((r) => r.id), [2, 1]);
  assert.deepEqual(store.due(new Date("2025-01-01T10:00:01.000Z")).map((r) => r.id), [2, 1, 3]);
});

test("ScheduleStore: update applies only the given fields", () => {
  const { store } = openStore();
  const id = store.create(reminder({ scheduleType: "interval", scheduleValue: "5m", maxRepetitions: 3 }));
  const lastRun = new Date("2025-01-01T11:00:02.000Z");

  assert.equal(store.update(id, { repetitionCount: 1, lastRun, nextRun: new Date("2025-01-01T11:05:02.000Z") }), true);
  const row = store.get(id);
  assert.ok(row);
  assert.equal(row.repetitionCount, 1);
  assert.deepEqual(row.lastRun, lastRun);
  assert.deepEqual(row.nextRun, new Date("2025-01-01T11:05:02.000Z"));
  assert.equal(row.active, true);
  assert.equal(row.message, "stretch");

  assert.equal(store.update(id, {}), true);
  assert.equal(store.update(42, { active: false }), false);
});

test("ScheduleStore: cancel is idempotent for existing rows", () => {
  const { store } = openStore();
  const id = store.create(reminder());
  assert.equal(store.cancel(id), true);
  assert.equal(store.cancel(id), true);
  assert.equal(store.get(id)?.active, false);
  assert.equal(store.cancel(404), false);
});

test("ScheduleStore: repetition count can never pass the cap", () => {
  const { store } = openStore();
  const id = store.create(reminder({ maxRepetitions: 2 }));
  assert.throws(() => store.update(id, { repetitionCount: 3 }), (err: unknown) => {
    assert.ok(err instanceof StorageError);
    assert.equal(err.operation, "update");
    return true;
  });
  assert.equal(store.get(id)?.repetitionCount, 0);
});

test("ScheduleStore: purgeInactive removes old inactive rows only", () => {
  const { store, setNow } = openStore();
  const oldInactive = store.create(reminder());
  const oldActive = store.create(reminder());
  store.cancel(oldInactive);

  setNow(new Date("2025-01-31T10:00:00.000Z"));
  const freshInactive = store.create(reminder());
  store.cancel(freshInactive);

  setNow(new Date("2025-02-01T10:00:00.000Z"));
  assert.equal(store.purgeInactive(30), 1);
  assert.equal(store.get(oldInactive), null);
  assert.ok(store.get(oldActive));
  assert.ok(store.get(freshInactive));
});

test("ScheduleStore: stats summarizes the table", () => {
  const { store, setNow } = openStore();
  assert.deepEqual(store.stats(), {
    total_reminders: 0,
    active_reminders: 0,
    inactive_reminders: 0,
    oldest_reminder: null,
    newest_reminder: null,
    database_file: ":memory:",
    database_size_bytes: 0,
    database_size_mb: 0
  });

  store.create(reminder());
  setNow(new Date("2025-01-02T10:00:00.000Z"));
  store.cancel(store.create(reminder()));

  const stats = store.stats();
  assert.equal(stats.total_reminders, 2);
  assert.equal(stats.active_reminders, 1);
  assert.equal(stats.inactive_reminders, 1);
  assert.equal(stats.oldest_reminder, "2025-01-01T10:00:00.000Z");
  assert.equal(stats.newest_reminder, "2025-01-02T10:00:00.000Z");
});

test("ScheduleStore: a closed database surfaces StorageError", () => {
  const { store } = openStore();
  store.close();
  assert.throws(() => store.list(), (err: unknown) => {
    assert.ok(err instanceof StorageError);
    assert.equal(err.operation, "list");
    assert.match(err.message, /^Storage list failed: /);
    return true;
  });
});
