import test from "node:test";
import assert from "node:assert/strict";
import Database from "better-sqlite3";
import { logger } from "../../logger.js";
import { executeDuePrompts } from "./executor.js";
import { ScheduleStore } from "./store.js";
import type { NewReminder, PromptDelivery } from "./types.js";

type Harness = {
  store: ScheduleStore;
  delivery: PromptDelivery & { sent: Array<[string, string]>; ok: boolean };
  setNow: (iso: string) => void;
  run: () => ReturnType<typeof executeDuePrompts>;
};

function harness(startIso = "2025-01-01T10:00:00.000Z"): Harness {
  let now = new Date(startIso);
  const clock = (): Date => now;
  const store = new ScheduleStore(new Database(":memory:"), { clock });
  const sent: Array<[string, string]> = [];
  const delivery: Harness["delivery"] = {
    sent,
    ok: true,
    async deliver(agentId, text) {
      sent.push([agentId, text]);
      if (agentId === "explodes") throw new Error("boom");
      return delivery.ok;
    }
  };
  return {
    store,
    delivery,
    setNow: (iso) => {
      now = new Date(iso);
    },
    run: () => executeDuePrompts({ store, delivery, clock })
  };
}

function add(store: ScheduleStore, fields: Partial<NewReminder> & Pick<NewReminder, "nextRun">): number {
  return store.create({
    agentId: "agent-1",
    message: "check in",
    scheduleType: "once",
    scheduleValue: "2025-01-01T10:01:00Z",
    maxRepetitions: null,
    ...fields
  });
}

test("executeDuePrompts: nothing due, nothing delivered", async () => {
  const h = harness();
  add(h.store, { nextRun: new Date("2025-01-01T11:00:00.000Z") });
  assert.deepEqual(await h.run(), []);
  assert.deepEqual(h.delivery.sent, []);
});

test("executeDuePrompts: a once schedule fires exactly once", async () => {
  const h = harness();
  const id = add(h.store, { nextRun: new Date("2025-01-01T11:00:00.000Z") });
  assert.deepEqual(h.store.due(new Date("2025-01-01T10:00:00.000Z")), []);

  h.setNow("2025-01-01T11:00:01.000Z");
  assert.deepEqual(await h.run(), [
    { id, agent_id: "agent-1", delivered: true, next_run: null, repetition_count: 1, max_repetitions: null, completed: false }
  ]);
  assert.deepEqual(h.delivery.sent, [["agent-1", "check in"]]);

  const row = h.store.get(id);
  assert.ok(row);
  assert.equal(row.active, false);
  assert.equal(row.repetitionCount, 1);
  assert.deepEqual(row.lastRun, new Date("2025-01-01T11:00:01.000Z"));

  h.setNow("2025-01-01T12:00:00.000Z");
  assert.deepEqual(await h.run(), []);
  assert.equal(h.delivery.sent.length, 1);
});

test("executeDuePrompts: failed delivery only records last_run", async () => {
  const h = harness();
  const id = add(h.store, { scheduleType: "interval", scheduleValue: "1m", nextRun: new Date("2025-01-01T10:00:00.000Z") });
  h.delivery.ok = false;
  h.setNow("2025-01-01T10:00:05.000Z");

  assert.deepEqual(await h.run(), [
    { id, agent_id: "agent-1", delivered: false, error: "Failed to deliver prompt", next_run: "2025-01-01T10:00:00.000Z" }
  ]);
  const row = h.store.get(id);
  assert.ok(row);
  assert.equal(row.active, true);
  assert.equal(row.repetitionCount, 0);
  assert.deepEqual(row.nextRun, new Date("2025-01-01T10:00:00.000Z"));
  assert.deepEqual(row.lastRun, new Date("2025-01-01T10:00:05.000Z"));

  // Still due, so the next pass retries it.
  h.delivery.ok = true;
  const [retry] = await h.run();
  assert.equal(retry?.delivered, true);
});

test("executeDuePrompts: interval capped at two deliveries", async () => {
  const h = harness();
  const id = add(h.store, {
    scheduleType: "interval",
    scheduleValue: "1m",
    nextRun: new Date("2025-01-01T10:01:00.000Z"),
    maxRepetitions: 2
  });

  h.setNow("2025-01-01T10:01:00.000Z");
  assert.deepEqual(await h.run(), [
    { id, agent_id: "agent-1", delivered: true, next_run: "2025-01-01T10:02:00.000Z", repetition_count: 1, max_repetitions: 2, completed: false }
  ]);

  h.setNow("2025-01-01T10:02:00.000Z");
  assert.deepEqual(await h.run(), [
    { id, agent_id: "agent-1", delivered: true, next_run: null, repetition_count: 2, max_repetitions: 2, completed: true }
  ]);
  const row = h.store.get(id);
  assert.ok(row);
  assert.equal(row.active, false);
  assert.equal(row.repetitionCount, 2);

  h.setNow("2025-01-01T10:05:00.000Z");
  assert.deepEqual(await h.run(), []);
});

test("executeDuePrompts: intervals are measured from delivery time", async () => {
  const h = harness();
  const id = add(h.store, { scheduleType: "interval", scheduleValue: "1m", nextRun: new Date("2025-01-01T10:01:00.000Z") });
  h.setNow("2025-01-01T10:01:20.000Z");
  await h.run();
  assert.deepEqual(h.store.get(id)?.nextRun, new Date("2025-01-01T10:02:20.000Z"));
});

test("executeDuePrompts: cron advances to the following match", async () => {
  const h = harness();
  const id = add(h.store, { scheduleType: "cron", scheduleValue: "0 9 * * *", nextRun: new Date("2025-01-02T09:00:00.000Z") });
  h.setNow("2025-01-02T09:00:30.000Z");
  const [outcome] = await h.run();
  assert.equal(outcome?.next_run, "2025-01-03T09:00:00.000Z");
  assert.equal(h.store.get(id)?.active, true);
});

test("executeDuePrompts: one failing item does not stop the batch", async () => {
  const h = harness();
  const bad = add(h.store, { agentId: "explodes", nextRun: new Date("2025-01-01T09:00:00.000Z") });
  const good = add(h.store, { nextRun: new Date("2025-01-01T09:30:00.000Z") });

  const outcomes = await h.run();
  assert.deepEqual(outcomes[0], { id: bad, agent_id: "explodes", delivered: false, error: "boom", next_run: "2025-01-01T09:00:00.000Z" });
  assert.equal(outcomes[1]?.id, good);
  assert.equal(outcomes[1]?.delivered, true);
  assert.equal(h.store.get(bad)?.active, true);
});

test("executeDuePrompts: a corrupted stored interval is reported per item", async () => {
  const h = harness();
  const id = add(h.store, { scheduleType: "interval", scheduleValue: "soon", nextRun: new Date("2025-01-01T09:00:00.000Z") });
  assert.deepEqual(await h.run(), [
    { id, agent_id: "agent-1", delivered: false, error: "Invalid interval schedule value: soon", next_run: "2025-01-01T09:00:00.000Z" }
  ]);
  assert.equal(h.store.get(id)?.repetitionCount, 0);
  assert.deepEqual(h.delivery.sent, []);
});

test("executeDuePrompts: an interval past the storable range is not delivered", async () => {
  const h = harness();
  const id = add(h.store, { scheduleType: "interval", scheduleValue: "90000000h", nextRun: new Date("2025-01-01T09:00:00.000Z") });
  assert.deepEqual(await h.run(), [
    {
      id,
      agent_id: "agent-1",
      delivered: false,
      error: "Next run for interval 90000000h is out of range",
      next_run: "2025-01-01T09:00:00.000Z"
    }
  ]);
  assert.deepEqual(h.delivery.sent, []);
  assert.equal(h.store.get(id)?.repetitionCount, 0);
});

test("executeDuePrompts: a row deleted mid-pass is logged, not saved", async (t) => {
  const db = new Database(":memory:");
  const now = new Date("2025-01-01T10:00:00.000Z");
  const clock = (): Date => now;
  const store = new ScheduleStore(db, { clock });
  const id = add(store, { scheduleType: "interval", scheduleValue: "1m", nextRun: new Date("2025-01-01T09:59:00.000Z") });
  const delivery: PromptDelivery = {
    async deliver() {
      db.prepare("DELETE FROM schedules WHERE id = ?").run(id);
      return true;
    }
  };
  const warn = t.mock.method(logger, "warn");

  const [outcome] = await executeDuePrompts({ store, delivery, clock });
  assert.equal(outcome?.delivered, true);
  assert.equal(store.get(id), null);
  assert.ok(warn.mock.calls.some((c) => c.arguments[1] === "Schedule vanished during execution, state not saved"));
});
