import test from "node:test";
import assert from "node:assert/strict";
import { parseCliArgs, parseCount } from "./args.js";

test("parseCliArgs: register flags", () => {
  assert.deepEqual(
    parseCliArgs(["register", "--agent-id", "agent-1", "--prompt", "Check the logs", "--every", "5m", "--max-repetitions", "3", "--start-at", "2025-01-01T12:00:00Z", "--skip-validation"]),
    {
      ok: true,
      command: "register",
      flags: {
        agentId: "agent-1",
        prompt: "Check the logs",
        time: undefined,
        cron: undefined,
        every: "5m",
        maxRepetitions: "3",
        startAt: "2025-01-01T12:00:00Z",
        skipValidation: true,
        all: false,
        id: undefined,
        loop: false,
        interval: undefined,
        days: undefined
      }
    }
  );
});

test("parseCliArgs: boolean switches default to false", () => {
  const res = parseCliArgs(["list", "--all"]);
  assert.ok(res.ok);
  assert.equal(res.command, "list");
  assert.equal(res.flags.all, true);
  assert.equal(res.flags.loop, false);
  assert.equal(res.flags.skipValidation, false);
});

test("parseCliArgs: a cron value with spaces stays one argument", () => {
  const res = parseCliArgs(["register", "--agent-id=agent-1", "--prompt=hi", "--cron", "0 9 * * 1-5"]);
  assert.ok(res.ok);
  assert.equal(res.flags.cron, "0 9 * * 1-5");
  assert.equal(res.flags.agentId, "agent-1");
});

test("parseCliArgs: rejects unknown commands and options", () => {
  assert.deepEqual(parseCliArgs([]), { ok: false, error: "Missing command" });
  assert.deepEqual(parseCliArgs(["snooze"]), { ok: false, error: "Unknown command: snooze" });
  assert.deepEqual(parseCliArgs(["list", "extra"]), { ok: false, error: "Unexpected argument: extra" });
  const unknown = parseCliArgs(["list", "--verbose"]);
  assert.equal(unknown.ok, false);
});

test("parseCount: whole numbers or the fallback", () => {
  assert.equal(parseCount(undefined, 30), 30);
  assert.equal(parseCount("7", 30), 7);
  assert.equal(parseCount(" 0 ", 30), 0);
  assert.equal(parseCount("-1", 30), null);
  assert.equal(parseCount("1.5", 30), null);
  assert.equal(parseCount("soon", 30), null);
});
