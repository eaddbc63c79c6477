import { CronExpressionParser } from "cron-parser";
import { ScheduleError } from "../../errors.js";
import { errorMessage } from "../../utils/async.js";
import { isStorableInstant } from "./timeParser.js";
import { SCHEDULE_TYPES, type ScheduleSpec, type ScheduleType } from "./types.js";

const INTERVAL_RE = /^(\d+)([smh]?)$/;

const UNIT_SECONDS: Record<string, number> = { "": 1, s: 1, m: 60, h: 3600 };

/** "30s" | "5m" | "2h" | "45" (bare digits are seconds). Returns null for anything else. */
export function parseIntervalSeconds(value: string): number | null {
  const m = INTERVAL_RE.exec(value);
  if (!m) return null;
  const amount = Number(m[1]);
  const unit = UNIT_SECONDS[m[2] ?? ""];
  if (!Number.isSafeInteger(amount) || unit === undefined) return null;
  return amount * unit;
}

export function isValidCron(expression: string): boolean {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) return false;
  try {
    CronExpressionParser.parse(expression.trim(), { tz: "UTC" });
    return true;
  } catch {
    return false;
  }
}

// Evaluated in UTC. With both day-of-month and day-of-week restricted, a day
// matching either one fires.
export function nextCronRun(expression: string, base: Date): Date {
  const cron = CronExpressionParser.parse(expression.trim(), { currentDate: base, tz: "UTC" });
  return cron.next().toDate();
}

export function parseScheduleType(value: string): ScheduleType {
  const found = SCHEDULE_TYPES.find((t) => t === value);
  if (!found) throw new ScheduleError("UnknownScheduleType", `Unknown schedule type: ${value}`);
  return found;
}

export function toScheduleSpec(type: ScheduleType, value: string): ScheduleSpec {
  switch (type) {
    case "once":
      return { kind: "once" };
    case "cron":
      return { kind: "cron", expression: value };
    case "interval":
      return { kind: "interval", every: value };
  }
}

function storable(next: Date, description: string): Date {
  if (!isStorableInstant(next)) throw new ScheduleError("InvalidScheduleValue", `Next run for ${description} is out of range`);
  return next;
}

export function nextOccurrence(spec: ScheduleSpec, base: Date): Date | null {
  switch (spec.kind) {
    case "once":
      return null;
    case "cron": {
      let next: Date;
      try {
        next = nextCronRun(spec.expression, base);
      } catch (err) {
        throw new ScheduleError("InvalidScheduleValue", `Invalid cron schedule value "${spec.expression}": ${errorMessage(err)}`);
      }
      return storable(next, `cron ${spec.expression}`);
    }
    case "interval": {
      // Stored values are free text, so they are re-checked here.
      const seconds = parseIntervalSeconds(spec.every);
      if (seconds === null) {
        throw new ScheduleError("InvalidScheduleValue", `Invalid interval schedule value: ${spec.every}`);
      }
      return storable(new Date(base.getTime() + seconds * 1000), `interval ${spec.every}`);
    }
  }
}
