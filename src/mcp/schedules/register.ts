import { ScheduleError } from "../../errors.js";
import { logger } from "../../logger.js";
import { errorMessage } from "../../utils/async.js";
import { isValidCron, nextCronRun, parseIntervalSeconds } from "./recurrence.js";
import type { ScheduleStore } from "./store.js";
import { isAfter, isStorableInstant, parseTimestamp } from "./timeParser.js";
import { systemClock, type AgentDirectory, type Clock, type NewReminder } from "./types.js";

export type RegisterRequest = {
  agentId?: string | null;
  message?: string | null;
  time?: string | null;
  cron?: string | null;
  every?: string | null;
  maxRepetitions?: number | string | null;
  startAt?: string | null;
  skipValidation?: boolean;
};

export type PlannedSchedule = NewReminder & { nextRun: Date };

export type RegistrationDeps = {
  store: ScheduleStore;
  agents: AgentDirectory;
  clock?: Clock;
};

const TIME_FORMAT_HINT =
  "Invalid time format. Use ISO 8601 like 2025-12-25T10:00:00Z or include offset, e.g. 2025-12-25T10:00:00-05:00";

function present(v: string | null | undefined): v is string {
  return typeof v === "string" && v.trim() !== "";
}

function coerceMaxRepetitions(v: number | string | null | undefined): number | null {
  if (v === undefined || v === null || v === "") return null;
  let n: number;
  if (typeof v === "number") {
    if (!Number.isInteger(v)) throw new ScheduleError("InvalidMaxRepetitions", "max-repetitions must be a valid integer");
    n = v;
  } else {
    const s = v.trim();
    if (!/^[+-]?\d+$/.test(s)) throw new ScheduleError("InvalidMaxRepetitions", "max-repetitions must be a valid integer");
    n = Number(s);
  }
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new ScheduleError("InvalidMaxRepetitions", "max-repetitions must be a positive integer");
  }
  return n;
}

function futureInstant(value: string, now: Date, notFuture: "TimeNotInFuture" | "StartTimeNotInFuture"): Date {
  const dt = parseTimestamp(value);
  if (!dt || !isStorableInstant(dt.toJSDate())) throw new ScheduleError("InvalidTimeFormat", TIME_FORMAT_HINT);
  if (!isAfter(dt, now)) {
    throw new ScheduleError(
      notFuture,
      notFuture === "TimeNotInFuture" ? "Scheduled time must be in the future" : "Start time must be in the future"
    );
  }
  return dt.toJSDate();
}

/** Validates a request and computes its first run without touching the store. */
export function planSchedule(req: RegisterRequest, now: Date): PlannedSchedule {
  const agentId = (req.agentId ?? "").trim();
  const message = req.message ?? "";
  if (!agentId || !message.trim()) {
    throw new ScheduleError("MissingArgument", "Missing required arguments: agent-id and prompt");
  }

  const options = [req.time, req.cron, req.every].filter(present);
  if (options.length === 0) throw new ScheduleError("NoScheduleOption", "Must specify one of --time, --cron, or --every");
  if (options.length > 1) throw new ScheduleError("ConflictingScheduleOptions", "Cannot specify multiple scheduling options");

  let planned: Pick<PlannedSchedule, "scheduleType" | "scheduleValue" | "nextRun">;
  if (present(req.time)) {
    const value = req.time.trim();
    planned = { scheduleType: "once", scheduleValue: value, nextRun: futureInstant(value, now, "TimeNotInFuture") };
  } else if (present(req.cron)) {
    const expression = req.cron.trim();
    if (!isValidCron(expression)) throw new ScheduleError("InvalidCronExpression", `Invalid cron expression: ${expression}`);
    planned = { scheduleType: "cron", scheduleValue: expression, nextRun: nextCronRun(expression, now) };
  } else {
    const every = (req.every ?? "").trim();
    const seconds = parseIntervalSeconds(every);
    const intervalError = new ScheduleError(
      "InvalidIntervalFormat",
      `Invalid interval format: ${every}. Use formats like '30s', '5m', '1h'`
    );
    if (seconds === null) throw intervalError;
    const onePeriod = new Date(now.getTime() + seconds * 1000);
    if (!isStorableInstant(onePeriod)) throw intervalError;
    const nextRun = present(req.startAt) ? futureInstant(req.startAt, now, "StartTimeNotInFuture") : onePeriod;
    planned = { scheduleType: "interval", scheduleValue: every, nextRun };
  }

  return { agentId, message, ...planned, maxRepetitions: coerceMaxRepetitions(req.maxRepetitions) };
}

async function ensureAgentExists(agents: AgentDirectory, agentId: string): Promise<void> {
  let exists: boolean;
  try {
    exists = await agents.agentExists(agentId);
  } catch (err) {
    throw new ScheduleError("AgentValidationFailed", `Agent validation failed: Failed to validate agent ${agentId}: ${errorMessage(err)}`);
  }
  if (!exists) throw new ScheduleError("AgentValidationFailed", `Agent validation failed: Agent ${agentId} not found`);
}

export async function registerSchedule(deps: RegistrationDeps, req: RegisterRequest): Promise<{ id: number; nextRun: Date }> {
  const clock = deps.clock ?? systemClock;
  const plan = planSchedule(req, clock());
  if (!req.skipValidation) await ensureAgentExists(deps.agents, plan.agentId);

  const id = deps.store.create(plan);
  logger.info({ id, agentId: plan.agentId, scheduleType: plan.scheduleType, nextRun: plan.nextRun.toISOString() }, "Schedule registered");
  return { id, nextRun: plan.nextRun };
}
