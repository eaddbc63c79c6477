import { logger } from "../../logger.js";
import { errorMessage } from "../../utils/async.js";
import { nextOccurrence, toScheduleSpec } from "./recurrence.js";
import type { ScheduleStore } from "./store.js";
import { systemClock, type Clock, type ExecutionOutcome, type PromptDelivery, type Reminder, type ReminderPatch } from "./types.js";

export type ExecutorDeps = {
  store: ScheduleStore;
  delivery: PromptDelivery;
  clock?: Clock;
};

function iso(d: Date | null): string | null {
  return d ? d.toISOString() : null;
}

function applyPatch(store: ScheduleStore, id: number, patch: ReminderPatch): void {
  if (!store.update(id, patch)) logger.warn({ id }, "Schedule vanished during execution, state not saved");
}

async function executeOne(deps: ExecutorDeps, clock: Clock, rem: Reminder): Promise<ExecutionOutcome> {
  const spec = toScheduleSpec(rem.scheduleType, rem.scheduleValue);
  // Throws before delivery when the stored value has no valid next run.
  nextOccurrence(spec, clock());

  const delivered = await deps.delivery.deliver(rem.agentId, rem.message);
  const now = clock();
  const patch: ReminderPatch = { lastRun: now };

  if (!delivered) {
    applyPatch(deps.store, rem.id, patch);
    logger.warn({ id: rem.id, agentId: rem.agentId }, "Prompt delivery failed, will retry on next pass");
    return { id: rem.id, agent_id: rem.agentId, delivered: false, error: "Failed to deliver prompt", next_run: iso(rem.nextRun) };
  }

  const count = rem.repetitionCount + 1;
  patch.repetitionCount = count;
  const completed = rem.maxRepetitions !== null && count >= rem.maxRepetitions;

  let nextRun: Date | null = null;
  if (completed) {
    patch.active = false;
    logger.info({ id: rem.id, maxRepetitions: rem.maxRepetitions }, "Schedule completed its repetitions, deactivating");
  } else {
    // Measured from delivery time, not from the previous next_run.
    nextRun = nextOccurrence(spec, now);
    if (nextRun) patch.nextRun = nextRun;
    else patch.active = false;
  }

  applyPatch(deps.store, rem.id, patch);
  return {
    id: rem.id,
    agent_id: rem.agentId,
    delivered: true,
    next_run: iso(nextRun),
    repetition_count: count,
    max_repetitions: rem.maxRepetitions,
    completed
  };
}

/**
 * One polling pass: delivers every due reminder and writes back its next
 * state. Items are independent; a failing item is reported, not rethrown.
 */
export async function executeDuePrompts(deps: ExecutorDeps): Promise<ExecutionOutcome[]> {
  const clock = deps.clock ?? systemClock;
  const due = deps.store.due(clock());
  if (!due.length) return [];

  const outcomes: ExecutionOutcome[] = [];
  for (const rem of due) {
    try {
      outcomes.push(await executeOne(deps, clock, rem));
    } catch (err) {
      logger.error({ err, id: rem.id, agentId: rem.agentId }, "Executing schedule failed");
      outcomes.push({ id: rem.id, agent_id: rem.agentId, delivered: false, error: errorMessage(err), next_run: iso(rem.nextRun) });
    }
  }

  const delivered = outcomes.filter((o) => o.delivered).length;
  logger.info({ total: outcomes.length, delivered, failed: outcomes.length - delivered }, "Executed due prompts");
  return outcomes;
}
