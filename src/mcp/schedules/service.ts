import { isScheduleError } from "../../errors.js";
import { logger } from "../../logger.js";
import { errorMessage } from "../../utils/async.js";
import { executeDuePrompts } from "./executor.js";
import { registerSchedule, type RegisterRequest } from "./register.js";
import type { ScheduleStore } from "./store.js";
import {
  systemClock,
  toScheduleView,
  type AgentCatalog,
  type AgentSummary,
  type Clock,
  type ConnectionCheck,
  type ExecutionOutcome,
  type PromptDelivery,
  type ScheduleView,
  type StoreStats
} from "./types.js";

export type ErrorEnvelope = { error: string };

export type Envelope<T> = ({ status: "success" } & T) | ErrorEnvelope;

export type RegisterResult = Envelope<{ id: number; next_run: string; message: string }>;
export type ListResult = Envelope<{ schedules: ScheduleView[]; count: number }>;
export type CancelResult = Envelope<{ cancelled_id: number; message: string }>;
export type ExecuteResult = Envelope<{ executed: ExecutionOutcome[]; message: string }>;
export type CleanupResult = Envelope<{ deleted: number; message: string }>;
export type StatsResult = Envelope<{ stats: StoreStats }>;
export type AgentsResult = Envelope<{ agents: AgentSummary[]; count: number }>;

export type ServiceDeps = {
  store: ScheduleStore;
  delivery: PromptDelivery;
  agents: AgentCatalog;
  clock?: Clock;
};

/** True for `{ error }` envelopes and for `{ status: "error" }` connection checks. */
export function isFailure(value: object): boolean {
  return "error" in value || ("status" in value && value.status === "error");
}

function parseScheduleId(raw: unknown): number | null {
  if (typeof raw === "number") return Number.isSafeInteger(raw) ? raw : null;
  if (typeof raw !== "string" || !/^\s*[+-]?\d+\s*$/.test(raw)) return null;
  const n = Number(raw.trim());
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * The public surface shared by the MCP tools and the CLI. Every method answers
 * with a `{ status: "success", ... }` object or `{ error }`; none throws.
 */
export class PromptService {
  private readonly clock: Clock;
  private readonly log = logger.child({ component: "service" });

  constructor(private readonly deps: ServiceDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  private fail(operation: string, err: unknown, prefix: string): ErrorEnvelope {
    const error = `${prefix}: ${errorMessage(err)}`;
    this.log.error({ operation, err }, error);
    return { error };
  }

  async register(req: RegisterRequest): Promise<RegisterResult> {
    try {
      const { id, nextRun } = await registerSchedule({ store: this.deps.store, agents: this.deps.agents, clock: this.clock }, req);
      return { status: "success", id, next_run: nextRun.toISOString(), message: `Prompt scheduled with ID ${id}` };
    } catch (err) {
      if (isScheduleError(err)) {
        this.log.warn({ code: err.code, agentId: req.agentId }, err.message);
        return { error: err.message };
      }
      return this.fail("register", err, "Failed to register prompt");
    }
  }

  list(opts: { agentId?: string; activeOnly?: boolean; limit?: number } = {}): ListResult {
    try {
      const schedules = this.deps.store
        .list({ agentId: opts.agentId?.trim() || undefined, activeOnly: opts.activeOnly ?? true, limit: opts.limit })
        .map(toScheduleView);
      return { status: "success", schedules, count: schedules.length };
    } catch (err) {
      return this.fail("list", err, "Failed to list prompts");
    }
  }

  cancel(rawId: unknown): CancelResult {
    if (rawId === undefined || rawId === null || rawId === "") return { error: "Missing required argument: id" };
    const id = parseScheduleId(rawId);
    if (id === null) return { error: "Schedule ID must be a number" };
    try {
      if (!this.deps.store.cancel(id)) return { error: `Schedule ${id} not found or already cancelled` };
      this.log.info({ id }, "Schedule cancelled");
      return { status: "success", cancelled_id: id, message: `Schedule ${id} cancelled` };
    } catch (err) {
      return this.fail("cancel", err, "Failed to cancel prompt");
    }
  }

  async execute(): Promise<ExecuteResult> {
    try {
      const executed = await executeDuePrompts({ store: this.deps.store, delivery: this.deps.delivery, clock: this.clock });
      return { status: "success", executed, message: `${executed.length} prompts executed` };
    } catch (err) {
      return this.fail("execute", err, "Failed to execute prompts");
    }
  }

  cleanup(days = 30): CleanupResult {
    if (!Number.isInteger(days) || days < 0) return { error: "days must be a non-negative integer" };
    try {
      const deleted = this.deps.store.purgeInactive(days);
      this.log.info({ deleted, days }, "Purged inactive schedules");
      return { status: "success", deleted, message: `Deleted ${deleted} inactive schedules older than ${days} days` };
    } catch (err) {
      return this.fail("cleanup", err, "Failed to clean up schedules");
    }
  }

  stats(): StatsResult {
    try {
      return { status: "success", stats: this.deps.store.stats() };
    } catch (err) {
      return this.fail("stats", err, "Failed to read statistics");
    }
  }

  async listAgents(): Promise<AgentsResult> {
    try {
      const agents = await this.deps.agents.listAgents();
      return { status: "success", agents, count: agents.length };
    } catch (err) {
      return this.fail("agents", err, "Failed to list agents");
    }
  }

  async testConnection(): Promise<ConnectionCheck | ErrorEnvelope> {
    try {
      return await this.deps.agents.testConnection();
    } catch (err) {
      return this.fail("test", err, "Failed to test connection");
    }
  }
}
