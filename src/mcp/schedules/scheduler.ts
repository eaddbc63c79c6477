import { logger } from "../../logger.js";
import { executeDuePrompts, type ExecutorDeps } from "./executor.js";
import type { ExecutionOutcome } from "./types.js";

export class PromptSchedulerService {
  private timer?: NodeJS.Timeout;
  private ticking = false;
  private readonly log = logger.child({ component: "scheduler" });

  constructor(
    private readonly deps: ExecutorDeps,
    readonly intervalSeconds = 60
  ) {}

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) {
      this.log.warn("Scheduler is already running");
      return;
    }
    this.timer = setInterval(() => void this.tick(), this.intervalSeconds * 1000);
    this.log.info({ intervalSeconds: this.intervalSeconds }, "Prompt scheduler started");
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    this.log.info("Prompt scheduler stopped");
  }

  /** Runs one pass unless the previous one is still in flight. */
  async tick(): Promise<ExecutionOutcome[] | null> {
    if (this.ticking) {
      this.log.debug("Previous pass still running, skipping tick");
      return null;
    }
    this.ticking = true;
    try {
      const results = await executeDuePrompts(this.deps);
      if (results.length) this.log.info({ count: results.length }, "Executed prompts");
      return results;
    } catch (err) {
      this.log.error({ err }, "Error in scheduled pass");
      return null;
    } finally {
      this.ticking = false;
    }
  }
}
