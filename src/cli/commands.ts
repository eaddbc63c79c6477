import type { ErrorEnvelope, PromptService } from "../mcp/schedules/service.js";
import { parseCount, type CliFlags, type Command } from "./args.js";

export type CommandDeps = {
  service: PromptService;
  /** Polls until the process is asked to stop. */
  runLoop: (intervalSeconds: number) => Promise<void>;
};

export async function runCommand(deps: CommandDeps, command: Command, flags: CliFlags): Promise<object> {
  const { service } = deps;
  switch (command) {
    case "register":
      return service.register({
        agentId: flags.agentId,
        message: flags.prompt,
        time: flags.time,
        cron: flags.cron,
        every: flags.every,
        maxRepetitions: flags.maxRepetitions,
        startAt: flags.startAt,
        skipValidation: flags.skipValidation
      });
    case "list":
      return service.list({ agentId: flags.agentId, activeOnly: !flags.all });
    case "cancel":
      return service.cancel(flags.id);
    case "execute": {
      if (!flags.loop) return service.execute();
      const interval = parseCount(flags.interval, 60);
      if (interval === null || interval === 0) return { error: "Interval must be a number (seconds)" } satisfies ErrorEnvelope;
      await deps.runLoop(interval);
      return { status: "success", message: "Scheduler loop completed" };
    }
    case "test":
      return service.testConnection();
    case "agents":
      return service.listAgents();
    case "cleanup": {
      const days = parseCount(flags.days, 30);
      if (days === null) return { error: "days must be a non-negative integer" } satisfies ErrorEnvelope;
      return service.cleanup(days);
    }
    case "stats":
      return service.stats();
  }
}
