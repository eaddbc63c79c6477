import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PromptService } from "../schedules/service.js";
import { jsonResult } from "./helpers.js";

export function registerScheduleCronTool(server: McpServer, deps: { service: PromptService }): void {
  server.registerTool(
    "promptyoself_schedule_cron",
    {
      title: "Schedule Cron Prompt",
      description:
        "Schedule a recurring prompt with a standard 5-field cron expression evaluated in UTC, e.g. '0 9 * * *' for every day at 09:00.",
      inputSchema: {
        agent_id: z.string().optional(),
        prompt: z.string(),
        cron: z.string(),
        max_repetitions: z.number().int().optional(),
        skip_validation: z.boolean().optional().default(false)
      }
    },
    async (args) =>
      jsonResult(
        await deps.service.register({
          agentId: args.agent_id,
          message: args.prompt,
          cron: args.cron,
          maxRepetitions: args.max_repetitions,
          skipValidation: args.skip_validation
        })
      )
  );
}
