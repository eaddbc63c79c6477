import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PromptService } from "../schedules/service.js";
import { jsonResult } from "./helpers.js";

export function registerScheduleEveryTool(server: McpServer, deps: { service: PromptService }): void {
  server.registerTool(
    "promptyoself_schedule_every",
    {
      title: "Schedule Interval Prompt",
      description:
        "Schedule a repeating prompt every '30s', '5m' or '1h' (bare digits are seconds). " +
        "start_at optionally sets the first run; max_repetitions caps the number of deliveries.",
      inputSchema: {
        agent_id: z.string().optional(),
        prompt: z.string(),
        every: z.string(),
        start_at: z.string().optional(),
        max_repetitions: z.number().int().optional(),
        skip_validation: z.boolean().optional().default(false)
      }
    },
    async (args) =>
      jsonResult(
        await deps.service.register({
          agentId: args.agent_id,
          message: args.prompt,
          every: args.every,
          startAt: args.start_at,
          maxRepetitions: args.max_repetitions,
          skipValidation: args.skip_validation
        })
      )
  );
}
