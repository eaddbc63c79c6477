import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PromptService } from "../schedules/service.js";
import { jsonResult } from "./helpers.js";

export function registerScheduleTimeTool(server: McpServer, deps: { service: PromptService }): void {
  server.registerTool(
    "promptyoself_schedule_time",
    {
      title: "Schedule One-Time Prompt",
      description:
        "Schedule a one-time prompt for a Letta agent at a future datetime. Accepts ISO 8601 such as 2025-12-25T10:00:00Z, " +
        "an explicit offset such as 2025-12-25T10:00:00-05:00, or '2025-12-25 10:00:00 UTC'.",
      inputSchema: {
        agent_id: z.string().optional(),
        prompt: z.string(),
        time: z.string(),
        skip_validation: z.boolean().optional().default(false)
      }
    },
    async (args) =>
      jsonResult(
        await deps.service.register({
          agentId: args.agent_id,
          message: args.prompt,
          time: args.time,
          skipValidation: args.skip_validation
        })
      )
  );
}
