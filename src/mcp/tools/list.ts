import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PromptService } from "../schedules/service.js";
import { jsonResult } from "./helpers.js";

export function registerListTool(server: McpServer, deps: { service: PromptService }): void {
  server.registerTool(
    "promptyoself_list",
    {
      title: "List Scheduled Prompts",
      description: "List scheduled prompts, optionally for one agent. Cancelled and finished schedules are hidden unless include_cancelled is set.",
      inputSchema: {
        agent_id: z.string().optional(),
        include_cancelled: z.boolean().optional().default(false),
        limit: z.number().int().min(1).max(500).optional()
      }
    },
    async (args) =>
      jsonResult(deps.service.list({ agentId: args.agent_id, activeOnly: !args.include_cancelled, limit: args.limit }))
  );
}
