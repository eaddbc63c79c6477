import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PromptService } from "../schedules/service.js";
import { jsonResult } from "./helpers.js";

export function registerCancelTool(server: McpServer, deps: { service: PromptService }): void {
  server.registerTool(
    "promptyoself_cancel",
    {
      title: "Cancel Scheduled Prompt",
      description: "Cancel a scheduled prompt by its numeric ID",
      inputSchema: {
        schedule_id: z.union([z.number(), z.string()])
      }
    },
    async (args) => jsonResult(deps.service.cancel(args.schedule_id))
  );
}
