import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PromptService } from "../schedules/service.js";
import { jsonResult } from "./helpers.js";

export function registerExecuteTool(server: McpServer, deps: { service: PromptService }): void {
  server.registerTool(
    "promptyoself_execute",
    {
      title: "Execute Due Prompts",
      description: "Deliver every prompt that is due now and report the outcome of each one",
      inputSchema: {}
    },
    async () => jsonResult(await deps.service.execute())
  );
}
