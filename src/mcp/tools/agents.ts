import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PromptService } from "../schedules/service.js";
import { jsonResult } from "./helpers.js";

export function registerAgentTools(server: McpServer, deps: { service: PromptService }): void {
  server.registerTool(
    "promptyoself_test",
    {
      title: "Test Letta Connection",
      description: "Check that the Letta server is reachable with the configured credentials",
      inputSchema: {}
    },
    async () => jsonResult(await deps.service.testConnection())
  );

  server.registerTool(
    "promptyoself_agents",
    {
      title: "List Letta Agents",
      description: "List the agents available on the Letta server",
      inputSchema: {}
    },
    async () => jsonResult(await deps.service.listAgents())
  );
}
