import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PromptService } from "../schedules/service.js";
import { registerAgentTools } from "./agents.js";
import { registerCancelTool } from "./cancel.js";
import { registerExecuteTool } from "./execute.js";
import { registerListTool } from "./list.js";
import { registerScheduleCronTool } from "./schedule_cron.js";
import { registerScheduleEveryTool } from "./schedule_every.js";
import { registerScheduleTimeTool } from "./schedule_time.js";
import { registerStatusTools, type StatusDeps } from "./status.js";

export function registerAllTools(server: McpServer, deps: StatusDeps & { service: PromptService }): void {
  registerScheduleTimeTool(server, deps);
  registerScheduleCronTool(server, deps);
  registerScheduleEveryTool(server, deps);
  registerListTool(server, deps);
  registerCancelTool(server, deps);
  registerExecuteTool(server, deps);
  registerAgentTools(server, deps);
  registerStatusTools(server, deps);
}
