import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppConfig } from "../../config.js";
import type { PromptSchedulerService } from "../schedules/scheduler.js";
import { jsonResult } from "./helpers.js";

export type StatusDeps = {
  config: Pick<
    AppConfig,
    "LETTA_BASE_URL" | "LETTA_API_KEY" | "LETTA_SERVER_PASSWORD" | "PROMPTYOSELF_DB" | "PROMPTYOSELF_EXECUTOR_AUTOSTART" | "PROMPTYOSELF_EXECUTOR_INTERVAL"
  >;
  scheduler?: PromptSchedulerService;
};

export function registerStatusTools(server: McpServer, deps: StatusDeps): void {
  server.registerTool(
    "promptyoself_executor_status",
    {
      title: "Executor Status",
      description: "Report whether the background executor is running and how often it polls",
      inputSchema: {}
    },
    async () =>
      jsonResult({
        status: "ok",
        running: deps.scheduler?.running ?? false,
        interval: deps.scheduler?.intervalSeconds ?? deps.config.PROMPTYOSELF_EXECUTOR_INTERVAL
      })
  );

  server.registerTool(
    "health",
    {
      title: "Health",
      description: "Server health and configuration summary",
      inputSchema: {}
    },
    async () =>
      jsonResult({
        status: "healthy",
        letta_base_url: deps.config.LETTA_BASE_URL,
        db: deps.config.PROMPTYOSELF_DB,
        auth_set: Boolean(deps.config.LETTA_API_KEY || deps.config.LETTA_SERVER_PASSWORD),
        executor_autostart: deps.config.PROMPTYOSELF_EXECUTOR_AUTOSTART,
        executor_interval: deps.config.PROMPTYOSELF_EXECUTOR_INTERVAL
      })
  );
}
