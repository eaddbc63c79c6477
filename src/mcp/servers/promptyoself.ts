import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "../../config.js";
import { logger } from "../../logger.js";
import { LettaHttpClient } from "../schedules/lettaHttp.js";
import { PromptSchedulerService } from "../schedules/scheduler.js";
import { PromptService } from "../schedules/service.js";
import { ScheduleStore } from "../schedules/store.js";
import { registerAllTools } from "../tools/registerAll.js";

const config = loadConfig();
logger.level = config.LOG_LEVEL;

const store = ScheduleStore.open(config.PROMPTYOSELF_DB);
const letta = new LettaHttpClient(config);
const service = new PromptService({ store, delivery: letta, agents: letta });

const scheduler = new PromptSchedulerService({ store, delivery: letta }, config.PROMPTYOSELF_EXECUTOR_INTERVAL);
if (config.PROMPTYOSELF_EXECUTOR_AUTOSTART) scheduler.start();

const server = new McpServer({ name: "promptyoself", version: "0.1.0" });
registerAllTools(server, { config, service, scheduler });

let closing = false;
async function shutdown(signal: string): Promise<void> {
  if (closing) return;
  closing = true;
  logger.info({ signal }, "Shutting down");
  scheduler.stop();
  try {
    await server.close();
  } finally {
    store.close();
  }
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  });
}

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info({ db: config.PROMPTYOSELF_DB, executor: scheduler.running }, "promptyoself MCP server ready");
