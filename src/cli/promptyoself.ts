#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config.js";
import { logger } from "../logger.js";
import { LettaHttpClient } from "../mcp/schedules/lettaHttp.js";
import { PromptSchedulerService } from "../mcp/schedules/scheduler.js";
import { isFailure, PromptService } from "../mcp/schedules/service.js";
import { ScheduleStore } from "../mcp/schedules/store.js";
import { USAGE, parseCliArgs } from "./args.js";
import { runCommand } from "./commands.js";

const invocation = parseCliArgs(process.argv.slice(2));
if (!invocation.ok) {
  console.error(invocation.error);
  console.error(USAGE);
  process.exit(2);
}

const config = loadConfig();
logger.level = config.LOG_LEVEL;

const store = ScheduleStore.open(config.PROMPTYOSELF_DB);
const letta = new LettaHttpClient(config);
const service = new PromptService({ store, delivery: letta, agents: letta });

function runLoop(intervalSeconds: number): Promise<void> {
  const scheduler = new PromptSchedulerService({ store, delivery: letta }, intervalSeconds);
  return new Promise((resolve) => {
    const stop = (): void => {
      scheduler.stop();
      resolve();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
    scheduler.start();
    void scheduler.tick();
  });
}

let exitCode = 0;
try {
  const result = await runCommand({ service, runLoop }, invocation.command, invocation.flags);
  console.log(JSON.stringify(result, null, 2));
  if (isFailure(result)) exitCode = 1;
} finally {
  store.close();
}
process.exit(exitCode);
