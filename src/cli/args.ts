import { parseArgs } from "node:util";
import { errorMessage } from "../utils/async.js";

export const COMMANDS = ["register", "list", "cancel", "execute", "test", "agents", "cleanup", "stats"] as const;

export type Command = (typeof COMMANDS)[number];

export type CliFlags = {
  agentId?: string;
  prompt?: string;
  time?: string;
  cron?: string;
  every?: string;
  maxRepetitions?: string;
  startAt?: string;
  skipValidation: boolean;
  all: boolean;
  id?: string;
  loop: boolean;
  interval?: string;
  days?: string;
};

export type CliInvocation = { ok: true; command: Command; flags: CliFlags } | { ok: false; error: string };

export const USAGE = `Usage: promptyoself <command> [options]

Commands:
  register   --agent-id <id> --prompt <text> (--time <iso> | --cron "<expr>" | --every <30s|5m|1h>)
             [--max-repetitions <n>] [--start-at <iso>] [--skip-validation]
  list       [--agent-id <id>] [--all]
  cancel     --id <schedule id>
  execute    [--loop] [--interval <seconds>]
  test       check the connection to the Letta server
  agents     list agents on the Letta server
  cleanup    [--days <n>]  delete inactive schedules older than n days (default 30)
  stats      database statistics`;

function parseCommand(value: string | undefined): Command | null {
  return COMMANDS.find((c) => c === value) ?? null;
}

export function parseCliArgs(argv: string[]): CliInvocation {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }

  const name = parsed.positionals[0];
  const command = parseCommand(name);
  if (!command) return { ok: false, error: name ? `Unknown command: ${name}` : "Missing command" };
  if (parsed.positionals.length > 1) return { ok: false, error: `Unexpected argument: ${parsed.positionals[1]}` };

  const v = parsed.values;
  return {
    ok: true,
    command,
    flags: {
      agentId: v["agent-id"],
      prompt: v.prompt,
      time: v.time,
      cron: v.cron,
      every: v.every,
      maxRepetitions: v["max-repetitions"],
      startAt: v["start-at"],
      skipValidation: v["skip-validation"] ?? false,
      all: v.all ?? false,
      id: v.id,
      loop: v.loop ?? false,
      interval: v.interval,
      days: v.days
    }
  };
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      "agent-id": { type: "string" },
      prompt: { type: "string" },
      time: { type: "string" },
      cron: { type: "string" },
      every: { type: "string" },
      "max-repetitions": { type: "string" },
      "start-at": { type: "string" },
      "skip-validation": { type: "boolean" },
      all: { type: "boolean" },
      id: { type: "string" },
      loop: { type: "boolean" },
      interval: { type: "string" },
      days: { type: "string" }
    }
  });
}

/** Whole non-negative numbers only; anything else is null. */
export function parseCount(value: string | undefined, fallback: number): number | null {
  if (value === undefined) return fallback;
  const s = value.trim();
  if (!/^\d+$/.test(s)) return null;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : null;
}
