import pino from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// Unknown values fall back to info here; loadConfig reports them.
export function initialLogLevel(raw: string | undefined): LogLevel {
  const wanted = (raw ?? "").trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === wanted) ?? "info";
}

// stdout carries MCP JSON-RPC frames and CLI output, so logs go to stderr.
export const logger = pino({ name: "promptyoself", level: initialLogLevel(process.env.LOG_LEVEL) }, pino.destination(2));

export type Logger = typeof logger;
