import path from "node:path";
import { z } from "zod";
import { LOG_LEVELS } from "./logger.js";
import { projectRootDir } from "./utils/fs.js";

function normalizeSecret(v: unknown): unknown {
  if (typeof v !== "string") return v;
  const s = v.trim();
  const m1 = s.match(/^["']([\s\S]*)["']$/);
  const v1 = (m1 ? m1[1] : s).trim();
  const m2 = v1.match(/^`([\s\S]*)`$/);
  const out = (m2 ? m2[1] : v1).trim();
  return out === "" ? undefined : out;
}

function parseFlag(v: unknown): unknown {
  if (typeof v !== "string") return v;
  const s = v.trim().toLowerCase();
  if (!s) return undefined;
  return ["1", "true", "yes", "on"].includes(s);
}

const envSchema = z.object({
  PROMPTYOSELF_DB: z.preprocess(normalizeSecret, z.string().min(1).default("data/promptyoself.sqlite3")),

  LETTA_BASE_URL: z.preprocess(normalizeSecret, z.string().url().default("http://localhost:8283")),
  LETTA_API_KEY: z.preprocess(normalizeSecret, z.string().min(1).optional()),
  LETTA_SERVER_PASSWORD: z.preprocess(normalizeSecret, z.string().min(1).optional()),
  LETTA_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  LETTA_RETRY_BASE_MS: z.coerce.number().int().min(0).max(60_000).default(1000),
  LETTA_TIMEOUT_MS: z.coerce.number().int().min(1000).max(300_000).default(30_000),

  PROMPTYOSELF_EXECUTOR_AUTOSTART: z.preprocess(parseFlag, z.boolean().default(true)),
  PROMPTYOSELF_EXECUTOR_INTERVAL: z.coerce.number().int().min(1).max(86_400).default(60),

  LOG_LEVEL: z.enum(LOG_LEVELS).default("info")
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const env: Record<string, unknown> = { ...source };
  if (typeof env.LOG_LEVEL === "string") env.LOG_LEVEL = env.LOG_LEVEL.trim().toLowerCase() || undefined;

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Config error:\n${issues}`);
  }
  const cfg = parsed.data;
  if (cfg.PROMPTYOSELF_DB !== ":memory:" && !path.isAbsolute(cfg.PROMPTYOSELF_DB)) {
    cfg.PROMPTYOSELF_DB = path.resolve(projectRootDir(), cfg.PROMPTYOSELF_DB);
  }
  cfg.LETTA_BASE_URL = cfg.LETTA_BASE_URL.replace(/\/+$/, "");
  return cfg;
}
