import { z } from "zod";
import type { AppConfig } from "../../config.js";
import { logger } from "../../logger.js";
import { errorMessage, sleep } from "../../utils/async.js";
import type { AgentCatalog, AgentSummary, ConnectionCheck, PromptDelivery } from "./types.js";

export type LettaConfig = Pick<
  AppConfig,
  "LETTA_BASE_URL" | "LETTA_API_KEY" | "LETTA_SERVER_PASSWORD" | "LETTA_MAX_RETRIES" | "LETTA_RETRY_BASE_MS" | "LETTA_TIMEOUT_MS"
>;

const agentListSchema = z.array(
  z
    .object({
      id: z.string(),
      name: z.string().nullish(),
      created_at: z.string().nullish(),
      last_updated: z.string().nullish()
    })
    .passthrough()
);

// Some agent templates fail the plain endpoint with this error while the
// streaming endpoint still accepts the message.
function isChatMlDescriptionBug(message: string): boolean {
  return message.includes("'description'") && message.includes("ChatMLInnerMonologueWrapper");
}

export class LettaHttpClient implements PromptDelivery, AgentCatalog {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleepImpl: (ms: number) => Promise<void>;
  private readonly log = logger.child({ component: "letta" });

  constructor(
    private readonly config: LettaConfig,
    opts: { fetch?: typeof fetch; sleep?: (ms: number) => Promise<void> } = {}
  ) {
    this.baseUrl = config.LETTA_BASE_URL.replace(/\/+$/, "");
    this.token = config.LETTA_API_KEY ?? config.LETTA_SERVER_PASSWORD;
    this.fetchImpl = opts.fetch ?? fetch;
    this.sleepImpl = opts.sleep ?? sleep;
  }

  /** Retries with exponential backoff; never throws. */
  async deliver(agentId: string, text: string): Promise<boolean> {
    const path = `/v1/agents/${encodeURIComponent(agentId)}/messages`;
    const attempts = this.config.LETTA_MAX_RETRIES;
    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        await this.callApi("POST", path, this.messageBody(text));
        this.log.debug({ agentId, attempt: attempt + 1 }, "Prompt delivered");
        return true;
      } catch (err) {
        const msg = errorMessage(err);
        this.log.warn({ agentId, attempt: attempt + 1, attempts, err: msg }, "Prompt delivery attempt failed");
        if (isChatMlDescriptionBug(msg) && (await this.deliverStreaming(agentId, text))) return true;
        if (attempt === attempts - 1) {
          this.log.error({ agentId, attempts }, "All delivery attempts failed");
          return false;
        }
        await this.sleepImpl(this.config.LETTA_RETRY_BASE_MS * 2 ** attempt);
      }
    }
    return false;
  }

  async listAgents(): Promise<AgentSummary[]> {
    const parsed = agentListSchema.safeParse(await this.callApi("GET", "/v1/agents"));
    if (!parsed.success) throw new Error("Letta API returned an unexpected agent list");
    return parsed.data.map((a) => ({
      id: a.id,
      name: a.name ?? "Unknown",
      created_at: a.created_at ?? null,
      last_updated: a.last_updated ?? null
    }));
  }

  async agentExists(agentId: string): Promise<boolean> {
    const agents = await this.listAgents();
    return agents.some((a) => a.id === agentId);
  }

  async testConnection(): Promise<ConnectionCheck> {
    try {
      const agents = await this.listAgents();
      return { status: "success", message: "Connection to Letta server successful", agent_count: agents.length };
    } catch (err) {
      return { status: "error", message: `Failed to connect to Letta server: ${errorMessage(err)}` };
    }
  }

  private async deliverStreaming(agentId: string, text: string): Promise<boolean> {
    try {
      this.log.info({ agentId }, "Attempting streaming fallback");
      await this.request("POST", `/v1/agents/${encodeURIComponent(agentId)}/messages/stream`, this.messageBody(text));
      this.log.info({ agentId }, "Streaming fallback succeeded");
      return true;
    } catch (err) {
      this.log.error({ agentId, err: errorMessage(err) }, "Streaming fallback failed");
      return false;
    }
  }

  private messageBody(text: string): Record<string, unknown> {
    return { messages: [{ role: "user", content: [{ type: "text", text }] }] };
  }

  /** Resolves to the response body; the timeout covers reading it too. */
  private async request(method: string, path: string, body?: Record<string, unknown>): Promise<string> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.token) headers["Authorization"] = `Bearer ${this.token}`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.LETTA_TIMEOUT_MS);
    try {
      const res = await this.fetchImpl(url, {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: controller.signal
      });
      const text = await res.text();
      if (!res.ok) throw new Error(`Letta API ${method} ${path} failed: ${res.status} ${text}`);
      return text;
    } finally {
      clearTimeout(timer);
    }
  }

  private async callApi(method: string, path: string, body?: Record<string, unknown>): Promise<unknown> {
    const text = await this.request(method, path, body);
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
}
