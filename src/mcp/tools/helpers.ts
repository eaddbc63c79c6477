import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { isFailure } from "../schedules/service.js";

/** Wraps an envelope as one JSON text block; failures are flagged with `isError`. */
export function jsonResult(value: object): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }], ...(isFailure(value) ? { isError: true } : {}) };
}
