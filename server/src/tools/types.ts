import type { ToolKeys } from "../config";
import type { Logger } from "../logger";

/** Tool results are sent back to the model as JSON. */
export type ToolResult = Record<string, unknown>;

export interface ToolContext {
  keys: ToolKeys;
  logger: Logger;
  now: () => Date;
  fetch?: typeof fetch;
}

export const TOOL_HTTP_TIMEOUT_MS = 5_000;

export interface JsonResponse {
  ok: boolean;
  status: number;
  body: unknown;
}

export async function fetchJson(ctx: ToolContext, url: string): Promise<JsonResponse> {
  const doFetch = ctx.fetch ?? fetch;
  const res = await doFetch(url, {
    headers: { Accept: "application/json", "User-Agent": "relay-chat/0.1" },
    signal: AbortSignal.timeout(TOOL_HTTP_TIMEOUT_MS),
  });
  const body: unknown = await res.json().catch(() => null);
  return { ok: res.ok, status: res.status, body };
}

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function stamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}
