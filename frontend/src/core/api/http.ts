import { getRuntimeConfig } from "../../config/runtimeConfig";
import { ApiError, errorMessage } from "./errors";

export type JsonResult = {
  status: number;
  ok: boolean;
  body: unknown;
};

type TimeoutInit = RequestInit & { timeoutMs?: number };

export function resolveUrl(path: string): string {
  if (/^https?:\/\//i.test(path)) return path;
  const { BACKEND_BASE_URL } = getRuntimeConfig();
  return `${BACKEND_BASE_URL}${path.startsWith("/") ? path : `/${path}`}`;
}

export async function fetchWithTimeout(url: string, init: TimeoutInit = {}): Promise<Response> {
  const { timeoutMs = 30000, ...rest } = init;

  const ctrl = new AbortController();
  const signal = rest.signal ?? ctrl.signal;

  let t: ReturnType<typeof setTimeout> | null = null;
  if (timeoutMs > 0) {
    t = setTimeout(() => ctrl.abort(), timeoutMs);
  }

  try {
    return await fetch(url, { ...rest, signal });
  } catch (e) {
    if (e instanceof Error && e.name === "AbortError") {
      throw new ApiError("timeout", "Request timed out");
    }
    throw new ApiError("network_error", errorMessage(e), undefined, e);
  } finally {
    if (t) clearTimeout(t);
  }
}

/**
 * Read a JSON body regardless of status. The relay reports failures as JSON
 * with a non-2xx status, so the status alone is not an error here; a body that
 * is not JSON is.
 */
export async function readJson(res: Response): Promise<JsonResult> {
  let text = "";
  try {
    text = await res.text();
    return { status: res.status, ok: res.ok, body: JSON.parse(text) as unknown };
  } catch (e) {
    const message = res.ok
      ? `Invalid JSON in response: ${errorMessage(e)}`
      : `HTTP ${res.status}${text ? `: ${text.slice(0, 200)}` : ""}`;
    throw new ApiError(res.ok ? "invalid_response" : "server_error", message, res.status, text);
  }
}

export async function getJson(path: string, timeoutMs = 15000): Promise<JsonResult> {
  const res = await fetchWithTimeout(resolveUrl(path), {
    method: "GET",
    headers: { Accept: "application/json" },
    timeoutMs
  });
  return readJson(res);
}

export async function postJson(path: string, payload: unknown, timeoutMs = 60000): Promise<JsonResult> {
  const res = await fetchWithTimeout(resolveUrl(path), {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Accept: "application/json"
    },
    body: JSON.stringify(payload),
    timeoutMs
  });
  return readJson(res);
}
