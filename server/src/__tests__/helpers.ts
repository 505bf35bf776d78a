import { vi } from "vitest";
import type { ServerConfig } from "../config";
import { createLogger } from "../logger";

export const silentLogger = createLogger({ level: "silent" });

export function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    port: 5001,
    logLevel: "silent",
    pretty: false,
    demoMode: false,
    together: { apiKey: "test-secret", baseUrl: "https://together.test/v1" },
    toolKeys: {},
    staticDir: undefined,
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function completion(content: string | null, extra: Record<string, unknown> = {}) {
  return {
    id: "cmpl-1",
    object: "chat.completion",
    choices: [{ index: 0, message: { role: "assistant", content, ...extra }, finish_reason: "stop" }],
  };
}

/** Reads the JSON body of the nth fetch call. */
export function requestBody(fetchMock: ReturnType<typeof vi.fn>, call = 0): unknown {
  const init = fetchMock.mock.calls[call]?.[1];
  if (typeof init !== "object" || init === null || !("body" in init) || typeof init.body !== "string") {
    throw new Error(`fetch call ${call} has no string body`);
  }
  return JSON.parse(init.body);
}
