import { Hono } from "hono";
import { describe, expect, it, vi } from "vitest";
import { createRequestLoggingMiddleware } from "../middleware/requestLogging";

function createApp(info: ReturnType<typeof vi.fn>) {
  const app = new Hono<{ Variables: { requestId: string } }>();
  app.use("*", createRequestLoggingMiddleware({ info }));
  app.get("/ping", (c) => c.json({ requestId: c.get("requestId") }));
  return app;
}

describe("request logging middleware", () => {
  it("reuses an incoming request id", async () => {
    const info = vi.fn();
    const app = createApp(info);

    const res = await app.request("/ping", { headers: { "x-request-id": "req-42" } });

    expect(res.headers.get("x-request-id")).toBe("req-42");
    expect(await res.json()).toEqual({ requestId: "req-42" });
    expect(info).toHaveBeenCalledWith(
      "request.completed",
      expect.objectContaining({ requestId: "req-42", method: "GET", path: "/ping", status: 200 })
    );
  });

  it("generates a request id when none is sent", async () => {
    const info = vi.fn();
    const app = createApp(info);

    const res = await app.request("/ping");

    expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("logs the status of unmatched routes", async () => {
    const info = vi.fn();
    const app = createApp(info);

    await app.request("/missing");

    expect(info).toHaveBeenCalledWith("request.completed", expect.objectContaining({ status: 404 }));
  });
});
