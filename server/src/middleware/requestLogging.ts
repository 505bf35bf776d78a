import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { Logger } from "../logger";

export type RequestLoggingEnv = { Variables: { requestId: string } };

export function createRequestLoggingMiddleware(
  logger: Pick<Logger, "info">
): MiddlewareHandler<RequestLoggingEnv> {
  return async (c, next) => {
    const start = performance.now();
    const incoming = c.req.header("x-request-id");
    const requestId = incoming?.trim() ? incoming.trim() : randomUUID();
    c.set("requestId", requestId);

    try {
      await next();
    } finally {
      c.header("x-request-id", requestId);
      logger.info("request.completed", {
        requestId,
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round(performance.now() - start),
      });
    }
  };
}
