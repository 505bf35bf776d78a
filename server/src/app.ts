import { Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import type { ServerConfig } from "./config";
import { RelayError } from "./errors";
import { jsonError } from "./http";
import type { Logger } from "./logger";
import { createRequestLoggingMiddleware } from "./middleware/requestLogging";
import { createGenerateRoutes } from "./routes/generate";
import { createModelRoutes } from "./routes/models";
import { DemoCompletionClient } from "./together/demoClient";
import { TogetherClient } from "./together/client";
import type { CompletionClient } from "./together/types";
import { ToolExecutor } from "./tools/executor";

export interface RelayAppDeps {
  config: ServerConfig;
  logger: Logger;
  /** overrides the client chosen from config */
  client?: CompletionClient;
  tools?: ToolExecutor;
}

export function createCompletionClient(config: ServerConfig, logger: Logger): CompletionClient {
  const apiKey = config.together.apiKey;
  if (!apiKey) {
    // loadServerConfig only lets this through in demo mode
    logger.warn("Demo mode: replies are canned, no provider calls are made");
    return new DemoCompletionClient();
  }
  return new TogetherClient({ apiKey, baseUrl: config.together.baseUrl, logger });
}

export function createRelayApp(deps: RelayAppDeps) {
  const { config, logger } = deps;
  const client = deps.client ?? createCompletionClient(config, logger);
  const tools = deps.tools ?? new ToolExecutor({ keys: config.toolKeys, logger });

  const app = new Hono();

  app.use(
    "*",
    secureHeaders({
      contentSecurityPolicy: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        connectSrc: ["'self'"],
        imgSrc: ["'self'", "data:", "https://openweathermap.org"],
        styleSrc: ["'self'", "'unsafe-inline'"],
      },
    })
  );
  app.use("*", createRequestLoggingMiddleware(logger));

  app.get("/healthz", (c) => c.json({ ok: true, demoMode: client instanceof DemoCompletionClient }));
  app.route("/", createModelRoutes());
  app.route("/", createGenerateRoutes({ client, tools, logger }));

  app.onError((error, c) => {
    if (error instanceof RelayError) {
      if (error.status >= 500) {
        logger.error("Request failed", error);
      }
      return jsonError(c, error.status, error.message);
    }
    logger.error("Server error", error);
    return jsonError(c, 500, "Internal server error");
  });

  return app;
}
