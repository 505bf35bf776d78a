import "./env";
import { existsSync } from "node:fs";
import { dirname, relative, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { serve } from "@hono/node-server";
import { serveStatic } from "@hono/node-server/serve-static";
import { createRelayApp } from "./app";
import { loadServerConfig } from "./config";
import { createLogger } from "./logger";

const config = loadServerConfig();
const logger = createLogger({ level: config.logLevel, pretty: config.pretty });
const app = createRelayApp({ config, logger });

const baseDir = dirname(fileURLToPath(import.meta.url));
// The built chat UI; serveStatic resolves roots against the working directory.
const staticDir = resolve(config.staticDir ?? resolve(baseDir, "..", "..", "frontend", "dist"));
if (existsSync(staticDir)) {
  app.use("/*", serveStatic({ root: relative(process.cwd(), staticDir) || "." }));
  logger.info("Serving UI", { staticDir });
} else {
  logger.warn("UI build not found; only the API is served", { staticDir });
}

serve({ port: config.port, fetch: app.fetch }, (info) => {
  logger.info(`Relay listening on http://localhost:${info.port}`, {
    demoMode: config.demoMode,
  });
});
