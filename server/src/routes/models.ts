import { Hono } from "hono";
import { listModelSummaries } from "../models";

export function createModelRoutes() {
  const app = new Hono();

  app.get("/api/models", (c) => c.json({ models: listModelSummaries() }));

  return app;
}
