import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { bootstrapApp } from "./bootstrap";
import { __resetRuntimeConfigForTest } from "../../config/runtimeConfig";
import { FALLBACK_MODELS } from "../models/modelsApi";
import { modelStore } from "../models/modelStore";

describe("bootstrapApp", () => {
  beforeEach(() => {
    __resetRuntimeConfigForTest();
    modelStore.set({ loading: false, models: FALLBACK_MODELS });
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("loads runtime config and the model catalogue", async () => {
    vi.stubGlobal("fetch", async (url: string) => {
      if (url.includes("runtime-config.json")) {
        return new Response(JSON.stringify({ BACKEND_BASE_URL: "https://relay.example.test/" }), { status: 200 });
      }
      if (url === "https://relay.example.test/api/models") {
        return new Response(JSON.stringify({ models: [{ id: "m-1", name: "Model One" }] }), { status: 200 });
      }
      return new Response("Not Found", { status: 404 });
    });

    const boot = await bootstrapApp();
    expect(boot.modelsLoaded).toBe(true);
    expect(boot.runtimeConfig.BACKEND_BASE_URL).toBe("https://relay.example.test");
    expect(boot.bootError).toBeUndefined();
    expect(modelStore.get().models.map((m) => m.id)).toEqual(["m-1"]);
  });

  it("falls back to defaults and the static model list when everything is down", async () => {
    vi.stubGlobal("fetch", async () => {
      throw new Error("connection refused");
    });

    const boot = await bootstrapApp();
    expect(boot.modelsLoaded).toBe(false);
    expect(boot.runtimeConfig.BACKEND_BASE_URL).toBe("");
    expect(boot.bootError).toBe("Model list unavailable: connection refused");
    expect(modelStore.get().models).toEqual(FALLBACK_MODELS);
  });
});
