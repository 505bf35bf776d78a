import { isRecord, readString } from "../core/util/guards";

export type RuntimeConfig = {
  // "" means same origin as the page (the relay serves the UI)
  BACKEND_BASE_URL: string;
  DEFAULT_MODEL?: string;
  REQUEST_TIMEOUT_MS?: number;
  BUILD_INFO?: {
    build_sha?: string;
    build_timestamp?: string;
  };
};

const DEFAULT_CONFIG: RuntimeConfig = {
  BACKEND_BASE_URL: "",
  REQUEST_TIMEOUT_MS: 60000
};

let config: RuntimeConfig | null = null;

export function mergeRuntimeConfig(
  base: Partial<RuntimeConfig>,
  patch: Partial<RuntimeConfig>
): RuntimeConfig {
  const mergedBaseUrlRaw = (patch.BACKEND_BASE_URL ?? base.BACKEND_BASE_URL ?? "").trim();
  return {
    BACKEND_BASE_URL: mergedBaseUrlRaw ? normalizeBaseUrl(mergedBaseUrlRaw) : "",
    DEFAULT_MODEL: patch.DEFAULT_MODEL ?? base.DEFAULT_MODEL,
    REQUEST_TIMEOUT_MS:
      patch.REQUEST_TIMEOUT_MS ?? base.REQUEST_TIMEOUT_MS ?? DEFAULT_CONFIG.REQUEST_TIMEOUT_MS,
    BUILD_INFO: {
      ...(base.BUILD_INFO ?? {}),
      ...(patch.BUILD_INFO ?? {}),
    },
  };
}

export function setRuntimeConfig(next: Partial<RuntimeConfig>): void {
  config = mergeRuntimeConfig(DEFAULT_CONFIG, next);
}

export function getRuntimeConfig(): RuntimeConfig {
  if (!config) throw new Error("Runtime config not set");
  return config;
}

export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) throw new Error("BACKEND_BASE_URL is empty");
  return trimmed.endsWith("/") ? trimmed.slice(0, -1) : trimmed;
}

function readPositiveInt(raw: Record<string, unknown>, key: string): number | undefined {
  const v = raw[key];
  return typeof v === "number" && Number.isInteger(v) && v > 0 ? v : undefined;
}

export function parseRuntimeConfig(raw: unknown): Partial<RuntimeConfig> {
  if (!isRecord(raw)) {
    throw new Error("runtime-config.json is not an object");
  }
  const build = raw.BUILD_INFO;
  return {
    BACKEND_BASE_URL: readString(raw, "BACKEND_BASE_URL"),
    DEFAULT_MODEL: readString(raw, "DEFAULT_MODEL"),
    REQUEST_TIMEOUT_MS: readPositiveInt(raw, "REQUEST_TIMEOUT_MS"),
    BUILD_INFO: isRecord(build)
      ? {
          build_sha: readString(build, "build_sha"),
          build_timestamp: readString(build, "build_timestamp"),
        }
      : undefined,
  };
}

export async function loadRuntimeConfig(): Promise<RuntimeConfig> {
  const res = await fetch(`./runtime-config.json?ts=${Date.now()}`, {
    cache: "no-store",
  });
  if (!res.ok) throw new Error(`Missing runtime-config.json (${res.status})`);
  const raw: unknown = await res.json();
  return mergeRuntimeConfig(DEFAULT_CONFIG, parseRuntimeConfig(raw));
}

export async function loadRuntimeConfigSafe(): Promise<RuntimeConfig> {
  try {
    return await loadRuntimeConfig();
  } catch {
    return { ...DEFAULT_CONFIG };
  }
}

export function __resetRuntimeConfigForTest(): void {
  config = null;
}
