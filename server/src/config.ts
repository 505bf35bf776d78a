import { z } from "zod";
import { ConfigError } from "./errors";
import type { LogLevel } from "./logger";

export interface ToolKeys {
  openWeatherMap?: string;
  timeZoneDb?: string;
  openCage?: string;
}

export interface ServerConfig {
  port: number;
  logLevel: LogLevel;
  pretty: boolean;
  /** canned replies instead of provider calls when no API key is set */
  demoMode: boolean;
  together: {
    apiKey?: string;
    baseUrl: string;
  };
  toolKeys: ToolKeys;
  staticDir?: string;
}

// Unset, blank, and "your_..." template values all count as missing.
const optionalKey = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed && !trimmed.startsWith("your_") ? trimmed : undefined;
  });

const flag = z
  .string()
  .optional()
  .transform((value) => ["true", "1", "yes"].includes(value?.trim().toLowerCase() ?? ""));

const envSchema = z.object({
  TOGETHER_API_KEY: optionalKey,
  OPENWEATHERMAP_API_KEY: optionalKey,
  TIMEZONEDB_API_KEY: optionalKey,
  OPENCAGE_API_KEY: optionalKey,
  PORT: z.coerce.number().int().min(1).max(65535).default(5001),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  TOGETHER_BASE_URL: z
    .string()
    .url()
    .default("https://api.together.xyz/v1")
    .transform((url) => url.replace(/\/+$/u, "")),
  STATIC_DIR: z.string().trim().min(1).optional(),
  DEMO_MODE: flag,
  NODE_ENV: z.string().optional(),
});

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
  }

  const vars = parsed.data;
  if (!vars.TOGETHER_API_KEY && !vars.DEMO_MODE) {
    throw new ConfigError(
      "TOGETHER_API_KEY is not set. Set DEMO_MODE=true to run without an API key."
    );
  }

  return {
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    pretty: vars.NODE_ENV === "development",
    demoMode: vars.DEMO_MODE,
    together: {
      apiKey: vars.TOGETHER_API_KEY,
      baseUrl: vars.TOGETHER_BASE_URL,
    },
    toolKeys: {
      openWeatherMap: vars.OPENWEATHERMAP_API_KEY,
      timeZoneDb: vars.TIMEZONEDB_API_KEY,
      openCage: vars.OPENCAGE_API_KEY,
    },
    staticDir: vars.STATIC_DIR,
  };
}
