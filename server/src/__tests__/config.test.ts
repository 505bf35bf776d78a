import { describe, expect, it } from "vitest";
import { loadServerConfig } from "../config";
import { ConfigError } from "../errors";
import { parseEnvLine } from "../env";

describe("loadServerConfig", () => {
  it("applies defaults around the API key", () => {
    const config = loadServerConfig({ TOGETHER_API_KEY: "test-secret" });

    expect(config).toEqual({
      port: 5001,
      logLevel: "info",
      pretty: false,
      demoMode: false,
      together: { apiKey: "test-secret", baseUrl: "https://api.together.xyz/v1" },
      toolKeys: { openWeatherMap: undefined, timeZoneDb: undefined, openCage: undefined },
      staticDir: undefined,
    });
  });

  it("reads overrides", () => {
    const config = loadServerConfig({
      TOGETHER_API_KEY: "test-secret",
      TOGETHER_BASE_URL: "https://proxy.test/v1/",
      PORT: "8080",
      LOG_LEVEL: "debug",
      NODE_ENV: "development",
      OPENWEATHERMAP_API_KEY: "test-weather",
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("debug");
    expect(config.pretty).toBe(true);
    expect(config.together.baseUrl).toBe("https://proxy.test/v1");
    expect(config.toolKeys.openWeatherMap).toBe("test-weather");
  });

  it("treats template placeholders as missing keys", () => {
    const config = loadServerConfig({
      TOGETHER_API_KEY: "test-secret",
      OPENCAGE_API_KEY: "your_opencage_api_key",
      TIMEZONEDB_API_KEY: "  ",
    });

    expect(config.toolKeys.openCage).toBeUndefined();
    expect(config.toolKeys.timeZoneDb).toBeUndefined();
  });

  it("requires an API key unless demo mode is on", () => {
    expect(() => loadServerConfig({})).toThrow(ConfigError);
    expect(() => loadServerConfig({ TOGETHER_API_KEY: "your_together_api_key" })).toThrow(
      "TOGETHER_API_KEY is not set. Set DEMO_MODE=true to run without an API key."
    );

    const config = loadServerConfig({ DEMO_MODE: "yes" });
    expect(config.demoMode).toBe(true);
    expect(config.together.apiKey).toBeUndefined();
  });

  it("rejects malformed values", () => {
    expect(() => loadServerConfig({ TOGETHER_API_KEY: "test-secret", PORT: "99999" })).toThrow(
      /^Invalid environment: PORT: /
    );
  });
});

describe("parseEnvLine", () => {
  it("parses assignments", () => {
    expect(parseEnvLine("PORT=5001")).toEqual({ key: "PORT", value: "5001" });
    expect(parseEnvLine("export LOG_LEVEL = debug")).toEqual({ key: "LOG_LEVEL", value: "debug" });
    expect(parseEnvLine('TOGETHER_API_KEY="test-secret"')).toEqual({ key: "TOGETHER_API_KEY", value: "test-secret" });
  });

  it("skips comments, blanks and lines without a key", () => {
    expect(parseEnvLine("# comment")).toBeNull();
    expect(parseEnvLine("   ")).toBeNull();
    expect(parseEnvLine("=value")).toBeNull();
  });
});
