import { describe, expect, it, vi } from "vitest";
import { ToolExecutionError } from "../errors";
import { ToolExecutor, parseToolArguments } from "../tools/executor";
import { formatClock, formatLongDate, formatUtcOffset } from "../tools/format";
import { searchProducts } from "../tools/products";
import { isGreetingOnly, resolveToolCategory } from "../tools/resolve";
import { findOffset, getRealTime, getSimulatedTime } from "../tools/time";
import type { ToolContext } from "../tools/types";
import { getRealWeather, getSimulatedWeather, windDirection } from "../tools/weather";
import { searchWikipedia } from "../tools/wikipedia";
import { jsonResponse, silentLogger } from "./helpers";

// Monday, 12:30 UTC
const NOW = new Date("2024-01-01T12:30:00Z");
const DAY_START = Date.UTC(2024, 0, 1) / 1000;

function context(keys: ToolContext["keys"] = {}, fetchMock = vi.fn()): ToolContext {
  return { keys, logger: silentLogger, now: () => NOW, fetch: fetchMock };
}

describe("resolveToolCategory", () => {
  it.each([
    ["get_real_weather", "weather"],
    ["Get the current weather", "weather"],
    ["get_current_time", "time"],
    ["search_products", "products"],
    ["search_wikipedia", "wikipedia"],
    ["translate_text", null],
  ] as const)("%s -> %s", (name, category) => {
    expect(resolveToolCategory(name)).toBe(category);
  });
});

describe("isGreetingOnly", () => {
  it("flags a bare greeting as the main argument", () => {
    expect(isGreetingOnly({ location: " Hello " })).toBe(true);
    expect(isGreetingOnly({ query: "hello kitty" })).toBe(false);
    expect(isGreetingOnly({ unit: "celsius" })).toBe(false);
  });
});

describe("format helpers", () => {
  it("formats clocks, dates and offsets", () => {
    const afternoon = new Date("2024-01-01T14:05:00Z");
    expect(formatClock(afternoon, "12h")).toBe("02:05 PM");
    expect(formatClock(afternoon, "24h")).toBe("14:05");
    expect(formatClock(new Date("2024-01-01T00:15:00Z"), "12h")).toBe("12:15 AM");
    expect(formatLongDate(afternoon)).toBe("Monday, January 01, 2024");
    expect(formatUtcOffset(5.5)).toBe("UTC+5.5");
    expect(formatUtcOffset(-4, "GMT")).toBe("GMT-4");
  });
});

describe("searchProducts", () => {
  it("filters by name, category and price", () => {
    const result = searchProducts({ query: "w", category: "electronics", maxPrice: 500 });

    expect(result).toMatchObject({ category: "electronics", max_price: 500, sort_by: "popularity", count: 2 });
    expect(result.results).toEqual([
      { id: 3, name: "Wireless Headphones", price: 149.99, category: "Electronics", rating: 4.3 },
      { id: 8, name: "Smart Watch", price: 199.99, category: "Electronics", rating: 4.6 },
    ]);
  });

  it("sorts by price", () => {
    const { count, results } = searchProducts({ query: "", sortBy: "price_asc" });
    if (!Array.isArray(results)) throw new Error("results is not an array");

    expect(count).toBe(8);
    expect(results[0]).toMatchObject({ name: "Backpack", price: 49.99 });
    expect(results[7]).toMatchObject({ name: "Laptop Pro", price: 1299.99 });
  });
});

describe("weather", () => {
  it("maps degrees to compass points", () => {
    expect(windDirection(0)).toBe("N");
    expect(windDirection(250)).toBe("WSW");
    expect(windDirection(355)).toBe("N");
  });

  it("serves simulated weather when no key is configured", async () => {
    const fetchMock = vi.fn();

    const result = await getRealWeather(context({}, fetchMock), "Tokyo", "fahrenheit");

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result).toEqual(getSimulatedWeather("Tokyo", "fahrenheit", NOW));
    expect(result).toMatchObject({ temperature: "79°F", condition: "Sunny", data_source: "simulated" });
  });

  it("falls back to default conditions for unknown places", () => {
    expect(getSimulatedWeather("Reykjavik", "celsius", NOW)).toEqual({
      location: "Reykjavik",
      temperature: "23°C",
      condition: "Sunny",
      humidity: "68%",
      unit: "celsius",
      timestamp: "2024-01-01 12:30:00",
      data_source: "simulated",
    });
  });

  it("reads live conditions from OpenWeatherMap", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({
        name: "London",
        coord: { lat: 51.51, lon: -0.13 },
        sys: { country: "GB", sunrise: DAY_START + 8 * 3600 + 6 * 60, sunset: DAY_START + 16 * 3600 },
        main: { temp: 7.6, feels_like: 5.2, humidity: 81, pressure: 1012 },
        weather: [{ main: "Rain", description: "light rain", icon: "10d" }],
        wind: { speed: 4.1, deg: 250 },
        visibility: 10000,
        timezone: 3600,
      })
    );

    const result = await getRealWeather(context({ openWeatherMap: "test-secret" }, fetchMock), "London", "celsius");

    const url = String(fetchMock.mock.calls[0]?.[0]);
    expect(url).toContain("q=London");
    expect(url).toContain("units=metric");
    expect(result).toMatchObject({
      location: "London, GB",
      temperature: "8°C",
      feels_like: "5°C",
      condition: "Rain",
      description: "Light rain",
      humidity: "81%",
      wind_speed: "4.1 m/s",
      wind_direction: "WSW",
      visibility: "10 km",
      sunrise: "09:06",
      sunset: "17:00",
      timezone: "UTC+1",
      data_source: "OpenWeatherMap API (real-time data)",
    });
  });

  it("reports an API error message", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ cod: "404", message: "city not found" }, 404));

    const result = await getRealWeather(context({ openWeatherMap: "test-secret" }, fetchMock), "Nowhere", "celsius");

    expect(result).toEqual({
      error: "Could not retrieve weather data: city not found",
      location: "Nowhere",
      timestamp: "2024-01-01 12:30:00",
    });
  });

  it("reports a network failure", async () => {
    const fetchMock = vi.fn().mockRejectedValue(new TypeError("fetch failed"));

    const result = await getRealWeather(context({ openWeatherMap: "test-secret" }, fetchMock), "Oslo", "celsius");

    expect(result).toMatchObject({ error: "Error accessing weather API: fetch failed" });
  });
});

describe("time", () => {
  it("finds offsets by exact or partial name", () => {
    expect(findOffset("mumbai")).toEqual({ key: "Mumbai", hours: 5.5 });
    expect(findOffset("Tokyo, Japan")).toEqual({ key: "Tokyo", hours: 9 });
    expect(findOffset("Atlantis")).toBeNull();
  });

  it("shifts the clock by the table offset", () => {
    expect(getSimulatedTime("Mumbai", "12h", NOW)).toEqual({
      location: "Mumbai",
      time: "06:00 PM",
      date: "Monday, January 01, 2024",
      timezone: "UTC+5.5",
      timezone_name: "IST (Indian Standard Time)",
      format: "12h",
    });
    expect(getSimulatedTime("New York", "24h", NOW)).toMatchObject({ time: "08:30", timezone: "UTC-4" });
    expect(getSimulatedTime("Atlantis", "24h", NOW)).toMatchObject({
      time: "12:30",
      timezone: "UTC+0",
      timezone_name: "GMT (Greenwich Mean Time)",
    });
  });

  it("notes which key is missing", async () => {
    const result = await getRealTime(context({ openCage: "test-secret" }), "Tokyo", "24h");
    expect(result).toMatchObject({
      note: "Using simulated data (TimeZoneDB API key not provided)",
      time: "21:30",
    });
  });

  it("geocodes then asks TimeZoneDB for local time", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        jsonResponse({ results: [{ geometry: { lat: 35.68, lng: 139.69 }, formatted: "Tokyo, Japan" }] })
      )
      .mockResolvedValueOnce(
        jsonResponse({
          status: "OK",
          timestamp: DAY_START + 21 * 3600 + 30 * 60,
          zoneName: "Asia/Tokyo",
          abbreviation: "JST",
          gmtOffset: 32400,
          dst: "0",
        })
      );

    const result = await getRealTime(
      context({ openCage: "test-secret", timeZoneDb: "test-secret" }, fetchMock),
      "Tokyo",
      "24h"
    );

    expect(String(fetchMock.mock.calls[1]?.[0])).toContain("lat=35.68");
    expect(result).toEqual({
      location: "Tokyo",
      resolved_location: "Tokyo, Japan",
      time: "21:30",
      date: "Monday, January 01, 2024",
      timezone: "Asia/Tokyo",
      timezone_abbreviation: "JST",
      gmt_offset: "GMT+9",
      dst: "No",
      format: "24h",
    });
  });

  it("falls back to the table when TimeZoneDB reports a failure", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ results: [{ geometry: { lat: 1, lng: 2 } }] }))
      .mockResolvedValueOnce(jsonResponse({ status: "FAILED", message: "Invalid API key." }));

    const result = await getRealTime(
      context({ openCage: "test-secret", timeZoneDb: "test-secret" }, fetchMock),
      "London",
      "24h"
    );

    expect(result).toMatchObject({
      error: "TimeZoneDB API error: Invalid API key.",
      note: "Using simulated data as fallback",
      time: "13:30",
    });
  });
});

describe("searchWikipedia", () => {
  const article = {
    query: {
      pages: {
        "1208": {
          title: "Ada Lovelace",
          extract: "Augusta Ada King was an English mathematician.",
          fullurl: "https://en.wikipedia.org/wiki/Ada_Lovelace",
          description: "English mathematician",
        },
      },
    },
  };

  it("searches then fetches each article's extract", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        jsonResponse({ query: { search: [{ title: "Ada Lovelace", wordcount: 5000, timestamp: "2024-01-01T00:00:00Z" }] } })
      )
      .mockResolvedValueOnce(jsonResponse(article));

    const result = await searchWikipedia(context({}, fetchMock), "Ada Lovelace", 9);

    expect(String(fetchMock.mock.calls[0]?.[0])).toContain("srlimit=5");
    expect(result).toMatchObject({ query: "Ada Lovelace", results_count: 1 });
    expect(result.results).toEqual([
      {
        title: "Ada Lovelace",
        extract: "Augusta Ada King was an English mathematician.",
        description: "English mathematician",
        url: "https://en.wikipedia.org/wiki/Ada_Lovelace",
        word_count: 5000,
        last_modified: "2024-01-01T00:00:00Z",
      },
    ]);
  });

  it("retries once with the spelling suggestion", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ query: { search: [], searchinfo: { suggestion: "ada lovelace" } } }))
      .mockResolvedValueOnce(jsonResponse({ query: { search: [{ title: "Ada Lovelace" }] } }))
      .mockResolvedValueOnce(jsonResponse(article));

    const result = await searchWikipedia(context({}, fetchMock), "ada lovelase");

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(result).toMatchObject({ query: "ada lovelace", results_count: 1 });
  });

  it("reports no matches", async () => {
    const fetchMock = vi.fn().mockResolvedValueOnce(jsonResponse({ query: { search: [] } }));

    const result = await searchWikipedia(context({}, fetchMock), "qwxz");

    expect(result).toMatchObject({ results_count: 0, message: "No Wikipedia articles found for 'qwxz'" });
  });
});

describe("ToolExecutor", () => {
  const executor = new ToolExecutor({ keys: {}, logger: silentLogger, now: () => NOW, fetch: vi.fn() });

  it("refuses to run a tool for a greeting", async () => {
    expect(await executor.execute("get_real_weather", '{"location":"hello"}')).toEqual({
      error: "Function calls are not needed for simple greetings",
      message: "This is a simple greeting that doesn't require API data",
    });
  });

  it("answers unknown tools with an error result", async () => {
    expect(await executor.execute("translate_text", "{}")).toEqual({
      error: "Function translate_text not implemented",
    });
  });

  it("routes aliases and applies argument defaults", async () => {
    const result = await executor.execute("get the current weather", '{"location":"London","unit":"kelvin"}');
    expect(result).toMatchObject({ location: "London", temperature: "18°C", unit: "celsius" });
  });

  it("throws on malformed or invalid arguments", async () => {
    await expect(executor.execute("get_real_time", "{}")).rejects.toThrow(
      new ToolExecutionError("location: Required")
    );
    expect(() => parseToolArguments("[1, 2]")).toThrow("Function execution failed: arguments must be a JSON object");
    expect(parseToolArguments(undefined)).toEqual({});
  });
});
