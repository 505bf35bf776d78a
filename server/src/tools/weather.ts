import { z } from "zod";
import { describeError } from "../errors";
import { formatClock, formatUtcOffset, shiftHours } from "./format";
import { type ToolContext, type ToolResult, fetchJson, stamp } from "./types";

export type TemperatureUnit = "celsius" | "fahrenheit";

const SIMULATED: Record<string, { temp: number; condition: string; humidity: number }> = {
  "New York": { temp: 22, condition: "Partly Cloudy", humidity: 65 },
  London: { temp: 18, condition: "Rainy", humidity: 80 },
  Tokyo: { temp: 26, condition: "Sunny", humidity: 70 },
  Sydney: { temp: 24, condition: "Clear", humidity: 60 },
  Paris: { temp: 20, condition: "Cloudy", humidity: 75 },
};

const DEFAULT_SIMULATED = { temp: 23, condition: "Sunny", humidity: 68 };

const COMPASS = [
  "N", "NNE", "NE", "ENE", "E", "ESE", "SE", "SSE",
  "S", "SSW", "SW", "WSW", "W", "WNW", "NW", "NNW",
];

export function windDirection(degrees: number): string {
  const index = Math.round(degrees / (360 / COMPASS.length)) % COMPASS.length;
  return COMPASS[index] ?? "N";
}

function symbol(unit: TemperatureUnit): string {
  return unit === "fahrenheit" ? "°F" : "°C";
}

export function getSimulatedWeather(location: string, unit: TemperatureUnit, now: Date): ToolResult {
  const weather = SIMULATED[location] ?? DEFAULT_SIMULATED;
  const temp = unit === "fahrenheit" ? (weather.temp * 9) / 5 + 32 : weather.temp;
  return {
    location,
    temperature: `${Math.round(temp)}${symbol(unit)}`,
    condition: weather.condition,
    humidity: `${weather.humidity}%`,
    unit,
    timestamp: stamp(now),
    data_source: "simulated",
  };
}

const openWeatherSchema = z.object({
  name: z.string(),
  coord: z.object({ lat: z.number(), lon: z.number() }),
  sys: z.object({ country: z.string(), sunrise: z.number(), sunset: z.number() }),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
    pressure: z.number(),
  }),
  weather: z.array(z.object({ main: z.string(), description: z.string(), icon: z.string() })),
  wind: z.object({ speed: z.number(), deg: z.number().optional() }),
  visibility: z.number().optional(),
  timezone: z.number(),
});

function readMessage(body: unknown, status: number): string {
  if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
    return body.message;
  }
  return `Error code: ${status}`;
}

/**
 * Live conditions from OpenWeatherMap. Without an API key the simulated table
 * answers instead; with a key, API failures come back as `{ error }`.
 */
export async function getRealWeather(
  ctx: ToolContext,
  location: string,
  unit: TemperatureUnit
): Promise<ToolResult> {
  const apiKey = ctx.keys.openWeatherMap;
  if (!apiKey) {
    ctx.logger.info("tool.weather.simulated", { location });
    return getSimulatedWeather(location, unit, ctx.now());
  }

  const params = new URLSearchParams({
    q: location,
    units: unit === "celsius" ? "metric" : "imperial",
    appid: apiKey,
  });

  try {
    const res = await fetchJson(ctx, `https://api.openweathermap.org/data/2.5/weather?${params}`);
    const parsed = openWeatherSchema.safeParse(res.body);
    if (!res.ok || !parsed.success) {
      return {
        error: `Could not retrieve weather data: ${readMessage(res.body, res.status)}`,
        location,
        timestamp: stamp(ctx.now()),
      };
    }

    const data = parsed.data;
    const [current] = data.weather;
    const sym = symbol(unit);
    const offsetHours = data.timezone / 3600;
    const localClock = (unixSeconds: number) =>
      formatClock(shiftHours(new Date(unixSeconds * 1000), offsetHours), "24h");

    return {
      location: `${data.name}, ${data.sys.country}`,
      coordinates: `Lat: ${data.coord.lat}, Lon: ${data.coord.lon}`,
      temperature: `${Math.round(data.main.temp)}${sym}`,
      feels_like: `${Math.round(data.main.feels_like)}${sym}`,
      condition: current?.main ?? "Unknown",
      description: current ? current.description.charAt(0).toUpperCase() + current.description.slice(1) : "",
      icon_url: current ? `https://openweathermap.org/img/wn/${current.icon}@2x.png` : null,
      humidity: `${data.main.humidity}%`,
      wind_speed: `${data.wind.speed} ${unit === "fahrenheit" ? "mph" : "m/s"}`,
      wind_direction: windDirection(data.wind.deg ?? 0),
      pressure: `${data.main.pressure} hPa`,
      visibility: `${(data.visibility ?? 0) / 1000} km`,
      sunrise: localClock(data.sys.sunrise),
      sunset: localClock(data.sys.sunset),
      timezone: formatUtcOffset(offsetHours),
      unit,
      timestamp: stamp(ctx.now()),
      data_source: "OpenWeatherMap API (real-time data)",
    };
  } catch (err) {
    ctx.logger.warn("tool.weather.failed", { location, error: describeError(err) });
    return {
      error: `Error accessing weather API: ${describeError(err)}`,
      location,
      timestamp: stamp(ctx.now()),
    };
  }
}
