import { z } from "zod";
import { describeError } from "../errors";
import timeZones from "./data/timeZones.json";
import { type ClockFormat, formatClock, formatLongDate, formatUtcOffset, shiftHours } from "./format";
import { type ToolContext, type ToolResult, fetchJson } from "./types";

const OFFSETS: Record<string, number> = timeZones.offsets;
const ZONE_NAMES: Record<string, string> = timeZones.zoneNames;

/** Exact (case-insensitive) name first, then the first partial match either way round. */
export function findOffset(location: string): { key: string; hours: number } | null {
  const needle = location.trim().toLowerCase();
  if (!needle) return null;
  const keys = Object.keys(OFFSETS);
  const key =
    keys.find((k) => k.toLowerCase() === needle) ??
    keys.find((k) => needle.includes(k.toLowerCase()) || k.toLowerCase().includes(needle));
  const hours = key === undefined ? undefined : OFFSETS[key];
  return key === undefined || hours === undefined ? null : { key, hours };
}

export function getSimulatedTime(location: string, format: ClockFormat, now: Date): ToolResult {
  const hours = findOffset(location)?.hours ?? 0;
  const local = shiftHours(now, hours);
  return {
    location,
    time: formatClock(local, format),
    date: formatLongDate(local),
    timezone: formatUtcOffset(hours),
    timezone_name: ZONE_NAMES[String(hours)] ?? formatUtcOffset(hours),
    format,
  };
}

const geocodeSchema = z.object({
  results: z.array(
    z.object({
      geometry: z.object({ lat: z.number(), lng: z.number() }),
      formatted: z.string().optional(),
    })
  ),
});

const timeZoneSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  timestamp: z.number().optional(),
  zoneName: z.string().optional(),
  abbreviation: z.string().optional(),
  gmtOffset: z.number().optional(),
  dst: z.string().optional(),
});

/**
 * OpenCage geocodes the location, TimeZoneDB turns the coordinates into local
 * time. Missing keys or any failure along the way answer from the offset
 * table, with a `note` saying why.
 */
export async function getRealTime(
  ctx: ToolContext,
  location: string,
  format: ClockFormat
): Promise<ToolResult> {
  const { timeZoneDb, openCage } = ctx.keys;
  const simulated = (note: string, error?: string): ToolResult => ({
    ...(error ? { error } : {}),
    note,
    ...getSimulatedTime(location, format, ctx.now()),
  });

  if (!timeZoneDb) return simulated("Using simulated data (TimeZoneDB API key not provided)");
  if (!openCage) return simulated("Using simulated data (OpenCage API key not provided)");

  try {
    const geocodeParams = new URLSearchParams({ q: location, key: openCage, limit: "1" });
    const geocode = await fetchJson(ctx, `https://api.opencagedata.com/geocode/v1/json?${geocodeParams}`);
    if (!geocode.ok) {
      return simulated(`Error getting coordinates: ${geocode.status}`);
    }
    const place = geocodeSchema.safeParse(geocode.body);
    const first = place.success ? place.data.results[0] : undefined;
    if (!first) {
      return simulated(`No geocoding results found for '${location}'`);
    }

    const zoneParams = new URLSearchParams({
      key: timeZoneDb,
      format: "json",
      by: "position",
      lat: String(first.geometry.lat),
      lng: String(first.geometry.lng),
    });
    const zone = await fetchJson(ctx, `https://api.timezonedb.com/v2.1/get-time-zone?${zoneParams}`);
    if (!zone.ok) {
      return simulated("Using simulated data as fallback", `Could not retrieve timezone data: ${zone.status}`);
    }
    const parsed = timeZoneSchema.safeParse(zone.body);
    const data = parsed.success ? parsed.data : null;
    if (!data || data.status !== "OK" || data.timestamp === undefined) {
      const message = data ? data.message ?? "Unknown error" : "Malformed response";
      return simulated("Using simulated data as fallback", `TimeZoneDB API error: ${message}`);
    }

    // TimeZoneDB's timestamp is already local wall-clock time
    const local = new Date(data.timestamp * 1000);
    return {
      location,
      resolved_location: first.formatted ?? location,
      time: formatClock(local, format),
      date: formatLongDate(local),
      timezone: data.zoneName ?? "Unknown",
      timezone_abbreviation: data.abbreviation ?? "",
      gmt_offset: formatUtcOffset((data.gmtOffset ?? 0) / 3600, "GMT"),
      dst: data.dst === "1" ? "Yes" : "No",
      format,
    };
  } catch (err) {
    ctx.logger.warn("tool.time.failed", { location, error: describeError(err) });
    return simulated("Using simulated data as fallback", `Error accessing timezone API: ${describeError(err)}`);
  }
}
