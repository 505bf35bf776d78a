const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

export type ClockFormat = "12h" | "24h";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

// These read the UTC fields of a Date that has already been shifted to local
// wall-clock time, so the host timezone never leaks in.

export function formatClock(local: Date, format: ClockFormat): string {
  const hours = local.getUTCHours();
  const minutes = pad2(local.getUTCMinutes());
  if (format === "12h") {
    const h12 = hours % 12 === 0 ? 12 : hours % 12;
    return `${pad2(h12)}:${minutes} ${hours < 12 ? "AM" : "PM"}`;
  }
  return `${pad2(hours)}:${minutes}`;
}

/** e.g. `Monday, January 01, 2024` */
export function formatLongDate(local: Date): string {
  return `${WEEKDAYS[local.getUTCDay()]}, ${MONTHS[local.getUTCMonth()]} ${pad2(local.getUTCDate())}, ${local.getUTCFullYear()}`;
}

export function formatUtcOffset(hours: number, prefix = "UTC"): string {
  return `${prefix}${hours >= 0 ? "+" : ""}${hours}`;
}

export function shiftHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * 3_600_000);
}
