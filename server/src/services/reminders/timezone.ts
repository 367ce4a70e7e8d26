/**
 * Reminders: Time Zone Helpers
 *
 * Wall-clock reading and wall-clock → instant conversion for IANA zones,
 * built on Intl.DateTimeFormat (no zone database of our own).
 */

/** Wall-clock components in a target timezone. */
export interface WallClock {
  year: number;
  month: number;   // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  dayOfWeek: number; // 0=Sun..6=Sat
}

const WEEKDAYS: Record<string, number> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 };

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    // Throws RangeError for an unknown zone
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
      weekday: "short",
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timezone: string): boolean {
  if (!timezone.trim()) return false;
  try {
    formatterFor(timezone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read the wall-clock time in a timezone for a given instant.
 */
export function getWallClock(date: Date, timezone: string): WallClock {
  const parts = formatterFor(timezone).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find((p) => p.type === type)?.value ?? "0", 10);
  const weekday = parts.find((p) => p.type === "weekday")?.value ?? "Sun";

  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour"),
    minute: get("minute"),
    second: get("second"),
    dayOfWeek: WEEKDAYS[weekday] ?? 0,
  };
}

/**
 * Zone offset at an instant in ms (local wall time minus UTC).
 */
export function offsetAt(date: Date, timezone: string): number {
  const wall = getWallClock(date, timezone);
  const wallMs = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return wallMs - Math.floor(date.getTime() / 1000) * 1000;
}

const DAY_MS = 86_400_000;
const MINUTE_MS = 60_000;

/**
 * Convert a wall-clock minute in a timezone to an instant.
 *
 * - Ordinary time: the single matching instant.
 * - Fall-back overlap (the wall time happens twice): the earlier instant.
 * - Spring-forward gap (the wall time never happens): the first instant
 *   after the gap, i.e. the moment the clocks jump.
 */
export function wallClockToInstant(
  year: number, month: number, day: number,
  hour: number, minute: number,
  timezone: string,
): Date {
  const desiredMs = Date.UTC(year, month - 1, day, hour, minute, 0, 0);

  // The zone's offsets a day either side bracket any transition near the target
  const offsetBefore = offsetAt(new Date(desiredMs - DAY_MS), timezone);
  const offsetAfter = offsetAt(new Date(desiredMs + DAY_MS), timezone);
  const candidates = [desiredMs - offsetBefore, desiredMs - offsetAfter].sort((a, b) => a - b);

  for (const candidate of candidates) {
    const wall = getWallClock(new Date(candidate), timezone);
    if (
      wall.year === year && wall.month === month && wall.day === day &&
      wall.hour === hour && wall.minute === minute
    ) {
      return new Date(candidate);
    }
  }

  // Gap: binary-search the transition between the two interpretations
  let lo = candidates[0];
  let hi = candidates[1];
  while (hi - lo > MINUTE_MS) {
    const mid = lo + Math.floor((hi - lo) / (2 * MINUTE_MS)) * MINUTE_MS;
    if (offsetAt(new Date(mid), timezone) === offsetAfter) {
      hi = mid;
    } else {
      lo = mid;
    }
  }
  return new Date(hi);
}

/**
 * "16:57" for most zones, "4:57 PM" for America/* zones.
 */
export function formatLocalTime(date: Date, timezone: string): string {
  const wall = getWallClock(date, timezone);
  const mm = String(wall.minute).padStart(2, "0");
  if (timezone.startsWith("America/")) {
    const suffix = wall.hour < 12 ? "AM" : "PM";
    const h12 = wall.hour % 12 === 0 ? 12 : wall.hour % 12;
    return `${h12}:${mm} ${suffix}`;
  }
  return `${String(wall.hour).padStart(2, "0")}:${mm}`;
}
