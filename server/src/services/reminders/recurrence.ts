/**
 * Reminders: Recurrence Engine
 *
 * Next occurrence of a cron expression or named preset in an IANA zone.
 * cron-parser validates and expands the fields; the walk over civil days
 * and the DST handling live here so gap and overlap behave the same for
 * every zone.
 */

import cronParser from "cron-parser";
import { ValidationError } from "./errors.js";
import { getPreset, isPresetName } from "./presets.js";
import { getWallClock, isValidTimeZone, wallClockToInstant } from "./timezone.js";
import type { RecurrenceSpec } from "./types.js";

/** Long enough for "0 0 29 2 *" from any starting point */
const HORIZON_DAYS = 8 * 366;

/** Candidates this far before `after` (wall time) can still land after it across a transition */
const TRANSITION_SLACK_MINUTES = 180;

// ============================================
// CRON PARSING
// ============================================

export interface CronMatcher {
  expression: string;
  minutes: number[];
  hours: number[];
  daysOfMonth: Set<number>;
  months: Set<number>;
  daysOfWeek: Set<number>;
  /** Both day fields restricted: a day matches if either matches */
  dayOr: boolean;
}

function toNumbers(values: readonly unknown[]): number[] {
  const out: number[] = [];
  for (const value of values) {
    if (typeof value === "number") out.push(value);
  }
  return out.sort((a, b) => a - b);
}

function isUnrestricted(token: string): boolean {
  return token.startsWith("*") || token.startsWith("?");
}

/**
 * Parse a five-field cron expression. Throws ValidationError.
 */
export function parseCron(expression: string): CronMatcher {
  const trimmed = expression.trim();
  const fields = trimmed.split(/\s+/);
  if (!trimmed || fields.length !== 5) {
    throw new ValidationError(
      `Cron expression must have exactly 5 fields (minute hour day month weekday), got "${expression}"`,
      "expression",
    );
  }

  const [, , dayOfMonth, , dayOfWeek] = fields;
  if (!/^[\d*?,\/-]+$/.test(dayOfMonth)) {
    throw new ValidationError(`Unsupported day-of-month field "${dayOfMonth}"`, "expression");
  }
  if (dayOfWeek.includes("#") || /(^|[\d,])l($|,)/i.test(dayOfWeek)) {
    throw new ValidationError(`Unsupported day-of-week field "${dayOfWeek}"`, "expression");
  }

  let parsed: ReturnType<typeof cronParser.parseExpression>;
  try {
    parsed = cronParser.parseExpression(fields.join(" "));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid cron expression "${expression}": ${reason}`, "expression");
  }

  const f = parsed.fields;
  return {
    expression: fields.join(" "),
    minutes: toNumbers(f.minute),
    hours: toNumbers(f.hour),
    daysOfMonth: new Set(toNumbers(f.dayOfMonth)),
    months: new Set(toNumbers(f.month)),
    daysOfWeek: new Set(toNumbers(f.dayOfWeek).map((d) => (d === 7 ? 0 : d))),
    dayOr: !isUnrestricted(dayOfMonth) && !isUnrestricted(dayOfWeek),
  };
}

// ============================================
// CIVIL CALENDAR
// ============================================

interface CivilDate {
  year: number;
  month: number;
  day: number;
}

function addDays(date: CivilDate, days: number): CivilDate {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

function dayOfWeek(date: CivilDate): number {
  return new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
}

function dayMatches(matcher: CronMatcher, date: CivilDate): boolean {
  if (!matcher.months.has(date.month)) return false;
  const domOk = matcher.daysOfMonth.has(date.day);
  const dowOk = matcher.daysOfWeek.has(dayOfWeek(date));
  return matcher.dayOr ? domOk || dowOk : domOk && dowOk;
}

/**
 * First instant strictly after `after` matching the cron matcher in `timezone`.
 * Wall times inside a spring-forward gap resolve to the end of the gap;
 * wall times repeated by a fall-back resolve to their first occurrence, so
 * each fires once.
 */
export function nextCronOccurrence(matcher: CronMatcher, after: Date, timezone: string): Date | null {
  const afterMs = after.getTime();
  const start = getWallClock(after, timezone);
  const startMinute = start.hour * 60 + start.minute;

  let date: CivilDate = { year: start.year, month: start.month, day: start.day };
  for (let i = 0; i <= HORIZON_DAYS; i++) {
    if (dayMatches(matcher, date)) {
      for (const hour of matcher.hours) {
        for (const minute of matcher.minutes) {
          if (i === 0 && hour * 60 + minute < startMinute - TRANSITION_SLACK_MINUTES) continue;
          const instant = wallClockToInstant(date.year, date.month, date.day, hour, minute, timezone);
          if (instant.getTime() > afterMs) return instant;
        }
      }
    }
    date = addDays(date, 1);
  }
  return null;
}

// ============================================
// PUBLIC API
// ============================================

export interface ResolvedRecurrence {
  expression: string;
  timezone: string;
}

/**
 * Reduce a spec to a cron expression and the zone it runs in.
 * A preset with a fixed zone overrides `timezone`.
 */
export function resolveRecurrence(spec: RecurrenceSpec, timezone: string): ResolvedRecurrence {
  switch (spec.kind) {
    case "cron":
      return { expression: spec.expression, timezone };
    case "preset": {
      if (!isPresetName(spec.name)) {
        throw new ValidationError(`Unknown preset "${spec.name}"`, "name");
      }
      const preset = getPreset(spec.name);
      return { expression: preset.expression, timezone: preset.timezone ?? timezone };
    }
  }
}

/**
 * Check a recurring spec and return its first occurrence after `after`.
 * Throws ValidationError for a bad expression, preset or zone, or when
 * the spec never fires again.
 */
export function validateRecurrence(spec: RecurrenceSpec, timezone: string, after: Date = new Date()): Date {
  if (!isValidTimeZone(timezone)) {
    throw new ValidationError(`Unknown timezone "${timezone}"`, "timezone");
  }
  const resolved = resolveRecurrence(spec, timezone);
  const matcher = parseCron(resolved.expression);
  const next = nextCronOccurrence(matcher, after, resolved.timezone);
  if (!next) {
    throw new ValidationError(`Schedule "${resolved.expression}" has no future occurrence`, "schedule");
  }
  return next;
}

/**
 * Next occurrence strictly after `after`, or null when the spec is
 * malformed or never fires again.
 */
export function nextOccurrence(spec: RecurrenceSpec, after: Date, timezone: string): Date | null {
  try {
    return validateRecurrence(spec, timezone, after);
  } catch (error) {
    if (error instanceof ValidationError) return null;
    throw error;
  }
}
