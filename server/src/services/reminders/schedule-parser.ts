/**
 * Reminders: Schedule Phrases
 *
 * Turns the short phrases chat users type ("+15", "через 30 минут",
 * "завтра 09:00", "ежедневно 7 pm", "cron: *\/15 * * * *") into schedule
 * definitions. All times of day are read in the chat's zone.
 */

import { ValidationError } from "./errors.js";
import { getPreset, isPresetName } from "./presets.js";
import { parseCron, resolveRecurrence } from "./recurrence.js";
import { getWallClock, wallClockToInstant } from "./timezone.js";
import type { RecurrenceSpec } from "./types.js";

export interface ParsedOnce {
  at: Date;
  /** "через 15 минут", "завтра в 09:00" */
  human: string;
}

export interface ParsedRepeat {
  schedule: RecurrenceSpec;
  /** "ежедневно", "через 5 минут", "по cron" */
  human: string;
}

const ONCE_EXAMPLES = "+15, через 30 минут, завтра 09:00, 7:10 pm, 12:00";
const REPEAT_EXAMPLES = "каждую минуту, каждые 2 минуты, ежедневно 09:30, будни 08:00, 7:10 pm, cron: */15 * * * *";

const MINUTE_MS = 60_000;

// ============================================
// RUSSIAN NUMBER AGREEMENT
// ============================================

function pluralize(n: number, one: string, few: string, many: string): string {
  const abs = Math.abs(Math.trunc(n));
  const n100 = abs % 100;
  if (n100 >= 11 && n100 <= 14) return many;
  const n10 = abs % 10;
  if (n10 === 1) return one;
  if (n10 >= 2 && n10 <= 4) return few;
  return many;
}

/** "минуту" / "минуты" / "минут" after "через" */
export function pluralizeMinutes(n: number): string {
  return pluralize(n, "минуту", "минуты", "минут");
}

export function pluralizeHours(n: number): string {
  return pluralize(n, "час", "часа", "часов");
}

// ============================================
// TIME OF DAY
// ============================================

interface TimeOfDay {
  hour: number;
  minute: number;
}

function checkTime(hour: number, minute: number): TimeOfDay {
  if (hour > 23 || minute > 59) {
    throw new ValidationError(`Invalid time of day ${hour}:${String(minute).padStart(2, "0")}`, "when");
  }
  return { hour, minute };
}

function from12h(hour: number, minute: number, meridiem: string): TimeOfDay {
  if (hour < 1 || hour > 12) {
    throw new ValidationError(`Invalid 12-hour time "${hour} ${meridiem}"`, "when");
  }
  const h = hour % 12 + (meridiem === "pm" ? 12 : 0);
  return checkTime(h, minute);
}

const TIME_24H = /^(\d{1,2}):(\d{2})$/;
const TIME_12H = /^(\d{1,2})(?::(\d{2}))?\s*(am|pm)$/;

/** "HH:MM" or "h[:mm] am|pm"; null when the text is neither */
function parseTimeOfDay(text: string): TimeOfDay | null {
  let m = TIME_24H.exec(text);
  if (m) return checkTime(Number(m[1]), Number(m[2]));
  m = TIME_12H.exec(text);
  if (m) return from12h(Number(m[1]), Number(m[2] ?? "0"), m[3]);
  return null;
}

function hhmm(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

function normalize(input: string): string {
  return input.trim().toLowerCase().replace(/\s+/g, " ");
}

// ============================================
// ONE-OFF
// ============================================

function atLocal(now: Date, dayOffset: number, time: TimeOfDay, timezone: string): Date {
  const today = getWallClock(now, timezone);
  const day = new Date(Date.UTC(today.year, today.month - 1, today.day + dayOffset));
  return wallClockToInstant(
    day.getUTCFullYear(), day.getUTCMonth() + 1, day.getUTCDate(),
    time.hour, time.minute, timezone,
  );
}

function inMinutes(now: Date, minutes: number): ParsedOnce {
  if (minutes < 1) {
    throw new ValidationError("Delay must be at least one minute", "when");
  }
  return {
    at: new Date(now.getTime() + minutes * MINUTE_MS),
    human: `через ${minutes} ${pluralizeMinutes(minutes)}`,
  };
}

/**
 * Parse a one-off "when" phrase relative to `now` in `timezone`.
 * Throws ValidationError when the phrase is not understood.
 */
export function parseOnceWhen(input: string, now: Date, timezone: string): ParsedOnce {
  const src = normalize(input);

  let m = /^\+? ?(\d{1,3})$/.exec(src);
  if (m) return inMinutes(now, Number(m[1]));

  m = /^через (\d{1,3}) ?мин(?:уту|уты|ут)?\.?$/.exec(src);
  if (m) return inMinutes(now, Number(m[1]));

  m = /^через (\d{1,2}) ?час(?:а|ов)?$/.exec(src);
  if (m) {
    const hours = Number(m[1]);
    const parsed = inMinutes(now, hours * 60);
    return { at: parsed.at, human: `через ${hours} ${pluralizeHours(hours)}` };
  }

  m = /^завтра (.+)$/.exec(src);
  if (m) {
    const time = parseTimeOfDay(m[1]);
    if (time) {
      return { at: atLocal(now, 1, time, timezone), human: `завтра в ${hhmm(time)}` };
    }
  }

  const time = parseTimeOfDay(src);
  if (time) {
    const today = atLocal(now, 0, time, timezone);
    if (today.getTime() > now.getTime()) {
      return { at: today, human: `сегодня в ${hhmm(time)}` };
    }
    return { at: atLocal(now, 1, time, timezone), human: `завтра в ${hhmm(time)}` };
  }

  throw new ValidationError(`Could not understand the time "${input}". Examples: ${ONCE_EXAMPLES}`, "when");
}

// ============================================
// RECURRING
// ============================================

function daily(time: TimeOfDay, days = "*"): RecurrenceSpec {
  return { kind: "cron", expression: `${time.minute} ${time.hour} * * ${days}` };
}

/**
 * Parse a repeat phrase into a recurring schedule.
 * Throws ValidationError when the phrase is not understood.
 */
export function parseRepeatSpec(input: string): ParsedRepeat {
  const src = normalize(input);

  if (src.startsWith("cron:")) {
    const expression = src.slice("cron:".length).trim();
    parseCron(expression);
    return { schedule: { kind: "cron", expression }, human: "по cron" };
  }

  const presetName = src.startsWith("preset:") ? src.slice("preset:".length).trim() : src;
  if (isPresetName(presetName)) {
    return { schedule: { kind: "preset", name: presetName }, human: getPreset(presetName).description };
  }

  if (src === "каждую минуту") {
    return { schedule: { kind: "cron", expression: "*/1 * * * *" }, human: "через 1 минуту" };
  }

  let m = /^кажд(?:ую|ые|ый) (\d{1,2}) мин(?:уту|уты|ут)?$/.exec(src);
  if (m) {
    const n = Number(m[1]);
    if (n < 1 || n > 59) {
      throw new ValidationError("Minute interval must be between 1 and 59", "repeat");
    }
    return { schedule: { kind: "cron", expression: `*/${n} * * * *` }, human: `через ${n} ${pluralizeMinutes(n)}` };
  }

  m = /^ежедневно (.+)$/.exec(src);
  if (m) {
    const time = parseTimeOfDay(m[1]);
    if (time) return { schedule: daily(time), human: "ежедневно" };
  }

  m = /^будни (.+)$/.exec(src);
  if (m) {
    const time = parseTimeOfDay(m[1]);
    if (time) return { schedule: daily(time, "1-5"), human: "по будням" };
  }

  m = /^воскресенье (.+)$/.exec(src);
  if (m) {
    const time = parseTimeOfDay(m[1]);
    if (time) return { schedule: daily(time, "0"), human: "по воскресеньям" };
  }

  const time = parseTimeOfDay(src);
  if (time) return { schedule: daily(time), human: "ежедневно" };

  throw new ValidationError(`Could not understand the schedule "${input}". Examples: ${REPEAT_EXAMPLES}`, "repeat");
}

/**
 * Display suffix for a recurring reminder: "Повтор через 5 минут",
 * "Повтор ежедневно" or "Повтор по расписанию".
 */
export function humanizeRepeat(spec: RecurrenceSpec): string {
  const expression = resolveRecurrence(spec, "UTC").expression.trim().split(/\s+/).join(" ");
  const step = /^\*\/(\d+) \* \* \* \*$/.exec(expression);
  if (step) {
    const n = Number(step[1]);
    return `Повтор через ${n} ${pluralizeMinutes(n)}`;
  }
  if (/^\d{1,2} \d{1,2} \* \* \*$/.test(expression)) return "Повтор ежедневно";
  return "Повтор по расписанию";
}

// ============================================
// SNOOZE
// ============================================

export type SnoozeShift = { minutes: number } | { tomorrow: true };

const DAY_MS = 24 * 60 * MINUTE_MS;

/**
 * Shift a one-off's instant by `shift`. When the shifted time would still
 * be in the past the shift is taken from `now` instead.
 */
export function snoozeTarget(at: Date, shift: SnoozeShift, now: Date): Date {
  const delta = "minutes" in shift ? shift.minutes * MINUTE_MS : DAY_MS;
  const shifted = at.getTime() + delta;
  return new Date(shifted > now.getTime() ? shifted : now.getTime() + delta);
}
