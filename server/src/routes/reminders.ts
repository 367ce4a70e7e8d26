/**
 * Reminder Routes
 *
 * Create, inspect and edit reminders. The schedule arrives either as an
 * explicit definition or as a chat phrase parsed in the chat's zone.
 */

import type { Hono } from "hono";
import { ValidationError } from "../services/reminders/errors.js";
import { isPresetName } from "../services/reminders/presets.js";
import {
  parseOnceWhen,
  parseRepeatSpec,
  snoozeTarget,
  type SnoozeShift,
} from "../services/reminders/schedule-parser.js";
import { shortId } from "../services/reminders/texts.js";
import { isValidTimeZone } from "../services/reminders/timezone.js";
import type { Reminder, ScheduleSpec } from "../services/reminders/types.js";
import {
  isJsonObject,
  optionalString,
  parseIntParam,
  queryInt,
  readJsonObject,
  requireInteger,
  requireString,
  type JsonObject,
  type RouteDeps,
} from "./helpers.js";

const MAX_SNOOZE_MINUTES = 7 * 24 * 60;

interface ParsedSchedule {
  schedule: ScheduleSpec;
  /** Present when the schedule came from a phrase */
  human?: string;
}

function parseSchedule(value: unknown, now: Date, timezone: string): ParsedSchedule {
  if (!isJsonObject(value)) {
    throw new ValidationError("schedule must be an object", "schedule");
  }

  switch (value.kind) {
    case "one_off": {
      const at = typeof value.at === "string" ? new Date(value.at) : null;
      if (!at || Number.isNaN(at.getTime())) {
        throw new ValidationError("schedule.at must be an ISO-8601 timestamp", "at");
      }
      return { schedule: { kind: "one_off", at } };
    }
    case "cron": {
      if (typeof value.expression !== "string") {
        throw new ValidationError("schedule.expression must be a string", "expression");
      }
      return { schedule: { kind: "cron", expression: value.expression } };
    }
    case "preset": {
      if (typeof value.name !== "string" || !isPresetName(value.name)) {
        throw new ValidationError(`Unknown preset "${String(value.name)}"`, "name");
      }
      return { schedule: { kind: "preset", name: value.name } };
    }
    case "phrase": {
      if (typeof value.once === "string") {
        const parsed = parseOnceWhen(value.once, now, timezone);
        return { schedule: { kind: "one_off", at: parsed.at }, human: parsed.human };
      }
      if (typeof value.repeat === "string") {
        const parsed = parseRepeatSpec(value.repeat);
        return { schedule: parsed.schedule, human: parsed.human };
      }
      throw new ValidationError("A phrase schedule needs \"once\" or \"repeat\"", "schedule");
    }
    default:
      throw new ValidationError("schedule.kind must be one_off, cron, preset or phrase", "kind");
  }
}

function parseSnoozeShift(body: JsonObject): SnoozeShift {
  if (body.tomorrow === true) return { tomorrow: true };
  const minutes = requireInteger(body, "minutes");
  if (minutes < 1 || minutes > MAX_SNOOZE_MINUTES) {
    throw new ValidationError(`minutes must be between 1 and ${MAX_SNOOZE_MINUTES}`, "minutes");
  }
  return { minutes };
}

export function toReminderJson(reminder: Reminder): Reminder & { shortId: string } {
  return { ...reminder, shortId: shortId(reminder.id) };
}

export function registerReminderRoutes(app: Hono, deps: RouteDeps): void {
  const { store } = deps;
  const now = deps.now ?? (() => new Date());

  // List a user's reminders across chats
  app.get("/api/reminders", (c) => {
    const userId = parseIntParam(c.req.query("userId") ?? "", "userId");
    const reminders = store.listForUser(userId).map(toReminderJson);
    return c.json({ userId, reminders, count: reminders.length });
  });

  app.post("/api/reminders", async (c) => {
    const body = await readJsonObject(c);
    const chatId = requireInteger(body, "chatId");
    const userId = requireInteger(body, "userId");
    const text = requireString(body, "text");
    const timezone = optionalString(body, "timezone");
    const category = optionalString(body, "category");
    if (timezone !== undefined && !isValidTimeZone(timezone)) {
      throw new ValidationError(`Unknown timezone "${timezone}"`, "timezone");
    }

    const at = now();
    const zone = timezone ?? store.getChat(chatId)?.timezone ?? deps.defaultTimezone;
    const { schedule, human } = parseSchedule(body.schedule, at, zone);

    const reminder = store.create({ chatId, userId, text, schedule, timezone, category }, at);
    return c.json({ ...toReminderJson(reminder), human }, 201);
  });

  app.get("/api/reminders/:id", (c) => {
    const reminder = store.get(c.req.param("id"));
    if (!reminder) return c.json({ error: "Reminder not found" }, 404);
    return c.json(toReminderJson(reminder));
  });

  app.patch("/api/reminders/:id", async (c) => {
    const body = await readJsonObject(c);
    const reminder = store.updateText(c.req.param("id"), requireString(body, "text"), now());
    if (!reminder) return c.json({ error: "Reminder not found" }, 404);
    return c.json(toReminderJson(reminder));
  });

  app.delete("/api/reminders/:id", (c) => {
    const id = c.req.param("id");
    if (!store.delete(id)) return c.json({ error: "Reminder not found" }, 404);
    return c.json({ id, deleted: true });
  });

  app.post("/api/reminders/:id/pause", (c) => {
    const reminder = store.pause(c.req.param("id"), true, now());
    if (!reminder) return c.json({ error: "Reminder not found" }, 404);
    return c.json(toReminderJson(reminder));
  });

  app.post("/api/reminders/:id/resume", (c) => {
    const reminder = store.pause(c.req.param("id"), false, now());
    if (!reminder) return c.json({ error: "Reminder not found" }, 404);
    return c.json(toReminderJson(reminder));
  });

  app.post("/api/reminders/:id/snooze", async (c) => {
    const body = await readJsonObject(c);
    const shift = parseSnoozeShift(body);
    const id = c.req.param("id");

    const existing = store.get(id);
    if (!existing) return c.json({ error: "Reminder not found" }, 404);
    if (existing.schedule.kind !== "one_off") {
      throw new ValidationError("Only one-off reminders can be snoozed", "schedule");
    }

    const at = now();
    const reminder = store.snooze(id, snoozeTarget(existing.schedule.at, shift, at), at);
    if (!reminder) return c.json({ error: "Reminder not found" }, 404);
    return c.json(toReminderJson(reminder));
  });

  app.get("/api/reminders/:id/runs", (c) => {
    const id = c.req.param("id");
    if (!store.get(id)) return c.json({ error: "Reminder not found" }, 404);
    const limit = queryInt(c.req.query("limit"), "limit", 50, 1, 500);
    const runs = store.listRuns(id, limit);
    return c.json({ reminderId: id, runs, count: runs.length });
  });
}
