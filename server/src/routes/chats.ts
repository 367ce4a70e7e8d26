/**
 * Chat Routes
 *
 * Chat registration, zone and tournament subscription.
 */

import type { Hono } from "hono";
import { ValidationError } from "../services/reminders/errors.js";
import { CHAT_TYPES, type ChatType } from "../services/reminders/types.js";
import {
  optionalString,
  parseIntParam,
  readJsonObject,
  requireBoolean,
  type RouteDeps,
} from "./helpers.js";
import { toReminderJson } from "./reminders.js";

function isChatType(value: unknown): value is ChatType {
  return CHAT_TYPES.some((type) => type === value);
}

export function registerChatRoutes(app: Hono, deps: RouteDeps): void {
  const { store } = deps;
  const now = deps.now ?? (() => new Date());

  app.get("/api/chats/:chatId", (c) => {
    const chat = store.getChat(parseIntParam(c.req.param("chatId"), "chatId"));
    if (!chat) return c.json({ error: "Chat not found" }, 404);
    return c.json(chat);
  });

  // Register or update a chat on first contact
  app.put("/api/chats/:chatId", async (c) => {
    const chatId = parseIntParam(c.req.param("chatId"), "chatId");
    const body = await readJsonObject(c);
    if (!isChatType(body.type)) {
      throw new ValidationError(`type must be one of ${CHAT_TYPES.join(", ")}`, "type");
    }
    const chat = store.upsertChat({
      chatId,
      type: body.type,
      title: optionalString(body, "title"),
      timezone: optionalString(body, "timezone"),
    }, now());
    return c.json(chat);
  });

  app.post("/api/chats/:chatId/tournaments", async (c) => {
    const chatId = parseIntParam(c.req.param("chatId"), "chatId");
    const body = await readJsonObject(c);
    const at = now();
    const chat = store.setTournamentSubscription(chatId, requireBoolean(body, "subscribed"), at);
    // Apply right away instead of waiting for the loop's next sync
    deps.tournaments?.sync(at);
    return c.json(chat);
  });

  app.get("/api/chats/:chatId/reminders", (c) => {
    const chatId = parseIntParam(c.req.param("chatId"), "chatId");
    const includePaused = c.req.query("includePaused") !== "false";
    const reminders = store.listForChat(chatId, { includePaused }).map(toReminderJson);
    return c.json({ chatId, reminders, count: reminders.length });
  });
}
