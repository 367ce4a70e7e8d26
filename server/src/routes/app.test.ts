/**
 * HTTP API Tests
 *
 * Routes driven through app.request() against a real in-memory store.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type Database from "better-sqlite3";
import type { Hono } from "hono";
import { openDatabase } from "../db/index.js";
import { ReminderStore } from "../services/reminders/store.js";
import { TournamentReconciler } from "../services/reminders/tournaments.js";
import { createApp } from "./app.js";

vi.mock("../logging.js", () => ({
  createComponentLogger: () => ({
    trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn(),
  }),
}));

// 10:00 Moscow, 16:00 Tokyo, Saturday
const NOW = new Date("2024-03-09T07:00:00Z");

let db: Database.Database;
let store: ReminderStore;
let app: Hono;

beforeEach(() => {
  db = openDatabase(":memory:");
  store = new ReminderStore(db, { defaultTimezone: "Europe/Moscow", leaseMs: 60_000, instanceId: "test" });
  app = createApp({
    store,
    defaultTimezone: "Europe/Moscow",
    tournaments: new TournamentReconciler(store),
    now: () => NOW,
  });
});

afterEach(() => {
  if (db.open) db.close();
});

async function call(method: string, path: string, body?: unknown): Promise<{ status: number; json: unknown }> {
  const init: RequestInit = { method };
  if (body !== undefined) {
    init.body = typeof body === "string" ? body : JSON.stringify(body);
    init.headers = { "Content-Type": "application/json" };
  }
  const res = await app.request(path, init);
  return { status: res.status, json: await res.json() };
}

function idOf(json: unknown): string {
  if (typeof json === "object" && json !== null && "id" in json && typeof json.id === "string") return json.id;
  throw new Error(`no id in ${JSON.stringify(json)}`);
}

async function createOneOff(at = "2024-03-09T08:00:00.000Z"): Promise<string> {
  const { json } = await call("POST", "/api/reminders", {
    chatId: 100,
    userId: 7,
    text: "standup",
    schedule: { kind: "one_off", at },
  });
  return idOf(json);
}

describe("health", () => {
  it("answers ok", async () => {
    expect(await call("GET", "/health")).toEqual({ status: 200, json: { ok: true } });
  });
});

describe("chats", () => {
  it("registers a chat with its zone", async () => {
    const { status, json } = await call("PUT", "/api/chats/100", { type: "group", title: "Team", timezone: "Asia/Tokyo" });

    expect(status).toBe(200);
    expect(json).toMatchObject({ chatId: 100, type: "group", title: "Team", timezone: "Asia/Tokyo", tournamentSubscribed: false });
  });

  it("rejects an unknown chat type", async () => {
    const { status, json } = await call("PUT", "/api/chats/100", { type: "forum" });

    expect(status).toBe(400);
    expect(json).toEqual({ error: "type must be one of private, group, supergroup, channel", field: "type" });
  });

  it("rejects a non-numeric chat id", async () => {
    const { status, json } = await call("GET", "/api/chats/abc");
    expect(status).toBe(400);
    expect(json).toEqual({ error: "chatId must be an integer", field: "chatId" });
  });

  it("subscribes a chat to tournaments and creates its reminder", async () => {
    const { status, json } = await call("POST", "/api/chats/-1001/tournaments", { subscribed: true });

    expect(status).toBe(200);
    expect(json).toMatchObject({ chatId: -1001, type: "group", tournamentSubscribed: true });
    expect(store.listByCategory(-1001, "tournament")).toHaveLength(1);

    await call("POST", "/api/chats/-1001/tournaments", { subscribed: false });
    expect(store.listByCategory(-1001, "tournament")).toHaveLength(0);
  });

  it("lists a chat's reminders, optionally without paused ones", async () => {
    const id = await createOneOff();
    await createOneOff("2024-03-09T09:00:00.000Z");
    await call("POST", `/api/reminders/${id}/pause`);

    const all = await call("GET", "/api/chats/100/reminders");
    const active = await call("GET", "/api/chats/100/reminders?includePaused=false");

    expect(all.json).toMatchObject({ chatId: 100, count: 2 });
    expect(active.json).toMatchObject({ chatId: 100, count: 1 });
  });
});

describe("creating reminders", () => {
  it("creates a cron reminder in the default zone", async () => {
    const { status, json } = await call("POST", "/api/reminders", {
      chatId: 100,
      userId: 7,
      text: "lunch",
      schedule: { kind: "cron", expression: "0 12 * * *" },
    });

    expect(status).toBe(201);
    expect(json).toMatchObject({
      chatId: 100,
      userId: 7,
      text: "lunch",
      schedule: { kind: "cron", expression: "0 12 * * *" },
      timezone: "Europe/Moscow",
      nextFireAt: "2024-03-09T09:00:00.000Z",
      paused: false,
      status: "active",
    });
    expect(json).toHaveProperty("shortId", expect.stringMatching(/^RID-[0-9A-F]{6}$/));
  });

  it("reads a phrase in the chat's zone", async () => {
    await call("PUT", "/api/chats/100", { type: "private", timezone: "Asia/Tokyo" });

    const once = await call("POST", "/api/reminders", {
      chatId: 100,
      userId: 7,
      text: "call the bank",
      schedule: { kind: "phrase", once: "завтра 09:00" },
    });
    expect(once.status).toBe(201);
    expect(once.json).toMatchObject({
      schedule: { kind: "one_off", at: "2024-03-10T00:00:00.000Z" },
      timezone: "Asia/Tokyo",
      human: "завтра в 09:00",
    });

    const repeat = await call("POST", "/api/reminders", {
      chatId: 100,
      userId: 7,
      text: "timesheet",
      schedule: { kind: "phrase", repeat: "будни 08:00" },
    });
    // Monday 08:00 Tokyo
    expect(repeat.json).toMatchObject({
      schedule: { kind: "cron", expression: "0 8 * * 1-5" },
      nextFireAt: "2024-03-10T23:00:00.000Z",
      human: "по будням",
    });
  });

  it("creates a preset reminder", async () => {
    const { json } = await call("POST", "/api/reminders", {
      chatId: 100,
      userId: 7,
      text: "ping",
      schedule: { kind: "preset", name: "hourly" },
    });
    expect(json).toMatchObject({ schedule: { kind: "preset", name: "hourly" }, nextFireAt: "2024-03-09T08:00:00.000Z" });
  });

  it.each([
    [{ chatId: 100, userId: 7, text: "x", schedule: { kind: "weekly" } }, "kind"],
    [{ chatId: 100, userId: 7, text: "x", schedule: { kind: "cron", expression: "0 0 * *" } }, "expression"],
    [{ chatId: 100, userId: 7, text: "x", schedule: { kind: "preset", name: "yearly" } }, "name"],
    [{ chatId: 100, userId: 7, text: "x", schedule: { kind: "one_off", at: "tomorrow" } }, "at"],
    [{ chatId: 100, userId: 7, text: "   ", schedule: { kind: "one_off", at: "2024-03-09T08:00:00Z" } }, "text"],
    [{ chatId: "100", userId: 7, text: "x", schedule: { kind: "one_off", at: "2024-03-09T08:00:00Z" } }, "chatId"],
    [{ chatId: 100, userId: 7, text: "x", timezone: "Mars/Olympus", schedule: { kind: "cron", expression: "* * * * *" } }, "timezone"],
  ])("rejects %j with field %s", async (body, field) => {
    const { status, json } = await call("POST", "/api/reminders", body);
    expect(status).toBe(400);
    expect(json).toHaveProperty("field", field);
  });

  it("rejects a body that is not JSON", async () => {
    const { status, json } = await call("POST", "/api/reminders", "not json");
    expect(status).toBe(400);
    expect(json).toEqual({ error: "Request body must be a JSON object" });
  });
});

describe("editing reminders", () => {
  it("fetches, renames and deletes a reminder", async () => {
    const id = await createOneOff();

    expect((await call("GET", `/api/reminders/${id}`)).json).toMatchObject({ id, text: "standup" });
    expect((await call("PATCH", `/api/reminders/${id}`, { text: "retro" })).json).toMatchObject({ text: "retro" });
    expect(await call("DELETE", `/api/reminders/${id}`)).toEqual({ status: 200, json: { id, deleted: true } });
    expect(await call("GET", `/api/reminders/${id}`)).toEqual({ status: 404, json: { error: "Reminder not found" } });
  });

  it("pauses and resumes", async () => {
    const id = await createOneOff();

    expect((await call("POST", `/api/reminders/${id}/pause`)).json).toMatchObject({ paused: true });
    expect((await call("POST", `/api/reminders/${id}/resume`)).json).toMatchObject({
      paused: false,
      nextFireAt: "2024-03-09T08:00:00.000Z",
    });
  });

  it("snoozes a one-off by minutes or to tomorrow", async () => {
    const id = await createOneOff();

    expect((await call("POST", `/api/reminders/${id}/snooze`, { minutes: 15 })).json).toMatchObject({
      schedule: { kind: "one_off", at: "2024-03-09T08:15:00.000Z" },
      nextFireAt: "2024-03-09T08:15:00.000Z",
    });
    expect((await call("POST", `/api/reminders/${id}/snooze`, { tomorrow: true })).json).toMatchObject({
      nextFireAt: "2024-03-10T08:15:00.000Z",
    });
  });

  it("refuses to snooze a recurring reminder", async () => {
    const { json } = await call("POST", "/api/reminders", {
      chatId: 100,
      userId: 7,
      text: "lunch",
      schedule: { kind: "cron", expression: "0 12 * * *" },
    });

    const res = await call("POST", `/api/reminders/${idOf(json)}/snooze`, { minutes: 15 });
    expect(res).toEqual({ status: 400, json: { error: "Only one-off reminders can be snoozed", field: "schedule" } });
  });

  it("lists runs newest first", async () => {
    const id = await createOneOff();
    store.recordRun(id, { firedAt: new Date("2024-03-09T08:00:00Z"), status: "error", errorText: "Telegram 502: Bad Gateway" }, NOW);
    store.recordRun(id, { firedAt: new Date("2024-03-09T08:00:00Z"), status: "ok", attempt: 2 }, NOW);

    const { json } = await call("GET", `/api/reminders/${id}/runs?limit=10`);

    expect(json).toMatchObject({
      reminderId: id,
      count: 2,
      runs: [{ status: "ok", attempt: 2 }, { status: "error", attempt: 1, errorText: "Telegram 502: Bad Gateway" }],
    });
  });

  it("lists a user's reminders", async () => {
    await createOneOff();
    expect((await call("GET", "/api/reminders?userId=7")).json).toMatchObject({ userId: 7, count: 1 });
  });
});

describe("scheduler endpoints", () => {
  it("reports stats", async () => {
    await createOneOff();

    const { json } = await call("GET", "/api/scheduler/stats");

    expect(json).toMatchObject({
      active: 1,
      paused: 0,
      nextDueAt: "2024-03-09T08:00:00.000Z",
      scheduler: null,
    });
  });

  it("refuses a manual tick without a loop", async () => {
    expect(await call("POST", "/api/scheduler/tick")).toEqual({ status: 503, json: { error: "Scheduler is not attached" } });
  });

  it("lists upcoming tournaments", async () => {
    const { json } = await call("GET", "/api/tournaments/schedule?count=2");

    expect(json).toEqual({
      timezone: "Europe/Moscow",
      tournaments: [
        { startsAt: "2024-03-09T11:00:00.000Z", remindAt: "2024-03-09T10:55:00.000Z", localStart: "14:00" },
        { startsAt: "2024-03-09T13:00:00.000Z", remindAt: "2024-03-09T12:55:00.000Z", localStart: "16:00" },
      ],
    });
  });
});

describe("errors", () => {
  it("maps a closed store to 503", async () => {
    db.close();
    expect(await call("GET", "/api/reminders/rem_x")).toEqual({
      status: 503,
      json: { error: "Reminder store is temporarily unavailable" },
    });
  });

  it("answers unknown paths with 404", async () => {
    expect(await call("GET", "/api/nothing")).toEqual({ status: 404, json: { error: "Not found" } });
  });
});
