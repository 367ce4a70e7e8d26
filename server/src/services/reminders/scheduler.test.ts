/**
 * Scheduler Loop Tests
 *
 * Fake timers drive the re-armed setTimeout; the store is real SQLite.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type Database from "better-sqlite3";
import { openDatabase } from "../../db/index.js";
import type { Messenger, SendResult } from "../../messaging/types.js";
import { Dispatcher } from "./dispatcher.js";
import { StoreUnavailable } from "./errors.js";
import { DueSetScanner } from "./scanner.js";
import { SchedulerLoop } from "./scheduler.js";
import { ReminderStore } from "./store.js";
import { TournamentReconciler } from "./tournaments.js";
import type { DispatcherOptions, SchedulerConfig, SchedulerEvent } from "./types.js";

vi.mock("../../logging.js", () => {
  const logger: Record<string, unknown> = {
    trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn(),
  };
  logger.child = () => logger;
  return { createComponentLogger: () => logger };
});

const NOW = new Date("2024-03-09T07:00:00Z");

class FakeMessenger implements Messenger {
  sent: number[] = [];
  constructor(private readonly reply: SendResult | "hang" = { ok: true }) {}

  async send(chatId: number): Promise<SendResult> {
    this.sent.push(chatId);
    if (this.reply === "hang") return new Promise<SendResult>(() => undefined);
    return this.reply;
  }
}

let db: Database.Database;
let store: ReminderStore;
let scanner: DueSetScanner;

beforeEach(() => {
  vi.useFakeTimers({ now: NOW });
  db = openDatabase(":memory:");
  store = new ReminderStore(db, { defaultTimezone: "Europe/Moscow", leaseMs: 60_000, instanceId: "test" });
  scanner = new DueSetScanner(store);
});

afterEach(() => {
  vi.useRealTimers();
  if (db.open) db.close();
});

interface BuildOptions {
  config?: Partial<SchedulerConfig>;
  dispatcher?: Partial<DispatcherOptions>;
  tournaments?: TournamentReconciler;
  random?: () => number;
}

function build(messenger: Messenger, options: BuildOptions = {}): { loop: SchedulerLoop; dispatcher: Dispatcher } {
  const dispatcher = new Dispatcher({ store, messenger, options: options.dispatcher, random: () => 0 });
  const loop = new SchedulerLoop({
    store,
    scanner,
    dispatcher,
    tournaments: options.tournaments,
    config: { jitterMs: 0, ...options.config },
    random: options.random ?? (() => 0.5),
  });
  return { loop, dispatcher };
}

function createDue(chatId = 100, text = "stretch"): string {
  return store.create({ chatId, userId: 7, text, schedule: { kind: "one_off", at: NOW } }, NOW).id;
}

describe("SchedulerLoop.tickOnce", () => {
  it("claims due reminders and delivers them concurrently", async () => {
    const first = createDue(100);
    const second = createDue(200);
    const messenger = new FakeMessenger();
    const { loop } = build(messenger);
    const events: SchedulerEvent[] = [];
    loop.onEvent((event) => events.push(event));

    expect(await loop.tickOnce()).toEqual({ claimed: 2, skipped: false });
    expect(loop.inFlightCount).toBe(2);
    expect(await loop.stop()).toBe(0);

    expect(messenger.sent.sort()).toEqual([100, 200]);
    expect(events.map((e) => e.type)).toEqual(["reminder_delivered", "reminder_delivered"]);
    expect(store.get(first)?.status).toBe("fired");
    expect(store.get(second)?.status).toBe("fired");
  });

  it("claims no more than the free delivery slots", async () => {
    createDue();
    createDue();
    createDue();
    const { loop } = build(new FakeMessenger("hang"), { config: { maxConcurrent: 2 } });

    expect(await loop.tickOnce()).toEqual({ claimed: 2, skipped: false });
    expect(await loop.tickOnce()).toEqual({ claimed: 0, skipped: true });

    const stopping = loop.stop(1_000);
    await vi.advanceTimersByTimeAsync(1_000);
    expect(await stopping).toBe(2);
    // Abandoned deliveries keep their lease until it runs out
    expect(store.listForChat(100).filter((r) => r.claimedBy === "test")).toHaveLength(2);
  });

  it("does not start a second delivery for a reminder still in flight", async () => {
    createDue();
    const messenger = new FakeMessenger("hang");
    const { loop } = build(messenger, { dispatcher: { deliveryTimeoutMs: 600_000 } });

    await loop.tickOnce();
    await vi.advanceTimersByTimeAsync(61_000);
    expect(await loop.tickOnce()).toEqual({ claimed: 1, skipped: false });

    expect(messenger.sent).toEqual([100]);
    expect(loop.inFlightCount).toBe(1);
  });

  it("reports a closed store as a failed tick", async () => {
    const { loop } = build(new FakeMessenger());
    const events: SchedulerEvent[] = [];
    loop.onEvent((event) => events.push(event));
    db.close();

    expect(await loop.tickOnce()).toEqual({ claimed: 0, skipped: false, error: "Database connection is closed" });
    expect(events).toEqual([{
      type: "tick_failed",
      timestamp: NOW,
      details: { error: "Database connection is closed", consecutiveFailures: 1, retryInMs: 2_000 },
    }]);
  });

  it("survives a delivery whose bookkeeping throws", async () => {
    createDue();
    const { loop, dispatcher } = build(new FakeMessenger());
    vi.spyOn(dispatcher, "deliver").mockRejectedValue(new StoreUnavailable("disk I/O error"));

    expect(await loop.tickOnce()).toEqual({ claimed: 1, skipped: false });
    expect(await loop.stop()).toBe(0);
    expect(loop.inFlightCount).toBe(0);
    expect(await loop.tickOnce()).toEqual({ claimed: 0, skipped: false });
  });
});

describe("SchedulerLoop events", () => {
  it("keeps notifying listeners after one throws", async () => {
    createDue();
    const blocked: SendResult = { ok: false, kind: "permanent", error: "Telegram 403: Forbidden: bot was kicked" };
    const { loop } = build(new FakeMessenger(blocked));
    const seen: SchedulerEvent[] = [];
    loop.onEvent(() => {
      throw new Error("listener bug");
    });
    loop.onEvent((event) => seen.push(event));

    await loop.tickOnce();
    await loop.stop();

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({
      type: "reminder_paused",
      chatId: 100,
      details: { kind: "permanent", action: "paused", nextFireAt: null },
    });
  });

  it("reports a transient failure with its retry", async () => {
    createDue();
    const flaky: SendResult = { ok: false, kind: "transient", error: "Telegram 502: Bad Gateway" };
    const { loop } = build(new FakeMessenger(flaky));
    const seen: SchedulerEvent[] = [];
    const unsubscribe = loop.onEvent((event) => seen.push(event));

    await loop.tickOnce();
    await loop.stop();
    unsubscribe();

    expect(seen[0]).toMatchObject({
      type: "reminder_failed",
      details: { action: "retry_scheduled", nextFireAt: new Date(NOW.getTime() + 30_000) },
    });
  });
});

describe("SchedulerLoop timing", () => {
  it("backs off exponentially after failed scans and resets on success", async () => {
    const { loop } = build(new FakeMessenger(), {
      config: { pollIntervalMs: 15_000, backoffBaseMs: 2_000, backoffMaxMs: 5_000 },
    });
    const offsets: number[] = [];
    vi.spyOn(scanner, "scan").mockImplementation(() => {
      offsets.push(Date.now() - NOW.getTime());
      if (offsets.length <= 3) throw new StoreUnavailable("database is locked");
      return [];
    });

    loop.start();
    await vi.advanceTimersByTimeAsync(26_000);
    await loop.stop();

    expect(offsets).toEqual([0, 2_000, 6_000, 11_000, 26_000]);
  });

  it("spreads ticks by the jitter", async () => {
    const { loop } = build(new FakeMessenger(), {
      config: { pollIntervalMs: 10_000, jitterMs: 1_000 },
      random: () => 1,
    });
    const offsets: number[] = [];
    vi.spyOn(scanner, "scan").mockImplementation(() => {
      offsets.push(Date.now() - NOW.getTime());
      return [];
    });

    loop.start();
    await vi.advanceTimersByTimeAsync(22_000);
    await loop.stop();

    expect(offsets).toEqual([0, 11_000, 22_000]);
  });

  it("stops ticking once stopped", async () => {
    const { loop } = build(new FakeMessenger(), { config: { pollIntervalMs: 1_000 } });
    const scan = vi.spyOn(scanner, "scan");

    loop.start();
    expect(loop.isRunning).toBe(true);
    await loop.stop();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(scan).toHaveBeenCalledTimes(1);
    expect(loop.isRunning).toBe(false);
  });

  it("reconciles tournament reminders once per sync interval", async () => {
    store.setTournamentSubscription(1, true, NOW);
    const reconciler = new TournamentReconciler(store);
    const sync = vi.spyOn(reconciler, "sync");
    const { loop } = build(new FakeMessenger(), {
      tournaments: reconciler,
      config: { tournamentSyncIntervalMs: 300_000 },
    });

    await loop.tickOnce();
    await loop.tickOnce();
    expect(sync).toHaveBeenCalledTimes(1);
    expect(store.listByCategory(1, "tournament")).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(300_000);
    await loop.tickOnce();
    expect(sync).toHaveBeenCalledTimes(2);
  });
});
