import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type Database from "better-sqlite3";
import { openDatabase } from "../../db/index.js";
import { DueSetScanner } from "./scanner.js";
import { ReminderStore } from "./store.js";

vi.mock("../../logging.js", () => ({
  createComponentLogger: () => ({
    trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn(),
  }),
}));

const NOW = new Date("2024-03-09T07:00:00Z");

let db: Database.Database;
let store: ReminderStore;

beforeEach(() => {
  db = openDatabase(":memory:");
  store = new ReminderStore(db, { defaultTimezone: "Europe/Moscow", leaseMs: 60_000, instanceId: "test" });
  for (let i = 0; i < 5; i++) {
    store.create({ chatId: 100, userId: 7, text: `r${i}`, schedule: { kind: "one_off", at: NOW } }, NOW);
  }
});

afterEach(() => {
  db.close();
});

describe("DueSetScanner", () => {
  it.each([
    [undefined, 100],
    [0, 1],
    [1_000, 500],
    [Number.NaN, 100],
    [25.9, 25],
  ])("clamps batchLimit %s to %i", (batchLimit, expected) => {
    expect(new DueSetScanner(store, { batchLimit }).batchLimit).toBe(expected);
  });

  it("claims up to the batch limit", () => {
    expect(new DueSetScanner(store, { batchLimit: 3 }).scan(NOW)).toHaveLength(3);
  });

  it("claims no more than the free capacity", () => {
    expect(new DueSetScanner(store, { batchLimit: 3 }).scan(NOW, 2.5)).toHaveLength(2);
  });

  it("skips the store when there is no capacity", () => {
    const claimDue = vi.spyOn(store, "claimDue");
    expect(new DueSetScanner(store).scan(NOW, 0)).toEqual([]);
    expect(claimDue).not.toHaveBeenCalled();
  });
});
