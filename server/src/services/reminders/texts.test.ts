import { describe, it, expect } from "vitest";
import {
  escapeHtml,
  pickPhrase,
  REMINDER_VARIANTS,
  renderReminderMessage,
  shortId,
} from "./texts.js";
import type { Reminder } from "./types.js";

function reminder(overrides: Partial<Reminder> = {}): Reminder {
  const created = new Date("2024-03-09T07:00:00Z");
  return {
    id: "rem_abc123",
    userId: 0,
    chatId: 100,
    text: "Быстрый турнир",
    schedule: { kind: "preset", name: "tournament" },
    timezone: "Europe/Moscow",
    nextFireAt: null,
    lastFiredAt: null,
    pendingOccurrence: null,
    paused: false,
    status: "active",
    category: "tournament",
    claimedBy: null,
    claimedUntil: null,
    createdAt: created,
    updatedAt: created,
    ...overrides,
  };
}

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#x27;s&lt;/a&gt;");
  });
});

describe("pickPhrase", () => {
  it("indexes the variants by the random value", () => {
    expect(pickPhrase(REMINDER_VARIANTS, { title: "tea" }, () => 0)).toBe("⏰ Напоминание: tea");
    expect(pickPhrase(REMINDER_VARIANTS, { title: "tea" }, () => 0.999)).toBe("🎯 Самое время: tea");
  });

  it("inserts dollar signs literally", () => {
    expect(pickPhrase(REMINDER_VARIANTS, { title: "pay $& $1" }, () => 0)).toBe("⏰ Напоминание: pay $&amp; $1");
  });
});

describe("renderReminderMessage", () => {
  const occurrence = new Date("2024-03-09T10:55:00Z");

  it("announces the tournament start in the reminder's zone", () => {
    expect(renderReminderMessage(reminder(), occurrence, () => 0)).toBe("⏰ Через 5 минут стартует Быстрый турнир — начало в 14:00!");
    expect(renderReminderMessage(reminder({ timezone: "America/New_York" }), occurrence, () => 0.2))
      .toBe("🔥 Быстрый турнир начинается в 6:00 AM. Осталось 5 минут!");
  });

  it("wraps ordinary reminder text", () => {
    const plain = reminder({ category: null, text: "drink water", schedule: { kind: "cron", expression: "0 * * * *" } });
    expect(renderReminderMessage(plain, occurrence, () => 0.3)).toBe("✨ Пора: drink water");
  });
});

describe("shortId", () => {
  it("derives a stable display id", () => {
    expect(shortId("rem_abc123")).toBe("RID-85C0CE");
    expect(shortId("rem_abc123")).toBe(shortId("rem_abc123"));
  });
});
