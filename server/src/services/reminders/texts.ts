/**
 * Reminders: Message Texts
 *
 * Phrase variants for delivered reminders. Message bodies go out with
 * Telegram's HTML parse mode, so user text is escaped here.
 */

import { createHash } from "crypto";
import { TOURNAMENT_LEAD_MINUTES } from "./presets.js";
import { formatLocalTime } from "./timezone.js";
import type { Reminder } from "./types.js";

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export const TOURNAMENT_CATEGORY = "tournament";
export const TOURNAMENT_TITLE = "Быстрый турнир";

export const TOURNAMENT_VARIANTS: readonly string[] = [
  "⏰ Через 5 минут стартует {title} — начало в {time}!",
  "🔥 {title} начинается в {time}. Осталось 5 минут!",
  "⚡ {title} через 5 минут ({time}). Поехали!",
  "🚀 Через 5 минут стартует {title}! Начало в {time}, не пропусти!",
  "⏳ Осталось 5 минут — {title} на старте! ({time})",
  "🕓 Напоминание: {title} начинается в {time}.",
];

export const REMINDER_VARIANTS: readonly string[] = [
  "⏰ Напоминание: {title}",
  "✨ Пора: {title}",
  "ℹ️ Не забудь: {title}",
  "🎯 Самое время: {title}",
];

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function pickPhrase(
  variants: readonly string[],
  values: { title: string; time?: string },
  random: RandomSource = Math.random,
): string {
  const index = Math.min(variants.length - 1, Math.floor(random() * variants.length));
  const template = variants[index] ?? "{title}";
  return template
    .replace("{title}", () => escapeHtml(values.title))
    .replace("{time}", () => values.time ?? "");
}

/**
 * Message for one occurrence. Tournament reminders announce the start
 * time in the reminder's zone; everything else wraps the reminder text.
 */
export function renderReminderMessage(reminder: Reminder, occurrence: Date, random: RandomSource = Math.random): string {
  if (reminder.category === TOURNAMENT_CATEGORY) {
    const startsAt = new Date(occurrence.getTime() + TOURNAMENT_LEAD_MINUTES * 60_000);
    return pickPhrase(TOURNAMENT_VARIANTS, {
      title: reminder.text,
      time: formatLocalTime(startsAt, reminder.timezone),
    }, random);
  }
  return pickPhrase(REMINDER_VARIANTS, { title: reminder.text }, random);
}

/** "RID-3FA2C1": compact display id */
export function shortId(id: string): string {
  return `RID-${createHash("sha256").update(id).digest("hex").slice(0, 6).toUpperCase()}`;
}
