/**
 * Reminders: Quick Tournaments
 *
 * Subscription is a per-chat flag; the reminders themselves are ordinary
 * preset reminders tagged with the "tournament" category. The reconciler
 * keeps the two in step: one tagged reminder per subscribed chat, none
 * anywhere else.
 */

import { createComponentLogger } from "../../logging.js";
import { TOURNAMENT_LEAD_MINUTES } from "./presets.js";
import { nextOccurrence } from "./recurrence.js";
import type { ReminderStore } from "./store.js";
import { TOURNAMENT_CATEGORY, TOURNAMENT_TITLE } from "./texts.js";
import { formatLocalTime } from "./timezone.js";

const log = createComponentLogger("reminders.tournaments");

/** Owner id for reminders the system creates on a chat's behalf */
export const SYSTEM_USER_ID = 0;

export interface TournamentSyncResult {
  created: number;
  removed: number;
}

export class TournamentReconciler {
  private readonly store: ReminderStore;

  constructor(store: ReminderStore) {
    this.store = store;
  }

  sync(now: Date = new Date()): TournamentSyncResult {
    const result: TournamentSyncResult = { created: 0, removed: 0 };
    const subscribed = this.store.listTournamentSubscribedChats();
    const subscribedIds = new Set(subscribed.map((chat) => chat.chatId));

    for (const chat of subscribed) {
      const existing = this.store.listByCategory(chat.chatId, TOURNAMENT_CATEGORY);
      if (existing.length === 0) {
        this.store.create({
          chatId: chat.chatId,
          userId: SYSTEM_USER_ID,
          text: TOURNAMENT_TITLE,
          schedule: { kind: "preset", name: "tournament" },
          timezone: chat.timezone,
          category: TOURNAMENT_CATEGORY,
        }, now);
        result.created++;
        continue;
      }
      // Keep the oldest, drop duplicates
      for (const duplicate of existing.slice(1)) {
        if (this.store.delete(duplicate.id)) result.removed++;
      }
    }

    for (const chatId of this.store.listChatIdsWithCategory(TOURNAMENT_CATEGORY)) {
      if (!subscribedIds.has(chatId)) {
        result.removed += this.store.deleteByCategory(chatId, TOURNAMENT_CATEGORY);
      }
    }

    if (result.created > 0 || result.removed > 0) {
      log.info("Tournament reminders reconciled", { ...result });
    }
    return result;
  }
}

// ============================================
// SCHEDULE PREVIEW
// ============================================

export interface UpcomingTournament {
  startsAt: Date;
  remindAt: Date;
  /** Start time in the requested zone, e.g. "14:00" or "7:00 AM" */
  localStart: string;
}

/**
 * The next `count` tournament starts after `now`.
 */
export function upcomingTournaments(now: Date, count: number, timezone = "Europe/Moscow"): UpcomingTournament[] {
  const out: UpcomingTournament[] = [];
  let after = now;
  while (out.length < count) {
    const remindAt = nextOccurrence({ kind: "preset", name: "tournament" }, after, timezone);
    if (!remindAt) break;
    const startsAt = new Date(remindAt.getTime() + TOURNAMENT_LEAD_MINUTES * 60_000);
    out.push({ startsAt, remindAt, localStart: formatLocalTime(startsAt, timezone) });
    after = remindAt;
  }
  return out;
}
