/**
 * Reminders: Due-Set Scanner
 *
 * One claimDue() per tick, sized to the loop's free delivery slots.
 */

import type { ReminderStore } from "./store.js";
import type { Reminder } from "./types.js";

export const DEFAULT_BATCH_LIMIT = 100;
export const MAX_BATCH_LIMIT = 500;

export interface ScannerOptions {
  batchLimit?: number;
}

export class DueSetScanner {
  private readonly store: ReminderStore;
  readonly batchLimit: number;

  constructor(store: ReminderStore, options: ScannerOptions = {}) {
    this.store = store;
    const limit = Math.floor(options.batchLimit ?? DEFAULT_BATCH_LIMIT);
    this.batchLimit = Math.min(MAX_BATCH_LIMIT, Math.max(1, Number.isFinite(limit) ? limit : DEFAULT_BATCH_LIMIT));
  }

  /**
   * Claim reminders due at `now`. `capacity` caps the batch below the
   * configured limit; zero or less claims nothing.
   */
  scan(now: Date, capacity: number = this.batchLimit): Reminder[] {
    const limit = Math.min(this.batchLimit, Math.floor(capacity));
    if (limit <= 0) return [];
    return this.store.claimDue(now, limit);
  }
}
