/**
 * Reminders: Stats
 *
 * Aggregated counts over reminders and their runs.
 */

import type Database from "better-sqlite3";

export interface ReminderStats {
  active: number;
  paused: number;
  fired: number;
  byKind: { one_off: number; cron: number; preset: number };
  /** Unpaused, unclaimed reminders whose next fire time has passed */
  overdue: number;
  /** Reminders under an unexpired lease */
  claimed: number;
  runs: { ok: number; error: number };
  tournamentSubscribedChats: number;
}

interface CountRow {
  key: string;
  count: number;
}

export function computeReminderStats(db: Database.Database, now: Date): ReminderStats {
  const nowIso = now.toISOString();
  const stats: ReminderStats = {
    active: 0,
    paused: 0,
    fired: 0,
    byKind: { one_off: 0, cron: 0, preset: 0 },
    overdue: 0,
    claimed: 0,
    runs: { ok: 0, error: 0 },
    tournamentSubscribedChats: 0,
  };

  const byState = db.prepare<[], CountRow>(`
    SELECT CASE WHEN status = 'fired' THEN 'fired' WHEN paused = 1 THEN 'paused' ELSE 'active' END AS key,
           COUNT(*) AS count
    FROM reminders GROUP BY key
  `).all();
  for (const row of byState) {
    if (row.key === "active") stats.active = row.count;
    else if (row.key === "paused") stats.paused = row.count;
    else if (row.key === "fired") stats.fired = row.count;
  }

  const byKind = db.prepare<[], CountRow>("SELECT kind AS key, COUNT(*) AS count FROM reminders GROUP BY kind").all();
  for (const row of byKind) {
    if (row.key === "one_off") stats.byKind.one_off = row.count;
    else if (row.key === "cron") stats.byKind.cron = row.count;
    else if (row.key === "preset") stats.byKind.preset = row.count;
  }

  const runs = db.prepare<[], CountRow>("SELECT status AS key, COUNT(*) AS count FROM runs GROUP BY status").all();
  for (const row of runs) {
    if (row.key === "ok") stats.runs.ok = row.count;
    else if (row.key === "error") stats.runs.error = row.count;
  }

  const single = (sql: string, ...params: string[]): number =>
    db.prepare<string[], { count: number }>(sql).get(...params)?.count ?? 0;

  stats.overdue = single(`
    SELECT COUNT(*) AS count FROM reminders
    WHERE paused = 0 AND status = 'active' AND next_at IS NOT NULL AND next_at <= ?
      AND (claimed_until IS NULL OR claimed_until <= ?)
  `, nowIso, nowIso);
  stats.claimed = single("SELECT COUNT(*) AS count FROM reminders WHERE claimed_until > ?", nowIso);
  stats.tournamentSubscribedChats = single("SELECT COUNT(*) AS count FROM chats WHERE tournament_subscribed = 1");

  return stats;
}
