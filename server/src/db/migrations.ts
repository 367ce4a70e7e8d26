/**
 * Database Migrations
 *
 * Sequential, numbered migrations that bring the database schema
 * from any prior version to the current version. Runs at startup
 * after the database file is opened.
 *
 * Rules:
 * - Migrations are append-only. Never edit a shipped migration.
 * - Each migration runs inside a transaction.
 * - To evolve the schema, add a new function to the `migrations` array.
 */

import type Database from "better-sqlite3";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("db.migrations");

// ============================================
// MIGRATION RUNNER
// ============================================

type Migration = (db: Database.Database) => void;

interface VersionRow {
  v: number | null;
}

/**
 * Run all pending migrations against the open database.
 * Safe to call on every startup; applied migrations are skipped.
 */
export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db.prepare<[], VersionRow>("SELECT MAX(version) AS v FROM schema_version").get();
  const currentVersion = row?.v ?? -1;

  if (currentVersion >= migrations.length - 1) {
    return;
  }

  log.info("Migrating schema", { from: currentVersion, to: migrations.length - 1 });

  const stamp = db.prepare(
    "INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))",
  );

  for (let i = currentVersion + 1; i < migrations.length; i++) {
    const migrate = migrations[i];
    const txn = db.transaction(() => {
      migrate(db);
      stamp.run(i);
    });
    txn();
    log.debug("Applied migration", { version: i });
  }
}

// ============================================
// MIGRATIONS
// ============================================

const migrations: Migration[] = [
  // ── v0: Baseline ──────────────────────────────────────────────────
  function v0_baseline(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS chats (
        chat_id INTEGER PRIMARY KEY,
        type TEXT NOT NULL CHECK (type IN ('private', 'group', 'supergroup', 'channel')),
        title TEXT,
        tz TEXT NOT NULL DEFAULT 'Europe/Moscow',
        tournament_subscribed INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS reminders (
        id TEXT PRIMARY KEY,
        chat_id INTEGER NOT NULL REFERENCES chats(chat_id) ON DELETE CASCADE,
        user_id INTEGER NOT NULL,
        kind TEXT NOT NULL CHECK (kind IN ('one_off', 'cron', 'preset')),
        text TEXT NOT NULL CHECK (length(text) > 0),
        remind_at TEXT,
        cron_expr TEXT,
        tz TEXT NOT NULL,
        next_at TEXT,
        last_fired_at TEXT,
        pending_occurrence TEXT,
        paused INTEGER NOT NULL DEFAULT 0,
        status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'fired')),
        category TEXT,
        claimed_by TEXT,
        claimed_until TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        CHECK (
          (kind = 'one_off' AND remind_at IS NOT NULL AND cron_expr IS NULL) OR
          (kind <> 'one_off' AND cron_expr IS NOT NULL AND remind_at IS NULL)
        )
      );

      CREATE INDEX IF NOT EXISTS reminders_due_idx ON reminders(paused, next_at);
      CREATE INDEX IF NOT EXISTS reminders_chat_idx ON reminders(chat_id, category);

      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        reminder_id TEXT NOT NULL REFERENCES reminders(id) ON DELETE CASCADE,
        fired_at TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('ok', 'error')),
        error_text TEXT,
        attempt INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS runs_reminder_idx ON runs(reminder_id, fired_at);
    `);
  },
];
