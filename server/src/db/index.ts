/**
 * Database Manager
 *
 * SQLite storage for chats, reminders and their delivery runs.
 * Several scheduler processes may open the same file; WAL mode plus a
 * busy timeout lets them take turns on the write lock.
 */

import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { createComponentLogger } from "../logging.js";
import { runMigrations } from "./migrations.js";

const log = createComponentLogger("db");

/** How long a writer waits for another connection's lock (ms) */
const BUSY_TIMEOUT_MS = 5_000;

let db: Database.Database | null = null;

/**
 * Open a connection and bring its schema up to date. Each call returns a
 * fresh connection; `":memory:"` gives a private in-memory database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const conn = new Database(dbPath);
  conn.pragma("journal_mode = WAL");
  conn.pragma("foreign_keys = ON");
  conn.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

  runMigrations(conn);
  return conn;
}

export function initDatabase(dbPath: string): Database.Database {
  db = openDatabase(dbPath);
  log.info("Database initialized", { path: dbPath });
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
