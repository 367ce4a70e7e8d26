/**
 * Server Configuration
 *
 * Environment variables → AppConfig. `.env` at the repository root is
 * loaded by `loadEnvFile()`; `loadConfig()` itself only reads the env
 * object it is given, so tests pass plain records.
 *
 * A malformed value never stops startup: it falls back to the default (or
 * the nearest bound) and a line is added to `warnings`.
 */

import { config as loadDotenv } from "dotenv";
import { homedir, hostname } from "os";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@remindly/shared/logging";
import { DEFAULT_TELEGRAM_API_BASE } from "./messaging/telegram.js";
import { isValidTimeZone } from "./services/reminders/timezone.js";
import {
  DEFAULT_DISPATCHER_OPTIONS,
  DEFAULT_SCHEDULER_CONFIG,
  type DispatcherOptions,
  type SchedulerConfig,
} from "./services/reminders/types.js";

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  databasePath: string;
  defaultTimezone: string;
  instanceId: string;
  /** How long a claim protects a reminder from other instances (ms) */
  leaseMs: number;
  telegram: {
    /** Null when unset; the server refuses to start without it */
    token: string | null;
    apiBase: string;
  };
  scheduler: SchedulerConfig;
  dispatcher: DispatcherOptions;
  logging: {
    level?: LogLevel;
    /** Rotated file logs go here when set */
    dir?: string;
  };
  warnings: string[];
}

export const DEFAULT_TIMEZONE = "Europe/Moscow";
export const DEFAULT_PORT = 3000;
export const DEFAULT_LEASE_MS = 120_000;

const DATA_DIR = join(homedir(), ".remindly");

/**
 * Load `.env` from the repository root into process.env. Variables already
 * set in the environment win.
 */
export function loadEnvFile(path?: string): void {
  const envPath = path ?? resolve(dirname(fileURLToPath(import.meta.url)), "../../.env");
  loadDotenv({ path: envPath });
}

// ============================================
// PARSING HELPERS
// ============================================

interface IntRange {
  min: number;
  max: number;
}

class EnvReader {
  readonly warnings: string[] = [];

  constructor(private readonly env: Env) {}

  string(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  int(name: string, fallback: number, range: IntRange): number {
    const raw = this.string(name);
    if (raw === undefined) return fallback;

    if (!/^-?\d+$/.test(raw)) {
      this.warnings.push(`${name}=${raw} is not an integer, using ${fallback}`);
      return fallback;
    }
    const value = Number.parseInt(raw, 10);
    if (value < range.min || value > range.max) {
      const clamped = Math.min(range.max, Math.max(range.min, value));
      this.warnings.push(`${name}=${value} is outside ${range.min}-${range.max}, using ${clamped}`);
      return clamped;
    }
    return value;
  }

  bool(name: string): boolean {
    const raw = this.string(name)?.toLowerCase();
    if (raw === undefined) return false;
    if (["1", "true", "yes", "on"].includes(raw)) return true;
    if (!["0", "false", "no", "off"].includes(raw)) {
      this.warnings.push(`${name}=${raw} is not a boolean, treating as false`);
    }
    return false;
  }
}

function normalizeApiBase(raw: string | undefined, warnings: string[]): string {
  if (raw === undefined) return DEFAULT_TELEGRAM_API_BASE;
  try {
    const url = new URL(raw);
    if (url.protocol !== "https:" && url.protocol !== "http:") throw new Error(url.protocol);
    return raw.replace(/\/+$/, "");
  } catch {
    warnings.push(`TELEGRAM_API_BASE=${raw} is not an http(s) URL, using ${DEFAULT_TELEGRAM_API_BASE}`);
    return DEFAULT_TELEGRAM_API_BASE;
  }
}

// ============================================
// LOAD
// ============================================

export function loadConfig(env: Env = process.env): AppConfig {
  const read = new EnvReader(env);
  const warnings = read.warnings;

  let defaultTimezone = read.string("DEFAULT_TZ") ?? DEFAULT_TIMEZONE;
  if (!isValidTimeZone(defaultTimezone)) {
    warnings.push(`DEFAULT_TZ=${defaultTimezone} is not a known IANA zone, using ${DEFAULT_TIMEZONE}`);
    defaultTimezone = DEFAULT_TIMEZONE;
  }

  const scheduler: SchedulerConfig = {
    pollIntervalMs: read.int("POLL_INTERVAL_MS", DEFAULT_SCHEDULER_CONFIG.pollIntervalMs, { min: 1_000, max: 60_000 }),
    jitterMs: read.int("JITTER_MS", DEFAULT_SCHEDULER_CONFIG.jitterMs, { min: 0, max: 30_000 }),
    batchLimit: read.int("BATCH_LIMIT", DEFAULT_SCHEDULER_CONFIG.batchLimit, { min: 1, max: 500 }),
    maxConcurrent: read.int("MAX_CONCURRENT", DEFAULT_SCHEDULER_CONFIG.maxConcurrent, { min: 1, max: 256 }),
    backoffBaseMs: read.int("BACKOFF_BASE_MS", DEFAULT_SCHEDULER_CONFIG.backoffBaseMs, { min: 100, max: 60_000 }),
    backoffMaxMs: read.int("BACKOFF_MAX_MS", DEFAULT_SCHEDULER_CONFIG.backoffMaxMs, { min: 1_000, max: 3_600_000 }),
    tournamentSyncIntervalMs: read.int(
      "TOURNAMENT_SYNC_INTERVAL_MS",
      DEFAULT_SCHEDULER_CONFIG.tournamentSyncIntervalMs,
      { min: 10_000, max: 86_400_000 },
    ),
    drainTimeoutMs: read.int("DRAIN_TIMEOUT_MS", DEFAULT_SCHEDULER_CONFIG.drainTimeoutMs, { min: 0, max: 300_000 }),
  };
  if (scheduler.backoffMaxMs < scheduler.backoffBaseMs) {
    warnings.push(`BACKOFF_MAX_MS is below BACKOFF_BASE_MS, using ${scheduler.backoffBaseMs}`);
    scheduler.backoffMaxMs = scheduler.backoffBaseMs;
  }

  const dispatcher: DispatcherOptions = {
    deliveryTimeoutMs: read.int("DELIVERY_TIMEOUT_MS", DEFAULT_DISPATCHER_OPTIONS.deliveryTimeoutMs, { min: 1_000, max: 120_000 }),
    graceWindowMs: read.int("GRACE_WINDOW_MS", DEFAULT_DISPATCHER_OPTIONS.graceWindowMs, { min: 0, max: 86_400_000 }),
    maxAttempts: read.int("MAX_DELIVERY_ATTEMPTS", DEFAULT_DISPATCHER_OPTIONS.maxAttempts, { min: 1, max: 10 }),
    retryDelayMs: read.int("RETRY_DELAY_MS", DEFAULT_DISPATCHER_OPTIONS.retryDelayMs, { min: 1_000, max: 3_600_000 }),
  };

  // A lease shorter than one delivery lets another instance reclaim a send in progress
  let leaseMs = read.int("CLAIM_LEASE_MS", DEFAULT_LEASE_MS, { min: 5_000, max: 3_600_000 });
  if (leaseMs <= dispatcher.deliveryTimeoutMs) {
    const bumped = dispatcher.deliveryTimeoutMs * 2;
    warnings.push(`CLAIM_LEASE_MS=${leaseMs} does not exceed DELIVERY_TIMEOUT_MS, using ${bumped}`);
    leaseMs = bumped;
  }

  let level: LogLevel | undefined;
  const rawLevel = read.string("LOG_LEVEL")?.toLowerCase();
  if (rawLevel !== undefined) {
    if (isLogLevel(rawLevel)) level = rawLevel;
    else warnings.push(`LOG_LEVEL=${rawLevel} is not a log level, using the default`);
  }
  const logToFile = read.bool("LOG_TO_FILE");
  const logDir = read.string("LOG_DIR") ?? (logToFile ? join(DATA_DIR, "logs") : undefined);

  return {
    port: read.int("PORT", DEFAULT_PORT, { min: 0, max: 65_535 }),
    databasePath: read.string("DATABASE_PATH") ?? join(DATA_DIR, "remindly.db"),
    defaultTimezone,
    instanceId: read.string("INSTANCE_ID") ?? `${hostname()}-${process.pid}`,
    leaseMs,
    telegram: {
      token: read.string("TELEGRAM_BOT_TOKEN") ?? null,
      apiBase: normalizeApiBase(read.string("TELEGRAM_API_BASE"), warnings),
    },
    scheduler,
    dispatcher,
    logging: { level, dir: logDir },
    warnings,
  };
}
