/**
 * Reminder Types
 *
 * Chats, reminders and their delivery runs, persisted in SQLite and
 * driven by the scheduler loop.
 */

import type { PresetName } from "./presets.js";

// ============================================
// CHAT
// ============================================

export type ChatType = "private" | "group" | "supergroup" | "channel";

export const CHAT_TYPES: readonly ChatType[] = ["private", "group", "supergroup", "channel"];

export interface Chat {
  chatId: number;
  type: ChatType;
  title: string | null;
  /** IANA zone used for new reminders in this chat */
  timezone: string;
  /** Receives the tournament preset reminders */
  tournamentSubscribed: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface UpsertChatParams {
  chatId: number;
  type: ChatType;
  title?: string | null;
  timezone?: string;
}

// ============================================
// SCHEDULE DEFINITION
// ============================================

export type ScheduleSpec =
  | { kind: "one_off"; at: Date }
  | { kind: "cron"; expression: string }
  | { kind: "preset"; name: PresetName };

/** The recurring half of ScheduleSpec */
export type RecurrenceSpec = Exclude<ScheduleSpec, { kind: "one_off" }>;

export type ScheduleKind = ScheduleSpec["kind"];

export function isRecurring(spec: ScheduleSpec): spec is RecurrenceSpec {
  return spec.kind !== "one_off";
}

// ============================================
// REMINDER
// ============================================

export type ReminderStatus = "active" | "fired";

export interface Reminder {
  id: string;
  userId: number;
  chatId: number;
  text: string;
  schedule: ScheduleSpec;
  /** IANA zone the recurrence is evaluated in */
  timezone: string;
  /** Next due occurrence; null once a one-off fired or delivery was abandoned */
  nextFireAt: Date | null;
  lastFiredAt: Date | null;
  /** Occurrence whose delivery is being retried; nextFireAt then holds the retry time */
  pendingOccurrence: Date | null;
  paused: boolean;
  status: ReminderStatus;
  category: string | null;
  /** Scheduler instance holding the in-flight lease */
  claimedBy: string | null;
  /** Lease expiry; after this another instance may claim the reminder */
  claimedUntil: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateReminderParams {
  chatId: number;
  userId: number;
  text: string;
  schedule: ScheduleSpec;
  /** Defaults to the chat's zone, then the store default */
  timezone?: string;
  category?: string | null;
}

// ============================================
// RUN
// ============================================

export type RunStatus = "ok" | "error";

export interface Run {
  id: string;
  reminderId: string;
  /** The occurrence this attempt delivered */
  firedAt: Date;
  status: RunStatus;
  errorText: string | null;
  /** 1-based attempt number for this occurrence */
  attempt: number;
  createdAt: Date;
}

export interface RecordRunParams {
  firedAt: Date;
  status: RunStatus;
  errorText?: string | null;
  attempt?: number;
}

export type RunOutcome =
  | { status: "ok"; nextFireAt: Date | null }
  | {
      status: "error";
      kind: "transient" | "permanent";
      error: string;
      action: "advanced" | "retry_scheduled" | "paused";
      nextFireAt: Date | null;
    };

// ============================================
// CONFIG
// ============================================

export interface SchedulerConfig {
  /** Delay between ticks (ms) */
  pollIntervalMs: number;
  /** Random ± spread added to each delay (ms) */
  jitterMs: number;
  /** Max reminders claimed per tick */
  batchLimit: number;
  /** Max deliveries in flight at once */
  maxConcurrent: number;
  /** First backoff delay after a failed tick (ms) */
  backoffBaseMs: number;
  /** Backoff cap (ms) */
  backoffMaxMs: number;
  /** How often subscribed chats are reconciled with tournament reminders (ms) */
  tournamentSyncIntervalMs: number;
  /** How long stop() waits for in-flight deliveries (ms) */
  drainTimeoutMs: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  pollIntervalMs: 15_000,
  jitterMs: 1_000,
  batchLimit: 100,
  maxConcurrent: 8,
  backoffBaseMs: 2_000,
  backoffMaxMs: 60_000,
  tournamentSyncIntervalMs: 5 * 60_000,
  drainTimeoutMs: 30_000,
};

export interface DispatcherOptions {
  /** Bound on a single messenger call (ms) */
  deliveryTimeoutMs: number;
  /** Transient failures younger than this may retry the same occurrence (ms) */
  graceWindowMs: number;
  /** Attempts per occurrence, including the first */
  maxAttempts: number;
  /** Delay before a transient retry (ms) */
  retryDelayMs: number;
}

export const DEFAULT_DISPATCHER_OPTIONS: DispatcherOptions = {
  deliveryTimeoutMs: 10_000,
  graceWindowMs: 2 * 60_000,
  maxAttempts: 3,
  retryDelayMs: 30_000,
};

// ============================================
// EVENTS
// ============================================

export type SchedulerEventType =
  | "reminder_delivered"
  | "reminder_failed"
  | "reminder_paused"
  | "tick_failed";

export interface SchedulerEvent {
  type: SchedulerEventType;
  reminderId?: string;
  chatId?: number;
  timestamp: Date;
  details?: Record<string, unknown>;
}

export type SchedulerEventCallback = (event: SchedulerEvent) => void;
