/**
 * Reminders: Store
 *
 * The only writer of scheduling state (next fire time, pause flag, status
 * and the in-flight lease). Every scheduler instance sharing the database
 * goes through claimDue(), whose IMMEDIATE transaction serializes claims
 * so an occurrence is handed to at most one of them.
 */

import type Database from "better-sqlite3";
import { nanoid } from "nanoid";
import { createComponentLogger } from "../../logging.js";
import { toStoreError, ValidationError } from "./errors.js";
import { isPresetName } from "./presets.js";
import { nextOccurrence, validateRecurrence } from "./recurrence.js";
import { computeReminderStats, type ReminderStats } from "./stats.js";
import { isValidTimeZone } from "./timezone.js";
import {
  CHAT_TYPES,
  isRecurring,
  type Chat,
  type ChatType,
  type CreateReminderParams,
  type RecordRunParams,
  type Reminder,
  type ReminderStatus,
  type Run,
  type RunStatus,
  type ScheduleSpec,
  type UpsertChatParams,
} from "./types.js";

const log = createComponentLogger("reminders.store");

export interface ReminderStoreOptions {
  /** Zone for chats created without one */
  defaultTimezone: string;
  /** How long a claim keeps other instances away (ms) */
  leaseMs: number;
  /** Written to claimed_by */
  instanceId: string;
}

export interface ListOptions {
  includePaused?: boolean;
}

// ============================================
// ROW MAPPING
// ============================================

interface ChatRow {
  chat_id: number;
  type: string;
  title: string | null;
  tz: string;
  tournament_subscribed: number;
  created_at: string;
  updated_at: string;
}

interface ReminderRow {
  id: string;
  chat_id: number;
  user_id: number;
  kind: string;
  text: string;
  remind_at: string | null;
  cron_expr: string | null;
  tz: string;
  next_at: string | null;
  last_fired_at: string | null;
  pending_occurrence: string | null;
  paused: number;
  status: string;
  category: string | null;
  claimed_by: string | null;
  claimed_until: string | null;
  created_at: string;
  updated_at: string;
}

interface RunRow {
  id: string;
  reminder_id: string;
  fired_at: string;
  status: string;
  error_text: string | null;
  attempt: number;
  created_at: string;
}

const REMINDER_STATUSES: readonly ReminderStatus[] = ["active", "fired"];
const RUN_STATUSES: readonly RunStatus[] = ["ok", "error"];

function optionalDate(value: string | null): Date | null {
  return value ? new Date(value) : null;
}

function oneOf<T extends string>(allowed: readonly T[], value: string, what: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Corrupt ${what} value in database: "${value}"`);
  }
  return match;
}

export function rowToChat(row: ChatRow): Chat {
  return {
    chatId: row.chat_id,
    type: oneOf<ChatType>(CHAT_TYPES, row.type, "chat type"),
    title: row.title,
    timezone: row.tz,
    tournamentSubscribed: row.tournament_subscribed === 1,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function rowToSchedule(row: ReminderRow): ScheduleSpec {
  if (row.kind === "one_off" && row.remind_at) {
    return { kind: "one_off", at: new Date(row.remind_at) };
  }
  if (row.kind === "cron" && row.cron_expr) {
    return { kind: "cron", expression: row.cron_expr };
  }
  if (row.kind === "preset" && row.cron_expr && isPresetName(row.cron_expr)) {
    return { kind: "preset", name: row.cron_expr };
  }
  throw new Error(`Corrupt schedule for reminder ${row.id}: kind=${row.kind}`);
}

export function rowToReminder(row: ReminderRow): Reminder {
  return {
    id: row.id,
    userId: row.user_id,
    chatId: row.chat_id,
    text: row.text,
    schedule: rowToSchedule(row),
    timezone: row.tz,
    nextFireAt: optionalDate(row.next_at),
    lastFiredAt: optionalDate(row.last_fired_at),
    pendingOccurrence: optionalDate(row.pending_occurrence),
    paused: row.paused === 1,
    status: oneOf(REMINDER_STATUSES, row.status, "reminder status"),
    category: row.category,
    claimedBy: row.claimed_by,
    claimedUntil: optionalDate(row.claimed_until),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function rowToRun(row: RunRow): Run {
  return {
    id: row.id,
    reminderId: row.reminder_id,
    firedAt: new Date(row.fired_at),
    status: oneOf(RUN_STATUSES, row.status, "run status"),
    errorText: row.error_text,
    attempt: row.attempt,
    createdAt: new Date(row.created_at),
  };
}

function scheduleColumns(schedule: ScheduleSpec): { kind: string; remindAt: string | null; cronExpr: string | null } {
  switch (schedule.kind) {
    case "one_off":
      return { kind: "one_off", remindAt: schedule.at.toISOString(), cronExpr: null };
    case "cron":
      return { kind: "cron", remindAt: null, cronExpr: schedule.expression.trim().split(/\s+/).join(" ") };
    case "preset":
      return { kind: "preset", remindAt: null, cronExpr: schedule.name };
  }
}

// ============================================
// STORE
// ============================================

export class ReminderStore {
  private readonly db: Database.Database;
  private readonly options: ReminderStoreOptions;

  constructor(db: Database.Database, options: ReminderStoreOptions) {
    if (!isValidTimeZone(options.defaultTimezone)) {
      throw new ValidationError(`Unknown timezone "${options.defaultTimezone}"`, "defaultTimezone");
    }
    this.db = db;
    this.options = options;
  }

  get instanceId(): string {
    return this.options.instanceId;
  }

  /** Run a storage operation, translating SQLite failures */
  private guard<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw toStoreError(error);
    }
  }

  private requireTimezone(timezone: string): void {
    if (!isValidTimeZone(timezone)) {
      throw new ValidationError(`Unknown timezone "${timezone}"`, "timezone");
    }
  }

  // ----------------------------------------
  // Chats
  // ----------------------------------------

  upsertChat(params: UpsertChatParams, now: Date = new Date()): Chat {
    if (!CHAT_TYPES.includes(params.type)) {
      throw new ValidationError(`Unknown chat type "${params.type}"`, "type");
    }
    if (params.timezone !== undefined) this.requireTimezone(params.timezone);

    return this.guard(() => {
      const nowIso = now.toISOString();
      this.db.prepare(`
        INSERT INTO chats (chat_id, type, title, tz, tournament_subscribed, created_at, updated_at)
        VALUES (@chatId, @type, @title, @tz, 0, @now, @now)
        ON CONFLICT(chat_id) DO UPDATE SET
          type = excluded.type,
          title = COALESCE(@title, chats.title),
          tz = CASE WHEN @tzGiven = 1 THEN excluded.tz ELSE chats.tz END,
          updated_at = excluded.updated_at
      `).run({
        chatId: params.chatId,
        type: params.type,
        title: params.title ?? null,
        tz: params.timezone ?? this.options.defaultTimezone,
        tzGiven: params.timezone !== undefined ? 1 : 0,
        now: nowIso,
      });
      return this.requireChat(params.chatId);
    });
  }

  getChat(chatId: number): Chat | null {
    return this.guard(() => {
      const row = this.db.prepare<[number], ChatRow>("SELECT * FROM chats WHERE chat_id = ?").get(chatId);
      return row ? rowToChat(row) : null;
    });
  }

  private requireChat(chatId: number): Chat {
    const chat = this.getChat(chatId);
    if (!chat) throw new Error(`Chat ${chatId} vanished during write`);
    return chat;
  }

  setChatTimezone(chatId: number, timezone: string, now: Date = new Date()): Chat | null {
    this.requireTimezone(timezone);
    return this.guard(() => {
      const result = this.db.prepare("UPDATE chats SET tz = ?, updated_at = ? WHERE chat_id = ?")
        .run(timezone, now.toISOString(), chatId);
      return result.changes > 0 ? this.requireChat(chatId) : null;
    });
  }

  /**
   * Flip the tournament flag, creating the chat as a group if it is new.
   */
  setTournamentSubscription(chatId: number, subscribed: boolean, now: Date = new Date()): Chat {
    return this.guard(() => {
      const nowIso = now.toISOString();
      this.db.prepare(`
        INSERT INTO chats (chat_id, type, title, tz, tournament_subscribed, created_at, updated_at)
        VALUES (?, 'group', NULL, ?, ?, ?, ?)
        ON CONFLICT(chat_id) DO UPDATE SET
          tournament_subscribed = excluded.tournament_subscribed,
          updated_at = excluded.updated_at
      `).run(chatId, this.options.defaultTimezone, subscribed ? 1 : 0, nowIso, nowIso);
      return this.requireChat(chatId);
    });
  }

  listTournamentSubscribedChats(): Chat[] {
    return this.guard(() =>
      this.db.prepare<[], ChatRow>("SELECT * FROM chats WHERE tournament_subscribed = 1 ORDER BY chat_id")
        .all()
        .map(rowToChat),
    );
  }

  // ----------------------------------------
  // Create
  // ----------------------------------------

  /**
   * Validate and persist a reminder. Recurring schedules are checked here
   * so a bad expression never reaches the scanner.
   */
  create(params: CreateReminderParams, now: Date = new Date()): Reminder {
    const text = params.text.trim();
    if (!text) {
      throw new ValidationError("Reminder text must not be empty", "text");
    }
    if (!Number.isSafeInteger(params.chatId) || !Number.isSafeInteger(params.userId)) {
      throw new ValidationError("chatId and userId must be integers", "chatId");
    }

    return this.guard(() => {
      const chat = this.getChat(params.chatId);
      const timezone = params.timezone ?? chat?.timezone ?? this.options.defaultTimezone;
      this.requireTimezone(timezone);

      const schedule = params.schedule;
      let nextFireAt: Date;
      if (isRecurring(schedule)) {
        nextFireAt = validateRecurrence(schedule, timezone, now);
      } else {
        if (Number.isNaN(schedule.at.getTime())) {
          throw new ValidationError("One-off reminder needs a valid instant", "at");
        }
        nextFireAt = schedule.at;
      }

      const id = `rem_${nanoid(12)}`;
      const nowIso = now.toISOString();
      const columns = scheduleColumns(schedule);

      const insert = this.db.transaction(() => {
        if (!chat) {
          this.db.prepare(`
            INSERT INTO chats (chat_id, type, title, tz, tournament_subscribed, created_at, updated_at)
            VALUES (?, 'private', NULL, ?, 0, ?, ?)
            ON CONFLICT(chat_id) DO NOTHING
          `).run(params.chatId, this.options.defaultTimezone, nowIso, nowIso);
        }
        this.db.prepare(`
          INSERT INTO reminders
            (id, chat_id, user_id, kind, text, remind_at, cron_expr, tz, next_at,
             paused, status, category, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 0, 'active', ?, ?, ?)
        `).run(
          id,
          params.chatId,
          params.userId,
          columns.kind,
          text,
          columns.remindAt,
          columns.cronExpr,
          timezone,
          nextFireAt.toISOString(),
          params.category ?? null,
          nowIso,
          nowIso,
        );
      });
      insert();

      log.info("Reminder created", {
        reminderId: id,
        chatId: params.chatId,
        kind: schedule.kind,
        nextFireAt,
      });
      return this.requireReminder(id);
    });
  }

  // ----------------------------------------
  // Scheduling
  // ----------------------------------------

  /**
   * Claim up to `limit` due reminders for this instance. Rows another
   * instance claimed first are skipped; expired leases are claimable again.
   */
  claimDue(now: Date, limit: number): Reminder[] {
    if (limit <= 0) return [];
    const nowIso = now.toISOString();
    const leaseUntil = new Date(now.getTime() + this.options.leaseMs).toISOString();

    return this.guard(() => {
      const select = this.db.prepare<[string, string, number], ReminderRow>(`
        SELECT * FROM reminders
        WHERE paused = 0 AND status = 'active'
          AND next_at IS NOT NULL AND next_at <= ?
          AND (claimed_until IS NULL OR claimed_until <= ?)
        ORDER BY next_at
        LIMIT ?
      `);
      const claim = this.db.prepare(`
        UPDATE reminders SET claimed_by = ?, claimed_until = ?, updated_at = ?
        WHERE id = ? AND paused = 0 AND status = 'active'
          AND (claimed_until IS NULL OR claimed_until <= ?)
      `);

      const txn = this.db.transaction((): Reminder[] => {
        const claimed: Reminder[] = [];
        for (const row of select.all(nowIso, nowIso, limit)) {
          const result = claim.run(this.options.instanceId, leaseUntil, nowIso, row.id, nowIso);
          if (result.changes === 1) {
            claimed.push(rowToReminder({
              ...row,
              claimed_by: this.options.instanceId,
              claimed_until: leaseUntil,
              updated_at: nowIso,
            }));
          }
        }
        return claimed;
      });
      return txn.immediate();
    });
  }

  /**
   * Record a delivery attempt. Returns null when the reminder was deleted
   * while its delivery was in flight.
   */
  recordRun(reminderId: string, params: RecordRunParams, now: Date = new Date()): Run | null {
    return this.guard(() => {
      const attempt = params.attempt ?? this.countFailedAttempts(reminderId, params.firedAt) + 1;
      const run: Run = {
        id: `run_${nanoid(12)}`,
        reminderId,
        firedAt: params.firedAt,
        status: params.status,
        errorText: params.errorText ?? null,
        attempt,
        createdAt: now,
      };
      const result = this.db.prepare(`
        INSERT INTO runs (id, reminder_id, fired_at, status, error_text, attempt, created_at)
        SELECT ?, id, ?, ?, ?, ?, ? FROM reminders WHERE id = ?
      `).run(
        run.id,
        run.firedAt.toISOString(),
        run.status,
        run.errorText,
        run.attempt,
        run.createdAt.toISOString(),
        run.reminderId,
      );
      return result.changes > 0 ? run : null;
    });
  }

  /** Failed runs already recorded for one occurrence */
  countFailedAttempts(reminderId: string, firedAt: Date): number {
    return this.guard(() => {
      const row = this.db.prepare<[string, string], { count: number }>(
        "SELECT COUNT(*) AS count FROM runs WHERE reminder_id = ? AND fired_at = ? AND status = 'error'",
      ).get(reminderId, firedAt.toISOString());
      return row?.count ?? 0;
    });
  }

  /**
   * Move a reminder past the occurrence it just attempted and release the
   * claim. One-offs become fired. Recurring reminders get the first
   * occurrence after max(now, firedAt).
   *
   * Only the instance holding the claim may settle it. If the claim was
   * cleared (snoozed, settled already) or taken by another instance after
   * the lease ran out, the row is left as is and its current state is
   * returned, so a repeated call is a no-op.
   */
  reschedule(reminderId: string, now: Date, firedAt?: Date): Reminder | null {
    return this.guard(() => {
      const reminder = this.get(reminderId);
      if (!reminder) return null;

      const nowIso = now.toISOString();
      let nextFireAt: Date | null = null;
      if (isRecurring(reminder.schedule)) {
        const base = firedAt && firedAt.getTime() > now.getTime() ? firedAt : now;
        nextFireAt = nextOccurrence(reminder.schedule, base, reminder.timezone);
      }
      const status: ReminderStatus = nextFireAt ? "active" : "fired";

      const result = this.db.prepare(`
        UPDATE reminders
        SET next_at = ?, status = ?, last_fired_at = ?, pending_occurrence = NULL,
            claimed_by = NULL, claimed_until = NULL, updated_at = ?
        WHERE id = ? AND claimed_by = ?
      `).run(nextFireAt ? nextFireAt.toISOString() : null, status, nowIso, nowIso, reminderId, this.options.instanceId);

      if (result.changes === 0) {
        this.claimLost(reminderId, "reschedule");
      } else if (isRecurring(reminder.schedule) && !nextFireAt) {
        log.warn("Recurring reminder has no further occurrence", { reminderId });
      }
      return this.requireReminder(reminderId);
    });
  }

  /**
   * Drop the lease without advancing. The same occurrence is due again at
   * `retryAt` and is remembered as pendingOccurrence. Returns false when
   * the claim is no longer ours.
   */
  releaseClaim(reminderId: string, retryAt: Date, now: Date = new Date()): boolean {
    const changed = this.guard(() =>
      this.db.prepare(`
        UPDATE reminders
        SET pending_occurrence = COALESCE(pending_occurrence, next_at), next_at = ?,
            claimed_by = NULL, claimed_until = NULL, updated_at = ?
        WHERE id = ? AND claimed_by = ?
      `).run(retryAt.toISOString(), now.toISOString(), reminderId, this.options.instanceId).changes > 0,
    );
    if (!changed) this.claimLost(reminderId, "releaseClaim");
    return changed;
  }

  /**
   * Stop scanning a reminder whose chat can no longer be reached. Returns
   * false when the claim is no longer ours.
   */
  autoPause(reminderId: string, now: Date): boolean {
    const changed = this.guard(() => {
      const nowIso = now.toISOString();
      return this.db.prepare(`
        UPDATE reminders
        SET paused = 1, next_at = NULL, last_fired_at = ?, pending_occurrence = NULL,
            claimed_by = NULL, claimed_until = NULL, updated_at = ?
        WHERE id = ? AND claimed_by = ?
      `).run(nowIso, nowIso, reminderId, this.options.instanceId).changes > 0;
    });
    if (changed) log.warn("Reminder auto-paused", { reminderId });
    else this.claimLost(reminderId, "autoPause");
    return changed;
  }

  private claimLost(reminderId: string, operation: string): void {
    log.warn("Claim no longer held, leaving reminder untouched", {
      reminderId,
      operation,
      instanceId: this.options.instanceId,
    });
  }

  /**
   * Pause or resume. Resuming a recurring reminder recomputes its next
   * occurrence from `now`; a one-off keeps its instant even if it passed,
   * so the next scan delivers it. Fired one-offs stay fired.
   */
  pause(reminderId: string, paused: boolean, now: Date = new Date()): Reminder | null {
    return this.guard(() => {
      const reminder = this.get(reminderId);
      if (!reminder) return null;
      const nowIso = now.toISOString();

      if (paused) {
        this.db.prepare("UPDATE reminders SET paused = 1, updated_at = ? WHERE id = ?").run(nowIso, reminderId);
        return this.requireReminder(reminderId);
      }

      if (reminder.status === "fired") return reminder;

      const next = isRecurring(reminder.schedule)
        ? nextOccurrence(reminder.schedule, now, reminder.timezone)
        : reminder.schedule.at;
      this.db.prepare("UPDATE reminders SET paused = 0, next_at = ?, pending_occurrence = NULL, updated_at = ? WHERE id = ?")
        .run(next ? next.toISOString() : null, nowIso, reminderId);
      return this.requireReminder(reminderId);
    });
  }

  delete(reminderId: string): boolean {
    return this.guard(() => this.db.prepare("DELETE FROM reminders WHERE id = ?").run(reminderId).changes > 0);
  }

  // ----------------------------------------
  // Reads
  // ----------------------------------------

  get(reminderId: string): Reminder | null {
    return this.guard(() => {
      const row = this.db.prepare<[string], ReminderRow>("SELECT * FROM reminders WHERE id = ?").get(reminderId);
      return row ? rowToReminder(row) : null;
    });
  }

  private requireReminder(reminderId: string): Reminder {
    const reminder = this.get(reminderId);
    if (!reminder) throw new Error(`Reminder ${reminderId} vanished during write`);
    return reminder;
  }

  listForChat(chatId: number, options: ListOptions = {}): Reminder[] {
    const includePaused = options.includePaused ?? true;
    return this.guard(() =>
      this.db.prepare<[number, number], ReminderRow>(`
        SELECT * FROM reminders
        WHERE chat_id = ? AND (? = 1 OR paused = 0)
        ORDER BY next_at IS NULL, next_at, created_at
      `).all(chatId, includePaused ? 1 : 0).map(rowToReminder),
    );
  }

  listForUser(userId: number): Reminder[] {
    return this.guard(() =>
      this.db.prepare<[number], ReminderRow>(`
        SELECT * FROM reminders WHERE user_id = ?
        ORDER BY next_at IS NULL, next_at, created_at
      `).all(userId).map(rowToReminder),
    );
  }

  /** Most recent first */
  listRuns(reminderId: string, limit = 50): Run[] {
    return this.guard(() =>
      this.db.prepare<[string, number], RunRow>(`
        SELECT * FROM runs WHERE reminder_id = ?
        ORDER BY created_at DESC, rowid DESC
        LIMIT ?
      `).all(reminderId, limit).map(rowToRun),
    );
  }

  listByCategory(chatId: number, category: string): Reminder[] {
    return this.guard(() =>
      this.db.prepare<[number, string], ReminderRow>(
        "SELECT * FROM reminders WHERE chat_id = ? AND category = ? ORDER BY created_at",
      ).all(chatId, category).map(rowToReminder),
    );
  }

  /** Chats holding at least one reminder in `category` */
  listChatIdsWithCategory(category: string): number[] {
    return this.guard(() =>
      this.db.prepare<[string], { chat_id: number }>(
        "SELECT DISTINCT chat_id FROM reminders WHERE category = ? ORDER BY chat_id",
      ).all(category).map((row) => row.chat_id),
    );
  }

  deleteByCategory(chatId: number, category: string): number {
    return this.guard(() =>
      this.db.prepare("DELETE FROM reminders WHERE chat_id = ? AND category = ?").run(chatId, category).changes,
    );
  }

  /** Earliest pending fire time across all reminders */
  nextDueAt(): Date | null {
    return this.guard(() => {
      const row = this.db.prepare<[], { next: string | null }>(
        "SELECT MIN(next_at) AS next FROM reminders WHERE paused = 0 AND status = 'active'",
      ).get();
      return optionalDate(row?.next ?? null);
    });
  }

  getStats(now: Date = new Date()): ReminderStats {
    return this.guard(() => computeReminderStats(this.db, now));
  }

  // ----------------------------------------
  // Edits
  // ----------------------------------------

  updateText(reminderId: string, text: string, now: Date = new Date()): Reminder | null {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new ValidationError("Reminder text must not be empty", "text");
    }
    return this.guard(() => {
      const result = this.db.prepare("UPDATE reminders SET text = ?, updated_at = ? WHERE id = ?")
        .run(trimmed, now.toISOString(), reminderId);
      return result.changes > 0 ? this.requireReminder(reminderId) : null;
    });
  }

  /**
   * Move a one-off reminder to `until` and make it active again, even if
   * it already fired or was paused.
   */
  snooze(reminderId: string, until: Date, now: Date = new Date()): Reminder | null {
    if (Number.isNaN(until.getTime()) || until.getTime() <= now.getTime()) {
      throw new ValidationError("Snooze target must be in the future", "until");
    }
    return this.guard(() => {
      const reminder = this.get(reminderId);
      if (!reminder) return null;
      if (reminder.schedule.kind !== "one_off") {
        throw new ValidationError("Only one-off reminders can be snoozed", "schedule");
      }

      const untilIso = until.toISOString();
      this.db.prepare(`
        UPDATE reminders
        SET remind_at = ?, next_at = ?, paused = 0, status = 'active', pending_occurrence = NULL,
            claimed_by = NULL, claimed_until = NULL, updated_at = ?
        WHERE id = ?
      `).run(untilIso, untilIso, now.toISOString(), reminderId);
      return this.requireReminder(reminderId);
    });
  }
}
