/**
 * Reminders: Scheduler Loop
 *
 * One re-armed setTimeout drives the ticks. Each tick claims as many due
 * reminders as there are free delivery slots and hands them to the
 * dispatcher without awaiting; deliveries run concurrently and are
 * tracked until they settle.
 *
 * A failed scan backs the next tick off exponentially. A failed delivery
 * is logged and left to its lease.
 */

import { createComponentLogger } from "../../logging.js";
import type { Dispatcher } from "./dispatcher.js";
import { isStoreUnavailable } from "./errors.js";
import type { DueSetScanner } from "./scanner.js";
import type { ReminderStore } from "./store.js";
import type { RandomSource } from "./texts.js";
import type { TournamentReconciler } from "./tournaments.js";
import {
  DEFAULT_SCHEDULER_CONFIG,
  type Reminder,
  type RunOutcome,
  type SchedulerConfig,
  type SchedulerEvent,
  type SchedulerEventCallback,
} from "./types.js";

const log = createComponentLogger("reminders.scheduler");

/** Maximum delay for setTimeout (Node.js limit: ~24.8 days) */
const MAX_TIMEOUT_MS = 2_147_483_647;

export interface SchedulerLoopDeps {
  store: ReminderStore;
  scanner: DueSetScanner;
  dispatcher: Dispatcher;
  tournaments?: TournamentReconciler;
  config?: Partial<SchedulerConfig>;
  now?: () => Date;
  /** Jitter source */
  random?: RandomSource;
}

export interface TickSummary {
  claimed: number;
  skipped: boolean;
  error?: string;
}

export class SchedulerLoop {
  private readonly store: ReminderStore;
  private readonly scanner: DueSetScanner;
  private readonly dispatcher: Dispatcher;
  private readonly tournaments: TournamentReconciler | null;
  private readonly config: SchedulerConfig;
  private readonly now: () => Date;
  private readonly random: RandomSource;

  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly listeners = new Set<SchedulerEventCallback>();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private scanning = false;
  private consecutiveFailures = 0;
  private lastTournamentSync: number | null = null;

  constructor(deps: SchedulerLoopDeps) {
    this.store = deps.store;
    this.scanner = deps.scanner;
    this.dispatcher = deps.dispatcher;
    this.tournaments = deps.tournaments ?? null;
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...deps.config };
    this.now = deps.now ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  start(): void {
    if (this.running) return;
    this.running = true;
    log.info("Scheduler started", {
      instanceId: this.store.instanceId,
      pollIntervalMs: this.config.pollIntervalMs,
      maxConcurrent: this.config.maxConcurrent,
    });
    this.runCycle();
  }

  /**
   * Stop ticking and wait up to `drainTimeoutMs` for in-flight deliveries.
   * Returns how many were still running; their leases expire and another
   * tick reclaims them.
   */
  async stop(drainTimeoutMs: number = this.config.drainTimeoutMs): Promise<number> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight.size === 0) {
      log.info("Scheduler stopped");
      return 0;
    }

    log.info("Scheduler draining", { count: this.inFlight.size });
    let drainTimer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<void>((resolve) => {
      drainTimer = setTimeout(resolve, Math.max(0, drainTimeoutMs));
    });
    try {
      await Promise.race([Promise.all(this.inFlight.values()), deadline]);
    } finally {
      clearTimeout(drainTimer);
    }

    const abandoned = this.inFlight.size;
    if (abandoned > 0) {
      log.warn("Drain timed out, leaving deliveries to lease expiry", { remaining: abandoned });
    } else {
      log.info("Scheduler stopped");
    }
    return abandoned;
  }

  onEvent(listener: SchedulerEventCallback): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ============================================
  // TICK
  // ============================================

  /**
   * One scan-and-dispatch pass. Never throws; a failed scan is reported in
   * the summary and through a tick_failed event.
   */
  async tickOnce(): Promise<TickSummary> {
    if (this.scanning) return { claimed: 0, skipped: true };

    const capacity = this.config.maxConcurrent - this.inFlight.size;
    if (capacity <= 0) {
      log.debug("All delivery slots busy, tick skipped", { inFlight: this.inFlight.size });
      return { claimed: 0, skipped: true };
    }

    this.scanning = true;
    const now = this.now();
    try {
      this.syncTournamentsIfDue(now);

      const claimed = this.scanner.scan(now, capacity);
      this.consecutiveFailures = 0;
      if (claimed.length > 0) log.debug(`Claimed ${claimed.length} due reminders`);

      for (const reminder of claimed) {
        // Lease ran out while the first delivery was still pending
        if (this.inFlight.has(reminder.id)) continue;
        this.launch(reminder);
      }
      return { claimed: claimed.length, skipped: false };
    } catch (error) {
      this.consecutiveFailures++;
      const message = error instanceof Error ? error.message : String(error);
      const retryInMs = this.backoffDelay();
      if (isStoreUnavailable(error)) {
        log.warn("Reminder store unavailable, backing off", { error: message, consecutiveFailures: this.consecutiveFailures, retryInMs });
      } else {
        log.error("Scheduler tick failed", error, { consecutiveFailures: this.consecutiveFailures, retryInMs });
      }
      this.emit({
        type: "tick_failed",
        timestamp: now,
        details: { error: message, consecutiveFailures: this.consecutiveFailures, retryInMs },
      });
      return { claimed: 0, skipped: false, error: message };
    } finally {
      this.scanning = false;
    }
  }

  private runCycle(): void {
    this.timer = null;
    void this.tickOnce()
      .then((summary) => this.arm(summary.error ? this.backoffDelay() : this.pollDelay()))
      .catch((error) => {
        log.error("Scheduler cycle crashed", error);
        this.arm(this.pollDelay());
      });
  }

  private arm(delayMs: number): void {
    if (!this.running) return;
    if (this.timer) clearTimeout(this.timer);
    const delay = Math.max(0, Math.min(delayMs, MAX_TIMEOUT_MS));
    this.timer = setTimeout(() => this.runCycle(), delay);
  }

  private pollDelay(): number {
    const spread = (this.random() * 2 - 1) * this.config.jitterMs;
    return Math.max(0, Math.round(this.config.pollIntervalMs + spread));
  }

  /** min(base * 2^(n-1), max) for n consecutive failures */
  private backoffDelay(): number {
    const exponent = Math.max(0, this.consecutiveFailures - 1);
    return Math.min(this.config.backoffBaseMs * 2 ** exponent, this.config.backoffMaxMs);
  }

  private syncTournamentsIfDue(now: Date): void {
    if (!this.tournaments) return;
    if (this.lastTournamentSync !== null
      && now.getTime() - this.lastTournamentSync < this.config.tournamentSyncIntervalMs) {
      return;
    }
    try {
      this.tournaments.sync(now);
      this.lastTournamentSync = now.getTime();
    } catch (error) {
      log.warn("Tournament sync failed, retrying next tick", { error });
    }
  }

  // ============================================
  // DELIVERY
  // ============================================

  private launch(reminder: Reminder): void {
    const delivery = this.dispatcher.deliver(reminder)
      .then((outcome) => this.report(reminder, outcome))
      .catch((error) => {
        log.error("Delivery bookkeeping failed, lease will expire", error, {
          reminderId: reminder.id,
          chatId: reminder.chatId,
        });
      })
      .finally(() => {
        this.inFlight.delete(reminder.id);
      });
    this.inFlight.set(reminder.id, delivery);
  }

  private report(reminder: Reminder, outcome: RunOutcome): void {
    const base = { reminderId: reminder.id, chatId: reminder.chatId, timestamp: this.now() };
    if (outcome.status === "ok") {
      this.emit({ ...base, type: "reminder_delivered", details: { nextFireAt: outcome.nextFireAt } });
      return;
    }
    this.emit({
      ...base,
      type: outcome.action === "paused" ? "reminder_paused" : "reminder_failed",
      details: { kind: outcome.kind, error: outcome.error, action: outcome.action, nextFireAt: outcome.nextFireAt },
    });
  }

  private emit(event: SchedulerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.error("Scheduler event listener threw", error, { type: event.type });
      }
    }
  }
}
