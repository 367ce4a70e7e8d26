/**
 * Reminders: Dispatcher
 *
 * Delivers one claimed occurrence and settles its bookkeeping:
 *
 *   ok         → run(ok), reschedule
 *   transient  → run(error), then either release the claim with a retry
 *                time inside the grace window or reschedule (missed)
 *   permanent  → run(error), auto-pause
 *
 * Store failures propagate; the claim's lease expires and the occurrence
 * is picked up again by a later tick.
 */

import { createComponentLogger } from "../../logging.js";
import type { Messenger, SendResult } from "../../messaging/types.js";
import { DeliveryPermanentError, DeliveryTimeoutError } from "./errors.js";
import type { ReminderStore } from "./store.js";
import { renderReminderMessage, type RandomSource } from "./texts.js";
import {
  DEFAULT_DISPATCHER_OPTIONS,
  type DispatcherOptions,
  type Reminder,
  type RunOutcome,
} from "./types.js";

const log = createComponentLogger("reminders.dispatcher");

export interface DispatcherDeps {
  store: ReminderStore;
  messenger: Messenger;
  options?: Partial<DispatcherOptions>;
  /** Clock used for bookkeeping after the send returns */
  now?: () => Date;
  random?: RandomSource;
}

export class Dispatcher {
  private readonly store: ReminderStore;
  private readonly messenger: Messenger;
  private readonly options: DispatcherOptions;
  private readonly now: () => Date;
  private readonly random: RandomSource;

  constructor(deps: DispatcherDeps) {
    this.store = deps.store;
    this.messenger = deps.messenger;
    this.options = { ...DEFAULT_DISPATCHER_OPTIONS, ...deps.options };
    this.now = deps.now ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  async deliver(reminder: Reminder): Promise<RunOutcome> {
    const occurrence = reminder.pendingOccurrence ?? reminder.nextFireAt ?? this.now();
    const rlog = log.child({ reminderId: reminder.id, chatId: reminder.chatId });
    const text = renderReminderMessage(reminder, occurrence, this.random);

    const result = await this.sendWithTimeout(reminder.chatId, text);
    const now = this.now();

    if (result.ok) {
      if (!this.store.recordRun(reminder.id, { firedAt: occurrence, status: "ok" }, now)) {
        rlog.info("Reminder deleted during delivery, nothing to settle");
        return { status: "ok", nextFireAt: null };
      }
      const updated = this.store.reschedule(reminder.id, now, occurrence);
      rlog.info("Reminder delivered", { occurrence, nextFireAt: updated?.nextFireAt ?? null });
      return { status: "ok", nextFireAt: updated?.nextFireAt ?? null };
    }

    const attempt = this.store.countFailedAttempts(reminder.id, occurrence) + 1;
    if (!this.store.recordRun(reminder.id, { firedAt: occurrence, status: "error", errorText: result.error, attempt }, now)) {
      rlog.info("Reminder deleted during delivery, nothing to settle", { error: result.error });
      return { status: "error", kind: result.kind, error: result.error, action: "advanced", nextFireAt: null };
    }

    if (result.kind === "permanent") {
      this.store.autoPause(reminder.id, now);
      rlog.warn("Chat unreachable, reminder paused", { error: result.error });
      return { status: "error", kind: "permanent", error: result.error, action: "paused", nextFireAt: null };
    }

    const delay = Math.max(this.options.retryDelayMs, result.retryAfterMs ?? 0);
    const retryAt = new Date(now.getTime() + delay);
    const withinGrace = retryAt.getTime() - occurrence.getTime() <= this.options.graceWindowMs;

    if (attempt < this.options.maxAttempts && withinGrace) {
      this.store.releaseClaim(reminder.id, retryAt, now);
      rlog.warn("Delivery failed, retry scheduled", { error: result.error, attempt, retryAt });
      return { status: "error", kind: "transient", error: result.error, action: "retry_scheduled", nextFireAt: retryAt };
    }

    const updated = this.store.reschedule(reminder.id, now, occurrence);
    rlog.warn("Delivery failed, occurrence missed", {
      error: result.error,
      attempt,
      nextFireAt: updated?.nextFireAt ?? null,
    });
    return {
      status: "error",
      kind: "transient",
      error: result.error,
      action: "advanced",
      nextFireAt: updated?.nextFireAt ?? null,
    };
  }

  /**
   * messenger.send bounded by deliveryTimeoutMs. A throwing messenger is
   * folded into a SendResult.
   */
  private async sendWithTimeout(chatId: number, text: string): Promise<SendResult> {
    const timeoutMs = this.options.deliveryTimeoutMs;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<SendResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, kind: "transient", error: new DeliveryTimeoutError(timeoutMs).message });
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.messenger.send(chatId, text, controller.signal), timeout]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const kind = error instanceof DeliveryPermanentError ? "permanent" : "transient";
      return { ok: false, kind, error: message };
    } finally {
      clearTimeout(timer);
    }
  }
}
