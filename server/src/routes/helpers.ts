/**
 * Route Helpers
 *
 * Request-body readers that throw ValidationError, and the error handler
 * that turns the reminder error taxonomy into HTTP statuses.
 */

import type { Context, Hono } from "hono";
import { createComponentLogger } from "../logging.js";
import { StoreUnavailable, ValidationError } from "../services/reminders/errors.js";
import type { SchedulerLoop } from "../services/reminders/scheduler.js";
import type { ReminderStore } from "../services/reminders/store.js";
import type { TournamentReconciler } from "../services/reminders/tournaments.js";

const log = createComponentLogger("routes");

export interface RouteDeps {
  store: ReminderStore;
  defaultTimezone: string;
  loop?: SchedulerLoop;
  tournaments?: TournamentReconciler;
  now?: () => Date;
}

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readJsonObject(c: Context): Promise<JsonObject> {
  const body: unknown = await c.req.json().catch(() => undefined);
  if (!isJsonObject(body)) {
    throw new ValidationError("Request body must be a JSON object");
  }
  return body;
}

// ============================================
// FIELD READERS
// ============================================

export function parseIntParam(raw: string, field: string): number {
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw) || !Number.isSafeInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, field);
  }
  return value;
}

export function requireInteger(body: JsonObject, field: string): number {
  const value = body[field];
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, field);
  }
  return value;
}

export function requireString(body: JsonObject, field: string): string {
  const value = body[field];
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`, field);
  }
  return value;
}

/** Absent and null both read as undefined */
export function optionalString(body: JsonObject, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`, field);
  }
  return value;
}

export function requireBoolean(body: JsonObject, field: string): boolean {
  const value = body[field];
  if (typeof value !== "boolean") {
    throw new ValidationError(`${field} must be true or false`, field);
  }
  return value;
}

/** Integer query parameter within [min, max], or the fallback when absent */
export function queryInt(raw: string | undefined, field: string, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw === "") return fallback;
  const value = parseIntParam(raw, field);
  if (value < min || value > max) {
    throw new ValidationError(`${field} must be between ${min} and ${max}`, field);
  }
  return value;
}

// ============================================
// ERRORS
// ============================================

export function installErrorHandler(app: Hono): void {
  app.onError((error, c) => {
    if (error instanceof ValidationError) {
      return c.json({ error: error.message, field: error.field }, 400);
    }
    if (error instanceof StoreUnavailable) {
      log.warn("Store unavailable during request", { path: c.req.path, code: error.code });
      return c.json({ error: "Reminder store is temporarily unavailable" }, 503);
    }
    log.error("Unhandled route error", error, { method: c.req.method, path: c.req.path });
    return c.json({ error: "Internal server error" }, 500);
  });

  app.notFound((c) => c.json({ error: "Not found" }, 404));
}
