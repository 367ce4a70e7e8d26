/**
 * Reminder Errors
 *
 * ValidationError    bad schedule or payload, rejected at creation
 * StoreUnavailable   transient storage fault, the tick retries with backoff
 * Delivery*Error     messaging collaborator failures
 */

export class ValidationError extends Error {
  public field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
  }
}

export class StoreUnavailable extends Error {
  public code?: string;

  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, { cause: options?.cause });
    this.name = "StoreUnavailable";
    this.code = options?.code;
  }
}

export class DeliveryTransientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeliveryTransientError";
  }
}

export class DeliveryTimeoutError extends DeliveryTransientError {
  public timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Delivery timed out after ${timeoutMs}ms`);
    this.name = "DeliveryTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class DeliveryPermanentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeliveryPermanentError";
  }
}

// ============================================
// SQLITE ERROR MAPPING
// ============================================

const UNAVAILABLE_CODES = [
  "SQLITE_BUSY",
  "SQLITE_LOCKED",
  "SQLITE_IOERR",
  "SQLITE_CANTOPEN",
  "SQLITE_FULL",
  "SQLITE_PROTOCOL",
];

function sqliteCode(error: unknown): string | null {
  if (!(error instanceof Error) || !("code" in error)) return null;
  const code = error.code;
  return typeof code === "string" && code.startsWith("SQLITE_") ? code : null;
}

/**
 * Translate a better-sqlite3 failure into the reminder error taxonomy.
 * Errors that are neither unavailability nor constraint violations are
 * returned unchanged.
 */
export function toStoreError(error: unknown): unknown {
  if (error instanceof ValidationError || error instanceof StoreUnavailable) return error;

  const code = sqliteCode(error);
  if (!code) {
    if (error instanceof TypeError && /database connection is not open/i.test(error.message)) {
      return new StoreUnavailable("Database connection is closed", { cause: error });
    }
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  if (UNAVAILABLE_CODES.some((prefix) => code.startsWith(prefix))) {
    return new StoreUnavailable(`Reminder store unavailable: ${message}`, { cause: error, code });
  }
  if (code.startsWith("SQLITE_CONSTRAINT")) {
    return new ValidationError(`Constraint violation: ${message}`);
  }
  return error;
}

export function isStoreUnavailable(error: unknown): error is StoreUnavailable {
  return error instanceof StoreUnavailable;
}
