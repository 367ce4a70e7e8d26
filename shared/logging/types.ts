/**
 * Logging Types
 *
 * Shared by every Remindly package. One entry shape, many transports.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogContext {
  /** Scheduler instance that produced the entry */
  instanceId?: string;
  /** Reminder being processed */
  reminderId?: string;
  /** Destination chat */
  chatId?: number;
}

export interface LogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Dotted component path, e.g. "server.reminders.dispatcher" */
  component: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  name: string;
  minLevel: LogLevel;
  log(entry: LogEntry): void;
  /** Flush buffered output (graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER
// ============================================

export interface LoggerConfig {
  minLevel: LogLevel;
  component: string;
  transports: LogTransport[];
  context?: LogContext;
  /** Keys matching any of these are replaced with "[REDACTED]" */
  redactPatterns?: RegExp[];
}

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Derive a logger with a narrower component and/or extra context */
  child(context: LogContext & { component?: string }): ILogger;

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /token/i,
  /secret/i,
  /password/i,
  /authorization/i,
  /api_?key/i,
];
