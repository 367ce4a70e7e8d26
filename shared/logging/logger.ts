/**
 * Core Logger
 *
 * Structured logging fanned out to one or more transports.
 */

import {
  DEFAULT_REDACT_PATTERNS,
  LOG_LEVELS,
  type ILogger,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from "./types.js";

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core
  // ----------------------------------------

  private write(level: LogLevel, message: string, data?: Record<string, unknown>, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      ...this.config.context,
    };

    if (data) entry.data = this.redact(data);
    if (error !== undefined) entry.error = serializeError(error);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        transport.log(entry);
      } catch (e) {
        // Last resort: the transport itself is broken
        console.error(`[Logger] Transport ${transport.name} failed:`, e);
      }
    }
  }

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some((pattern) => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (value instanceof Date) {
        result[key] = value.toISOString();
      } else if (value instanceof Error) {
        result[key] = serializeError(value);
      } else if (isPlainObject(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  // ----------------------------------------
  // Context
  // ----------------------------------------

  child(context: LogContext & { component?: string }): ILogger {
    const { component, ...rest } = context;
    return new Logger({
      ...this.config,
      component: component ?? this.config.component,
      context: { ...this.config.context, ...rest },
      redactPatterns: this.redactPatterns,
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map((t) => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map((t) => t.close?.()));
  }
}

function serializeError(error: unknown): NonNullable<LogEntry["error"]> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "Unknown", message: String(error) };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================
// ROOT
// ============================================

/** Build the process root logger; components derive from it via child() */
export function initLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
