/**
 * Logging Setup for the Reminder Server
 *
 * Builds the root logger from config and hands out per-component children.
 */

import {
  ConsoleTransport,
  FileTransport,
  initLogger,
  Logger,
  type ILogger,
  type LogContext,
  type LogLevel,
  type LogTransport,
} from "@remindly/shared/logging";

export interface LoggingOptions {
  /** Minimum level (default: "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Write rotated JSON-lines files into this directory */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
  /** Scheduler instance id stamped on every entry */
  instanceId?: string;
}

let logger: Logger | null = null;
/** Bumped on every init so component loggers re-resolve against the new root */
let generation = 0;

/**
 * Initialize the logging system for the server.
 */
export function initServerLogging(options: LoggingOptions = {}): Logger {
  const isProd = process.env.NODE_ENV === "production";
  const minLevel = options.minLevel ?? (isProd ? "info" : "debug");

  const transports: LogTransport[] = [
    new ConsoleTransport({ minLevel, colors: options.colors, json: isProd }),
  ];

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir,
      filename: "server",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10,
    }));
  }

  generation++;
  logger = initLogger({
    minLevel,
    component: "server",
    transports,
    context: options.instanceId ? { instanceId: options.instanceId } : undefined,
  });
  return logger;
}

/**
 * Root server logger. Falls back to console-only defaults if accessed
 * before `initServerLogging()`.
 */
export function getServerLogger(): Logger {
  return logger ?? initServerLogging();
}

// ============================================
// COMPONENT LOGGERS
// ============================================

type ComponentContext = LogContext & { component: string };

/**
 * Module-level loggers are created at import time, before bootstrap has
 * read the config. This one binds to whichever root is current when it
 * writes.
 */
class ComponentLogger implements ILogger {
  private resolved: ILogger | null = null;
  private resolvedGeneration = -1;

  constructor(private readonly context: ComponentContext) {}

  private get target(): ILogger {
    if (!this.resolved || this.resolvedGeneration !== generation) {
      this.resolved = getServerLogger().child(this.context);
      this.resolvedGeneration = generation;
    }
    return this.resolved;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.target.trace(message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.target.debug(message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.target.info(message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.target.warn(message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.target.error(message, error, data);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.target.fatal(message, error, data);
  }

  child(context: LogContext & { component?: string }): ILogger {
    return new ComponentLogger({ ...this.context, ...context, component: context.component ?? this.context.component });
  }

  flush(): Promise<void> {
    return this.target.flush();
  }
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return new ComponentLogger({ component: `server.${component}` });
}
