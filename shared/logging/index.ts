/**
 * Remindly Logging
 *
 * ```typescript
 * import { initLogger, ConsoleTransport } from "@remindly/shared/logging";
 *
 * const root = initLogger({
 *   minLevel: "info",
 *   component: "server",
 *   transports: [new ConsoleTransport({ json: true })],
 * });
 * root.child({ component: "server.reminders" }).info("Claimed", { count: 3 });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export { Logger, initLogger } from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions,
} from "./transports/index.js";
