/**
 * Console Transport
 *
 * Human-readable colored lines in development, one JSON object per line
 * in production (for log shippers).
 */

import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const LEVEL_STYLE: Record<LogLevel, { label: string; color: string }> = {
  trace: { label: "TRC", color: COLORS.gray },
  debug: { label: "DBG", color: COLORS.cyan },
  info: { label: "INF", color: COLORS.blue },
  warn: { label: "WRN", color: COLORS.yellow },
  error: { label: "ERR", color: COLORS.red },
  fatal: { label: "FTL", color: COLORS.bgRed + COLORS.white },
  silent: { label: "   ", color: COLORS.reset },
};

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Colors (default: when stdout is a TTY) */
  colors?: boolean;
  /** JSON lines instead of pretty output */
  json?: boolean;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private readonly colors: boolean;
  private readonly json: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.json = options.json ?? false;
    this.colors = !this.json && (options.colors ?? process.stdout.isTTY === true);
  }

  log(entry: LogEntry): void {
    const line = this.json ? JSON.stringify(entry) : this.format(entry);

    if (entry.level === "error" || entry.level === "fatal") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private format(entry: LogEntry): string {
    const style = LEVEL_STYLE[entry.level];
    const time = entry.timestamp.slice(11, 19);
    const parts = [
      this.paint(time, COLORS.dim),
      this.paint(style.label, style.color),
      this.paint(`[${entry.component}]`, COLORS.magenta),
    ];
    if (entry.reminderId) parts.push(this.paint(`(${entry.reminderId})`, COLORS.dim));
    parts.push(entry.message);

    let output = parts.join(" ");
    if (entry.data && Object.keys(entry.data).length > 0) {
      output += " " + this.paint(JSON.stringify(entry.data), COLORS.dim);
    }
    if (entry.error) {
      output += "\n" + this.paint(`${entry.error.name}: ${entry.error.message}`, COLORS.red);
      if (entry.error.stack) output += "\n" + this.paint(entry.error.stack, COLORS.dim);
    }
    return output;
  }

  private paint(text: string, color: string): string {
    return this.colors ? `${color}${text}${COLORS.reset}` : text;
  }
}
