/**
 * File Transport
 *
 * JSON lines appended to `<logDir>/<filename>.log`, rotated by size into
 * `<filename>.log.1` … `<filename>.log.<maxFiles>`.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogEntry, LogLevel, LogTransport } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename without extension (default: "remindly") */
  filename?: string;
  /** Rotate once the active file exceeds this many bytes (default: 10MB) */
  maxSize?: number;
  /** Rotated files kept (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private readonly filePath: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private stream: fs.WriteStream;
  private size = 0;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    fs.mkdirSync(options.logDir, { recursive: true });
    this.filePath = path.join(options.logDir, `${options.filename ?? "remindly"}.log`);
    this.stream = this.open();
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    const bytes = Buffer.byteLength(line);
    if (this.size > 0 && this.size + bytes > this.maxSize) {
      this.rotate();
    }
    this.stream.write(line);
    this.size += bytes;
  }

  private open(): fs.WriteStream {
    try {
      this.size = fs.statSync(this.filePath).size;
    } catch {
      this.size = 0;
    }
    const stream = fs.createWriteStream(this.filePath, { flags: "a" });
    stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
    return stream;
  }

  private rotate(): void {
    this.stream.end();
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.filePath}.${i}`;
      if (fs.existsSync(from)) fs.renameSync(from, `${this.filePath}.${i + 1}`);
    }
    if (fs.existsSync(this.filePath)) fs.renameSync(this.filePath, `${this.filePath}.1`);
    this.stream = this.open();
  }

  async flush(): Promise<void> {
    if (!this.stream.writableNeedDrain) return;
    await new Promise<void>((resolve) => this.stream.once("drain", () => resolve()));
  }

  async close(): Promise<void> {
    await new Promise<void>((resolve) => this.stream.end(() => resolve()));
  }
}
