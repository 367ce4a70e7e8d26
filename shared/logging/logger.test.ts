import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Logger } from "./logger.js";
import { FileTransport } from "./transports/file.js";
import type { LogEntry, LogLevel, LogTransport } from "./types.js";

class MemoryTransport implements LogTransport {
  name = "memory";
  entries: LogEntry[] = [];
  constructor(public minLevel: LogLevel = "trace") {}
  log(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

function setup(minLevel: LogLevel = "trace") {
  const memory = new MemoryTransport();
  const logger = new Logger({ minLevel, component: "server", transports: [memory] });
  return { memory, logger };
}

describe("Logger", () => {
  it("drops entries below the minimum level", () => {
    const { memory, logger } = setup("warn");
    logger.info("ignored");
    logger.warn("kept");
    expect(memory.entries.map((e) => e.message)).toEqual(["kept"]);
  });

  it("respects each transport's own level", () => {
    const quiet = new MemoryTransport("error");
    const logger = new Logger({ minLevel: "trace", component: "server", transports: [quiet] });
    logger.warn("ignored");
    logger.error("kept");
    expect(quiet.entries).toHaveLength(1);
  });

  it("redacts sensitive keys at any depth", () => {
    const { memory, logger } = setup();
    logger.info("config", { botToken: "test-token", nested: { password: "test-secret", port: 3000 } });
    expect(memory.entries[0].data).toEqual({
      botToken: "[REDACTED]",
      nested: { password: "[REDACTED]", port: 3000 },
    });
  });

  it("serializes dates and errors in data", () => {
    const { memory, logger } = setup();
    logger.warn("late", { at: new Date("2024-03-09T07:00:00Z"), cause: new RangeError("too far") });
    expect(memory.entries[0].data).toMatchObject({
      at: "2024-03-09T07:00:00.000Z",
      cause: { name: "RangeError", message: "too far" },
    });
  });

  it("attaches the error argument", () => {
    const { memory, logger } = setup();
    logger.error("send failed", new Error("boom"), { chatId: 1 });
    logger.fatal("odd failure", "plain string");
    expect(memory.entries[0]).toMatchObject({ level: "error", error: { name: "Error", message: "boom" }, data: { chatId: 1 } });
    expect(memory.entries[1].error).toEqual({ name: "Unknown", message: "plain string" });
  });

  it("derives children with a component and merged context", () => {
    const { memory, logger } = setup();
    const child = logger.child({ component: "server.scheduler", instanceId: "a" }).child({ reminderId: "rem_1" });
    child.debug("claimed");
    expect(memory.entries[0]).toMatchObject({
      component: "server.scheduler",
      instanceId: "a",
      reminderId: "rem_1",
      message: "claimed",
    });
  });

  it("keeps going when a transport throws", () => {
    const memory = new MemoryTransport();
    const broken: LogTransport = { name: "broken", minLevel: "trace", log: () => { throw new Error("disk full"); } };
    const original = console.error;
    console.error = () => {};
    try {
      new Logger({ minLevel: "trace", component: "server", transports: [broken, memory] }).info("still here");
    } finally {
      console.error = original;
    }
    expect(memory.entries).toHaveLength(1);
  });
});

describe("FileTransport", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("appends JSON lines to the log file", async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "remindly-log-"));
    const transport = new FileTransport({ logDir: dir, filename: "test" });
    const logger = new Logger({ minLevel: "info", component: "server", transports: [transport] });

    logger.info("first", { n: 1 });
    logger.warn("second");
    await logger.close();

    const lines = fs.readFileSync(path.join(dir, "test.log"), "utf-8").trim().split("\n");
    expect(lines.map((line) => JSON.parse(line).message)).toEqual(["first", "second"]);
  });
});
