import { describe, it, expect, afterEach, vi } from "vitest";
import { createComponentLogger, initServerLogging } from "./logging.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createComponentLogger", () => {
  it("follows the root logger across re-initialization", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const log = createComponentLogger("reminders");

    initServerLogging({ minLevel: "info", colors: false, instanceId: "a" });
    log.info("claimed", { count: 2 });
    initServerLogging({ minLevel: "warn", colors: false });
    log.info("hidden");

    expect(out).toHaveBeenCalledTimes(1);
    expect(String(out.mock.calls[0][0])).toMatch(/ INF \[server\.reminders\] claimed \{"count":2\}$/);
  });

  it("keeps the component on children", () => {
    const out = vi.spyOn(console, "warn").mockImplementation(() => {});
    initServerLogging({ minLevel: "info", colors: false });

    createComponentLogger("scheduler").child({ reminderId: "rem_1" }).warn("slow");

    expect(String(out.mock.calls[0][0])).toMatch(/ WRN \[server\.scheduler\] \(rem_1\) slow$/);
  });
});
