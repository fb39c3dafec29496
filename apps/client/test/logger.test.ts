import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LogLevel, Logger, formatLine } from "../src/observability/logger.js";

const AT = new Date("2026-01-02T03:04:05.000Z");

describe("formatLine", () => {
  it("prints timestamp, level and message", () => {
    expect(formatLine(LogLevel.INFO, "Connecting", undefined, AT)).toBe(
      "[2026-01-02T03:04:05.000Z] [INFO] Connecting"
    );
  });

  it("appends meta as JSON", () => {
    expect(formatLine(LogLevel.WARN, "Dropped frame", { reason: "short" }, AT)).toBe(
      '[2026-01-02T03:04:05.000Z] [WARN] Dropped frame {"reason":"short"}'
    );
  });

  it("keeps falsy meta values", () => {
    expect(formatLine(LogLevel.DEBUG, "count", 0, AT)).toBe(
      "[2026-01-02T03:04:05.000Z] [DEBUG] count 0"
    );
  });

  it("summarizes binary meta by size", () => {
    expect(formatLine(LogLevel.DEBUG, "audio", Buffer.alloc(640), AT)).toBe(
      "[2026-01-02T03:04:05.000Z] [DEBUG] audio <640 bytes>"
    );
  });
});

describe("Logger", () => {
  let out: string[];
  let err: string[];

  beforeEach(() => {
    out = [];
    err = [];
    vi.spyOn(console, "log").mockImplementation((line: string) => {
      out.push(line);
    });
    vi.spyOn(console, "warn").mockImplementation((line: string) => {
      err.push(line);
    });
    vi.spyOn(console, "error").mockImplementation((line: string) => {
      err.push(line);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops lines below its threshold", () => {
    const log = new Logger(LogLevel.WARN);

    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");
    log.error("shown too");

    expect(out).toEqual([]);
    expect(err.map((line) => line.replace(/^\[[^\]]+\] /, ""))).toEqual([
      "[WARN] shown",
      "[ERROR] shown too",
    ]);
  });

  it("writes state transitions only at debug level", () => {
    new Logger(LogLevel.INFO).stateTransition("conn-1", "OPEN");
    new Logger(LogLevel.DEBUG).stateTransition("conn-1", "CLOSED");

    expect(out.map((line) => line.replace(/^\[[^\]]+\] /, ""))).toEqual([
      "[DEBUG] [conn-1] State → CLOSED",
    ]);
  });
});
