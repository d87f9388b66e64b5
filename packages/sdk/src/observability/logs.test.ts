import { describe, it, expect, afterEach, vi } from "vitest";
import { Logger, levelFromEnv } from "./logs.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should format entries on one line", () => {
    const line = new Logger().format({
      timestamp: "2024-01-01T00:00:00.000Z",
      level: "warn",
      event: "table.recovered",
      table: "users",
      message: "truncated incomplete entry",
      details: { offset: 10, droppedBytes: 3 },
    });
    expect(line).toBe(
      '[2024-01-01T00:00:00.000Z] [WARN] [table.recovered] users truncated incomplete entry {"offset":10,"droppedBytes":3}'
    );
  });

  it("should omit absent fields", () => {
    const line = new Logger().format({ timestamp: "T", level: "debug", event: "bucket.closed" });
    expect(line).toBe("[T] [DEBUG] [bucket.closed]");
  });

  it("should drop entries below the minimum level", () => {
    const info = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new Logger("warn");

    logger.info("bucket.opened");
    logger.warn("table.recovered", { table: "t" });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/\[WARN\] \[table\.recovered\] t$/);
  });

  it("should route levels to matching console methods", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("debug");

    logger.debug("a");
    logger.error("b");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("should be silenced by setEnabled(false)", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger();
    logger.setEnabled(false);
    logger.error("table.compact_failed");
    expect(error).not.toHaveBeenCalled();
  });

  it("should change level at runtime", () => {
    const logger = new Logger();
    expect(logger.level).toBe("info");
    logger.setLevel("error");
    expect(logger.level).toBe("error");
  });
});

describe("levelFromEnv", () => {
  it("should default to info", () => {
    expect(levelFromEnv({})).toBe("info");
  });

  it("should read BUCKETDB_LOG_LEVEL case-insensitively", () => {
    expect(levelFromEnv({ BUCKETDB_LOG_LEVEL: "ERROR" })).toBe("error");
  });

  it("should ignore unknown levels", () => {
    expect(levelFromEnv({ BUCKETDB_LOG_LEVEL: "loud" })).toBe("info");
  });

  it("should force debug when BUCKETDB_DEBUG is set", () => {
    expect(levelFromEnv({ BUCKETDB_DEBUG: "1", BUCKETDB_LOG_LEVEL: "error" })).toBe("debug");
  });
});
