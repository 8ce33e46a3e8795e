import { afterEach, describe, expect, it, vi } from "vitest";

// Mock config before importing logger
vi.mock("../config", () => ({
  getConfig: () => ({
    logging: {
      level: "debug",
    },
    server: {
      nodeEnv: "test",
    },
  }),
}));

import { createLogger, logger } from "./logger";

const createWriter = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

const parseLine = (line: unknown): unknown => JSON.parse(String(line));

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should log info messages", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    logger.info("test message");
    expect(consoleSpy).toHaveBeenCalled();
  });

  it("should log error messages", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.error("test error", new Error("test"));
    expect(consoleSpy).toHaveBeenCalled();
  });

  it("should include context in logs", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    logger.info("test message", { foo: "bar" });
    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('"foo":"bar"'));
  });
});

describe("createLogger", () => {
  it("should skip entries below the configured level", () => {
    const writer = createWriter();
    const log = createLogger({ level: "warn", writer, format: "json" });

    log.debug("debug message");
    log.info("info message");
    log.warn("warn message");

    expect(writer.log).not.toHaveBeenCalled();
    expect(writer.warn).toHaveBeenCalledTimes(1);
  });

  it("should write JSON entries with context and error details", () => {
    const writer = createWriter();
    const log = createLogger({ level: "debug", writer, format: "json" });
    const error = new Error("upstream unavailable");

    log.error("Call failed", error, { attempts: 3 });

    expect(parseLine(writer.error.mock.calls[0]?.[0])).toMatchObject({
      level: "error",
      message: "Call failed",
      context: { attempts: 3 },
      error: { name: "Error", message: "upstream unavailable" },
    });
  });

  it("should omit an empty context", () => {
    const writer = createWriter();
    const log = createLogger({ level: "debug", writer, format: "json" });

    log.info("ready");

    expect(parseLine(writer.log.mock.calls[0]?.[0])).not.toHaveProperty("context");
  });

  it("should merge child bindings into every entry", () => {
    const writer = createWriter();
    const log = createLogger({ level: "debug", writer, format: "json" }).child({
      component: "resilience",
    });

    log.info("Circuit breaker closed", { breaker: "chat" });

    expect(parseLine(writer.log.mock.calls[0]?.[0])).toMatchObject({
      context: { component: "resilience", breaker: "chat" },
    });
  });

  it("should format pretty lines", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-01T12:00:00.000Z"));
    const writer = createWriter();
    const log = createLogger({ level: "debug", writer, format: "pretty" });

    log.warn("Rate limit exceeded", { waitTimeMs: 100 });
    log.error("Call failed", new TypeError("bad input"));

    expect(writer.warn).toHaveBeenCalledWith(
      '2026-03-01T12:00:00.000Z [WARN] Rate limit exceeded {"waitTimeMs":100}',
    );
    expect(writer.error).toHaveBeenCalledWith(
      "2026-03-01T12:00:00.000Z [ERROR] Call failed (TypeError: bad input)",
    );
    vi.useRealTimers();
  });
});
