import { describe, test, expect } from "vitest";
import { ConsoleLogger, silentLogger } from "../../src/utils/logger.js";
import type { LogLevel } from "../../src/utils/logger.js";

function capture(level: LogLevel) {
  const lines: Array<{ level: LogLevel; entry: unknown }> = [];
  const logger = new ConsoleLogger({
    level,
    write: (entryLevel, line) => lines.push({ level: entryLevel, entry: JSON.parse(line) }),
    now: () => new Date("2026-01-02T03:04:05.000Z"),
  });
  return { logger, lines };
}

describe("ConsoleLogger", () => {
  test("writes one JSON object per entry", () => {
    const { logger, lines } = capture("info");
    logger.info("step started", { step: 2 });
    expect(lines).toEqual([
      {
        level: "info",
        entry: {
          level: "info",
          message: "step started",
          timestamp: "2026-01-02T03:04:05.000Z",
          step: 2,
        },
      },
    ]);
  });

  test("drops entries below the configured level", () => {
    const { logger, lines } = capture("warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown too");
    expect(lines.map((line) => line.level)).toEqual(["warn", "error"]);
  });

  test("child loggers add context to every entry", () => {
    const { logger, lines } = capture("debug");
    logger.child({ component: "tool-loop" }).child({ source: "stub" }).debug("hi");
    expect(lines[0]?.entry).toEqual({
      level: "debug",
      message: "hi",
      timestamp: "2026-01-02T03:04:05.000Z",
      component: "tool-loop",
      source: "stub",
    });
  });

  test("serializes errors by name and message", () => {
    const { logger, lines } = capture("error");
    logger.error("failed", { error: new TypeError("bad input") });
    expect(lines[0]?.entry).toEqual({
      level: "error",
      message: "failed",
      timestamp: "2026-01-02T03:04:05.000Z",
      error: { name: "TypeError", message: "bad input" },
    });
  });
});

describe("silentLogger", () => {
  test("child returns itself", () => {
    expect(silentLogger.child({ a: 1 })).toBe(silentLogger);
  });
});
