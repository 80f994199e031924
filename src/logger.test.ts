import { describe, expect, it } from "vitest";
import { createLogger, formatLogLine, type LogLevel } from "./logger.js";

describe("formatLogLine", () => {
  it("prints the level and message", () => {
    expect(formatLogLine("info", "session created")).toBe("INFO session created");
  });

  it("appends metadata as JSON", () => {
    expect(formatLogLine("warn", "slow", { durationMs: 1200 })).toBe(
      'WARN slow {"durationMs":1200}',
    );
  });

  it("serializes errors by name and message", () => {
    expect(formatLogLine("error", "failed", { error: new TypeError("bad input") })).toBe(
      'ERROR failed {"error":{"name":"TypeError","message":"bad input"}}',
    );
  });

  it("omits empty metadata", () => {
    expect(formatLogLine("debug", "tick", {})).toBe("DEBUG tick");
  });
});

describe("createLogger", () => {
  it("drops messages below the threshold", () => {
    const lines: Array<[LogLevel, string]> = [];
    const logger = createLogger({ level: "warn", sink: (level, line) => lines.push([level, line]) });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d", { id: "x" });

    expect(lines).toEqual([
      ["warn", "WARN c"],
      ["error", 'ERROR d {"id":"x"}'],
    ]);
  });
});
