import { describe, expect, it } from "vitest";
import { createLogger, formatLogLine, type LogSink } from "./log.js";

function recordingSink(lines: string[]): LogSink {
  const push = (line: string): void => {
    lines.push(line);
  };
  return { debug: push, info: push, warn: push, error: push };
}

describe("log", () => {
  it("should format lines with timestamp, level and source", () => {
    expect(formatLogLine("warn", "hi", "engine", new Date(0))).toBe("[1970-01-01T00:00:00.000Z] [WARN] [engine] hi");
  });

  it("should drop messages below the threshold", () => {
    const lines: string[] = [];
    const logger = createLogger("info", recordingSink(lines), () => new Date(0));
    logger.debug("hidden", "test");
    logger.info("shown", "test");
    logger.error("also shown", "test");
    expect(lines).toEqual([
      "[1970-01-01T00:00:00.000Z] [INFO] [test] shown",
      "[1970-01-01T00:00:00.000Z] [ERROR] [test] also shown",
    ]);
  });

  it("should stay quiet when silent", () => {
    const lines: string[] = [];
    createLogger("silent", recordingSink(lines)).error("nothing", "test");
    expect(lines).toEqual([]);
  });
});
