import { expect, test } from "vitest";
import { createLogger, parseLogLevel, type LogLevel } from "../src/logging/logger";

function collect(level: LogLevel) {
  const entries: Array<[LogLevel, string]> = [];
  const logger = createLogger("reflow", { level, write: (entryLevel, line) => entries.push([entryLevel, line]) });
  return { logger, entries };
}

test("entries below the level are dropped", () => {
  const { logger, entries } = collect("info");
  logger.debug("hidden");
  logger.info("shown", { lines: 2 });
  logger.error("failed");
  expect(entries).toEqual([
    ["info", '[reflow] INFO shown {"lines":2}'],
    ["error", "[reflow] ERROR failed"],
  ]);
});

test("children extend the scope and share warn-once keys", () => {
  const { logger, entries } = collect("trace");
  const child = logger.child("fonts");
  child.warnOnce("font-load:/a.ttf", "font load failed");
  logger.warnOnce("font-load:/a.ttf", "font load failed");
  child.trace("tick");
  expect(entries).toEqual([
    ["warn", "[reflow:fonts] WARN font load failed"],
    ["trace", "[reflow:fonts] TRACE tick"],
  ]);
});

test("log levels parse case-insensitively", () => {
  expect(parseLogLevel(" DEBUG ")).toBe("debug");
  expect(parseLogLevel("verbose")).toBeNull();
  expect(parseLogLevel(undefined)).toBeNull();
});
