import test from "node:test";
import assert from "node:assert/strict";
import { Logger, createMemoryLogger, formatLogLine, formatTimestamp, isLogLevel } from "../Logger.js";

const fixedNow = (): Date => new Date(2024, 0, 5, 9, 3, 7);

test("formatTimestamp pads date and time fields", () => {
  assert.equal(formatTimestamp(fixedNow()), "2024-01-05 09:03:07");
});

test("formatLogLine renders timestamp, scope, and level", () => {
  const line = formatLogLine({
    level: "warn",
    scope: "ctxask.resolver",
    message: "Path 'missing.txt' does not exist",
    timestamp: fixedNow(),
  });
  assert.equal(line, "2024-01-05 09:03:07 - ctxask.resolver - WARN - Path 'missing.txt' does not exist");
});

test("Logger drops lines below the configured level", () => {
  const formatted: string[] = [];
  const logger = new Logger({
    level: "info",
    now: fixedNow,
    sink: (_line, text) => formatted.push(text),
  });
  logger.debug("hidden");
  logger.info("shown");
  assert.deepEqual(formatted, ["2024-01-05 09:03:07 - ctxask - INFO - shown"]);
});

test("child loggers share the root level", () => {
  const { logger, lines } = createMemoryLogger("warn");
  const child = logger.child("aggregator");
  child.info("before");
  logger.setLevel("debug");
  child.debug("after");
  assert.equal(lines.length, 1);
  assert.equal(lines[0]?.scope, "ctxask.aggregator");
  assert.equal(lines[0]?.message, "after");
});

test("isLogLevel accepts known levels only", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("trace"), false);
});
