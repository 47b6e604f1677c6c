import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import test from "node:test";
import type { LogLine } from "@ctxask/shared";
import { CtxaskEntrypoint, USAGE, main } from "../bin/CtxaskEntrypoint.js";

const captureLogs = async (fn: () => Promise<void> | void): Promise<string[]> => {
  const logs: string[] = [];
  const originalLog = console.log;
  console.log = (...args: unknown[]) => {
    logs.push(args.map(String).join(" "));
  };
  try {
    await fn();
  } finally {
    console.log = originalLog;
  }
  return logs;
};

const quiet = { logSink: (_line: LogLine) => undefined, env: {} };

test("CtxaskEntrypoint prints version", { concurrency: false }, async () => {
  const raw: unknown = JSON.parse(await readFile(new URL("../../package.json", import.meta.url), "utf8"));
  assert.ok(raw && typeof raw === "object" && "version" in raw);
  const logs = await captureLogs(() => CtxaskEntrypoint.run(["--version"]));
  assert.deepEqual(logs, [String(raw.version)]);
});

test("CtxaskEntrypoint prints usage without arguments", { concurrency: false }, async () => {
  const logs = await captureLogs(() => CtxaskEntrypoint.run([]));
  assert.deepEqual(logs, [USAGE]);
});

test("CtxaskEntrypoint treats a bare prompt as the ask command", { concurrency: false }, async () => {
  const logs = await captureLogs(() => CtxaskEntrypoint.run(["hello world", "-m", "gpt4", "-n"], quiet));
  assert.deepEqual(logs, ["Prompt tokens: 2"]);
  const explicit = await captureLogs(() => CtxaskEntrypoint.run(["ask", "hello world", "-m", "gpt4", "-n"], quiet));
  assert.deepEqual(explicit, ["Prompt tokens: 2"]);
});

test("main reports errors with remediation and sets the exit code", { concurrency: false }, async () => {
  const errors: string[] = [];
  const originalError = console.error;
  const originalExitCode = process.exitCode;
  console.error = (...args: unknown[]) => {
    errors.push(args.map(String).join(" "));
  };
  try {
    await main(["prompts", "poetry"]);
    assert.equal(process.exitCode, 1);
  } finally {
    console.error = originalError;
    process.exitCode = originalExitCode;
  }
  assert.equal(errors.length, 1);
  assert.ok(errors[0]?.startsWith("Unknown system prompt: poetry. Available: code_review, "));
});
