import assert from "node:assert/strict";
import test from "node:test";
import { ConfigError } from "@ctxask/shared";
import { parseArgs, readInteger, readList, readNumber, readString } from "../args/parseArgs.js";

const spec = {
  aliases: { c: "context", t: "temperature", v: "verbose" },
  booleans: ["verbose", "json"],
  lists: ["context"],
};

test("parseArgs resolves aliases, inline values and positionals", () => {
  const parsed = parseArgs(["explain", "this", "-t", "0.5", "--model=gpt4", "-v"], spec);
  assert.deepEqual(parsed, {
    flags: { temperature: "0.5", model: "gpt4", verbose: true },
    positionals: ["explain", "this"],
  });
});

test("parseArgs collects list values until the next flag and across repeats", () => {
  const parsed = parseArgs(["-c", "src", "docs/*.md", "--json", "-c", "README.md", "question"], spec);
  assert.deepEqual(readList(parsed.flags, "context"), ["src", "docs/*.md", "README.md", "question"]);
  assert.equal(parsed.flags.json, true);
  assert.deepEqual(parsed.positionals, []);
});

test("parseArgs treats negative numbers as values and -- as the end of flags", () => {
  const parsed = parseArgs(["-t", "-1", "--", "--not-a-flag"], spec);
  assert.equal(parsed.flags.temperature, "-1");
  assert.deepEqual(parsed.positionals, ["--not-a-flag"]);
});

test("parseArgs reads boolean flags with explicit values", () => {
  assert.equal(parseArgs(["--json=false"], spec).flags.json, false);
  assert.equal(parseArgs(["--json=yes"], spec).flags.json, true);
});

test("readString and readNumber report missing or malformed values", () => {
  const { flags } = parseArgs(["--model", "--temperature", "warm"], spec);
  assert.throws(() => readString(flags, "model", "ask"), /ask: missing value for --model/);
  assert.throws(() => readNumber(flags, "temperature", "ask"), /ask: --temperature expects a number, got warm/);
  assert.equal(readNumber(flags, "budget", "ask"), undefined);
});

test("flag readers raise ConfigError for bad input", () => {
  const { flags } = parseArgs(["--model", "--temperature", "warm", "--max-tokens", "1.5", "--budget", "200"], spec);
  assert.throws(() => readString(flags, "model", "ask"), ConfigError);
  assert.throws(() => readNumber(flags, "temperature", "ask"), ConfigError);
  assert.throws(
    () => readInteger(flags, "max-tokens", "ask"),
    (error: unknown) =>
      error instanceof ConfigError && error.message === "ask: --max-tokens expects an integer, got 1.5",
  );
  assert.equal(readInteger(flags, "budget", "ask"), 200);
});
