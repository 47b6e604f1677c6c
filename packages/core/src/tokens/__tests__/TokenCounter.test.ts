import assert from "node:assert/strict";
import test from "node:test";
import { createMemoryLogger } from "@ctxask/shared";
import { TiktokenCounter } from "../TokenCounter.js";

test("TiktokenCounter counts with the default gpt-4 encoding", () => {
  const counter = new TiktokenCounter({ logger: createMemoryLogger().logger });
  assert.equal(counter.count("hello world"), 2);
  assert.equal(counter.count(""), 0);
});

test("TiktokenCounter maps catalog model names to encodings", () => {
  const counter = new TiktokenCounter({
    encodings: { gpt4: "cl100k_base" },
    logger: createMemoryLogger().logger,
  });
  assert.equal(counter.count("hello world", "gpt4"), counter.count("hello world", "gpt-4"));
});

test("TiktokenCounter returns undefined for unknown models and logs", () => {
  const { logger, lines } = createMemoryLogger();
  const counter = new TiktokenCounter({ logger });
  assert.equal(counter.count("hello", "mystery-model"), undefined);
  assert.equal(lines.length, 1);
  assert.equal(lines[0]?.level, "error");
  assert.equal(
    lines[0]?.message,
    "Error counting tokens: no tokenizer encoding known for model 'mystery-model'",
  );
});

test("TiktokenCounter reports special-token text as unknown", () => {
  const { logger, lines } = createMemoryLogger();
  const counter = new TiktokenCounter({ logger });
  assert.equal(counter.count("before <|endoftext|> after"), undefined);
  assert.ok(lines[0]?.message.startsWith("Error counting tokens: "));
});
