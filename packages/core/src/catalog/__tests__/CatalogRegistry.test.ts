import assert from "node:assert/strict";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { createMemoryLogger } from "@ctxask/shared";
import { CatalogRegistry } from "../CatalogRegistry.js";

const withDataDir = async (fn: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "ctxask-catalog-"));
  try {
    await writeFile(path.join(dir, "system-prompts.yaml"), "review: Review it.\n", "utf8");
    await writeFile(path.join(dir, "supported-extensions.json"), JSON.stringify([".TXT", ".md"]), "utf8");
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

test("CatalogRegistry.load reads the bundled catalogs", async () => {
  const registry = await CatalogRegistry.load({ logger: createMemoryLogger().logger });
  assert.ok(registry.systemPrompts.list().includes("code_review"));
  assert.deepEqual(registry.tasks.list(), ["explain_code", "summarize_paper", "write_tests"]);
  assert.ok(registry.supportedExtensions.has(".py"));
  assert.ok(registry.supportedExtensions.has(".ts"));
  assert.equal(registry.models.require("gpt4").maxTokens, 8192);
});

test("CatalogRegistry.load skips task files that fail to parse", async () => {
  await withDataDir(async (dir) => {
    await mkdir(path.join(dir, "tasks"));
    await writeFile(path.join(dir, "tasks", "good.yaml"), "description: Works\nuser_prompt: Hi\n", "utf8");
    await writeFile(path.join(dir, "tasks", "bad.yaml"), "- not\n- a mapping\n", "utf8");
    await writeFile(path.join(dir, "tasks", "notes.txt"), "ignored", "utf8");
    const { logger, lines } = createMemoryLogger();

    const registry = await CatalogRegistry.load({ dataDir: dir, logger });

    assert.deepEqual(registry.tasks.list(), ["good"]);
    assert.equal(registry.tasks.require("good").userPrompt, "Hi");
    const errors = lines.filter((line) => line.level === "error");
    assert.equal(errors.length, 1);
    assert.equal(errors[0]?.message, "Error loading task 'bad': Task 'bad' must be a YAML mapping");
    assert.equal(errors[0]?.scope, "ctxask.catalog");
  });
});

test("CatalogRegistry.load tolerates a missing task directory", async () => {
  await withDataDir(async (dir) => {
    const { logger, lines } = createMemoryLogger();
    const registry = await CatalogRegistry.load({ dataDir: dir, logger });
    assert.deepEqual(registry.tasks.list(), []);
    assert.deepEqual(registry.systemPrompts.list(), ["review"]);
    assert.deepEqual(Array.from(registry.supportedExtensions), [".txt", ".md"]);
    assert.equal(lines.filter((line) => line.level === "warn").length, 1);
  });
});

test("CatalogRegistry can be built directly for tests", () => {
  const registry = new CatalogRegistry({ systemPrompts: { a: "b" }, supportedExtensions: [".PDF"] });
  assert.equal(registry.systemPrompts.require("a"), "b");
  assert.ok(registry.supportedExtensions.has(".pdf"));
  assert.ok(registry.models.list().length > 0);
});
