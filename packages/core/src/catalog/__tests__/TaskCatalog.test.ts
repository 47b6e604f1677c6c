import assert from "node:assert/strict";
import test from "node:test";
import { UnknownCatalogEntryError } from "@ctxask/shared";
import { TaskCatalog, parseTask } from "../TaskCatalog.js";

const TASK_YAML = `name: Explain
description: Explain code
goal: Understanding
system_prompt: |
  You explain code.
user_prompt: |
  Explain this:

  {context}
`;

test("parseTask maps snake_case fields and trims them", () => {
  assert.deepEqual(parseTask("explain", TASK_YAML), {
    name: "Explain",
    description: "Explain code",
    goal: "Understanding",
    systemPrompt: "You explain code.",
    userPrompt: "Explain this:\n\n{context}",
  });
});

test("parseTask falls back to the file key for the name and to empty fields", () => {
  const task = parseTask("summarize", "description: Summaries\n");
  assert.equal(task.name, "summarize");
  assert.equal(task.systemPrompt, "");
  assert.equal(task.userPrompt, "");
});

test("parseTask rejects documents that are not mappings", () => {
  assert.throws(() => parseTask("broken", "- a\n- b\n"), /Task 'broken' must be a YAML mapping/);
  assert.throws(() => parseTask("broken", "name: [1, 2]\n"), /Task field 'name' must be a string/);
});

test("TaskCatalog lists and formats tasks by key", () => {
  const catalog = new TaskCatalog({
    zeta: parseTask("zeta", "description: Last\n"),
    alpha: parseTask("alpha", "description: First\n"),
  });
  assert.deepEqual(catalog.list(), ["alpha", "zeta"]);
  assert.equal(catalog.formatList(), "- alpha: First\n- zeta: Last");
  assert.throws(
    () => catalog.require("beta"),
    (error: unknown) =>
      error instanceof UnknownCatalogEntryError && error.message === "Unknown task: beta. Available: alpha, zeta",
  );
});
