import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { PathHelper } from "../PathHelper.js";

test("getInteractionsDir resolves relative to cwd", () => {
  assert.equal(PathHelper.getInteractionsDir("interactions", "/work"), path.resolve("/work", "interactions"));
  assert.equal(PathHelper.getInteractionsDir("/abs/logs", "/work"), path.resolve("/abs/logs"));
});

test("toSafeSegment replaces unsafe characters", () => {
  assert.equal(PathHelper.toSafeSegment("jane.doe@lab/x"), "jane.doe_lab_x");
  assert.equal(PathHelper.toSafeSegment(""), "_");
});

test("ensureDir creates nested directories", async () => {
  const root = mkdtempSync(path.join(os.tmpdir(), "ctxask-paths-"));
  const target = path.join(root, "a", "b");
  try {
    await PathHelper.ensureDir(target);
    assert.ok(existsSync(target));
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});
