import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { ConfigError } from "@ctxask/shared";
import { createDefaultConfig } from "../Config.js";
import { loadConfig, loadEnvConfig } from "../ConfigLoader.js";

const withTempDir = async (fn: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "ctxask-config-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

test("loadConfig returns the defaults when nothing is configured", async () => {
  await withTempDir(async (dir) => {
    const config = await loadConfig({ cwd: dir, env: {} });
    const defaults = createDefaultConfig();
    assert.equal(config.model, "gpt4olatest");
    assert.deepEqual(config.recording, defaults.recording);
    assert.deepEqual(config.logging, { level: "info" });
    assert.deepEqual(config.sampling, { temperature: 0.7, topP: 0.9, maxTokens: 4096 });
    assert.deepEqual(config.request, { timeoutMs: 120000, maxAttempts: 3, backoffMs: 300 });
    assert.equal(config.endpointUrl, undefined);
  });
});

test("loadConfig layers file, environment and cli values", async () => {
  await withTempDir(async (dir) => {
    await writeFile(
      path.join(dir, "ctxask.config.json"),
      JSON.stringify({
        endpointUrl: "https://file.example.test",
        user: "file-user",
        model: "gpt4",
        sampling: { temperature: 0.1, topP: 0.5 },
        recording: { directory: "logs" },
      }),
      "utf8",
    );
    const config = await loadConfig({
      cwd: dir,
      env: { CTXASK_USER: "env-user", CTXASK_TEMPERATURE: "0.3", CTXASK_RECORD: "no" },
      cli: { sampling: { temperature: 1.1 }, model: undefined },
    });

    assert.equal(config.endpointUrl, "https://file.example.test");
    assert.equal(config.user, "env-user");
    assert.equal(config.model, "gpt4");
    assert.deepEqual(config.sampling, { temperature: 1.1, topP: 0.5, maxTokens: 4096 });
    assert.deepEqual(config.recording, { enabled: false, directory: "logs" });
  });
});

test("loadConfig applies caller defaults beneath file and environment values", async () => {
  await withTempDir(async (dir) => {
    const defaults = { sampling: { maxTokens: 100000 }, model: "gpt4" };
    const plain = await loadConfig({ cwd: dir, env: {}, defaults });
    assert.equal(plain.sampling.maxTokens, 100000);
    assert.equal(plain.model, "gpt4");

    const overridden = await loadConfig({ cwd: dir, env: { CTXASK_MAX_TOKENS: "2048" }, defaults });
    assert.equal(overridden.sampling.maxTokens, 2048);
  });
});

test("loadConfig falls back to .ctxaskrc", async () => {
  await withTempDir(async (dir) => {
    await writeFile(path.join(dir, ".ctxaskrc"), JSON.stringify({ logging: { level: "debug" } }), "utf8");
    const config = await loadConfig({ cwd: dir, env: {} });
    assert.equal(config.logging.level, "debug");
  });
});

test("loadConfig rejects malformed files and values", async () => {
  await withTempDir(async (dir) => {
    const file = path.join(dir, "ctxask.config.json");
    await writeFile(file, "{ not json", "utf8");
    await assert.rejects(() => loadConfig({ cwd: dir, env: {} }), ConfigError);

    await writeFile(file, JSON.stringify({ sampling: { temperature: "hot" } }), "utf8");
    await assert.rejects(
      () => loadConfig({ cwd: dir, env: {} }),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message === "Invalid ctxask.config.json.sampling.temperature: expected number.",
    );

    await writeFile(file, JSON.stringify({ request: { maxAttempts: 0, timeoutMs: -1 } }), "utf8");
    await assert.rejects(
      () => loadConfig({ cwd: dir, env: {} }),
      (error: unknown) =>
        error instanceof ConfigError && error.message === "Invalid config values: request.maxAttempts, request.timeoutMs",
    );
  });
});

test("loadEnvConfig names the variable that fails to parse", () => {
  assert.throws(
    () => loadEnvConfig({ CTXASK_MAX_TOKENS: "lots" }),
    (error: unknown) =>
      error instanceof ConfigError && error.message === "Invalid CTXASK_MAX_TOKENS: expected number.",
  );
  assert.throws(() => loadEnvConfig({ CTXASK_RECORD: "maybe" }), /Invalid CTXASK_RECORD: expected boolean\./);
  assert.throws(() => loadEnvConfig({ CTXASK_LOG_LEVEL: "loud" }), /Invalid CTXASK_LOG_LEVEL: loud/);
});

test("loadEnvConfig ignores blank values", () => {
  const source = loadEnvConfig({ CTXASK_URL: "  ", CTXASK_TIMEOUT_MS: "" });
  assert.equal(source.endpointUrl, undefined);
  assert.equal(source.request?.timeoutMs, undefined);
});
