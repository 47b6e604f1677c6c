import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { ConfigError, isLogLevel } from "@ctxask/shared";
import type { SamplingParameters } from "../request/RequestTypes.js";
import {
  createDefaultConfig,
  type CtxaskConfig,
  type LoggingConfig,
  type RecordingConfig,
  type RequestConfig,
} from "./Config.js";

export interface ConfigSource {
  endpointUrl?: string;
  user?: string;
  model?: string;
  sampling?: Partial<SamplingParameters>;
  contextBudget?: number;
  request?: Partial<RequestConfig>;
  recording?: Partial<RecordingConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Caller-specific defaults, overridden by the config file, env and CLI values. */
  defaults?: ConfigSource;
  cli?: ConfigSource;
  configPath?: string;
}

export const CONFIG_FILE_CANDIDATES = ["ctxask.config.json", ".ctxaskrc"];

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Invalid ${label}: expected number.`, { variable: label, value });
  }
  return parsed;
};

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (value === undefined || value.trim() === "") return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`Invalid ${label}: expected boolean.`, { variable: label, value });
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

const readNumberField = (record: Record<string, unknown>, key: string, label: string): number | undefined => {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`Invalid ${label}.${key}: expected number.`);
  }
  return value;
};

const readStringField = (record: Record<string, unknown>, key: string, label: string): string | undefined => {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`Invalid ${label}.${key}: expected string.`);
  }
  return value;
};

const readBooleanField = (record: Record<string, unknown>, key: string, label: string): boolean | undefined => {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid ${label}.${key}: expected boolean.`);
  }
  return value;
};

const readSection = (record: Record<string, unknown>, key: string, label: string): Record<string, unknown> => {
  const value = record[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid ${label}.${key}: expected object.`);
  }
  return value;
};

const normalizeFileConfig = (raw: unknown, label: string): ConfigSource => {
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid ${label}: expected a JSON object.`);
  }
  const sampling = readSection(raw, "sampling", label);
  const request = readSection(raw, "request", label);
  const recording = readSection(raw, "recording", label);
  const logging = readSection(raw, "logging", label);
  const level = readStringField(logging, "level", `${label}.logging`);
  if (level !== undefined && !isLogLevel(level)) {
    throw new ConfigError(`Invalid ${label}.logging.level: ${level}`);
  }
  return {
    endpointUrl: readStringField(raw, "endpointUrl", label),
    user: readStringField(raw, "user", label),
    model: readStringField(raw, "model", label),
    contextBudget: readNumberField(raw, "contextBudget", label),
    sampling: {
      temperature: readNumberField(sampling, "temperature", `${label}.sampling`),
      topP: readNumberField(sampling, "topP", `${label}.sampling`),
      maxTokens: readNumberField(sampling, "maxTokens", `${label}.sampling`),
    },
    request: {
      timeoutMs: readNumberField(request, "timeoutMs", `${label}.request`),
      maxAttempts: readNumberField(request, "maxAttempts", `${label}.request`),
      backoffMs: readNumberField(request, "backoffMs", `${label}.request`),
    },
    recording: {
      enabled: readBooleanField(recording, "enabled", `${label}.recording`),
      directory: readStringField(recording, "directory", `${label}.recording`),
    },
    logging: level !== undefined ? { level } : {},
  };
};

const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_FILE_CANDIDATES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const readConfigFile = async (configPath?: string): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  if (!existsSync(configPath)) return undefined;
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return normalizeFileConfig(parsed, path.basename(configPath));
};

export const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const level = nonEmpty(env.CTXASK_LOG_LEVEL)?.toLowerCase();
  if (level !== undefined && !isLogLevel(level)) {
    throw new ConfigError(`Invalid CTXASK_LOG_LEVEL: ${level}`);
  }
  return {
    endpointUrl: nonEmpty(env.CTXASK_URL),
    user: nonEmpty(env.CTXASK_USER),
    model: nonEmpty(env.CTXASK_MODEL),
    contextBudget: parseNumberStrict(env.CTXASK_CONTEXT_BUDGET, "CTXASK_CONTEXT_BUDGET"),
    sampling: {
      temperature: parseNumberStrict(env.CTXASK_TEMPERATURE, "CTXASK_TEMPERATURE"),
      topP: parseNumberStrict(env.CTXASK_TOP_P, "CTXASK_TOP_P"),
      maxTokens: parseNumberStrict(env.CTXASK_MAX_TOKENS, "CTXASK_MAX_TOKENS"),
    },
    request: {
      timeoutMs: parseNumberStrict(env.CTXASK_TIMEOUT_MS, "CTXASK_TIMEOUT_MS"),
      maxAttempts: parseNumberStrict(env.CTXASK_MAX_ATTEMPTS, "CTXASK_MAX_ATTEMPTS"),
      backoffMs: parseNumberStrict(env.CTXASK_BACKOFF_MS, "CTXASK_BACKOFF_MS"),
    },
    recording: {
      enabled: parseBooleanStrict(env.CTXASK_RECORD, "CTXASK_RECORD"),
      directory: nonEmpty(env.CTXASK_INTERACTIONS_DIR),
    },
    logging: level !== undefined ? { level } : {},
  };
};

const pickDefined = <T>(...values: Array<T | undefined>): T | undefined => {
  for (let index = values.length - 1; index >= 0; index -= 1) {
    const value = values[index];
    if (value !== undefined) return value;
  }
  return undefined;
};

const mergeConfigs = (defaults: CtxaskConfig, ...sources: Array<ConfigSource | undefined>): CtxaskConfig => {
  const present = sources.filter((source): source is ConfigSource => source !== undefined);
  const pick = <T>(read: (source: ConfigSource) => T | undefined, fallback: T): T =>
    pickDefined(...present.map(read)) ?? fallback;
  return {
    endpointUrl: pick((source) => source.endpointUrl, defaults.endpointUrl),
    user: pick((source) => source.user, defaults.user),
    model: pick((source) => source.model, defaults.model),
    contextBudget: pick((source) => source.contextBudget, defaults.contextBudget),
    sampling: {
      temperature: pick((source) => source.sampling?.temperature, defaults.sampling.temperature),
      topP: pick((source) => source.sampling?.topP, defaults.sampling.topP),
      maxTokens: pick((source) => source.sampling?.maxTokens, defaults.sampling.maxTokens),
    },
    request: {
      timeoutMs: pick((source) => source.request?.timeoutMs, defaults.request.timeoutMs),
      maxAttempts: pick((source) => source.request?.maxAttempts, defaults.request.maxAttempts),
      backoffMs: pick((source) => source.request?.backoffMs, defaults.request.backoffMs),
    },
    recording: {
      enabled: pick((source) => source.recording?.enabled, defaults.recording.enabled),
      directory: pick((source) => source.recording?.directory, defaults.recording.directory),
    },
    logging: {
      level: pick((source) => source.logging?.level, defaults.logging.level),
    },
  };
};

const assertValid = (config: CtxaskConfig): void => {
  const errors: string[] = [];
  if (!config.model) errors.push("model");
  if (!Number.isInteger(config.request.maxAttempts) || config.request.maxAttempts < 1) {
    errors.push("request.maxAttempts");
  }
  if (!(config.request.timeoutMs > 0)) errors.push("request.timeoutMs");
  if (!(config.request.backoffMs >= 0)) errors.push("request.backoffMs");
  if (config.contextBudget !== undefined && !(config.contextBudget > 0)) errors.push("contextBudget");
  if (!config.recording.directory) errors.push("recording.directory");
  if (errors.length) {
    throw new ConfigError(`Invalid config values: ${errors.join(", ")}`, { fields: errors });
  }
};

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<CtxaskConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? findConfigFile(cwd);
  const fileConfig = await readConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  const merged = mergeConfigs(createDefaultConfig(), options.defaults, fileConfig, envConfig, options.cli);
  assertValid(merged);
  return merged;
};
