import type { LogLevel } from "@ctxask/shared";
import { DEFAULT_MODEL } from "../models/ModelCatalog.js";
import { DEFAULT_SAMPLING } from "../request/RequestBuilder.js";
import type { SamplingParameters } from "../request/RequestTypes.js";

export interface RequestConfig {
  timeoutMs: number;
  maxAttempts: number;
  backoffMs: number;
}

export interface RecordingConfig {
  enabled: boolean;
  directory: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface CtxaskConfig {
  endpointUrl?: string;
  user?: string;
  model: string;
  sampling: SamplingParameters;
  contextBudget?: number;
  request: RequestConfig;
  recording: RecordingConfig;
  logging: LoggingConfig;
}

export const DEFAULT_REQUEST: RequestConfig = {
  timeoutMs: 120_000,
  maxAttempts: 3,
  backoffMs: 300,
};

export const DEFAULT_RECORDING: RecordingConfig = {
  enabled: true,
  directory: "interactions",
};

export const DEFAULT_LOGGING: LoggingConfig = {
  level: "info",
};

export const createDefaultConfig = (): CtxaskConfig => ({
  model: DEFAULT_MODEL,
  sampling: { ...DEFAULT_SAMPLING },
  request: { ...DEFAULT_REQUEST },
  recording: { ...DEFAULT_RECORDING },
  logging: { ...DEFAULT_LOGGING },
});
