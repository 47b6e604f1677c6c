import { InvalidParameterError } from "@ctxask/shared";
import type { ModelConfig } from "../models/ModelCatalog.js";
import type { PromptRequest, SamplingParameters } from "./RequestTypes.js";
import { isStandardRequest } from "./RequestTypes.js";

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful AI assistant.";
export const DEFAULT_SAMPLING: SamplingParameters = {
  temperature: 0.7,
  topP: 0.9,
  maxTokens: 4096,
};

export const resolveSampling = (
  base: SamplingParameters,
  override: Partial<SamplingParameters> = {},
): SamplingParameters => ({
  temperature: override.temperature ?? base.temperature,
  topP: override.topP ?? base.topP,
  maxTokens: override.maxTokens ?? base.maxTokens,
});

export const validateParameters = ({ temperature, topP, maxTokens }: SamplingParameters): void => {
  if (!(temperature >= 0 && temperature <= 2)) {
    throw new InvalidParameterError("temperature", temperature, "must be between 0 and 2");
  }
  if (!(topP >= 0 && topP <= 1)) {
    throw new InvalidParameterError("top_p", topP, "must be between 0 and 1");
  }
  if (!(maxTokens > 0)) {
    throw new InvalidParameterError("max_tokens", maxTokens, "must be positive");
  }
};

/** Re-checks an already built payload; the variant decides which fields exist. */
export const validateRequest = (request: PromptRequest): void => {
  if (isStandardRequest(request)) {
    validateParameters({
      temperature: request.temperature,
      topP: request.top_p,
      maxTokens: request.max_tokens,
    });
    return;
  }
  if (!(request.max_completion_tokens > 0)) {
    throw new InvalidParameterError("max_completion_tokens", request.max_completion_tokens, "must be positive");
  }
};

export interface BuildRequestInput {
  user: string;
  model: ModelConfig;
  prompt: string;
  system?: string;
  sampling?: Partial<SamplingParameters>;
}

export const buildPromptRequest = (input: BuildRequestInput): PromptRequest => {
  const sampling = resolveSampling(DEFAULT_SAMPLING, input.sampling);
  validateParameters(sampling);
  const prompt: [string] = [input.prompt];
  const base = {
    user: input.user,
    model: input.model.name,
    system: input.system ?? DEFAULT_SYSTEM_PROMPT,
    prompt,
    stop: [],
  };
  const cappedTokens = Math.min(sampling.maxTokens, input.model.maxTokens);
  if (input.model.supportsStandardParams) {
    return {
      ...base,
      temperature: sampling.temperature,
      top_p: sampling.topP,
      max_tokens: cappedTokens,
    };
  }
  return { ...base, max_completion_tokens: cappedTokens };
};
