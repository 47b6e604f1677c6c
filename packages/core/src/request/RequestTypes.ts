interface PromptRequestBase {
  user: string;
  model: string;
  system: string;
  prompt: [string];
  stop: string[];
}

export interface StandardPromptRequest extends PromptRequestBase {
  temperature: number;
  top_p: number;
  max_tokens: number;
}

export interface CompletionPromptRequest extends PromptRequestBase {
  max_completion_tokens: number;
}

/** Wire body; which variant is sent depends on the model's standard-parameter support. */
export type PromptRequest = StandardPromptRequest | CompletionPromptRequest;

export interface SamplingParameters {
  temperature: number;
  topP: number;
  maxTokens: number;
}

export interface DispatchResult {
  response: string;
  elapsedSeconds: number;
  attempts: number;
}

export const isStandardRequest = (request: PromptRequest): request is StandardPromptRequest =>
  "temperature" in request;
