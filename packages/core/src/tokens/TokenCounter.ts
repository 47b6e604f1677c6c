import { getEncoding, type Tiktoken } from "js-tiktoken";
import { Logger } from "@ctxask/shared";
import type { TokenizerEncoding } from "../models/ModelCatalog.js";

export const DEFAULT_TOKENIZER_MODEL = "gpt-4";

/** Returns undefined when the text cannot be measured for the given model. */
export interface TokenCounter {
  count(text: string, modelHint?: string): number | undefined;
}

const BUILTIN_ENCODINGS: Record<string, TokenizerEncoding> = {
  "gpt-4": "cl100k_base",
  "gpt-4-32k": "cl100k_base",
  "gpt-4-turbo": "cl100k_base",
  "gpt-3.5-turbo": "cl100k_base",
  "gpt-4o": "o200k_base",
  "gpt-4o-mini": "o200k_base",
  o1: "o200k_base",
  "o1-mini": "o200k_base",
  "o3-mini": "o200k_base",
};

export interface TiktokenCounterOptions {
  /** Extra model → encoding entries, typically taken from the model catalog. */
  encodings?: Record<string, TokenizerEncoding>;
  defaultModel?: string;
  logger?: Logger;
}

export class TiktokenCounter implements TokenCounter {
  private encodings: Record<string, TokenizerEncoding>;
  private cache = new Map<TokenizerEncoding, Tiktoken>();
  private defaultModel: string;
  private logger: Logger;

  constructor(options: TiktokenCounterOptions = {}) {
    this.encodings = { ...BUILTIN_ENCODINGS, ...options.encodings };
    this.defaultModel = options.defaultModel ?? DEFAULT_TOKENIZER_MODEL;
    this.logger = (options.logger ?? new Logger()).child("tokens");
  }

  count(text: string, modelHint: string = this.defaultModel): number | undefined {
    const encodingName = this.encodings[modelHint];
    if (!encodingName) {
      this.logger.error(`Error counting tokens: no tokenizer encoding known for model '${modelHint}'`);
      return undefined;
    }
    try {
      return this.encoder(encodingName).encode(text).length;
    } catch (error) {
      this.logger.error(`Error counting tokens: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }

  private encoder(name: TokenizerEncoding): Tiktoken {
    const cached = this.cache.get(name);
    if (cached) return cached;
    const encoding = getEncoding(name);
    this.cache.set(name, encoding);
    return encoding;
  }
}
