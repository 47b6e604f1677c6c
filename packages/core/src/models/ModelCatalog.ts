import { InvalidModelError } from "@ctxask/shared";

export type TokenizerEncoding = "cl100k_base" | "o200k_base";

export interface ModelConfig {
  name: string;
  maxTokens: number;
  supportsStandardParams: boolean;
  encoding?: TokenizerEncoding;
  notes?: string[];
}

export const DEFAULT_MODEL = "gpt4olatest";

export const DEFAULT_MODELS: readonly ModelConfig[] = [
  { name: "gpt35", maxTokens: 4096, supportsStandardParams: true, encoding: "cl100k_base" },
  { name: "gpt35large", maxTokens: 16384, supportsStandardParams: true, encoding: "cl100k_base" },
  { name: "gpt4", maxTokens: 8192, supportsStandardParams: true, encoding: "cl100k_base" },
  { name: "gpt4large", maxTokens: 32768, supportsStandardParams: true, encoding: "cl100k_base" },
  {
    name: "gpt4turbo",
    maxTokens: 4096,
    supportsStandardParams: true,
    encoding: "cl100k_base",
    notes: ["This model responds much slower than GPT-3.5"],
  },
  { name: "gpt4o", maxTokens: 16384, supportsStandardParams: true, encoding: "o200k_base" },
  { name: "gpt4olatest", maxTokens: 16384, supportsStandardParams: true, encoding: "o200k_base" },
  {
    name: "gpto1preview",
    maxTokens: 16384,
    supportsStandardParams: false,
    encoding: "o200k_base",
    notes: ["Only uses 'user prompt' and 'max_completion_tokens' fields"],
  },
  {
    name: "gpto1mini",
    maxTokens: 65536,
    supportsStandardParams: false,
    encoding: "o200k_base",
    notes: ["Only available in dev environment"],
  },
  {
    name: "gpto3mini",
    maxTokens: 100000,
    supportsStandardParams: false,
    encoding: "o200k_base",
    notes: ["Only available in dev environment"],
  },
  { name: "gpto1", maxTokens: 200000, supportsStandardParams: false, encoding: "o200k_base" },
];

/** Read-only lookup over model capabilities, keyed by model name. */
export class ModelCatalog {
  private models: Map<string, ModelConfig>;

  constructor(models: readonly ModelConfig[] = DEFAULT_MODELS) {
    this.models = new Map(models.map((model) => [model.name, Object.freeze({ ...model })]));
  }

  lookup(name: string): ModelConfig | undefined {
    return this.models.get(name);
  }

  require(name: string): ModelConfig {
    const model = this.models.get(name);
    if (!model) {
      throw new InvalidModelError(name, this.list());
    }
    return model;
  }

  list(): string[] {
    return Array.from(this.models.keys());
  }

  /** Model name → tokenizer encoding, for models that declare one. */
  encodings(): Record<string, TokenizerEncoding> {
    const encodings: Record<string, TokenizerEncoding> = {};
    for (const model of this.models.values()) {
      if (model.encoding) encodings[model.name] = model.encoding;
    }
    return encodings;
  }

  describe(): string {
    const sections = Array.from(this.models.values()).map((model) => {
      const lines = [
        model.name,
        "=".repeat(model.name.length),
        `  • Max tokens: ${model.maxTokens}`,
        `  • Supports standard parameters (temperature, top_p): ${model.supportsStandardParams}`,
        ...(model.notes ?? []).map((note) => `  • Note: ${note}`),
      ];
      return lines.join("\n");
    });
    return `Available models and their specifications:\n\n${sections.join("\n\n")}\n`;
  }
}
