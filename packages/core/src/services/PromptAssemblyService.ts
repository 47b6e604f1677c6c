import { ConfigError, Logger } from "@ctxask/shared";
import type { CatalogRegistry } from "../catalog/CatalogRegistry.js";
import { ContextAggregator, serializeContext } from "../context/ContextAggregator.js";
import { PathResolver } from "../context/PathResolver.js";
import type { PipelineWarning } from "../context/Types.js";
import { TextExtractor } from "../extract/TextExtractor.js";
import { applyTask, composePrompt } from "../prompts/PromptComposer.js";
import type { TokenCounter } from "../tokens/TokenCounter.js";

export interface AssemblyRequest {
  prompt?: string;
  promptFile?: string;
  contextPaths?: string[];
  systemPromptName?: string;
  taskName?: string;
  contextBudget?: number;
}

export interface AssembledPrompt {
  prompt: string;
  userPrompt: string;
  instructionName?: string;
  contextFiles: string[];
  contextTokens: number;
  promptTokens?: number;
  warnings: PipelineWarning[];
}

export interface PromptAssemblyServiceDeps {
  registry: CatalogRegistry;
  counter: TokenCounter;
  /** Tokenizer model used for the budget and the final count. */
  model: string;
  extractor?: TextExtractor;
  resolver?: PathResolver;
  logger?: Logger;
}

export class PromptAssemblyService {
  private registry: CatalogRegistry;
  private counter: TokenCounter;
  private model: string;
  private extractor: TextExtractor;
  private aggregator: ContextAggregator;
  private logger: Logger;

  constructor(deps: PromptAssemblyServiceDeps) {
    this.registry = deps.registry;
    this.counter = deps.counter;
    this.model = deps.model;
    this.logger = (deps.logger ?? new Logger()).child("assembly");
    this.extractor = deps.extractor ?? new TextExtractor({ logger: deps.logger });
    const resolver =
      deps.resolver ??
      new PathResolver({ supportedExtensions: deps.registry.supportedExtensions, logger: deps.logger });
    this.aggregator = new ContextAggregator({
      resolver,
      extractor: this.extractor,
      counter: this.counter,
      modelHint: this.model,
      logger: deps.logger,
    });
  }

  async assemble(request: AssemblyRequest): Promise<AssembledPrompt> {
    if (request.systemPromptName && request.taskName) {
      throw new ConfigError("Choose either a system prompt or a task, not both.");
    }
    if (request.prompt !== undefined && request.promptFile) {
      throw new ConfigError("Provide the prompt inline or through a prompt file, not both.");
    }

    let userPrompt = request.prompt;
    if (request.promptFile) {
      const extracted = await this.extractor.extract(request.promptFile);
      if (!extracted.ok) {
        throw new ConfigError(`Cannot read prompt file: ${extracted.reason}`);
      }
      userPrompt = extracted.text;
    }

    let instruction: string | undefined;
    let instructionName: string | undefined;
    if (request.taskName) {
      const selection = applyTask(this.registry.tasks.require(request.taskName), userPrompt);
      instruction = selection.instruction;
      userPrompt = selection.userPrompt;
      instructionName = request.taskName;
    } else if (request.systemPromptName) {
      instruction = this.registry.systemPrompts.require(request.systemPromptName);
      instructionName = request.systemPromptName;
    }

    if (userPrompt === undefined || !userPrompt.trim()) {
      throw new ConfigError("A prompt is required (inline, --prompt-file, or a task with a default prompt).");
    }

    let context: string | undefined;
    let contextFiles: string[] = [];
    let contextTokens = 0;
    const warnings: PipelineWarning[] = [];
    if (request.contextPaths?.length) {
      const result = await this.aggregator.aggregate(request.contextPaths, request.contextBudget);
      context = serializeContext(result.entries);
      contextFiles = Array.from(result.entries.keys());
      contextTokens = result.totalTokens;
      warnings.push(...result.skipped);
      if (contextTokens > 0) {
        this.logger.info(`Context contains ${contextTokens} tokens`);
      }
    }

    const prompt = composePrompt(userPrompt, context, instruction);
    const promptTokens = this.counter.count(prompt, this.model);
    if (promptTokens !== undefined) {
      this.logger.info(`Prompt contains ${promptTokens} tokens`);
    }

    return { prompt, userPrompt, instructionName, contextFiles, contextTokens, promptTokens, warnings };
  }
}
