import { Logger, TokenBudgetExceededError } from "@ctxask/shared";
import type { TextExtractor } from "../extract/TextExtractor.js";
import type { TokenCounter } from "../tokens/TokenCounter.js";
import type { PathResolver } from "./PathResolver.js";
import type { AggregationResult, ContextEntry, PipelineWarning } from "./Types.js";

export interface ContextAggregatorOptions {
  resolver: PathResolver;
  extractor: TextExtractor;
  counter: TokenCounter;
  /** Model whose tokenizer measures the budget. */
  modelHint?: string;
  logger?: Logger;
}

/**
 * Builds the path → text mapping for a prompt. Unresolvable paths and
 * unreadable files are skipped; crossing the token budget aborts the whole
 * run and nothing accumulated so far is returned.
 *
 * A file reached through several path specs is read and counted once.
 *
 * Entries whose token count is unknown keep their text but do not count
 * against the budget, so the true prompt size can exceed it.
 */
export class ContextAggregator {
  private resolver: PathResolver;
  private extractor: TextExtractor;
  private counter: TokenCounter;
  private modelHint?: string;
  private logger: Logger;

  constructor(options: ContextAggregatorOptions) {
    this.resolver = options.resolver;
    this.extractor = options.extractor;
    this.counter = options.counter;
    this.modelHint = options.modelHint;
    this.logger = (options.logger ?? new Logger()).child("aggregator");
  }

  async aggregate(paths: string[], maxTokens?: number): Promise<AggregationResult> {
    const entries = new Map<string, ContextEntry>();
    const skipped: PipelineWarning[] = [];
    let totalTokens = 0;

    for (const spec of paths) {
      const resolution = await this.resolver.resolve(spec);
      if (resolution.warning) {
        skipped.push(resolution.warning);
        continue;
      }
      for (const filePath of resolution.files) {
        if (entries.has(filePath)) {
          this.logger.debug(`Skipping '${filePath}'; already included`);
          continue;
        }
        const extracted = await this.extractor.extract(filePath);
        if (!extracted.ok) {
          skipped.push({ kind: "extraction", path: filePath, message: extracted.reason });
          continue;
        }

        let tokenCount: number | undefined;
        if (maxTokens !== undefined) {
          tokenCount = this.counter.count(extracted.text, this.modelHint);
          if (tokenCount !== undefined) {
            totalTokens += tokenCount;
            if (totalTokens > maxTokens) {
              throw new TokenBudgetExceededError(totalTokens, maxTokens);
            }
          } else {
            this.logger.warn(`Token count unknown for '${filePath}'; excluded from the budget`);
          }
        }
        entries.set(filePath, { sourcePath: filePath, text: extracted.text, tokenCount });
        this.logger.debug(
          `Added '${filePath}' (${tokenCount ?? "uncounted"} tokens, running total ${totalTokens})`,
        );
      }
    }

    return { entries, totalTokens, skipped };
  }
}

/** Renders the context as a pretty-printed JSON object of path → text, in discovery order. */
export const serializeContext = (entries: ReadonlyMap<string, ContextEntry>): string => {
  const record: Record<string, string> = {};
  for (const [sourcePath, entry] of entries) {
    record[sourcePath] = entry.text;
  }
  return JSON.stringify(record, null, 2);
};
