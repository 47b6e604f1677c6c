import { stat } from "node:fs/promises";
import path from "node:path";
import { Logger } from "@ctxask/shared";
import type { ExtractionResult, FormatReader } from "./FormatReader.js";
import { DocxReader } from "./readers/DocxReader.js";
import { MarkdownReader } from "./readers/MarkdownReader.js";
import { PdfReader } from "./readers/PdfReader.js";
import { PlainTextReader } from "./readers/PlainTextReader.js";
import { PresentationReader } from "./readers/PresentationReader.js";
import { SpreadsheetReader } from "./readers/SpreadsheetReader.js";

export const createDefaultReaders = (): FormatReader[] => [
  new PdfReader(),
  new DocxReader(),
  new SpreadsheetReader(),
  new PresentationReader(),
  new MarkdownReader(),
];

export interface TextExtractorOptions {
  readers?: FormatReader[];
  fallback?: FormatReader;
  logger?: Logger;
}

/**
 * Picks a reader by lower-cased extension and turns every failure into an
 * `{ ok: false }` result; nothing thrown by a reader escapes `extract`.
 */
export class TextExtractor {
  private readers = new Map<string, FormatReader>();
  private fallback: FormatReader;
  private logger: Logger;

  constructor(options: TextExtractorOptions = {}) {
    for (const reader of options.readers ?? createDefaultReaders()) {
      for (const extension of reader.extensions) {
        this.readers.set(extension.toLowerCase(), reader);
      }
    }
    this.fallback = options.fallback ?? new PlainTextReader();
    this.logger = (options.logger ?? new Logger()).child("extractor");
  }

  readerFor(filePath: string): FormatReader {
    return this.readers.get(path.extname(filePath).toLowerCase()) ?? this.fallback;
  }

  async extract(filePath: string): Promise<ExtractionResult> {
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) {
        return this.fail(`Not a regular file: ${filePath}`);
      }
    } catch {
      return this.fail(`File does not exist: ${filePath}`);
    }

    const reader = this.readerFor(filePath);
    try {
      const text = await reader.read(filePath);
      return { ok: true, text };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.fail(`Error reading ${reader.name} file '${filePath}': ${message}`);
    }
  }

  private fail(reason: string): ExtractionResult {
    this.logger.error(reason);
    return { ok: false, reason };
  }
}
