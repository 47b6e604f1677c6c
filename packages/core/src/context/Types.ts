export interface PipelineWarning {
  kind: "path_resolution" | "extraction" | "persistence";
  path: string;
  message: string;
}

/** Extracted text for one file; `tokenCount` is undefined when not counted or not countable. */
export interface ContextEntry {
  readonly sourcePath: string;
  readonly text: string;
  readonly tokenCount: number | undefined;
}

export interface AggregationResult {
  entries: ReadonlyMap<string, ContextEntry>;
  totalTokens: number;
  skipped: PipelineWarning[];
}
