export interface FormatReader {
  readonly name: string;
  /** Lower-case extensions including the dot, e.g. ".pdf". */
  readonly extensions: readonly string[];
  read(filePath: string): Promise<string>;
}

export type ExtractionResult = { ok: true; text: string } | { ok: false; reason: string };
