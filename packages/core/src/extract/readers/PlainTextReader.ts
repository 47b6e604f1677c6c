import { readFile } from "node:fs/promises";
import type { FormatReader } from "../FormatReader.js";

export const decodeText = (buffer: Buffer): string => {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    return buffer.toString("latin1");
  }
};

/** Catch-all reader: UTF-8, falling back to Latin-1 for bytes that are not valid UTF-8. */
export class PlainTextReader implements FormatReader {
  readonly name = "text";
  readonly extensions: readonly string[] = [];

  async read(filePath: string): Promise<string> {
    const buffer = await readFile(filePath);
    return decodeText(buffer).trim();
  }
}
