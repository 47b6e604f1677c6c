import { readFile } from "node:fs/promises";
import { extractText, getDocumentProxy } from "unpdf";
import type { FormatReader } from "../FormatReader.js";

export class PdfReader implements FormatReader {
  readonly name = "pdf";
  readonly extensions = [".pdf"];

  async read(filePath: string): Promise<string> {
    const buffer = await readFile(filePath);
    const document = await getDocumentProxy(new Uint8Array(buffer));
    const { text } = await extractText(document, { mergePages: true });
    return text.trim();
  }
}
