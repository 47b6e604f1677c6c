import mammoth from "mammoth";
import type { FormatReader } from "../FormatReader.js";

export class DocxReader implements FormatReader {
  readonly name = "docx";
  readonly extensions = [".docx"];

  async read(filePath: string): Promise<string> {
    const result = await mammoth.extractRawText({ path: filePath });
    return result.value.trim();
  }
}
