import { readFile } from "node:fs/promises";
import { marked } from "marked";
import type { FormatReader } from "../FormatReader.js";

const BLOCK_BREAKS: Array<[RegExp, string]> = [
  [/<br\s*\/?>/g, "\n"],
  [/<\/(p|h[1-6])>/g, "\n\n"],
  [/<\/(li|ul|ol)>/g, "\n"],
];

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": "\"",
  "&#39;": "'",
};

export const htmlToText = (html: string): string => {
  let text = html;
  for (const [pattern, replacement] of BLOCK_BREAKS) {
    text = text.replace(pattern, replacement);
  }
  text = text.replace(/<[^>]+>/g, "");
  text = text.replace(/&(amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity);
  return text.replace(/\n{3,}/g, "\n\n").trim();
};

export class MarkdownReader implements FormatReader {
  readonly name = "markdown";
  readonly extensions = [".md", ".markdown"];

  async read(filePath: string): Promise<string> {
    const source = await readFile(filePath, "utf8");
    const html = await marked.parse(source);
    return htmlToText(html);
  }
}
