import { readFile } from "node:fs/promises";
import JSZip from "jszip";
import type { FormatReader } from "../FormatReader.js";

const SLIDE_PATH = /^ppt\/slides\/slide(\d+)\.xml$/;

const decodeXml = (value: string): string =>
  value
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, "\"")
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");

const paragraphText = (paragraphXml: string): string => {
  const runs = Array.from(paragraphXml.matchAll(/<a:t(?:\s[^>]*)?>([^<]*)<\/a:t>/g), (match) => match[1] ?? "");
  return decodeXml(runs.join(""));
};

export const extractShapeTexts = (slideXml: string): string[] => {
  const texts: string[] = [];
  for (const shape of slideXml.matchAll(/<p:sp>([\s\S]*?)<\/p:sp>/g)) {
    const paragraphs = Array.from(shape[1]?.matchAll(/<a:p>([\s\S]*?)<\/a:p>/g) ?? [], (match) =>
      paragraphText(match[1] ?? ""),
    );
    const text = paragraphs.join("\n").trim();
    if (text) texts.push(text);
  }
  return texts;
};

/** Reads slide text frames from an Office Open XML presentation. */
export class PresentationReader implements FormatReader {
  readonly name = "presentation";
  readonly extensions = [".pptx", ".ppt"];

  async read(filePath: string): Promise<string> {
    const zip = await JSZip.loadAsync(await readFile(filePath));
    const slides = zip
      .file(SLIDE_PATH)
      .map((file) => ({ file, index: Number(SLIDE_PATH.exec(file.name)?.[1] ?? 0) }))
      .sort((left, right) => left.index - right.index);
    const parts: string[] = [];
    for (const [position, slide] of slides.entries()) {
      parts.push(`Slide ${position + 1}:`);
      parts.push(...extractShapeTexts(await slide.file.async("string")));
    }
    return parts.join("\n\n").trim();
  }
}
