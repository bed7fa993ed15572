/**
 * Plain text and rich-text extraction.
 */
import { readFile } from "node:fs/promises";

import type { ExtractionStrategy } from "./backend.js";

export class PlainTextExtractionStrategy implements ExtractionStrategy {
  async extract(filePath: string): Promise<string> {
    return readFile(filePath, "utf-8");
  }
}

const RTF_DESTINATION = /\{\\(?:\*|fonttbl|colortbl|stylesheet|info)[^{}]*(?:\{[^{}]*\}[^{}]*)*\}/g;

/** Strip RTF markup: header tables, control words and braces. */
export function stripRtf(content: string): string {
  return content
    .replace(RTF_DESTINATION, "")
    .replace(/\\par\b ?/g, "\n")
    .replace(/\\[a-z]+-?\d* ?/gi, "")
    .replace(/[{}]/g, "")
    .trim();
}

export class RtfExtractionStrategy implements ExtractionStrategy {
  async extract(filePath: string): Promise<string> {
    return stripRtf(await readFile(filePath, "utf-8"));
  }
}
