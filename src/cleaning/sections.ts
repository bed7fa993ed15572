/**
 * Helpers over cleaned text: section extraction, technical-line filtering,
 * reduction stats and the clean-then-truncate shortcut.
 */
import { defaultRuleSet, type ContentRules } from "../filters/rules.js";
import type { CleaningStats } from "../core/types.js";
import { filterNoise } from "./noise.js";
import { cleanAndStructure, type StructureOptions } from "./structure.js";
import { DEFAULT_MAX_CHARS, truncate } from "./truncate.js";

/**
 * Map of `**Header**` label to the non-empty lines that follow it, up to
 * the next header. Lines before the first header are ignored.
 */
export function extractKeySections(text: string): Record<string, string> {
  const sections: Record<string, string> = {};
  let current: string | null = null;
  let content: string[] = [];

  const flush = () => {
    if (current !== null && content.length > 0) {
      sections[current] = content.join("\n").trim();
    }
  };

  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (!line) continue;

    if (line.startsWith("**") && line.endsWith("**") && line.length > 4) {
      flush();
      current = line.replace(/^\*+|\*+$/g, "");
      content = [];
    } else if (current !== null) {
      content.push(line);
    }
  }
  flush();

  return sections;
}

/** Keep only lines mentioning a technical keyword. */
export function extractTechnicalInfo(
  text: string,
  rules: ContentRules = defaultRuleSet().content,
): string {
  return text
    .split(/\r?\n/)
    .filter((line) => {
      const lower = line.toLowerCase();
      return rules.technicalKeywords.some((k) => lower.includes(k));
    })
    .join("\n");
}

export interface ReductionStats {
  originalLines: number;
  cleanedLines: number;
  linesRemoved: number;
  linesReductionPercent: number;
  originalChars: number;
  cleanedChars: number;
  charsRemoved: number;
  charsReductionPercent: number;
}

function percent(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 100 * 100) / 100 : 0;
}

export function getCleaningStats(original: string, cleaned: string): ReductionStats {
  const originalLines = original.split("\n").length;
  const cleanedLines = cleaned.split("\n").length;
  return {
    originalLines,
    cleanedLines,
    linesRemoved: originalLines - cleanedLines,
    linesReductionPercent: percent(originalLines - cleanedLines, originalLines),
    originalChars: original.length,
    cleanedChars: cleaned.length,
    charsRemoved: original.length - cleaned.length,
    charsReductionPercent: percent(original.length - cleaned.length, original.length),
  };
}

export interface PreprocessOptions extends StructureOptions {
  maxChars?: number;
  /** Structural cleaning (default) or the line-level noise filter only. */
  advanced?: boolean;
}

export type PreprocessStats =
  | (CleaningStats & { mode: "advanced"; finalLength: number; truncated: boolean })
  | (ReductionStats & { mode: "basic"; finalLength: number; truncated: boolean });

export interface PreprocessResult {
  text: string;
  stats: PreprocessStats;
}

/** Clean then truncate a single document's text. */
export function preprocessText(text: string, options: PreprocessOptions = {}): PreprocessResult {
  const { maxChars = DEFAULT_MAX_CHARS, advanced = true, ...structure } = options;

  if (advanced) {
    const cleaned = cleanAndStructure(text, structure);
    const final = truncate(cleaned.text, maxChars);
    return {
      text: final,
      stats: {
        ...cleaned.stats,
        mode: "advanced",
        finalLength: final.length,
        truncated: final.length !== cleaned.text.length,
      },
    };
  }

  const cleaned = filterNoise(text).text;
  const final = truncate(cleaned, maxChars);
  return {
    text: final,
    stats: {
      ...getCleaningStats(text, cleaned),
      mode: "basic",
      finalLength: final.length,
      truncated: final.length !== cleaned.length,
    },
  };
}
