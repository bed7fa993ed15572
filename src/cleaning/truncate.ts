/**
 * Length bounding at a word boundary where that costs little.
 */
import { createChildLogger } from "../logger.js";

const log = createChildLogger({ module: "truncate" });

export const DEFAULT_MAX_CHARS = 15000;

/** Share of the budget below which a word-boundary cut is not worth it. */
const WORD_BOUNDARY_FLOOR = 0.9;

export function truncate(text: string, maxChars: number = DEFAULT_MAX_CHARS): string {
  if (text.length <= maxChars) return text;

  let cut = text.slice(0, maxChars);
  const boundary = cut.search(/\s\S*$/);
  if (boundary > maxChars * WORD_BOUNDARY_FLOOR) {
    cut = cut.slice(0, boundary);
  }

  log.info({ before: text.length, after: cut.length }, "text truncated");
  return cut;
}
