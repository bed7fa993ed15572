/**
 * Filename classification – decides from a name alone whether a document
 * is worth extracting.
 */
import { extname } from "node:path";

import { createChildLogger } from "../logger.js";
import type { ClassificationVerdict } from "../core/types.js";
import { defaultRuleSet, type FilenameRules } from "./rules.js";

const log = createChildLogger({ module: "classifier" });

const EXTENSION_RE = /\.[\p{L}\p{N}_]+$/u;
const ALNUM_RE = /^[\p{L}\p{N}]+$/u;

/**
 * Canonical form of a filename: extension stripped, `_`/`-` as spaces,
 * whitespace squeezed, lower-cased.
 */
export function normalizeFilename(filename: string): string {
  return filename
    .replace(EXTENSION_RE, "")
    .replace(/[_-]/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

export function classifyFilename(
  filename: string,
  rules: FilenameRules = defaultRuleSet().filename,
): ClassificationVerdict {
  const normalized = normalizeFilename(filename);
  const ext = extname(filename).toLowerCase();

  if (rules.disallowedExtensions.includes(ext)) {
    log.debug({ filename }, "rejected: disallowed extension");
    return { keep: false, reason: "disallowed-extension", normalized };
  }

  // Exclude markers win even when an include marker is also present.
  if (rules.exclude.some((marker) => normalized.includes(marker))) {
    log.debug({ filename, normalized }, "rejected: exclude keyword");
    return { keep: false, reason: "matched-exclude-keyword", normalized };
  }

  if (rules.include.some((marker) => normalized.includes(marker))) {
    log.info({ filename, normalized }, "accepted: include keyword");
    return { keep: true, reason: "matched-include-keyword", normalized };
  }

  if (
    normalized.length <= rules.neutralMaxLength &&
    ALNUM_RE.test(normalized.replace(/ /g, ""))
  ) {
    log.info({ filename, normalized }, "accepted: short neutral name");
    return { keep: true, reason: "short-neutral-name", normalized };
  }

  log.debug({ filename, normalized }, "rejected: long uninformative name");
  return { keep: false, reason: "long-uninformative-name", normalized };
}

/** Boolean shorthand for {@link classifyFilename}. */
export function isUsefulDocument(filename: string, rules?: FilenameRules): boolean {
  return classifyFilename(filename, rules).keep;
}
