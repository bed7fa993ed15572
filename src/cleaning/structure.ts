/**
 * Structural cleaner: drops templated filler, strips long tracking numbers,
 * suppresses near-duplicate lines and tags key sections with headers.
 */
import { createChildLogger } from "../logger.js";
import type { CleanResult, CleaningStats } from "../core/types.js";
import {
  compileKeySections,
  defaultRuleSet,
  type CompiledKeySection,
  type KeySectionRules,
  type TemplateRule,
  type TemplateRules,
} from "../filters/rules.js";
import { similarityRatio } from "./similarity.js";

const log = createChildLogger({ module: "structure" });

export interface SimilarityOptions {
  /** Accepted lines compared against each candidate line. */
  lineWindow: number;
  lineThreshold: number;
  /** Accepted lines scanned for a header-like predecessor. */
  headerWindow: number;
  headerThreshold: number;
}

export const DEFAULT_SIMILARITY: SimilarityOptions = {
  lineWindow: 10,
  lineThreshold: 0.85,
  headerWindow: 5,
  headerThreshold: 0.7,
};

export interface StructureOptions {
  similarity?: Partial<SimilarityOptions>;
  template?: TemplateRules;
  keySections?: KeySectionRules;
}

interface CompiledTemplateRule {
  rule: TemplateRule;
  re: RegExp;
}

const templateCache = new WeakMap<TemplateRules, CompiledTemplateRule[]>();

function compileTemplate(rules: TemplateRules): CompiledTemplateRule[] {
  let compiled = templateCache.get(rules);
  if (!compiled) {
    compiled = rules.lineRules.map((rule) => ({
      rule,
      re: new RegExp(rule.pattern, `${rule.flags}u`),
    }));
    templateCache.set(rules, compiled);
  }
  return compiled;
}

function emptyStats(originalLength: number): CleaningStats {
  return {
    noiseLinesRemoved: 0,
    longNumbersRemoved: 0,
    duplicatesRemoved: 0,
    keyHeadersFound: 0,
    originalLength,
    cleanedLength: 0,
  };
}

function longNumberPattern(minDigits: number): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])\\d{${minDigits},}(?![\\p{L}\\p{N}_])`, "gu");
}

function isHeaderLike(lower: string, sections: CompiledKeySection[]): boolean {
  return sections.some((s) => s.pattern.test(lower));
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

function removeTemplateNoise(
  lines: string[],
  rules: CompiledTemplateRule[],
  stats: CleaningStats,
): string[] {
  const kept: string[] = [];
  for (const line of lines) {
    const hit = rules.find((r) => r.re.test(line));
    if (hit) {
      stats[hit.rule.counter]++;
      continue;
    }
    kept.push(line);
  }
  return kept;
}

function stripLongNumbers(lines: string[], minDigits: number, stats: CleaningStats): string[] {
  const joined = lines.join("\n");
  const found = joined.match(longNumberPattern(minDigits));
  stats.longNumbersRemoved += found ? found.length : 0;
  return joined.replace(longNumberPattern(minDigits), "").split("\n");
}

function lastLines(lines: string[], n: number): string[] {
  return n > 0 ? lines.slice(-n) : [];
}

function suppressNearDuplicates(
  lines: string[],
  sections: CompiledKeySection[],
  opts: SimilarityOptions,
  stats: CleaningStats,
): string[] {
  const accepted: string[] = [];

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) {
      accepted.push(line);
      continue;
    }

    const recent = lastLines(accepted, opts.lineWindow);
    let duplicate = recent.some((prev) => {
      const p = prev.trim();
      return p !== "" && similarityRatio(trimmed, p) > opts.lineThreshold;
    });

    if (!duplicate) {
      const lower = trimmed.toLowerCase();
      if (isHeaderLike(lower, sections)) {
        duplicate = lastLines(accepted, opts.headerWindow).some((prev) => {
          const p = prev.trim().toLowerCase();
          return (
            p !== "" &&
            isHeaderLike(p, sections) &&
            similarityRatio(lower, p) > opts.headerThreshold
          );
        });
      }
    }

    if (duplicate) {
      stats.duplicatesRemoved++;
      log.debug({ line: trimmed.slice(0, 50) }, "near-duplicate dropped");
      continue;
    }
    accepted.push(line);
  }

  return accepted;
}

function tagKeySections(
  lines: string[],
  sections: CompiledKeySection[],
  bulletVocabulary: string[],
  stats: CleaningStats,
): string[] {
  const out: string[] = [];
  const emitted = new Set<string>();

  for (const line of lines) {
    const lower = line.trim().toLowerCase();
    const section = lower ? sections.find((s) => s.pattern.test(lower)) : undefined;

    if (section) {
      if (!emitted.has(section.header)) {
        out.push("", section.header);
        emitted.add(section.header);
        stats.keyHeadersFound++;
      }
      out.push(line);
      continue;
    }

    if (
      lower &&
      !lower.startsWith("**") &&
      bulletVocabulary.some((stem) => lower.includes(stem))
    ) {
      out.push(`• ${line}`);
    } else {
      out.push(line);
    }
  }

  return out;
}

function finalSweep(lines: string[], sweepRules: RegExp[]): string {
  const collapsed = lines.join("\n").replace(/\n\s*\n\s*\n+/g, "\n\n");
  return collapsed
    .split("\n")
    .filter((line) => !sweepRules.some((re) => re.test(line)))
    .join("\n")
    .trim();
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export function cleanAndStructure(text: string, options: StructureOptions = {}): CleanResult {
  const stats = emptyStats(text.length);
  if (!text) return { text: "", stats };

  const rules = defaultRuleSet();
  const template = options.template ?? rules.template;
  const keySections = options.keySections ?? rules.keySections;
  const similarity = { ...DEFAULT_SIMILARITY, ...options.similarity };
  const templateRules = compileTemplate(template);
  const sections = compileKeySections(keySections);

  let lines = text.split("\n");
  const originalLineCount = lines.length;

  lines = removeTemplateNoise(lines, templateRules, stats);
  lines = stripLongNumbers(lines, template.longNumberMinDigits, stats);
  lines = suppressNearDuplicates(lines, sections, similarity, stats);
  lines = tagKeySections(lines, sections, keySections.bulletVocabulary, stats);

  const sweepRules = templateRules.filter((r) => r.rule.sweep).map((r) => r.re);
  const cleaned = finalSweep(lines, sweepRules);
  stats.cleanedLength = cleaned.length;

  log.info(
    {
      lines: originalLineCount,
      noise: stats.noiseLinesRemoved,
      longNumbers: stats.longNumbersRemoved,
      duplicates: stats.duplicatesRemoved,
      headers: stats.keyHeadersFound,
      before: stats.originalLength,
      after: stats.cleanedLength,
    },
    "structural cleaning done",
  );

  return { text: cleaned, stats };
}
