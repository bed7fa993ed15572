/**
 * Ordered rule tables for classification and cleaning.
 *
 * Defaults live as JSON under `rules/` at the package root. Each file is
 * validated with Zod on first use and cached for the process.
 */
import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ConfigError } from "../core/exceptions.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const FilenameRulesSchema = z.object({
  disallowedExtensions: z.array(z.string()),
  exclude: z.array(z.string()),
  include: z.array(z.string()),
  neutralMaxLength: z.number().int().positive().default(25),
});

export const NoiseRulesSchema = z.object({
  boilerplate: z.array(z.string()),
  contentFreeShapes: z.array(z.string()),
  minLineLength: z.number().int().nonnegative().default(10),
});

export const KeySectionSchema = z.object({
  pattern: z.string(),
  label: z.string(),
});

export const KeySectionRulesSchema = z.object({
  sections: z.array(KeySectionSchema),
  bulletVocabulary: z.array(z.string()).default([]),
});

export const TemplateRuleSchema = z.object({
  name: z.string(),
  pattern: z.string(),
  flags: z.string().default(""),
  counter: z.enum(["noiseLinesRemoved", "longNumbersRemoved"]),
  sweep: z.boolean().default(false),
});

export const TemplateRulesSchema = z.object({
  lineRules: z.array(TemplateRuleSchema),
  longNumberMinDigits: z.number().int().positive().default(15),
});

export const ContentRulesSchema = z.object({
  usefulMarkers: z.array(z.string()),
  technicalKeywords: z.array(z.string()),
});

export type FilenameRules = z.infer<typeof FilenameRulesSchema>;
export type NoiseRules = z.infer<typeof NoiseRulesSchema>;
export type KeySection = z.infer<typeof KeySectionSchema>;
export type KeySectionRules = z.infer<typeof KeySectionRulesSchema>;
export type TemplateRule = z.infer<typeof TemplateRuleSchema>;
export type TemplateRules = z.infer<typeof TemplateRulesSchema>;
export type ContentRules = z.infer<typeof ContentRulesSchema>;

export interface RuleSet {
  filename: FilenameRules;
  noise: NoiseRules;
  template: TemplateRules;
  keySections: KeySectionRules;
  content: ContentRules;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function findRulesDir(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, "rules");
    if (existsSync(join(dir, "package.json")) && existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new ConfigError("Could not locate the rules/ directory");
    }
    dir = parent;
  }
}

function loadRuleFile<T>(dir: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const path = join(dir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read rule file ${path}: ${String(err)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid rule file ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Read and validate every rule table from `dir`. */
export function loadRuleSet(dir: string = findRulesDir()): RuleSet {
  return {
    filename: loadRuleFile(dir, "filename-rules.json", FilenameRulesSchema),
    noise: loadRuleFile(dir, "noise-rules.json", NoiseRulesSchema),
    template: loadRuleFile(dir, "template-rules.json", TemplateRulesSchema),
    keySections: loadRuleFile(dir, "key-sections.json", KeySectionRulesSchema),
    content: loadRuleFile(dir, "content-rules.json", ContentRulesSchema),
  };
}

let defaultRules: RuleSet | null = null;

/** The packaged rule tables, loaded once. */
export function defaultRuleSet(): RuleSet {
  if (!defaultRules) defaultRules = loadRuleSet();
  return defaultRules;
}

// ---------------------------------------------------------------------------
// Compiled key sections
// ---------------------------------------------------------------------------

export interface CompiledKeySection {
  pattern: RegExp;
  header: string;
}

const compiledCache = new WeakMap<KeySectionRules, CompiledKeySection[]>();

/** Key sections as regexes with their bolded header, in table order. */
export function compileKeySections(rules: KeySectionRules): CompiledKeySection[] {
  let compiled = compiledCache.get(rules);
  if (!compiled) {
    compiled = rules.sections.map((s) => ({
      pattern: new RegExp(s.pattern, "u"),
      header: `**${s.label}**`,
    }));
    compiledCache.set(rules, compiled);
  }
  return compiled;
}
