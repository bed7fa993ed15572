/**
 * Configuration validation and backend factory.
 */
import { resolve } from "node:path";
import { z } from "zod";

import { ConfigError } from "./core/exceptions.js";
import { ArchiveExpander } from "./archives/expander.js";
import { RegistryTextExtractor } from "./extractors/registry.js";
import type { TextExtractor } from "./extractors/backend.js";
import { defaultRuleSet, loadRuleSet, type RuleSet } from "./filters/rules.js";
import { setLogLevel } from "./logger.js";
import { DiskStorage } from "./storage/disk.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const SimilarityConfigSchema = z.object({
  lineWindow: z.number().int().positive().default(10),
  lineThreshold: z.number().min(0).max(1).default(0.85),
  headerWindow: z.number().int().positive().default(5),
  headerThreshold: z.number().min(0).max(1).default(0.7),
});

export const ConfigSchema = z.object({
  /** Root under which each run gets `<workDir>/<runId>`. */
  workDir: z.string().min(1).default("./download_files/temp_cleaned"),
  allowedExtensions: z
    .array(z.string().regex(/^\.[^.]+$/, "extension must start with a dot"))
    .default([".doc", ".docx", ".pdf", ".txt"])
    .transform((exts) => exts.map((e) => e.toLowerCase())),
  maxChars: z.number().int().positive().default(15000),
  dedupePriority: z
    .enum(["input-order", "archive-first", "top-level-first"])
    .default("input-order"),
  similarity: SimilarityConfigSchema.default({}),
  /** Directory holding replacement rule tables. */
  rulesDir: z.string().optional(),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

export interface Backends {
  config: Config;
  storage: DiskStorage;
  extractor: TextExtractor;
  expander: ArchiveExpander;
  rules: RuleSet;
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function parseConfig(raw: unknown = {}): Backends {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.message}`);
  }
  const config = parsed.data;
  if (config.logLevel) setLogLevel(config.logLevel);

  const rules = config.rulesDir ? loadRuleSet(resolve(config.rulesDir)) : defaultRuleSet();
  return {
    config,
    storage: new DiskStorage(config.workDir),
    extractor: new RegistryTextExtractor(),
    expander: new ArchiveExpander({ rules: rules.filename }),
    rules,
  };
}
