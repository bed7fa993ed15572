/**
 * tender-digest – turns a bundle of tender attachments into one compact,
 * cleaned text for downstream analysis.
 */
import { parseConfig } from "./config.js";
import { ArchiveExpander } from "./archives/expander.js";
import { DocumentFilter, type FilterOptions } from "./core/filter.js";
import { DocumentPipeline } from "./core/pipeline.js";
import { describeError, InvalidRunIdError } from "./core/exceptions.js";
import type {
  CleaningCounters,
  DedupePriority,
  PipelineResult,
  SkipRecord,
  SourceRecord,
} from "./core/types.js";
import { emptyCounters } from "./core/types.js";
import type { TextExtractor } from "./extractors/backend.js";
import { defaultRuleSet, type RuleSet } from "./filters/rules.js";
import { DEFAULT_SIMILARITY, type SimilarityOptions } from "./cleaning/structure.js";
import { DEFAULT_MAX_CHARS } from "./cleaning/truncate.js";
import { createChildLogger } from "./logger.js";
import type { DiskStorage } from "./storage/disk.js";

const log = createChildLogger({ module: "tender-digest" });

export const NO_FILES_ERROR = "No suitable files found for processing";

const DEFAULT_ALLOWED_EXTENSIONS = [".doc", ".docx", ".pdf", ".txt"];

/** A run id must be a single path segment. */
export function isSafeRunId(runId: string): boolean {
  return (
    runId.length > 0 &&
    runId !== "." &&
    runId !== ".." &&
    !/[/\\\p{Cc}]/u.test(runId)
  );
}

export interface TenderDigestOptions {
  /** Work root; each run gets its own `<root>/<runId>` directory. */
  storage: DiskStorage;
  extractor: TextExtractor;
  expander?: ArchiveExpander;
  rules?: RuleSet;
  allowedExtensions?: string[];
  dedupePriority?: DedupePriority;
  similarity?: Partial<SimilarityOptions>;
  maxChars?: number;
}

export class TenderDigest {
  private storage: DiskStorage;
  private pipeline: DocumentPipeline;
  private documentFilter: DocumentFilter;
  readonly maxChars: number;

  constructor(opts: TenderDigestOptions) {
    const rules = opts.rules ?? defaultRuleSet();
    const expander = opts.expander ?? new ArchiveExpander({ rules: rules.filename });
    this.storage = opts.storage;
    this.maxChars = opts.maxChars ?? DEFAULT_MAX_CHARS;
    this.pipeline = new DocumentPipeline({
      storage: opts.storage,
      expander,
      extractor: opts.extractor,
      rules,
      allowedExtensions: (opts.allowedExtensions ?? DEFAULT_ALLOWED_EXTENSIONS).map((e) =>
        e.toLowerCase(),
      ),
      dedupePriority: opts.dedupePriority ?? "input-order",
      similarity: { ...DEFAULT_SIMILARITY, ...opts.similarity },
    });
    this.documentFilter = new DocumentFilter({
      storage: opts.storage,
      expander,
      extractor: opts.extractor,
      rules,
    });
  }

  /** Construct from a configuration object (validated with Zod). */
  static fromConfig(raw: unknown = {}): TenderDigest {
    const { config, storage, extractor, expander, rules } = parseConfig(raw);
    return new TenderDigest({
      storage,
      extractor,
      expander,
      rules,
      allowedExtensions: config.allowedExtensions,
      dedupePriority: config.dedupePriority,
      similarity: config.similarity,
      maxChars: config.maxChars,
    });
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /**
   * Process `paths` (documents and archives) into one cleaned text. Never
   * throws: item-level problems become skip records, run-level ones a
   * failure result. The run directory is left in place; see `withRun`.
   */
  async run(paths: string[], runId: string): Promise<PipelineResult> {
    const skipped: SkipRecord[] = [];
    const stats = emptyCounters();

    try {
      // 1. Fresh run directory
      await this.resetRunDir(runId);

      // 2. Expand archives, pass documents through
      const collected = await this.pipeline.collect(paths, runId);
      skipped.push(...collected.skipped);

      // 3. Extension allow-list and filename classification
      const selected = this.pipeline.select(collected.items);
      skipped.push(...selected.skipped);

      // 4. Deduplicate
      const unique = await this.pipeline.dedupe(selected.items);
      skipped.push(...unique.skipped);

      // 5. Extract and clean
      const processed = await this.pipeline.process(unique.items);
      skipped.push(...processed.skipped);
      const { texts, sources } = processed.items;
      Object.assign(stats, processed.items.stats);

      if (texts.length === 0) {
        log.warn({ runId, skipped: skipped.length }, NO_FILES_ERROR);
        return failure(NO_FILES_ERROR, stats, skipped);
      }

      const text = texts.join("\n\n");
      log.info(
        { runId, files: sources.length, length: text.length, ...stats },
        "run complete",
      );
      return {
        success: true,
        text,
        length: text.length,
        sources,
        stats,
        skipped,
      };
    } catch (err) {
      log.error({ runId, err: describeError(err) }, "run failed");
      return failure(describeError(err), stats, skipped);
    }
  }

  /** Run, hand the result to `fn`, then remove the run directory. */
  async withRun<T>(
    paths: string[],
    runId: string,
    fn: (result: PipelineResult) => T | Promise<T>,
  ): Promise<T> {
    try {
      const result = await this.run(paths, runId);
      return await fn(result);
    } finally {
      await this.cleanup(runId);
    }
  }

  /** Remove `<workDir>/<runId>`. Unsafe ids are ignored. */
  async cleanup(runId: string): Promise<void> {
    if (!isSafeRunId(runId)) return;
    await this.storage.deletePrefix(runId);
    log.debug({ runId }, "run directory removed");
  }

  /** Location of the run directory for `runId`. */
  runDir(runId: string): string {
    if (!isSafeRunId(runId)) throw new InvalidRunIdError(runId);
    return this.storage.pathOf(runId);
  }

  /**
   * Filename-filter `paths`, unpacking archives into temp directories and,
   * with `checkContent`, dropping files whose text has no technical marker.
   */
  async filterDocuments(paths: string[], options: FilterOptions = {}): Promise<string[]> {
    return this.documentFilter.filter(paths, options);
  }

  /** Remove temp directories created by `filterDocuments`. */
  async cleanupTempDirs(): Promise<void> {
    await this.documentFilter.cleanupTempDirs();
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async resetRunDir(runId: string): Promise<void> {
    if (!isSafeRunId(runId)) throw new InvalidRunIdError(runId);
    await this.storage.deletePrefix(runId);
    await this.storage.ensureDir(runId);
  }
}

function failure(
  error: string,
  stats: CleaningCounters,
  skipped: SkipRecord[],
): PipelineResult {
  return {
    success: false,
    error,
    text: "",
    length: 0,
    sources: [],
    stats,
    skipped,
  };
}

export type { PipelineResult, SkipRecord, SourceRecord, CleaningCounters, DedupePriority };
export type {
  CleaningStats,
  ClassificationVerdict,
  DocumentRef,
  PipelineFailure,
  PipelineSuccess,
} from "./core/types.js";
export { parseConfig, ConfigSchema, type Config } from "./config.js";
export { classifyFilename, isUsefulDocument, normalizeFilename } from "./filters/classifier.js";
export { isUsefulByText } from "./filters/content.js";
export { Deduplicator, dedupePaths, fingerprintFile } from "./filters/dedupe.js";
export { loadRuleSet, defaultRuleSet, type RuleSet } from "./filters/rules.js";
export { filterNoise, cleanTextBlocks } from "./cleaning/noise.js";
export { cleanAndStructure, DEFAULT_SIMILARITY, type SimilarityOptions } from "./cleaning/structure.js";
export { truncate, DEFAULT_MAX_CHARS } from "./cleaning/truncate.js";
export {
  extractKeySections,
  extractTechnicalInfo,
  getCleaningStats,
  preprocessText,
} from "./cleaning/sections.js";
export { ArchiveExpander, sanitizeFilename } from "./archives/expander.js";
export { RegistryTextExtractor } from "./extractors/registry.js";
export type { TextExtractor } from "./extractors/backend.js";
export { DiskStorage } from "./storage/disk.js";
export { buildFinalPrompt, buildPromptFromResult } from "./prompt/builder.js";
export {
  ArchiveExtractionError,
  ConfigError,
  InvalidRunIdError,
} from "./core/exceptions.js";
