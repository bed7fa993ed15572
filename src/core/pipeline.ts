/**
 * Pipeline stages – collect → select → dedupe → process. Each stage
 * absorbs item-level failures and reports them as skip records.
 */
import { stat } from "node:fs/promises";
import { basename, extname, parse, resolve } from "node:path";

import { createChildLogger } from "../logger.js";
import type { ArchiveExpander } from "../archives/expander.js";
import type { TextExtractor } from "../extractors/backend.js";
import { classifyFilename } from "../filters/classifier.js";
import { Deduplicator, orderForDedupe } from "../filters/dedupe.js";
import type { RuleSet } from "../filters/rules.js";
import { cleanAndStructure, type SimilarityOptions } from "../cleaning/structure.js";
import type { DiskStorage } from "../storage/disk.js";
import { describeError } from "./exceptions.js";
import {
  emptyCounters,
  mergeCounters,
  type CleaningCounters,
  type DedupePriority,
  type DocumentRef,
  type SkipRecord,
  type SourceRecord,
} from "./types.js";

const log = createChildLogger({ module: "pipeline" });

export interface StageOutput<T> {
  items: T;
  skipped: SkipRecord[];
}

export interface ProcessedTexts {
  texts: string[];
  sources: SourceRecord[];
  stats: CleaningCounters;
}

export class DocumentPipeline {
  private storage: DiskStorage;
  private expander: ArchiveExpander;
  private extractor: TextExtractor;
  private rules: RuleSet;
  private allowedExtensions: string[];
  private dedupePriority: DedupePriority;
  private similarity: SimilarityOptions;

  constructor(opts: {
    storage: DiskStorage;
    expander: ArchiveExpander;
    extractor: TextExtractor;
    rules: RuleSet;
    allowedExtensions: string[];
    dedupePriority: DedupePriority;
    similarity: SimilarityOptions;
  }) {
    this.storage = opts.storage;
    this.expander = opts.expander;
    this.extractor = opts.extractor;
    this.rules = opts.rules;
    this.allowedExtensions = opts.allowedExtensions;
    this.dedupePriority = opts.dedupePriority;
    this.similarity = opts.similarity;
  }

  /** Step 1: expand archives into the run directory, pass files through. */
  async collect(paths: string[], runKey: string): Promise<StageOutput<DocumentRef[]>> {
    const items: DocumentRef[] = [];
    const skipped: SkipRecord[] = [];

    for (const path of paths) {
      const name = basename(path);
      let isFile = false;
      try {
        isFile = (await stat(path)).isFile();
      } catch {
        isFile = false;
      }
      if (!isFile) {
        log.warn({ path }, "file not found");
        skipped.push({ filename: name, reason: "missing-path" });
        continue;
      }

      if (!this.expander.isArchive(path)) {
        items.push({ name, path: resolve(path), fromArchive: false });
        continue;
      }

      log.info({ archive: name }, "unpacking archive");
      const destKey = await this.uniqueKey(`${runKey}/${parse(path).name || "archive"}`);
      const members = await this.expander.expandAll(path, this.storage.pathOf(destKey));
      if (members.length === 0) {
        skipped.push({ filename: name, reason: "archive-failed", detail: "no files extracted" });
      }
      items.push(...members);
    }

    return { items, skipped };
  }

  /** Step 2: extension allow-list, then the filename classifier. */
  select(refs: DocumentRef[]): StageOutput<DocumentRef[]> {
    const items: DocumentRef[] = [];
    const skipped: SkipRecord[] = [];

    for (const ref of refs) {
      const ext = extname(ref.name).toLowerCase();
      if (!this.allowedExtensions.includes(ext)) {
        log.info({ file: ref.name }, "ignored by extension");
        skipped.push({ filename: ref.name, reason: "disallowed-extension" });
        continue;
      }
      const verdict = classifyFilename(ref.name, this.rules.filename);
      if (!verdict.keep) {
        log.info({ file: ref.name, reason: verdict.reason }, "ignored by filename filter");
        skipped.push({ filename: ref.name, reason: "classified-out", detail: verdict.reason });
        continue;
      }
      items.push(ref);
    }

    return { items, skipped };
  }

  /** Step 3: content and name deduplication, first seen wins. */
  async dedupe(refs: DocumentRef[]): Promise<StageOutput<DocumentRef[]>> {
    const ordered = orderForDedupe(refs, this.dedupePriority);
    const byPath = new Map<string, DocumentRef>();
    for (const ref of ordered) {
      if (!byPath.has(ref.path)) byPath.set(ref.path, ref);
    }

    const report = await new Deduplicator().dedupeWithReport(ordered.map((r) => r.path));
    const items: DocumentRef[] = [];
    for (const path of report.unique) {
      const ref = byPath.get(path);
      if (ref) items.push(ref);
    }
    const skipped: SkipRecord[] = report.rejected.map((r) => ({
      filename: byPath.get(r.path)?.name ?? basename(r.path),
      reason: r.reason,
      detail: r.detail,
    }));

    log.info({ unique: items.length, files: items.map((r) => r.name) }, "after deduplication");
    return { items, skipped };
  }

  /** Step 4: extract and clean each file in order. */
  async process(refs: DocumentRef[]): Promise<StageOutput<ProcessedTexts>> {
    const texts: string[] = [];
    const sources: SourceRecord[] = [];
    const stats = emptyCounters();
    const skipped: SkipRecord[] = [];

    for (const ref of refs) {
      try {
        const text = await this.extractor.extract(ref.path);
        if (!text.trim()) {
          log.info({ file: ref.name }, "skipped: no text extracted");
          skipped.push({ filename: ref.name, reason: "empty-extraction" });
          continue;
        }

        const cleaned = cleanAndStructure(text, {
          similarity: this.similarity,
          template: this.rules.template,
          keySections: this.rules.keySections,
        });
        mergeCounters(stats, cleaned.stats);

        if (!cleaned.text) {
          log.info({ file: ref.name }, "skipped: empty after cleaning");
          skipped.push({ filename: ref.name, reason: "empty-after-cleaning" });
          continue;
        }

        texts.push(cleaned.text);
        sources.push({
          filename: ref.name,
          length: cleaned.text.length,
          originalLength: text.length,
          archive: ref.archive,
        });
        log.info(
          { file: ref.name, before: text.length, after: cleaned.text.length },
          "file processed",
        );
      } catch (err) {
        log.error({ file: ref.name, err: describeError(err) }, "file processing failed");
        skipped.push({ filename: ref.name, reason: "processing-failed", detail: describeError(err) });
      }
    }

    return { items: { texts, sources, stats }, skipped };
  }

  private async uniqueKey(base: string): Promise<string> {
    let key = base;
    for (let n = 2; await this.storage.exists(key); n++) {
      key = `${base}-${n}`;
    }
    return key;
  }
}
