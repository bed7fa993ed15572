/**
 * Filename-first document selection with an optional content check.
 * Archives are unpacked into per-call temp directories that the filter
 * remembers until `cleanupTempDirs()`.
 */
import { randomUUID } from "node:crypto";
import { stat } from "node:fs/promises";
import { basename } from "node:path";

import { createChildLogger } from "../logger.js";
import type { ArchiveExpander } from "../archives/expander.js";
import type { TextExtractor } from "../extractors/backend.js";
import { classifyFilename } from "../filters/classifier.js";
import { isUsefulByText } from "../filters/content.js";
import type { RuleSet } from "../filters/rules.js";
import type { DiskStorage } from "../storage/disk.js";
import { describeError } from "./exceptions.js";

const log = createChildLogger({ module: "document-filter" });

export interface FilterOptions {
  /** Drop top-level files whose extracted text carries no technical marker. */
  checkContent?: boolean;
}

export class DocumentFilter {
  private storage: DiskStorage;
  private expander: ArchiveExpander;
  private extractor: TextExtractor;
  private rules: RuleSet;
  private tempKeys: string[] = [];

  constructor(opts: {
    storage: DiskStorage;
    expander: ArchiveExpander;
    extractor: TextExtractor;
    rules: RuleSet;
  }) {
    this.storage = opts.storage;
    this.expander = opts.expander;
    this.extractor = opts.extractor;
    this.rules = opts.rules;
  }

  async filter(paths: string[], options: FilterOptions = {}): Promise<string[]> {
    const candidates: string[] = [];
    const topLevel = new Set<string>();

    for (const path of paths) {
      let isFile = false;
      try {
        isFile = (await stat(path)).isFile();
      } catch {
        isFile = false;
      }
      if (!isFile) {
        log.warn({ path }, "file not found");
        continue;
      }

      if (this.expander.isArchive(path)) {
        const key = `extract_${randomUUID().slice(0, 8)}`;
        this.tempKeys.push(key);
        candidates.push(...(await this.expander.expand(path, this.storage.pathOf(key))));
      } else if (classifyFilename(basename(path), this.rules.filename).keep) {
        candidates.push(path);
        topLevel.add(path);
      } else {
        log.info({ file: basename(path) }, "ignored by filename filter");
      }
    }

    if (!options.checkContent) return candidates;

    const kept: string[] = [];
    // Archive members were already vetted by name inside the archive
    for (const path of candidates) {
      if (!topLevel.has(path)) {
        kept.push(path);
        continue;
      }
      const text = await this.extractor.extract(path);
      if (text && !isUsefulByText(text, this.rules.content)) {
        log.info({ file: basename(path) }, "ignored by content check");
        continue;
      }
      kept.push(path);
    }
    return kept;
  }

  /** Remove every temp directory this filter created. */
  async cleanupTempDirs(): Promise<void> {
    const keys = this.tempKeys;
    this.tempKeys = [];
    for (const key of keys) {
      try {
        await this.storage.deletePrefix(key);
        log.debug({ dir: key }, "temp directory removed");
      } catch (err) {
        log.warn({ dir: key, err: describeError(err) }, "could not remove temp directory");
      }
    }
  }
}
