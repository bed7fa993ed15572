/**
 * Run-scoped deduplication by content fingerprint and normalized name.
 */
import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";

import { createChildLogger } from "../logger.js";
import type { DedupePriority, DocumentRef } from "../core/types.js";
import { normalizeFilename } from "./classifier.js";

const log = createChildLogger({ module: "dedupe" });

/** MD5 of the file bytes. */
export async function fingerprintFile(path: string): Promise<string> {
  const data = await readFile(path);
  return createHash("md5").update(data).digest("hex");
}

export interface DedupeRejection {
  path: string;
  reason: "duplicate-content" | "duplicate-name" | "unreadable";
  detail?: string;
}

export interface DedupeReport {
  unique: string[];
  rejected: DedupeRejection[];
}

/**
 * First-seen-wins deduplicator. One instance per pipeline run: the seen
 * sets persist across calls.
 */
export class Deduplicator {
  private seenHashes = new Set<string>();
  private seenNames = new Set<string>();

  async dedupe(paths: string[]): Promise<string[]> {
    const report = await this.dedupeWithReport(paths);
    return report.unique;
  }

  async dedupeWithReport(paths: string[]): Promise<DedupeReport> {
    const unique: string[] = [];
    const rejected: DedupeRejection[] = [];

    for (const path of paths) {
      const name = basename(path);
      const normName = normalizeFilename(name);

      let hash: string;
      try {
        hash = await fingerprintFile(path);
      } catch (err) {
        log.warn({ path, err: String(err) }, "cannot read file for hashing");
        rejected.push({ path, reason: "unreadable", detail: String(err) });
        continue;
      }

      if (this.seenHashes.has(hash)) {
        log.info({ file: name }, "duplicate by content");
        rejected.push({ path, reason: "duplicate-content" });
        continue;
      }
      if (this.seenNames.has(normName)) {
        log.info({ file: name }, "duplicate by name");
        rejected.push({ path, reason: "duplicate-name" });
        continue;
      }

      this.seenHashes.add(hash);
      this.seenNames.add(normName);
      unique.push(path);
    }

    return { unique, rejected };
  }
}

/** Dedupe with a fresh instance. */
export function dedupePaths(paths: string[]): Promise<string[]> {
  return new Deduplicator().dedupe(paths);
}

/**
 * Stable reorder of candidates so the preferred origin is seen first.
 * `input-order` leaves the caller's order untouched.
 */
export function orderForDedupe(
  refs: DocumentRef[],
  priority: DedupePriority,
): DocumentRef[] {
  if (priority === "input-order") return [...refs];
  const archived = refs.filter((r) => r.fromArchive);
  const topLevel = refs.filter((r) => !r.fromArchive);
  return priority === "archive-first"
    ? [...archived, ...topLevel]
    : [...topLevel, ...archived];
}
