/**
 * Archive expansion: writes members to a destination directory, sanitizes
 * their filenames and (optionally) applies the filename classifier.
 */
import { basename, extname, posix } from "node:path";

import { createChildLogger } from "../logger.js";
import { describeError } from "../core/exceptions.js";
import type { DocumentRef } from "../core/types.js";
import { classifyFilename } from "../filters/classifier.js";
import type { FilenameRules } from "../filters/rules.js";
import { DiskStorage } from "../storage/disk.js";
import { readerSupports, type ArchiveReader } from "./backend.js";
import { RarReader } from "./rar.js";
import { ZipReader } from "./zip.js";

const log = createChildLogger({ module: "archives" });

/** Control characters (line breaks included) become spaces, whitespace is squeezed. */
export function sanitizeFilename(name: string): string {
  return name
    .replace(/\p{Cc}/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Normalized member path, or null when it would land outside the destination. */
function safeMemberPath(name: string): string | null {
  const normalised = posix.normalize(name.replace(/\\/g, "/")).replace(/^\/+/, "");
  if (normalised === "." || normalised === ".." || normalised.startsWith("../")) {
    return null;
  }
  return normalised;
}

/** `key`, or `stem_2.ext`, `stem_3.ext`… when a sibling already holds it. */
async function freeKey(storage: DiskStorage, key: string): Promise<string> {
  const ext = posix.extname(key);
  const stem = key.slice(0, key.length - ext.length);
  let candidate = key;
  for (let n = 2; await storage.exists(candidate); n++) {
    candidate = `${stem}_${n}${ext}`;
  }
  return candidate;
}

export function defaultArchiveReaders(): ArchiveReader[] {
  return [new ZipReader(), new RarReader()];
}

export class ArchiveExpander {
  private readers: ArchiveReader[];
  private rules: FilenameRules | undefined;

  constructor(opts: { readers?: ArchiveReader[]; rules?: FilenameRules } = {}) {
    this.readers = opts.readers ?? defaultArchiveReaders();
    this.rules = opts.rules;
  }

  isArchive(path: string): boolean {
    return this.readers.some((r) => readerSupports(r, path));
  }

  /**
   * Extract every member into `destDir` and return the ones the filename
   * classifier keeps.
   */
  async expand(archivePath: string, destDir: string): Promise<string[]> {
    const refs = await this.expandAll(archivePath, destDir);
    const kept: string[] = [];
    for (const ref of refs) {
      if (classifyFilename(ref.name, this.rules).keep) {
        log.info({ file: ref.name }, "useful file found in archive");
        kept.push(ref.path);
      } else {
        log.debug({ file: ref.name }, "archive member filtered out");
      }
    }
    log.info({ archive: archivePath, kept: kept.length, total: refs.length }, "archive filtered");
    return kept;
  }

  /** Extract every member into `destDir`; no classification. */
  async expandAll(archivePath: string, destDir: string): Promise<DocumentRef[]> {
    const reader = this.readers.find((r) => readerSupports(r, archivePath));
    if (!reader) {
      log.warn({ archive: archivePath, ext: extname(archivePath) }, "unsupported archive format");
      return [];
    }
    if (!(await reader.isAvailable())) {
      log.error({ archive: archivePath }, "archive format support is not installed");
      return [];
    }

    try {
      const storage = new DiskStorage(destDir);
      const entries = await reader.entries(archivePath);
      log.info({ archive: archivePath, members: entries.length }, "unpacking archive");

      for (const entry of entries) {
        const key = safeMemberPath(entry.name);
        if (key === null) {
          log.warn({ archive: archivePath, member: entry.name }, "member path escapes destination, skipped");
          continue;
        }
        await storage.write(key, entry.data);
      }

      return await this.collect(storage, basename(archivePath));
    } catch (err) {
      log.error({ archive: archivePath, err: describeError(err) }, "archive processing failed");
      return [];
    }
  }

  /** Walk the destination, renaming members whose names need sanitizing. */
  private async collect(storage: DiskStorage, archive: string): Promise<DocumentRef[]> {
    const refs: DocumentRef[] = [];

    for (const key of await storage.list("")) {
      const original = posix.basename(key);
      const clean = sanitizeFilename(original);
      let finalKey = key;

      if (clean !== original) {
        try {
          const target = clean ? await freeKey(storage, posix.join(posix.dirname(key), clean)) : "";
          if (target && (await storage.rename(key, target))) {
            log.info({ from: original, to: clean }, "renamed archive member");
            finalKey = target;
          }
        } catch (err) {
          log.warn({ file: original, err: describeError(err) }, "could not rename archive member");
        }
      }

      refs.push({
        name: posix.basename(finalKey),
        path: storage.pathOf(finalKey),
        fromArchive: true,
        archive,
      });
    }

    return refs;
  }
}
