/**
 * Zip reader backed by fflate.
 */
import { readFile } from "node:fs/promises";
import { unzipSync } from "fflate";

import { ArchiveExtractionError, describeError } from "../core/exceptions.js";
import type { ArchiveEntry, ArchiveReader } from "./backend.js";

export class ZipReader implements ArchiveReader {
  readonly extensions = [".zip"] as const;

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async entries(archivePath: string): Promise<ArchiveEntry[]> {
    const zipData = await readFile(archivePath);
    let files: Record<string, Uint8Array>;
    try {
      files = unzipSync(new Uint8Array(zipData));
    } catch (err) {
      throw new ArchiveExtractionError(archivePath, describeError(err));
    }

    const entries: ArchiveEntry[] = [];
    for (const [name, data] of Object.entries(files)) {
      // Skip directories (empty data with trailing /)
      if (name.endsWith("/") && data.length === 0) continue;
      entries.push({ name, data });
    }
    return entries;
  }
}
