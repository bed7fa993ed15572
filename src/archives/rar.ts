/**
 * Rar reader backed by the optional `node-unrar-js` package.
 *
 * The package sits in optionalDependencies; when it cannot be loaded the
 * reader reports itself unavailable instead of failing the run.
 */
import { readFile } from "node:fs/promises";

import { createChildLogger } from "../logger.js";
import { ArchiveExtractionError, describeError } from "../core/exceptions.js";
import type { ArchiveEntry, ArchiveReader } from "./backend.js";

type UnrarModule = typeof import("node-unrar-js");

const log = createChildLogger({ module: "rar" });

export class RarReader implements ArchiveReader {
  readonly extensions = [".rar"] as const;
  private module: Promise<UnrarModule | null> | null = null;

  private load(): Promise<UnrarModule | null> {
    if (!this.module) {
      this.module = import("node-unrar-js").then(
        (mod) => mod,
        (err: unknown) => {
          log.warn({ err: describeError(err) }, "node-unrar-js not installed; rar archives are skipped");
          return null;
        },
      );
    }
    return this.module;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.load()) !== null;
  }

  async entries(archivePath: string): Promise<ArchiveEntry[]> {
    const unrar = await this.load();
    if (!unrar) {
      throw new ArchiveExtractionError(archivePath, "rar support is not installed");
    }

    const buf = await readFile(archivePath);
    try {
      const extractor = await unrar.createExtractorFromData({
        data: new Uint8Array(buf).buffer,
      });
      const { files } = extractor.extract();

      const entries: ArchiveEntry[] = [];
      for (const file of files) {
        if (file.fileHeader.flags.directory || !file.extraction) continue;
        entries.push({
          name: file.fileHeader.name.replace(/\\/g, "/"),
          data: file.extraction,
        });
      }
      return entries;
    } catch (err) {
      throw new ArchiveExtractionError(archivePath, describeError(err));
    }
  }
}
