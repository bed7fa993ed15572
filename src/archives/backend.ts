/**
 * Archive reader interface – one implementation per container format.
 */
import { extname } from "node:path";

export interface ArchiveEntry {
  /** Member path inside the archive, forward slashes. */
  name: string;
  data: Uint8Array;
}

export interface ArchiveReader {
  /** Lower-case extensions this reader handles, with the dot. */
  readonly extensions: readonly string[];

  /** Whether the format's library can be loaded in this process. */
  isAvailable(): Promise<boolean>;

  /** Read every file member; directories are skipped. */
  entries(archivePath: string): Promise<ArchiveEntry[]>;
}

export function readerSupports(reader: ArchiveReader, path: string): boolean {
  return reader.extensions.includes(extname(path).toLowerCase());
}
