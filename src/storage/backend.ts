/**
 * Abstract storage backend for per-run working files.
 */

export interface StorageBackend {
  /** Absolute location of `key` on disk. */
  pathOf(key: string): string;

  /** Write data to the given key, creating parent directories. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Create the directory for `key` (and its parents). */
  ensureDir(key: string): Promise<void>;

  /** Read data from the given key. */
  read(key: string): Promise<Uint8Array>;

  /** List all file keys under the given prefix, sorted. */
  list(prefix: string): Promise<string[]>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;

  /** Move a key; returns false when the source is missing. */
  rename(from: string, to: string): Promise<boolean>;

  /** Delete the given key. */
  delete(key: string): Promise<void>;

  /** Remove everything under the prefix. */
  deletePrefix(prefix: string): Promise<void>;
}
