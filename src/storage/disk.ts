/**
 * Local filesystem storage backend.
 */
import { access, mkdir, readFile, readdir, rename, rm, stat, unlink, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import type { StorageBackend } from "./backend.js";

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  get root(): string {
    return this.basePath;
  }

  /** Resolve a key under the base path; keys may not climb out of it. */
  pathOf(key: string): string {
    const full = resolve(this.basePath, key);
    if (full !== this.basePath && !full.startsWith(this.basePath + sep)) {
      throw new Error(`Storage key escapes base path: ${key}`);
    }
    return full;
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const fullPath = this.pathOf(key);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  }

  async ensureDir(key: string): Promise<void> {
    await mkdir(this.pathOf(key), { recursive: true });
  }

  async read(key: string): Promise<Uint8Array> {
    const buf = await readFile(this.pathOf(key));
    return new Uint8Array(buf);
  }

  async list(prefix: string): Promise<string[]> {
    const prefixPath = this.pathOf(prefix);
    try {
      const s = await stat(prefixPath);
      if (s.isFile()) return [prefix];
    } catch {
      return [];
    }

    const keys: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          // Keys are relative to basePath, always with forward slashes
          keys.push(relative(this.basePath, full).split(sep).join("/"));
        }
      }
    };

    await walk(prefixPath);
    return keys.sort();
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.pathOf(key));
      return true;
    } catch {
      return false;
    }
  }

  async rename(from: string, to: string): Promise<boolean> {
    if (!(await this.exists(from))) return false;
    const target = this.pathOf(to);
    await mkdir(dirname(target), { recursive: true });
    await rename(this.pathOf(from), target);
    return true;
  }

  async delete(key: string): Promise<void> {
    try {
      await unlink(this.pathOf(key));
    } catch {
      // Ignore if not found
    }
  }

  async deletePrefix(prefix: string): Promise<void> {
    await rm(this.pathOf(prefix), { recursive: true, force: true });
  }
}
