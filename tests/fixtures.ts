/**
 * Shared test fixtures: temp dirs, zip builder, pre-configured digest.
 */
import { mkdtempSync, writeFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { zipSync, strToU8 } from "fflate";

import { TenderDigest, type TenderDigestOptions } from "../src/index.js";
import type { TextExtractor } from "../src/extractors/backend.js";
import { DiskStorage } from "../src/storage/disk.js";

// ---------------------------------------------------------------------------
// Document texts
// ---------------------------------------------------------------------------

export const TECH_SPEC_TEXT = [
  "Наименование товара: бумага офисная А4",
  "Плотность бумаги 80 г/м2, белизна 146%",
  "Товар должен быть новым и не бывшим в употреблении",
].join("\n");

export const TECH_SPEC_CLEANED = [
  "Наименование товара: бумага офисная А4",
  "Плотность бумаги 80 г/м2, белизна 146%",
  "",
  "**Требования к товару**",
  "Товар должен быть новым и не бывшим в употреблении",
].join("\n");

export const CONTRACT_TEXT = [
  "Настоящий контракт вступает в силу с момента подписания",
  "Права и обязанности сторон определены разделом 4",
].join("\n");

export const TEMPLATE_NOISE_TEXT = [
  "Поставка бумаги офисной для нужд учреждения",
  "ИКЗ: 123456789012345678",
  ...Array.from({ length: 10 }, () => '_________ "____" ____'),
].join("\n");

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "tender-digest-test-"));
}

export function buildZip(files: Record<string, string | Uint8Array>): Uint8Array {
  const entries: Record<string, Uint8Array> = {};
  for (const [name, content] of Object.entries(files)) {
    entries[name] = typeof content === "string" ? strToU8(content) : content;
  }
  return zipSync(entries);
}

/** Write `content` to `dir/name` and return the path. */
export function writeDoc(dir: string, name: string, content: string | Uint8Array): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

/** Reads every file as UTF-8, whatever its extension. */
export class Utf8TextExtractor implements TextExtractor {
  calls: string[] = [];

  async extract(filePath: string): Promise<string> {
    this.calls.push(filePath);
    return readFile(filePath, "utf-8");
  }
}

export function makeDigest(
  dir: string,
  opts: Partial<TenderDigestOptions> = {},
): TenderDigest {
  return new TenderDigest({
    storage: new DiskStorage(join(dir, "work")),
    extractor: new Utf8TextExtractor(),
    ...opts,
  });
}
