/**
 * Tests for content and name deduplication.
 */
import { describe, test, expect } from "vitest";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import {
  Deduplicator,
  dedupePaths,
  fingerprintFile,
  orderForDedupe,
} from "../src/filters/dedupe.js";
import type { DocumentRef } from "../src/core/types.js";
import { makeTmpDir, writeDoc } from "./fixtures.js";

describe("fingerprintFile", () => {
  test("md5 of file bytes", async () => {
    const dir = makeTmpDir();
    const path = writeDoc(dir, "a.txt", "hello");
    expect(await fingerprintFile(path)).toBe("5d41402abc4b2a76b9719d911017c592");
  });
});

describe("Deduplicator", () => {
  test("identical content, different names: first wins", async () => {
    const dir = makeTmpDir();
    const a = writeDoc(dir, "ТЗ.txt", "одинаковое содержимое");
    const b = writeDoc(dir, "Спецификация.txt", "одинаковое содержимое");
    const report = await new Deduplicator().dedupeWithReport([a, b]);
    expect(report.unique).toEqual([a]);
    expect(report.rejected).toEqual([{ path: b, reason: "duplicate-content" }]);
  });

  test("equal normalized names, different content: first wins", async () => {
    const dir = makeTmpDir();
    mkdirSync(join(dir, "x"));
    mkdirSync(join(dir, "y"));
    const a = writeDoc(join(dir, "x"), "Техническое_задание.pdf", "версия 1");
    const b = writeDoc(join(dir, "y"), "техническое задание.docx", "версия 2");
    const report = await new Deduplicator().dedupeWithReport([a, b]);
    expect(report.unique).toEqual([a]);
    expect(report.rejected).toEqual([{ path: b, reason: "duplicate-name" }]);
  });

  test("unreadable path is rejected, not thrown", async () => {
    const dir = makeTmpDir();
    const ok = writeDoc(dir, "ТЗ.txt", "текст");
    const missing = join(dir, "нет.txt");
    const report = await new Deduplicator().dedupeWithReport([missing, ok]);
    expect(report.unique).toEqual([ok]);
    expect(report.rejected).toHaveLength(1);
    expect(report.rejected[0].path).toBe(missing);
    expect(report.rejected[0].reason).toBe("unreadable");
  });

  test("seen sets persist across calls on one instance", async () => {
    const dir = makeTmpDir();
    const a = writeDoc(dir, "ТЗ.txt", "текст");
    const b = writeDoc(dir, "Копия.txt", "текст");
    const dedup = new Deduplicator();
    expect(await dedup.dedupe([a])).toEqual([a]);
    expect(await dedup.dedupe([b])).toEqual([]);
  });

  test("idempotent on its own output", async () => {
    const dir = makeTmpDir();
    const paths = [
      writeDoc(dir, "a.txt", "1"),
      writeDoc(dir, "b.txt", "1"),
      writeDoc(dir, "c.txt", "2"),
    ];
    const once = await dedupePaths(paths);
    expect(once).toEqual([paths[0], paths[2]]);
    expect(await dedupePaths(once)).toEqual(once);
  });
});

describe("orderForDedupe", () => {
  const refs: DocumentRef[] = [
    { name: "a.txt", path: "/t/a.txt", fromArchive: false },
    { name: "b.txt", path: "/w/b.txt", fromArchive: true, archive: "x.zip" },
    { name: "c.txt", path: "/t/c.txt", fromArchive: false },
  ];

  test("input-order keeps the caller's order", () => {
    expect(orderForDedupe(refs, "input-order").map((r) => r.name)).toEqual([
      "a.txt",
      "b.txt",
      "c.txt",
    ]);
  });

  test("archive-first and top-level-first are stable", () => {
    expect(orderForDedupe(refs, "archive-first").map((r) => r.name)).toEqual([
      "b.txt",
      "a.txt",
      "c.txt",
    ]);
    expect(orderForDedupe(refs, "top-level-first").map((r) => r.name)).toEqual([
      "a.txt",
      "c.txt",
      "b.txt",
    ]);
  });
});
