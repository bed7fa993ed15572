/**
 * Tests for filterDocuments() and its temp-directory bookkeeping.
 */
import { describe, test, expect } from "vitest";
import { existsSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import {
  buildZip,
  CONTRACT_TEXT,
  makeDigest,
  makeTmpDir,
  TECH_SPEC_TEXT,
  writeDoc,
} from "./fixtures.js";

describe("filterDocuments", () => {
  test("filename filter over files and archive members", async () => {
    const dir = makeTmpDir();
    const digest = makeDigest(dir);
    const tz = writeDoc(dir, "ТЗ.txt", TECH_SPEC_TEXT);
    const contract = writeDoc(dir, "Договор.txt", CONTRACT_TEXT);
    const zip = writeDoc(
      dir,
      "docs.zip",
      buildZip({ "Спецификация.txt": TECH_SPEC_TEXT, "Анкета.txt": "анкета" }),
    );

    const kept = await digest.filterDocuments([tz, contract, zip, join(dir, "нет.txt")]);

    expect(kept).toHaveLength(2);
    expect(kept[0]).toBe(tz);
    expect(basename(kept[1])).toBe("Спецификация.txt");
    expect(basename(dirname(kept[1]))).toMatch(/^extract_[0-9a-f]{8}$/);
  });

  test("content check drops files without technical markers", async () => {
    const dir = makeTmpDir();
    const digest = makeDigest(dir);
    const greeting = writeDoc(dir, "ТЗ.txt", "Добрый день коллеги");
    const spec = writeDoc(dir, "Спецификация.txt", TECH_SPEC_TEXT);
    const empty = writeDoc(dir, "Размеры.txt", "");

    const kept = await digest.filterDocuments([greeting, spec, empty], { checkContent: true });

    // Files with no extractable text stay in
    expect(kept).toEqual([spec, empty]);
  });

  test("content check leaves archive members alone", async () => {
    const dir = makeTmpDir();
    const digest = makeDigest(dir);
    const zip = writeDoc(dir, "docs.zip", buildZip({ "ТЗ.txt": "Добрый день коллеги" }));
    const greeting = writeDoc(dir, "Спецификация.txt", "Добрый день коллеги");

    const kept = await digest.filterDocuments([zip, greeting], { checkContent: true });

    expect(kept.map((p) => basename(p))).toEqual(["ТЗ.txt"]);
  });

  test("cleanupTempDirs removes extraction directories", async () => {
    const dir = makeTmpDir();
    const digest = makeDigest(dir);
    const zip = writeDoc(dir, "docs.zip", buildZip({ "Спецификация.txt": TECH_SPEC_TEXT }));

    const [member] = await digest.filterDocuments([zip]);
    const tempDir = dirname(member);
    expect(existsSync(tempDir)).toBe(true);

    await digest.cleanupTempDirs();
    expect(existsSync(tempDir)).toBe(false);
    await digest.cleanupTempDirs();
  });
});
