/**
 * Tests for analysis prompt assembly.
 */
import { describe, test, expect } from "vitest";
import {
  buildFinalPrompt,
  buildPromptFromResult,
  formatPrice,
  PROMPT_CUT_MARKER,
  TEXT_CUT_MARKER,
} from "../src/prompt/builder.js";
import type { PipelineResult } from "../src/core/types.js";

const STATS = {
  noiseLinesRemoved: 0,
  longNumbersRemoved: 0,
  duplicatesRemoved: 0,
  keyHeadersFound: 0,
};

describe("formatPrice", () => {
  test("groups thousands with spaces", () => {
    expect(formatPrice(1234567.5)).toBe("1 234 567.50");
    expect(formatPrice("30727.4")).toBe("30 727.40");
    expect(formatPrice(999)).toBe("999.00");
  });

  test("missing or unparsable", () => {
    expect(formatPrice(null)).toBe("Не указана");
    expect(formatPrice(undefined)).toBe("Не указана");
    expect(formatPrice("по запросу")).toBe("по запросу");
  });
});

describe("buildFinalPrompt", () => {
  test("summary, items and document text", () => {
    const prompt = buildFinalPrompt({
      summary: { number: "0373100000124000001", title: "Поставка бумаги", price: 30727.4 },
      items: [{ name: "Бумага", quantity: 10, unit: "пач.", price: 250, total: 2500 }],
      text: "Плотность 80 г/м2",
    });
    const lines = prompt.split("\n");
    expect(lines).toContain("• Номер: 0373100000124000001");
    expect(lines).toContain("• Заказчик: Не указан");
    expect(lines).toContain("• Начальная цена: 30 727.40 руб.");
    expect(lines).toContain("1. Бумага: 10 пач. × 250.00 = 2 500.00 руб.");
    expect(prompt).toContain("<<<\nПлотность 80 г/м2\n>>>");
  });

  test("no text, no document block", () => {
    const prompt = buildFinalPrompt({ summary: {} });
    expect(prompt).not.toContain("<<<");
    expect(prompt.split("\n")).toContain("• Название: Не указано");
  });

  test("over budget: document text is cut first", () => {
    const prompt = buildFinalPrompt({ summary: {}, text: "слово ".repeat(5000) });
    expect(prompt.length).toBeLessThanOrEqual(16000);
    expect(prompt).toContain(`${TEXT_CUT_MARKER}\n>>>`);
  });

  test("too little room: the whole prompt is cut", () => {
    const prompt = buildFinalPrompt({ summary: {}, text: "слово ".repeat(100) }, 300);
    expect(prompt).toHaveLength(300);
    expect(prompt.endsWith(PROMPT_CUT_MARKER)).toBe(true);
  });
});

describe("buildPromptFromResult", () => {
  test("uses the truncated pipeline text", () => {
    const result: PipelineResult = {
      success: true,
      text: "a".repeat(50),
      length: 50,
      sources: [],
      stats: STATS,
      skipped: [],
    };
    const prompt = buildPromptFromResult({}, [], result, { maxTextLength: 20 });
    expect(prompt).toContain(`<<<\n${"a".repeat(20)}\n>>>`);
  });

  test("failed run contributes no text", () => {
    const result: PipelineResult = {
      success: false,
      error: "No suitable files found for processing",
      text: "",
      length: 0,
      sources: [],
      stats: STATS,
      skipped: [],
    };
    expect(buildPromptFromResult({}, [], result)).not.toContain("<<<");
  });
});
