/**
 * Tests for the line-level noise filter.
 */
import { describe, test, expect } from "vitest";
import { cleanTextBlocks, filterNoise } from "../src/cleaning/noise.js";

const RAW = [
  "Бумага офисная размера А4",
  "Участник закупки обязан предоставить образцы",
  "№ 5 пункт плана",
  "",
  "А4 80",
  "короткая",
  "12.",
  "Плотность 80 г/м2",
].join("\n");

describe("filterNoise", () => {
  test("drops boilerplate, shapes and short digit-free lines", () => {
    const result = filterNoise(RAW);
    expect(result.text).toBe("Бумага офисная размера А4\nА4 80\nПлотность 80 г/м2");
    expect(result.removed).toBe(5);
  });

  test("idempotent on clean text", () => {
    const once = cleanTextBlocks(RAW);
    expect(cleanTextBlocks(once)).toBe(once);
  });

  test("boilerplate match ignores case", () => {
    expect(filterNoise("СОГЛАСНО ТРЕБОВАНИЯМ стандарта поставки").text).toBe("");
  });

  test("short lines with any decimal digit survive", () => {
    expect(filterNoise("Лист ٣").text).toBe("Лист ٣");
  });

  test("CRLF line endings", () => {
    const result = filterNoise("Плотность 80 г/м2\r\nкороткая\r\nБелизна не менее 146%");
    expect(result.text).toBe("Плотность 80 г/м2\nБелизна не менее 146%");
    expect(result.removed).toBe(1);
  });

  test("custom rules", () => {
    const rules = { boilerplate: ["печать"], contentFreeShapes: [], minLineLength: 0 };
    expect(filterNoise("М.П. печать\nок", rules).text).toBe("ок");
  });
});
