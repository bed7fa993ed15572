/**
 * Tests for length bounding.
 */
import { describe, test, expect } from "vitest";
import { DEFAULT_MAX_CHARS, truncate } from "../src/cleaning/truncate.js";

describe("truncate", () => {
  test("text under budget is unchanged", () => {
    expect(truncate("короткий текст", 100)).toBe("короткий текст");
    expect(truncate("x".repeat(100), 100)).toBe("x".repeat(100));
  });

  test("cuts at the last space near the end", () => {
    const text = "a".repeat(95) + " " + "b".repeat(10);
    expect(truncate(text, 100)).toBe("a".repeat(95));
  });

  test("a newline is a boundary too", () => {
    const text = "aaaaaaaaa\n".repeat(10) + "b".repeat(20);
    expect(truncate(text, 105)).toBe("aaaaaaaaa\n".repeat(9) + "aaaaaaaaa");
  });

  test("hard cut when the last space is too early", () => {
    const text = "a".repeat(50) + " " + "b".repeat(100);
    expect(truncate(text, 100)).toBe("a".repeat(50) + " " + "b".repeat(49));
  });

  test("hard cut without spaces", () => {
    expect(truncate("a".repeat(200), 100)).toHaveLength(100);
  });

  test("never grows and is idempotent", () => {
    const text = "слово ".repeat(50);
    for (const n of [1, 10, 57, 299, 300, 400]) {
      const once = truncate(text, n);
      expect(once.length).toBeLessThanOrEqual(Math.min(n, text.length));
      expect(truncate(once, n)).toBe(once);
    }
  });

  test("default budget", () => {
    expect(DEFAULT_MAX_CHARS).toBe(15000);
    expect(truncate("x".repeat(20000))).toHaveLength(15000);
  });
});
