/**
 * Line-level noise filter: drops boilerplate, procedural and content-free
 * lines from raw extracted text.
 */
import { createChildLogger } from "../logger.js";
import { defaultRuleSet, type NoiseRules } from "../filters/rules.js";

const log = createChildLogger({ module: "noise" });

export interface NoiseFilterResult {
  text: string;
  removed: number;
}

const shapeCache = new WeakMap<NoiseRules, RegExp[]>();

function compileShapes(rules: NoiseRules): RegExp[] {
  let shapes = shapeCache.get(rules);
  if (!shapes) {
    shapes = rules.contentFreeShapes.map((p) => new RegExp(p, "iu"));
    shapeCache.set(rules, shapes);
  }
  return shapes;
}

function isNoise(trimmed: string, rules: NoiseRules, shapes: RegExp[]): boolean {
  if (!trimmed) return true;

  const lower = trimmed.toLowerCase();
  if (rules.boilerplate.some((p) => lower.includes(p))) return true;
  if (shapes.some((re) => re.test(trimmed))) return true;

  // Short fragments go unless they carry a digit (codes, sizes).
  return trimmed.length < rules.minLineLength && !/\p{Nd}/u.test(trimmed);
}

export function filterNoise(
  rawText: string,
  rules: NoiseRules = defaultRuleSet().noise,
): NoiseFilterResult {
  const shapes = compileShapes(rules);
  const lines = rawText.split(/\r?\n/);
  const kept: string[] = [];
  let removed = 0;

  for (const line of lines) {
    if (isNoise(line.trim(), rules, shapes)) {
      removed++;
      continue;
    }
    kept.push(line);
  }

  const text = kept.join("\n");
  log.debug(
    { removed, total: lines.length, before: rawText.length, after: text.length },
    "noise filter done",
  );
  return { text, removed };
}

/** Text-only form of {@link filterNoise}. */
export function cleanTextBlocks(rawText: string, rules?: NoiseRules): string {
  return filterNoise(rawText, rules).text;
}
