/**
 * Secondary, content-based usefulness check.
 */
import { createChildLogger } from "../logger.js";
import { defaultRuleSet, type ContentRules } from "./rules.js";

const log = createChildLogger({ module: "content-filter" });

/** True when the text mentions at least one technical-requirement marker. */
export function isUsefulByText(
  text: string,
  rules: ContentRules = defaultRuleSet().content,
): boolean {
  const lower = text.toLowerCase();
  const useful = rules.usefulMarkers.some((marker) => lower.includes(marker));
  log.debug({ useful }, "content check");
  return useful;
}
