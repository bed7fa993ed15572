/**
 * Process-wide pino logger.
 */
import { pino } from "pino";
import type { Logger } from "pino";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function resolveLevel(): string {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return LEVELS.includes(raw) ? raw : "info";
}

export const logger: Logger = pino({
  level: resolveLevel(),
  base: { service: "tender-digest" },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

const children: Logger[] = [];

/** Child logger tagged with the calling module. */
export function createChildLogger(context: Record<string, unknown>): Logger {
  const child = logger.child(context);
  children.push(child);
  return child;
}

/** Override the level at runtime (config `logLevel`); children follow. */
export function setLogLevel(level: string): void {
  if (!LEVELS.includes(level)) return;
  logger.level = level;
  for (const child of children) child.level = level;
}
