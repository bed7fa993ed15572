#!/usr/bin/env node
/**
 * CLI entrypoint for tender-digest.
 *
 * Usage:
 *   tender-digest --run-id 0373100000124000001 docs.zip spec.pdf
 *   tender-digest --run-id t1 --prompt --title "Поставка бумаги" docs.zip
 */
import { parseArgs } from "node:util";
import { buildPromptFromResult, TenderDigest } from "./index.js";

const USAGE = `
tender-digest: cleaned text from tender documentation

Usage:
  tender-digest --run-id <id> <file-or-archive>...

Options:
  --run-id <id>          Run identifier, names the work subdirectory (required)
  --work-dir <dir>       Work root               (default: ./download_files/temp_cleaned)
  --max-chars <n>        Text budget for --prompt (default: 15000)
  --prompt               Print an analysis prompt instead of the bare text
  --title <text>         Tender title for --prompt
  --keep                 Keep the run directory afterwards
  --log-level <level>    fatal|error|warn|info|debug|trace|silent
  --help                 Show this help
`.trim();

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    "run-id": { type: "string" },
    "work-dir": { type: "string" },
    "max-chars": { type: "string" },
    prompt: { type: "boolean", default: false },
    title: { type: "string" },
    keep: { type: "boolean", default: false },
    "log-level": { type: "string" },
    help: { type: "boolean", short: "h", default: false },
  },
  allowPositionals: true,
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const runId = values["run-id"];
if (!runId || positionals.length === 0) {
  console.error(USAGE);
  process.exit(1);
}

const digest = TenderDigest.fromConfig({
  workDir: values["work-dir"],
  maxChars: values["max-chars"] ? Number(values["max-chars"]) : undefined,
  logLevel: values["log-level"],
});

const result = await digest.run(positionals, runId);
try {
  if (!result.success) {
    console.error(`Error: ${result.error}`);
    for (const skip of result.skipped) {
      console.error(`  skipped ${skip.filename}: ${skip.reason}${skip.detail ? ` (${skip.detail})` : ""}`);
    }
    process.exitCode = 1;
  } else if (values.prompt) {
    console.log(
      buildPromptFromResult({ number: runId, title: values.title }, [], result, {
        maxTextLength: digest.maxChars,
      }),
    );
  } else {
    console.log(result.text);
    console.error(
      `\n${result.sources.length} file(s), ${result.length} chars; ` +
        `noise ${result.stats.noiseLinesRemoved}, long numbers ${result.stats.longNumbersRemoved}, ` +
        `duplicates ${result.stats.duplicatesRemoved}, headers ${result.stats.keyHeadersFound}`,
    );
  }
} finally {
  if (!values.keep) await digest.cleanup(runId);
}
