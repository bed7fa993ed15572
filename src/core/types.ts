/**
 * Pipeline data model.
 */

/** One input item: a top-level file or a member extracted from an archive. */
export interface DocumentRef {
  /** Filename as seen by the classifier (sanitized for archive members). */
  name: string;
  /** Location on disk. */
  path: string;
  fromArchive: boolean;
  /** Archive the member came from, when `fromArchive` is set. */
  archive?: string;
}

export type ClassificationReason =
  | "matched-include-keyword"
  | "matched-exclude-keyword"
  | "short-neutral-name"
  | "long-uninformative-name"
  | "disallowed-extension";

export interface ClassificationVerdict {
  keep: boolean;
  reason: ClassificationReason;
  /** Normalized form of the filename the rules were applied to. */
  normalized: string;
}

/** Additive counters accumulated while cleaning. */
export interface CleaningCounters {
  noiseLinesRemoved: number;
  longNumbersRemoved: number;
  duplicatesRemoved: number;
  keyHeadersFound: number;
}

export interface CleaningStats extends CleaningCounters {
  originalLength: number;
  cleanedLength: number;
}

export interface CleanResult {
  text: string;
  stats: CleaningStats;
}

/** Provenance of one file that contributed text. */
export interface SourceRecord {
  filename: string;
  /** Cleaned length. */
  length: number;
  originalLength: number;
  /** Archive the file was unpacked from. */
  archive?: string;
}

export type SkipReason =
  | "missing-path"
  | "archive-failed"
  | "disallowed-extension"
  | "classified-out"
  | "duplicate-content"
  | "duplicate-name"
  | "unreadable"
  | "empty-extraction"
  | "empty-after-cleaning"
  | "processing-failed";

export interface SkipRecord {
  filename: string;
  reason: SkipReason;
  detail?: string;
}

interface PipelineResultBase {
  text: string;
  length: number;
  sources: SourceRecord[];
  stats: CleaningCounters;
  skipped: SkipRecord[];
}

export interface PipelineSuccess extends PipelineResultBase {
  success: true;
}

export interface PipelineFailure extends PipelineResultBase {
  success: false;
  error: string;
}

/** Result returned from TenderDigest.run(). */
export type PipelineResult = PipelineSuccess | PipelineFailure;

/** Ordering applied to candidates before deduplication. */
export type DedupePriority = "input-order" | "archive-first" | "top-level-first";

export function emptyCounters(): CleaningCounters {
  return {
    noiseLinesRemoved: 0,
    longNumbersRemoved: 0,
    duplicatesRemoved: 0,
    keyHeadersFound: 0,
  };
}

/** Add `from` into `into` in place. */
export function mergeCounters(into: CleaningCounters, from: CleaningCounters): void {
  into.noiseLinesRemoved += from.noiseLinesRemoved;
  into.longNumbersRemoved += from.longNumbersRemoved;
  into.duplicatesRemoved += from.duplicatesRemoved;
  into.keyHeadersFound += from.keyHeadersFound;
}
