/**
 * Text extraction interfaces.
 */

/**
 * Converts a file into raw text. Returns "" for anything that should be
 * skipped; never throws for an unsupported or unreadable file.
 */
export interface TextExtractor {
  extract(filePath: string): Promise<string>;
}

/** Format-specific extraction; may throw, the registry absorbs it. */
export interface ExtractionStrategy {
  extract(filePath: string): Promise<string>;
}
