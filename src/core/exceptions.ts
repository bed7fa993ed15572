/**
 * Custom exceptions for pipeline operations.
 *
 * None of these escape `TenderDigest.run()`: each is caught at item level
 * and recorded as a skip, or turned into a failure result.
 */

export class ArchiveExtractionError extends Error {
  archivePath: string;

  constructor(archivePath: string, message?: string) {
    super(
      message
        ? `Archive extraction failed for ${archivePath}: ${message}`
        : `Archive extraction failed for ${archivePath}`,
    );
    this.name = "ArchiveExtractionError";
    this.archivePath = archivePath;
  }
}

export class InvalidRunIdError extends Error {
  runId: string;

  constructor(runId: string) {
    super(`Run id is not a safe directory name: ${JSON.stringify(runId)}`);
    this.name = "InvalidRunIdError";
    this.runId = runId;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Stringify anything thrown. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
