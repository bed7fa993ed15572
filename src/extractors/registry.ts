/**
 * Extractor registry – maps file extensions to extraction strategies.
 */
import { extname } from "node:path";

import { createChildLogger } from "../logger.js";
import { describeError } from "../core/exceptions.js";
import type { ExtractionStrategy, TextExtractor } from "./backend.js";
import { DocxExtractionStrategy } from "./docx.js";
import { PdfExtractionStrategy } from "./pdf.js";
import { PlainTextExtractionStrategy, RtfExtractionStrategy } from "./plain.js";

const log = createChildLogger({ module: "extractors" });

/** Formats accepted but never read: legacy binary office files and images (OCR). */
class SkippedFormatStrategy implements ExtractionStrategy {
  async extract(filePath: string): Promise<string> {
    log.info({ file: filePath }, "format needs OCR or a binary parser; skipped");
    return "";
  }
}

export const EXTRACTOR_REGISTRY: Record<string, new () => ExtractionStrategy> = {
  ".txt": PlainTextExtractionStrategy,
  ".docx": DocxExtractionStrategy,
  ".pdf": PdfExtractionStrategy,
  ".rtf": RtfExtractionStrategy,
  ".doc": SkippedFormatStrategy,
  ".jpg": SkippedFormatStrategy,
  ".jpeg": SkippedFormatStrategy,
  ".png": SkippedFormatStrategy,
  ".bmp": SkippedFormatStrategy,
};

/** Dispatches on extension; unknown formats and failures give "". */
export class RegistryTextExtractor implements TextExtractor {
  private strategies = new Map<string, ExtractionStrategy>();
  private registry: Record<string, new () => ExtractionStrategy>;

  constructor(registry: Record<string, new () => ExtractionStrategy> = EXTRACTOR_REGISTRY) {
    this.registry = registry;
  }

  private strategyFor(ext: string): ExtractionStrategy | null {
    const existing = this.strategies.get(ext);
    if (existing) return existing;
    const Strategy = this.registry[ext];
    if (!Strategy) return null;
    const created = new Strategy();
    this.strategies.set(ext, created);
    return created;
  }

  async extract(filePath: string): Promise<string> {
    const ext = extname(filePath).toLowerCase();
    const strategy = this.strategyFor(ext);
    if (!strategy) {
      log.debug({ file: filePath, ext }, "unsupported format for text extraction");
      return "";
    }

    try {
      return await strategy.extract(filePath);
    } catch (err) {
      log.error({ file: filePath, err: describeError(err) }, "text extraction failed");
      return "";
    }
  }
}
