/**
 * DOCX extraction via mammoth's raw-text conversion.
 */
import mammoth from "mammoth";

import { createChildLogger } from "../logger.js";
import type { ExtractionStrategy } from "./backend.js";

const log = createChildLogger({ module: "docx" });

export class DocxExtractionStrategy implements ExtractionStrategy {
  async extract(filePath: string): Promise<string> {
    const result = await mammoth.extractRawText({ path: filePath });
    if (result.messages.length > 0) {
      log.debug({ file: filePath, messages: result.messages.length }, "mammoth reported warnings");
    }
    return result.value;
  }
}
