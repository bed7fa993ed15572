/**
 * PDF extraction via pdfjs-dist text content. Scanned PDFs yield little or
 * no text; OCR is not attempted.
 */
import { readFile } from "node:fs/promises";

import type { ExtractionStrategy } from "./backend.js";

export class PdfExtractionStrategy implements ExtractionStrategy {
  async extract(filePath: string): Promise<string> {
    // Loaded lazily: pdf.js is heavy and only PDFs need it.
    const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
    const data = new Uint8Array(await readFile(filePath));
    const doc = await pdfjs.getDocument({
      data,
      useSystemFonts: true,
      isEvalSupported: false,
    }).promise;

    try {
      const pages: string[] = [];
      for (let i = 1; i <= doc.numPages; i++) {
        const page = await doc.getPage(i);
        const content = await page.getTextContent();
        let text = "";
        for (const item of content.items) {
          if ("str" in item) {
            text += item.str + (item.hasEOL ? "\n" : "");
          }
        }
        pages.push(text);
        page.cleanup();
      }
      return pages.join("\n");
    } finally {
      await doc.destroy();
    }
  }
}
