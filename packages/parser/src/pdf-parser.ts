import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ParseResult } from "@groundwork/types";
import { ExtractionError, errorMessage } from "@groundwork/errors";
import type { IParser } from "./parser.interface.js";

const PDF_MIME_TYPES = ["application/pdf"];

/**
 * PDF text extraction using Mozilla's pdfjs-dist (legacy build for Node).
 * One text block per page; pages are separated by a blank line.
 */
export class PdfParser implements IParser {
  readonly supportedMimeTypes = PDF_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    if (typeof input === "string") {
      throw new ExtractionError("PDF input must be binary");
    }

    // pdfjs transfers the buffer to its worker; hand it a copy
    const data = new Uint8Array(input);

    try {
      const pdf = await getDocument({ data, useSystemFonts: true, isEvalSupported: false })
        .promise;

      const pageTexts: string[] = [];
      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();
        const pageText = textContent.items
          .map((item) => ("str" in item ? item.str : ""))
          .join(" ")
          .replace(/[ \t]+/g, " ")
          .trim();
        pageTexts.push(pageText);
        page.cleanup();
      }

      const pageCount = pdf.numPages;
      await pdf.destroy();

      const text = pageTexts.filter((t) => t.length > 0).join("\n\n");
      return {
        text,
        pageCount,
        metadata: { mimeType, charCount: text.length },
      };
    } catch (err: unknown) {
      throw new ExtractionError(`Unreadable PDF: ${errorMessage(err)}`, { cause: err });
    }
  }
}
