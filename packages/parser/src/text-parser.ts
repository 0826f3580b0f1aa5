import type { ParseResult } from "@groundwork/types";
import { ExtractionError } from "@groundwork/errors";
import type { IParser } from "./parser.interface.js";

const TEXT_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "text/csv",
  "text/html",
  "application/json",
];

const CHARS_PER_PAGE = 3000;

const HTML_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

// Closing these starts a new paragraph, so sentence boundaries survive
const BLOCK_TAG_REGEX =
  /<\/?(p|div|h[1-6]|li|ul|ol|tr|table|section|article|header|footer|blockquote|pre)\b[^>]*>|<br\s*\/?>/gi;

function decodeEntities(text: string): string {
  return text.replace(/&(#x?[0-9a-f]+|[a-z]+);/gi, (entity, body: string) => {
    if (body.startsWith("#")) {
      const hex = body[1]?.toLowerCase() === "x";
      const code = hex ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
    }
    return HTML_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

function stripHtml(html: string): string {
  return decodeEntities(
    html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<!--[\s\S]*?-->/g, "")
      .replace(BLOCK_TAG_REGEX, "\n\n")
      .replace(/<[^>]+>/g, " "),
  )
    .split(/\n{2,}/)
    .map((block) => block.replace(/\s+/g, " ").trim())
    .filter((block) => block.length > 0)
    .join("\n\n");
}

/**
 * Text-based formats: plain text, Markdown, CSV, JSON and HTML.
 * Bytes must be valid UTF-8. Line endings are normalised to `\n`; HTML keeps
 * one blank line between blocks.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const raw = typeof input === "string" ? input : this.decode(input);
    const text = raw.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");

    const cleanedText = mimeType === "text/html" ? stripHtml(text) : text.trim();

    return {
      text: cleanedText,
      pageCount: Math.max(1, Math.ceil(cleanedText.length / CHARS_PER_PAGE)),
      metadata: {
        mimeType,
        charCount: cleanedText.length,
        wordCount: cleanedText.split(/\s+/).filter((w) => w.length > 0).length,
      },
    };
  }

  private decode(bytes: Uint8Array): string {
    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch (err: unknown) {
      throw new ExtractionError("Text input is not valid UTF-8", { cause: err });
    }
  }
}
