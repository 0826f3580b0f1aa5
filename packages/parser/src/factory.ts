import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";

const textParser = new TextParser();
const pdfParser = new PdfParser();

const allParsers: IParser[] = [textParser, pdfParser];

const MIME_BY_EXTENSION: Record<string, string> = {
  pdf: "application/pdf",
  txt: "text/plain",
  text: "text/plain",
  md: "text/markdown",
  markdown: "text/markdown",
  csv: "text/csv",
  htm: "text/html",
  html: "text/html",
  json: "application/json",
};

/**
 * Select the appropriate parser based on mimeType.
 */
export function getParser(mimeType: string): IParser {
  const parser = allParsers.find((p) => p.supportedMimeTypes.includes(mimeType));

  // Default to text parser for unknown types
  return parser ?? textParser;
}

/** MIME type from a filename extension; unknown extensions read as plain text. */
export function detectMimeType(filename: string): string {
  const dot = filename.lastIndexOf(".");
  const extension = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : "";
  return MIME_BY_EXTENSION[extension] ?? "text/plain";
}
