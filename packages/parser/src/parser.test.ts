import { describe, it, expect } from "vitest";
import { ExtractionError } from "@groundwork/errors";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";
import { getParser, detectMimeType } from "./factory.js";

describe("TextParser", () => {
  const parser = new TextParser();

  it("supports text MIME types", () => {
    expect(parser.supportedMimeTypes).toContain("text/plain");
    expect(parser.supportedMimeTypes).toContain("text/markdown");
    expect(parser.supportedMimeTypes).toContain("text/html");
  });

  it("parses plain text string", async () => {
    const result = await parser.parse("Hello world", "text/plain");

    expect(result.text).toBe("Hello world");
    expect(result.pageCount).toBe(1);
    expect(result.metadata).toEqual({ mimeType: "text/plain", charCount: 11, wordCount: 2 });
  });

  it("parses Uint8Array input", async () => {
    const input = new TextEncoder().encode("Encoded text");
    const result = await parser.parse(input, "text/plain");

    expect(result.text).toBe("Encoded text");
  });

  it("strips HTML tags, scripts and styles", async () => {
    const html =
      '<script>alert("x")</script><style>p{color:red}</style><h1>Title</h1><p>Content with <b>bold</b> text</p>';
    const result = await parser.parse(html, "text/html");

    expect(result.text).toBe("Title\n\nContent with bold text");
  });

  it("decodes entities and drops comments", async () => {
    const result = await parser.parse("<p>Fish &amp; chips<!-- note --> &#8364;5 &lt;ok&gt;</p>", "text/html");

    expect(result.text).toBe("Fish & chips \u20AC5 <ok>");
  });

  it("normalises line endings and a byte order mark", async () => {
    const result = await parser.parse("\uFEFFline one\r\nline two\r", "text/plain");

    expect(result.text).toBe("line one\nline two");
  });

  it("raises ExtractionError for bytes that are not UTF-8", async () => {
    await expect(parser.parse(new Uint8Array([0xff, 0xfe, 0xfd]), "text/plain")).rejects.toThrow(
      "Text input is not valid UTF-8",
    );
  });

  it("estimates page count", async () => {
    const result = await parser.parse("x".repeat(9000), "text/plain");
    expect(result.pageCount).toBe(3);
  });
});

describe("PdfParser", () => {
  const parser = new PdfParser();

  it("supports application/pdf", () => {
    expect(parser.supportedMimeTypes).toEqual(["application/pdf"]);
  });

  it("rejects string input", async () => {
    await expect(parser.parse("not binary", "application/pdf")).rejects.toThrow(
      "PDF input must be binary",
    );
  });

  it("raises ExtractionError for bytes that are not a PDF", async () => {
    const bytes = new TextEncoder().encode("plain text pretending to be a pdf");
    await expect(parser.parse(bytes, "application/pdf")).rejects.toBeInstanceOf(ExtractionError);
  });
});

describe("getParser factory", () => {
  it("returns the PDF parser for application/pdf", () => {
    expect(getParser("application/pdf")).toBeInstanceOf(PdfParser);
  });

  it("returns TextParser for markdown and unknown types", () => {
    expect(getParser("text/markdown")).toBeInstanceOf(TextParser);
    expect(getParser("application/unknown")).toBeInstanceOf(TextParser);
  });
});

describe("detectMimeType", () => {
  it("maps known extensions case-insensitively", () => {
    expect(detectMimeType("report.PDF")).toBe("application/pdf");
    expect(detectMimeType("notes.md")).toBe("text/markdown");
    expect(detectMimeType("page.html")).toBe("text/html");
  });

  it("falls back to text/plain", () => {
    expect(detectMimeType("README")).toBe("text/plain");
    expect(detectMimeType("archive.zip")).toBe("text/plain");
  });
});
