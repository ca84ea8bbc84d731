/**
 * Text extraction capabilities, one per family of formats.
 *
 * A source resolves each file to the first type whose canProcess() accepts
 * it, or to {@link unsupported}, which the ingestion pipeline ignores.
 */
import path from "node:path";
import type { Readable } from "node:stream";
import { buffer, text } from "node:stream/consumers";
import * as mammoth from "mammoth";
import { PDFParse } from "pdf-parse";
import type { DocumentType } from "./types";

/** Lowercased extension without the leading dot ("" when none). */
export function extensionOf(locator: string): string {
  return path.extname(locator).slice(1).toLowerCase();
}

function normalizeExtensions(exts: readonly string[]): Set<string> {
  return new Set(exts.map((e) => e.trim().toLowerCase().replace(/^\./, "")).filter(Boolean));
}

/** Binary formats that must never be read as UTF-8. */
const BINARY_EXTENSIONS = ["pdf", "docx", "doc"];

/** UTF-8 text formats (source code, markdown, config files...). */
export class TextDocumentType implements DocumentType {
  public readonly name = "text";
  private readonly extensions: Set<string>;

  public constructor(extensions: readonly string[]) {
    this.extensions = normalizeExtensions(extensions);
    for (const ext of BINARY_EXTENSIONS) this.extensions.delete(ext);
  }

  public canProcess(locator: string): boolean {
    return this.extensions.has(extensionOf(locator));
  }

  public async getText(stream: Readable): Promise<string> {
    const content = await text(stream);
    return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  }
}

/** PDF text layer via pdf-parse. Scanned PDFs without text yield "". */
export class PdfDocumentType implements DocumentType {
  public readonly name = "pdf";

  public canProcess(locator: string): boolean {
    return extensionOf(locator) === "pdf";
  }

  public async getText(stream: Readable): Promise<string> {
    const data = await buffer(stream);
    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      return result.text || "";
    } finally {
      await parser.destroy();
    }
  }
}

/** Word documents (.docx) via mammoth. Legacy .doc files are not readable. */
export class WordDocumentType implements DocumentType {
  public readonly name = "word";

  public canProcess(locator: string): boolean {
    return extensionOf(locator) === "docx";
  }

  public async getText(stream: Readable): Promise<string> {
    const result = await mammoth.extractRawText({ buffer: await buffer(stream) });
    return result.value;
  }
}

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

function decodeEntity(match: string, body: string): string {
  if (body[0] !== "#") return ENTITIES[body.toLowerCase()] ?? match;
  const code = body[1] === "x" || body[1] === "X" ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
  return Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
}

/**
 * Visible text of an HTML page: head, scripts, styles and comments dropped,
 * block ends turned into line breaks, entities decoded in a single pass.
 */
export function htmlToText(html: string): string {
  return html
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/<(head|script|style|noscript|template)\b[\s\S]*?<\/\1\s*>/gi, "")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|li|h[1-6]|tr|section|article|blockquote|pre)\s*>/gi, "\n")
    .replace(/<[^>]*>/g, "")
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, decodeEntity)
    .replace(/[ \t\f\v\r]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** HTML pages, reduced to their text before chunking. */
export class HtmlDocumentType implements DocumentType {
  public readonly name = "html";

  public canProcess(locator: string): boolean {
    const ext = extensionOf(locator);
    return ext === "html" || ext === "htm";
  }

  public async getText(stream: Readable): Promise<string> {
    return htmlToText(await text(stream));
  }
}

class UnsupportedDocumentType implements DocumentType {
  public readonly name = "unsupported";

  public canProcess(): boolean {
    return false;
  }

  public async getText(_stream: Readable, locator: string): Promise<string> {
    throw new Error(`No text extractor for ${locator}`);
  }
}

/** Distinguished "unknown format" capability; records carrying it are ignored. */
export const unsupported: DocumentType = new UnsupportedDocumentType();

export function isUnsupported(docType: DocumentType): boolean {
  return docType === unsupported;
}

/** First type in `types` that accepts `locator`, else {@link unsupported}. */
export function resolveDocumentType(locator: string, types: readonly DocumentType[]): DocumentType {
  return types.find((t) => t.canProcess(locator)) ?? unsupported;
}

/**
 * Types for `allowedExt`: PDF, Word and HTML when their extensions are
 * allowed, ahead of the plain text type that takes the rest.
 */
export function createDocumentTypes(allowedExt: readonly string[]): DocumentType[] {
  const allowed = normalizeExtensions(allowedExt);
  const types: DocumentType[] = [];
  if (allowed.has("pdf")) types.push(new PdfDocumentType());
  if (allowed.has("docx")) types.push(new WordDocumentType());
  if (allowed.has("html") || allowed.has("htm")) types.push(new HtmlDocumentType());
  types.push(new TextDocumentType(allowedExt));
  return types;
}
