import { Readable } from "node:stream";
import { DocumentRejectedError } from "./errors";
import type { DocumentInfo, DocumentType } from "./types";

/** `sourcePrefix@filePath`, the corpus-wide key of a document. */
export function documentReferenceOf(sourcePrefix: string, filePath: string): string {
  return `${sourcePrefix}@${filePath}`;
}

export function createDocumentInfo(fields: {
  sourcePrefix: string;
  filePath: string;
  stream: Readable;
  docType: DocumentType;
}): DocumentInfo {
  return {
    ...fields,
    documentReference: documentReferenceOf(fields.sourcePrefix, fields.filePath),
  };
}

function isNonEmptyString(v: unknown): v is string {
  return typeof v === "string" && v.length > 0;
}

/**
 * Precondition check for records coming from a document source. Throws
 * {@link DocumentRejectedError} naming the first offending field.
 */
export function validateDocumentInfo(doc: DocumentInfo | null | undefined): asserts doc is DocumentInfo {
  if (!doc) throw new DocumentRejectedError("document");
  const locator = typeof doc.filePath === "string" ? doc.filePath : undefined;
  if (!isNonEmptyString(doc.sourcePrefix)) throw new DocumentRejectedError("sourcePrefix", locator);
  if (!isNonEmptyString(doc.filePath)) throw new DocumentRejectedError("filePath", locator);
  if (!isNonEmptyString(doc.documentReference)) {
    throw new DocumentRejectedError("documentReference", locator);
  }
  if (doc.documentReference !== documentReferenceOf(doc.sourcePrefix, doc.filePath)) {
    throw new DocumentRejectedError("documentReference", locator);
  }
  if (!(doc.stream instanceof Readable)) throw new DocumentRejectedError("stream", locator);
  if (!doc.docType || typeof doc.docType.getText !== "function") {
    throw new DocumentRejectedError("docType", locator);
  }
}
