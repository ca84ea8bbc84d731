import { createHash } from "node:crypto";
import { InvalidChunkingError } from "./errors";
import type { ChunkingOptions, TextChunk } from "./types";

/** Throws {@link InvalidChunkingError} unless the stride is at least one character. */
export function assertChunkingOptions({ chunkSize, overlap }: ChunkingOptions): void {
  if (
    !Number.isInteger(chunkSize) ||
    !Number.isInteger(overlap) ||
    chunkSize < 1 ||
    overlap < 0 ||
    overlap >= chunkSize
  ) {
    throw new InvalidChunkingError(chunkSize, overlap);
  }
}

/**
 * Split text into fixed-size windows starting every `chunkSize - overlap`
 * characters. Enumeration stops at the first window that reaches the end of
 * the text, so the last chunk may be shorter and no window is wholly
 * contained in its predecessor.
 *
 * For `len > chunkSize` the count is `ceil((len - overlap) / (chunkSize - overlap))`;
 * otherwise the whole text is a single chunk (none for an empty string).
 */
export function splitChunks(text: string, options: ChunkingOptions): string[] {
  assertChunkingOptions(options);
  const { chunkSize, overlap } = options;
  const stride = chunkSize - overlap;
  const out: string[] = [];
  for (let start = 0; start < text.length; start += stride) {
    out.push(text.slice(start, start + chunkSize));
    if (start + chunkSize >= text.length) break;
  }
  return out;
}

/**
 * Chunk id: hash of the document reference plus the chunk ordinal, so
 * re-ingesting a changed document overwrites its chunks in place.
 */
export function chunkId(documentReference: string, ordinal: number): string {
  const key = createHash("sha256").update(documentReference, "utf8").digest("hex").slice(0, 32);
  return `${key}-${ordinal}`;
}

/** Wrap {@link splitChunks} output as un-embedded chunks of one document. */
export function chunk(
  fullText: string,
  documentReference: string,
  options: ChunkingOptions,
): TextChunk[] {
  return splitChunks(fullText, options).map((content, ordinal) => ({
    id: chunkId(documentReference, ordinal),
    documentReference,
    content,
  }));
}
