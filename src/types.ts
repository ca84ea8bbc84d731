import type { Readable } from "node:stream";

/** Embedding vector; dimensionality is fixed by the embedding service. */
export type Vector = Float32Array;

/**
 * A contiguous slice of a document's text plus (once embedded) its vector.
 * Many chunks point back at one document through `documentReference`.
 */
export interface TextChunk {
  /** Unique per chunk: document reference hash + ordinal (see chunker.ts). */
  readonly id: string;
  /** `sourcePrefix@filePath` of the owning document. */
  readonly documentReference: string;
  readonly content: string;
  /** Absent until the embedding stage fills it; never returned by search. */
  embedding?: Vector;
}

/** Ledger entry: last seen content hash for one document reference. */
export interface DocumentHash {
  readonly documentReference: string;
  /** Lowercase hex SHA-256 of the extracted text. */
  readonly hash: string;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

/**
 * Text extraction capability for one family of formats. The distinguished
 * `unsupported` instance (see document-types.ts) marks records to ignore.
 */
export interface DocumentType {
  readonly name: string;
  /** Whether this type handles the given locator (usually by extension). */
  canProcess(locator: string): boolean;
  /** Read the whole stream and return its plain text. May throw per format. */
  getText(stream: Readable, locator: string): Promise<string>;
}

/** One discovered unit of content, consumed once by the ingestion pipeline. */
export interface DocumentInfo {
  readonly sourcePrefix: string;
  readonly filePath: string;
  /** `sourcePrefix + "@" + filePath`; unique across the whole corpus. */
  readonly documentReference: string;
  readonly stream: Readable;
  readonly docType: DocumentType;
}

/** Produces documents lazily; `prefix` partitions the index for reconciliation. */
export interface DocumentSource {
  readonly prefix: string;
  documents(signal?: AbortSignal): AsyncIterable<DocumentInfo>;
}

export interface EmbeddingService {
  readonly modelName: string;
  /** Batch-of-one: one input text, one vector. */
  embed(text: string, signal?: AbortSignal): Promise<Vector>;
}

/** Result of a completion call; `raw` is the provider's full response (usage etc). */
export interface CompletionResult<TRaw = unknown> {
  readonly text: string;
  readonly raw: TRaw;
}

export interface CompletionService<TRaw = unknown> {
  complete(messages: readonly ChatMessage[], signal?: AbortSignal): Promise<CompletionResult<TRaw>>;
}

/** Id + reference pair returned when listing the index by source prefix. */
export interface IndexedChunkRef {
  readonly id: string;
  readonly documentReference: string;
}

/** The external vector index. */
export interface IndexService {
  exists(signal?: AbortSignal): Promise<boolean>;
  /** Create the index schema if absent; idempotent. */
  createOrUpdate(signal?: AbortSignal): Promise<void>;
  /** Merge-or-insert keyed by chunk id. */
  upsert(chunks: readonly TextChunk[], signal?: AbortSignal): Promise<void>;
  deleteByIds(ids: readonly string[], signal?: AbortSignal): Promise<void>;
  /** All chunks whose document reference starts with `prefix`. */
  listByPrefix(prefix: string, signal?: AbortSignal): Promise<IndexedChunkRef[]>;
  /** Nearest neighbours of `vector`; embeddings are not returned. */
  search(vector: Vector, k: number, signal?: AbortSignal): Promise<TextChunk[]>;
}

/** Persistent store behind the change detector. */
export interface HashLedgerStore {
  get(documentReference: string): Promise<DocumentHash | undefined>;
  insert(entry: DocumentHash): Promise<void>;
  update(entry: DocumentHash, hash: string): Promise<void>;
  delete(documentReferences: readonly string[]): Promise<void>;
}

export interface ChunkingOptions {
  /** Characters per chunk. */
  readonly chunkSize: number;
  /** Characters shared by consecutive chunks; must be < chunkSize. */
  readonly overlap: number;
}
