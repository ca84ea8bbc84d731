import { IncompatibleIndexError, IndexNotReadyError } from "./errors";
import { log } from "./log";
import { Persistence, type StoredChunk } from "./persistence";
import type { IndexService, IndexedChunkRef, TextChunk, Vector } from "./types";

/** Cosine of the angle between two vectors, over their common length. Zero vectors score 0. */
export function cosine(a: Vector, b: Vector): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    normA += a[i] ** 2;
    normB += b[i] ** 2;
  }
  const denom = Math.sqrt(normA * normB);
  return denom === 0 ? 0 : dot / denom;
}

export interface LocalVectorIndexOptions {
  /** Embedding model in use; a persisted store from another model is refused. */
  modelName: string;
  /** Persist to this JSON file after every mutation. In-memory only when unset. */
  storePath?: string;
}

/**
 * In-process implementation of the index service: chunks live in a Map and
 * search is a linear cosine scan. With a store path the whole index is
 * rewritten after each mutation, so it never lags behind the hash ledger.
 *
 * The index "exists" once {@link createOrUpdate} has run, or a store file
 * was found on disk.
 */
export class LocalVectorIndex implements IndexService {
  private readonly chunks = new Map<string, StoredChunk>();
  private readonly modelName: string;
  private readonly persistence?: Persistence;
  private created = false;
  private loading: Promise<void> | null = null;

  public constructor(opts: LocalVectorIndexOptions) {
    this.modelName = opts.modelName;
    if (opts.storePath) this.persistence = new Persistence(opts.storePath);
  }

  /**
   * Read the persisted store, if any. Called implicitly by every operation;
   * call it at startup to surface an incompatible store before serving.
   */
  public open(): Promise<void> {
    return this.load();
  }

  /** Number of chunks currently indexed. */
  public async size(): Promise<number> {
    await this.load();
    return this.chunks.size;
  }

  public async exists(): Promise<boolean> {
    await this.load();
    return this.created;
  }

  public async createOrUpdate(): Promise<void> {
    await this.load();
    if (this.created) return;
    this.created = true;
    log.info(`Created index${this.persistence ? ` at ${this.persistence.getStorePath()}` : " (in memory)"}`);
    await this.persist();
  }

  public async upsert(chunks: readonly TextChunk[]): Promise<void> {
    await this.requireIndex();
    for (const c of chunks) {
      if (!c.embedding) throw new Error(`Chunk ${c.id} of ${c.documentReference} has no embedding`);
      this.chunks.set(c.id, {
        id: c.id,
        documentReference: c.documentReference,
        content: c.content,
        embedding: c.embedding,
      });
    }
    await this.persist();
  }

  public async deleteByIds(ids: readonly string[]): Promise<void> {
    await this.requireIndex();
    let removed = 0;
    for (const id of ids) if (this.chunks.delete(id)) removed++;
    if (removed) await this.persist();
  }

  public async listByPrefix(prefix: string): Promise<IndexedChunkRef[]> {
    await this.requireIndex();
    const out: IndexedChunkRef[] = [];
    for (const c of this.chunks.values()) {
      if (c.documentReference.startsWith(prefix)) {
        out.push({ id: c.id, documentReference: c.documentReference });
      }
    }
    return out;
  }

  public async search(vector: Vector, k: number): Promise<TextChunk[]> {
    await this.requireIndex();
    const scored = Array.from(this.chunks.values(), (c) => ({
      c,
      s: cosine(c.embedding, vector),
    }));
    scored.sort((a, b) => b.s - a.s); // descending score
    return scored.slice(0, Math.max(0, k)).map(({ c }) => ({
      id: c.id,
      documentReference: c.documentReference,
      content: c.content,
    }));
  }

  private async requireIndex(): Promise<void> {
    await this.load();
    if (!this.created) throw new IndexNotReadyError();
  }

  private load(): Promise<void> {
    if (!this.loading) this.loading = this.loadStore();
    return this.loading;
  }

  private async loadStore(): Promise<void> {
    if (!this.persistence) return;
    const stored = await this.persistence.load();
    if (!stored) return;
    if (stored.meta.modelName && stored.meta.modelName !== this.modelName) {
      throw new IncompatibleIndexError(
        this.persistence.getStorePath(),
        stored.meta.modelName,
        this.modelName,
      );
    }
    for (const c of stored.chunks) this.chunks.set(c.id, c);
    this.created = true;
    log.info(`Loaded persisted index: ${this.chunks.size} chunks.`);
  }

  private async persist(): Promise<void> {
    if (!this.persistence) return;
    await this.persistence.save(this.chunks.values(), this.modelName);
  }
}
