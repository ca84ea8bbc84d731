import fs from "node:fs/promises";
import path from "node:path";
import { isNotFound } from "./ledger";
import { log } from "./log";
import type { Vector } from "./types";

/** A chunk as held by the local index: always embedded. */
export interface StoredChunk {
  readonly id: string;
  readonly documentReference: string;
  readonly content: string;
  readonly embedding: Vector;
}

export interface StoreMeta {
  /** Embedding model the vectors were produced with. */
  modelName: string;
  savedAt: string;
  embEncoding: "f32-base64";
}

export interface LoadedStore {
  meta: StoreMeta;
  chunks: StoredChunk[];
}

/**
 * Load / save of the local vector index as a single JSON file.
 *
 * Embeddings are serialized as base64-encoded little-endian float32 under
 * `emb`; the embedding model is stored in `meta` so callers can refuse a
 * store built with another model.
 */
export class Persistence {
  /**
   * @param storePath JSON file holding the index.
   */
  public constructor(private readonly storePath: string) {}

  public getStorePath(): string {
    return this.storePath;
  }

  /**
   * Read the store. Returns null when no file exists yet. Entries with a
   * missing field or an undecodable embedding are skipped.
   */
  public async load(): Promise<LoadedStore | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
    let parsed: unknown = null;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      log.debug(`Index store parse error: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!isRecord(parsed) || !Array.isArray(parsed.chunks) || !isRecord(parsed.meta)) {
      log.warn(`Index store ${this.storePath} is malformed; ignoring it.`);
      return null;
    }
    const meta: StoreMeta = {
      modelName: typeof parsed.meta.modelName === "string" ? parsed.meta.modelName : "",
      savedAt: typeof parsed.meta.savedAt === "string" ? parsed.meta.savedAt : "",
      embEncoding: "f32-base64",
    };
    const chunks: StoredChunk[] = [];
    let dropped = 0;
    for (const d of parsed.chunks) {
      const chunk = isRecord(d) ? decodeChunk(d) : null;
      if (chunk) chunks.push(chunk);
      else dropped++;
    }
    if (dropped) log.warn(`Skipped ${dropped} unreadable entries in ${this.storePath}`);
    log.debug(`Loaded ${chunks.length} chunks from ${this.storePath}`);
    return { meta, chunks };
  }

  /** Write the whole index (temp file + rename). */
  public async save(chunks: Iterable<StoredChunk>, modelName: string): Promise<void> {
    const out = {
      version: 2,
      meta: {
        modelName,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      } satisfies StoreMeta,
      chunks: Array.from(chunks, (c) => ({
        id: c.id,
        documentReference: c.documentReference,
        content: c.content,
        emb: Buffer.from(c.embedding.buffer, c.embedding.byteOffset, c.embedding.byteLength).toString(
          "base64",
        ),
      })),
    };
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    const tmp = `${this.storePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(out));
    await fs.rename(tmp, this.storePath);
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function decodeChunk(d: Record<string, unknown>): StoredChunk | null {
  const { id, documentReference, content, emb } = d;
  if (typeof id !== "string" || typeof documentReference !== "string" || typeof content !== "string") {
    return null;
  }
  let embedding: Vector | null = null;
  if (Array.isArray(emb)) {
    embedding = Float32Array.from(emb, (n) => Number(n) || 0);
  } else if (typeof emb === "string") {
    const buf = Buffer.from(emb, "base64");
    if (buf.byteLength > 0 && buf.byteLength % 4 === 0) {
      // copy first: a pooled Buffer's offset need not be 4-byte aligned
      embedding = new Float32Array(new Uint8Array(buf).buffer);
    }
  }
  return embedding ? { id, documentReference, content, embedding } : null;
}
