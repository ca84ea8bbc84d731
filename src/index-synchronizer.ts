import type { ChangeDetector } from "./change-detector";
import { log } from "./log";
import { ResiliencePolicy } from "./resilience";
import type { IndexService, TextChunk, Vector } from "./types";

/** Default number of neighbours returned by {@link IndexSynchronizer.search}. */
export const DEFAULT_TOP_K = 3;

export interface ReconcileResult {
  deletedChunks: number;
  /** Distinct document references whose chunks were removed. */
  deletedReferences: string[];
}

export interface IndexSynchronizerOptions {
  /** Existence checks and schema creation. Defaults to the 3s preset. */
  administrative?: ResiliencePolicy;
  /** Upserts, listing, deletes and searches. Defaults to the 7s preset. */
  dataPath?: ResiliencePolicy;
}

/**
 * Keeps the index in line with the sources: replaces the chunks of each new or
 * changed document and, once per source pass, deletes chunks whose document
 * was not seen in that pass.
 * Every call to the index service goes through a resilience policy.
 */
export class IndexSynchronizer {
  private readonly admin: ResiliencePolicy;
  private readonly data: ResiliencePolicy;

  public constructor(
    private readonly index: IndexService,
    private readonly changeDetector: ChangeDetector,
    opts: IndexSynchronizerOptions = {},
  ) {
    this.admin = opts.administrative ?? ResiliencePolicy.administrative();
    this.data = opts.dataPath ?? ResiliencePolicy.dataPath();
  }

  /** Create the index if needed, then merge-or-insert `chunks` by id. No-op when empty. */
  public async ensureIndexed(chunks: readonly TextChunk[], signal?: AbortSignal): Promise<void> {
    if (!chunks.length) return;
    await this.admin.named("create index").execute((s) => this.index.createOrUpdate(s), signal);
    await this.data.named("upsert chunks").execute((s) => this.index.upsert(chunks, s), signal);
  }

  /**
   * Replace the indexed chunks of one document with `chunks`: upsert them,
   * then delete in one batch whatever the document had beyond that set (the
   * tail of a shrunk document, or everything once its text is empty).
   * Returns the number of chunks removed.
   */
  public async indexDocument(
    documentReference: string,
    chunks: readonly TextChunk[],
    signal?: AbortSignal,
  ): Promise<number> {
    if (chunks.length) {
      await this.ensureIndexed(chunks, signal);
    } else {
      const exists = await this.admin.named("index exists").execute((s) => this.index.exists(s), signal);
      if (!exists) return 0;
    }

    const current = new Set(chunks.map((c) => c.id));
    const listed = await this.data
      .named("list document chunks")
      .execute((s) => this.index.listByPrefix(documentReference, s), signal);
    // The prefix also matches "a.txt.bak" when the reference is "a.txt".
    const outdated = listed
      .filter((c) => c.documentReference === documentReference && !current.has(c.id))
      .map((c) => c.id);
    if (!outdated.length) return 0;

    await this.data.named("delete chunks").execute((s) => this.index.deleteByIds(outdated, s), signal);
    log.debug(`Removed ${outdated.length} outdated chunks of ${documentReference}`);
    return outdated.length;
  }

  /**
   * Delete every indexed chunk under `sourcePrefix` whose document reference
   * is not in `currentReferences`, in one batch, and drop those references
   * from the hash ledger. Chunks of still-present documents are untouched.
   * Does nothing when the index does not exist yet.
   */
  public async reconcile(
    sourcePrefix: string,
    currentReferences: Iterable<string>,
    signal?: AbortSignal,
  ): Promise<ReconcileResult> {
    const none: ReconcileResult = { deletedChunks: 0, deletedReferences: [] };
    const exists = await this.admin.named("index exists").execute((s) => this.index.exists(s), signal);
    if (!exists) return none;

    // "@" closes the partition: prefix "fs:/a" must not match "fs:/ab@x".
    const partition = `${sourcePrefix}@`;
    const indexed = await this.data
      .named("list source chunks")
      .execute((s) => this.index.listByPrefix(partition, s), signal);

    const current = new Set(currentReferences);
    const staleIds: string[] = [];
    const staleRefs = new Set<string>();
    for (const c of indexed) {
      if (current.has(c.documentReference)) continue;
      staleIds.push(c.id);
      staleRefs.add(c.documentReference);
    }
    if (!staleIds.length) return none;

    await this.data.named("delete chunks").execute((s) => this.index.deleteByIds(staleIds, s), signal);
    const deletedReferences = Array.from(staleRefs);
    await this.changeDetector.forget(deletedReferences);
    log.info(
      `Removed ${staleIds.length} chunks of ${deletedReferences.length} deleted documents under ${sourcePrefix}`,
    );
    return { deletedChunks: staleIds.length, deletedReferences };
  }

  /** Nearest chunks to `queryVector`. Throws IndexNotReadyError before the first ingest. */
  public search(queryVector: Vector, k = DEFAULT_TOP_K, signal?: AbortSignal): Promise<TextChunk[]> {
    return this.data.named("search").execute((s) => this.index.search(queryVector, k, s), signal);
  }
}
