import { Readable } from "node:stream";
import type { ChangeDetector } from "./change-detector";
import { assertChunkingOptions } from "./chunker";
import { validateDocumentInfo } from "./document-info";
import { isUnsupported } from "./document-types";
import type { EmbeddingStage } from "./embedding-stage";
import {
  DocumentRejectedError,
  IncompatibleIndexError,
  IndexNotReadyError,
  IngestionInProgressError,
  describeError,
  isAuthorizationFailure,
} from "./errors";
import type { IndexSynchronizer } from "./index-synchronizer";
import { log } from "./log";
import { StatusManager, type IngestionCounters } from "./status";
import type { ChunkingOptions, DocumentInfo, DocumentSource } from "./types";

export interface SourceReport extends IngestionCounters {
  prefix: string;
  /** Stale document references removed by reconciliation. */
  deletedReferences: string[];
  /** The pass stopped early on cancellation (reconciliation still ran). */
  cancelled: boolean;
  /** Set when enumeration or reconciliation of this source failed. */
  error?: string;
}

export interface IngestionReport {
  sources: SourceReport[];
  cancelled: boolean;
}

export interface IngestionPipelineOptions {
  changeDetector: ChangeDetector;
  embeddingStage: EmbeddingStage;
  synchronizer: IndexSynchronizer;
  /** Applied to every document of every pass. */
  chunking: ChunkingOptions;
  /** Receives state transitions and counters; a private instance when omitted. */
  status?: StatusManager;
}

/** Errors that end the whole pass instead of being recorded against one document. */
function isFatal(err: unknown): boolean {
  return (
    isAuthorizationFailure(err) ||
    err instanceof IndexNotReadyError ||
    err instanceof IncompatibleIndexError
  );
}

function closeStream(doc: DocumentInfo | null | undefined): void {
  if (doc && doc.stream instanceof Readable) doc.stream.destroy();
}

/**
 * Per-source control loop: enumerate → (extract → skip | embed → replace) per
 * document → reconcile. Sources run one after another, documents one at a
 * time. A bad document never aborts its source.
 *
 * Cancellation is cooperative: the signal is checked after each document.
 * Reconciliation still runs against the references seen so far, so documents
 * not reached before cancelling are removed from the index and re-ingested on
 * the next full pass.
 */
export class IngestionPipeline {
  private readonly changeDetector: ChangeDetector;
  private readonly embeddingStage: EmbeddingStage;
  private readonly synchronizer: IndexSynchronizer;
  private readonly chunking: ChunkingOptions;
  private readonly status: StatusManager;
  private running = false;

  public constructor(opts: IngestionPipelineOptions) {
    assertChunkingOptions(opts.chunking);
    this.changeDetector = opts.changeDetector;
    this.embeddingStage = opts.embeddingStage;
    this.synchronizer = opts.synchronizer;
    this.chunking = opts.chunking;
    this.status = opts.status ?? new StatusManager();
  }

  public isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one pass over `sources`. Rejects with {@link IngestionInProgressError}
   * while another pass is running on this pipeline.
   */
  public async run(sources: readonly DocumentSource[], signal?: AbortSignal): Promise<IngestionReport> {
    if (this.running) throw new IngestionInProgressError();
    this.running = true;
    this.status.beginRun();
    const reports: SourceReport[] = [];
    let cancelled = false;
    try {
      log.info(`Processing ${sources.length} document source(s)...`);
      for (const source of sources) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }
        const report = await this.ingestSource(source, signal);
        reports.push(report);
        if (report.cancelled) {
          cancelled = true;
          break;
        }
      }
      if (!cancelled) this.status.markReady();
      log.info(
        `Ingestion ${cancelled ? "cancelled" : "complete"}: ${reports
          .map((r) => `${r.prefix} (indexed ${r.indexed}, unchanged ${r.skipped}, failed ${r.failed}, removed ${r.deletedReferences.length})`)
          .join("; ")}`,
      );
      return { sources: reports, cancelled };
    } finally {
      this.running = false;
      this.status.endRun(cancelled);
    }
  }

  private async ingestSource(source: DocumentSource, signal?: AbortSignal): Promise<SourceReport> {
    const report: SourceReport = {
      prefix: source.prefix,
      seen: 0,
      indexed: 0,
      skipped: 0,
      unsupported: 0,
      rejected: 0,
      failed: 0,
      chunksIndexed: 0,
      chunksDeleted: 0,
      deletedReferences: [],
      cancelled: false,
    };
    const count = (key: keyof IngestionCounters, n = 1) => {
      report[key] += n;
      this.status.inc(key, n);
    };
    const seen: string[] = [];

    this.status.setState("enumerating", source.prefix);
    try {
      for await (const doc of source.documents(signal)) {
        count("seen");
        try {
          await this.ingestDocument(doc, seen, count, signal);
        } finally {
          closeStream(doc);
        }
        if (signal?.aborted) break;
        this.status.setState("enumerating");
      }
    } catch (e) {
      if (isFatal(e)) throw e;
      // The seen list is incomplete for reasons other than cancellation:
      // reconciling against it would delete documents that still exist.
      report.error = describeError(e);
      log.error(`Enumerating ${source.prefix} failed; skipping reconciliation.`, report.error);
      return report;
    }
    report.cancelled = signal?.aborted ?? false;
    if (report.cancelled) {
      log.warn(`Ingestion of ${source.prefix} cancelled after ${seen.length} documents; reconciling the partial pass.`);
    }

    this.status.setState("reconciling");
    try {
      // A cancelled pass still reconciles, so it must not inherit the aborted signal.
      const result = await this.synchronizer.reconcile(
        source.prefix,
        seen,
        report.cancelled ? undefined : signal,
      );
      count("chunksDeleted", result.deletedChunks);
      report.deletedReferences = result.deletedReferences;
    } catch (e) {
      if (isFatal(e)) throw e;
      report.error = describeError(e);
      log.error(`Reconciling ${source.prefix} failed.`, report.error);
    }
    return report;
  }

  private async ingestDocument(
    doc: DocumentInfo,
    seen: string[],
    count: (key: keyof IngestionCounters, n?: number) => void,
    signal?: AbortSignal,
  ): Promise<void> {
    try {
      validateDocumentInfo(doc);
    } catch (e) {
      if (!(e instanceof DocumentRejectedError)) throw e;
      log.warn(e.message);
      count("rejected");
      return;
    }
    const ref = doc.documentReference;
    if (isUnsupported(doc.docType)) {
      log.debug(`Ignoring ${ref}: unsupported document type`);
      count("unsupported");
      return;
    }
    // Recorded before any outcome: unchanged or failing documents are still present.
    seen.push(ref);

    this.status.setState("extracting");
    let fullText: string;
    try {
      fullText = await doc.docType.getText(doc.stream, doc.filePath);
    } catch (e) {
      log.warn(`Unable to process file: ${doc.filePath}`, describeError(e));
      count("failed");
      return;
    }

    let unchanged: boolean;
    try {
      unchanged = await this.changeDetector.shouldSkip(ref, fullText);
    } catch (e) {
      if (isFatal(e)) throw e;
      log.warn(`Hash ledger lookup failed for ${ref}`, describeError(e));
      count("failed");
      return;
    }
    if (unchanged) {
      this.status.setState("skipping");
      log.debug(`Unchanged: ${ref}`);
      count("skipped");
      return;
    }

    log.info(`Ingesting ${ref}`);
    try {
      this.status.setState("embedding");
      const chunks = await this.embeddingStage.embed(fullText, ref, this.chunking, signal);
      this.status.setState("indexing");
      const removed = await this.synchronizer.indexDocument(ref, chunks, signal);
      count("indexed");
      count("chunksIndexed", chunks.length);
      if (removed) count("chunksDeleted", removed);
    } catch (e) {
      // The ledger already holds the new hash; drop it so the next pass retries.
      await this.forgetAfterFailure(ref);
      if (isFatal(e)) throw e;
      if (signal?.aborted) return;
      log.warn(`Failed to ingest ${ref}`, describeError(e));
      count("failed");
    }
  }

  /** Drop the ledger entry of a failed document; a ledger error is logged, not raised over the cause. */
  private async forgetAfterFailure(ref: string): Promise<void> {
    try {
      await this.changeDetector.forget([ref]);
    } catch (e) {
      log.error(`Could not forget the hash of ${ref}; it may be skipped until it changes again.`, describeError(e));
    }
  }
}
