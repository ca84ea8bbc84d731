import { APP_VERSION } from "./version";

/** Ingestion pipeline states, per source. */
export type PipelineState =
  | "idle"
  | "enumerating"
  | "extracting"
  | "skipping"
  | "embedding"
  | "indexing"
  | "reconciling";

/**
 * Counters for the current (or last) ingestion pass. All values are
 * monotonic within a pass and reset when a new pass starts.
 */
export interface IngestionCounters {
  /** Documents handed to the pipeline by sources. */
  seen: number;
  /** New or changed documents embedded and indexed. */
  indexed: number;
  /** Unchanged documents skipped by the change detector. */
  skipped: number;
  /** Documents with an unsupported type. */
  unsupported: number;
  /** Malformed records rejected before processing. */
  rejected: number;
  /** Documents whose extraction, embedding or indexing failed. */
  failed: number;
  /** Chunks written to the index. */
  chunksIndexed: number;
  /** Chunks deleted by reconciliation. */
  chunksDeleted: number;
}

/**
 * Mutable in-memory snapshot of server lifecycle + ingestion progress.
 * Exposed read-only via `statusManager.getStatus()` (health endpoint, status tool).
 */
export interface ServerStatus {
  /** Package version (kept in sync with package.json). */
  version: string;
  /** Configured document roots. */
  sources: string[];
  /** Embedding model identifier. */
  modelName: string;
  /** Active transport: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  /** True once at least one ingestion pass has completed (or a persisted index was loaded). */
  ready: boolean;
  state: PipelineState;
  /** Prefix of the source being processed, if any. */
  currentSource: string | null;
  startedAt: string;
  lastRunStartedAt: string | null;
  lastRunFinishedAt: string | null;
  /** Whether the last pass stopped early because it was cancelled. */
  lastRunCancelled: boolean;
  ingestion: IngestionCounters;
}

function emptyCounters(): IngestionCounters {
  return {
    seen: 0,
    indexed: 0,
    skipped: 0,
    unsupported: 0,
    rejected: 0,
    failed: 0,
    chunksIndexed: 0,
    chunksDeleted: 0,
  };
}

/**
 * Class wrapper around mutable status state so every mutation goes through
 * one place.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      sources: initial?.sources ?? [],
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      state: initial?.state ?? "idle",
      currentSource: initial?.currentSource ?? null,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      lastRunStartedAt: initial?.lastRunStartedAt ?? null,
      lastRunFinishedAt: initial?.lastRunFinishedAt ?? null,
      lastRunCancelled: initial?.lastRunCancelled ?? false,
      ingestion: initial?.ingestion ?? emptyCounters(),
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setSources(sources: string[]) {
    this.data.sources = sources;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Reset counters at the start of an ingestion pass. */
  public beginRun() {
    this.data.ingestion = emptyCounters();
    this.data.lastRunStartedAt = new Date().toISOString();
    this.data.lastRunCancelled = false;
  }

  public endRun(cancelled: boolean) {
    this.data.state = "idle";
    this.data.currentSource = null;
    this.data.lastRunFinishedAt = new Date().toISOString();
    this.data.lastRunCancelled = cancelled;
  }

  public setState(state: PipelineState, source?: string) {
    this.data.state = state;
    if (source !== undefined) this.data.currentSource = source;
  }

  public inc(counter: keyof IngestionCounters, count = 1) {
    this.data.ingestion[counter] += count;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  /** JSON serialization helper (returns underlying object). */
  public toJSON() {
    return this.data;
  }
}

// Singleton used by the entry point, transports and health checks.
export const statusManager = new StatusManager();
