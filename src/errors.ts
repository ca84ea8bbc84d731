/** Base class for every error raised by the ingestion / retrieval core. */
export class RagError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RagError";
  }
}

/**
 * Control signal: the vector index has not been created yet (nothing was
 * ingested). Never retried; callers are expected to branch on it.
 */
export class IndexNotReadyError extends RagError {
  public constructor(message = "Index does not exist yet. Run an ingestion pass first.") {
    super(message);
    this.name = "IndexNotReadyError";
  }
}

/** Credential / permission failure reported by an external service. */
export class AuthorizationError extends RagError {
  public readonly status?: number;

  public constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = "AuthorizationError";
    this.status = status;
  }
}

/** A single attempt of an external call exceeded its time budget. */
export class TimeoutError extends RagError {
  public readonly timeoutMs: number;

  public constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Chunk size / overlap combination that cannot make forward progress. */
export class InvalidChunkingError extends RagError {
  public constructor(chunkSize: number, overlap: number) {
    super(
      `Invalid chunking options: chunkSize=${chunkSize}, overlap=${overlap} (need chunkSize >= 1 and 0 <= overlap < chunkSize)`,
    );
    this.name = "InvalidChunkingError";
  }
}

/** A document source produced a record with missing or inconsistent fields. */
export class DocumentRejectedError extends RagError {
  public readonly field: string;

  public constructor(field: string, locator?: string) {
    super(`Rejected document${locator ? ` ${locator}` : ""}: invalid or missing '${field}'`);
    this.name = "DocumentRejectedError";
    this.field = field;
  }
}

/** Persisted index was built with a different embedding model. */
export class IncompatibleIndexError extends RagError {
  public constructor(storePath: string, storedModel: string, activeModel: string) {
    super(
      `Index store ${storePath} was built with model '${storedModel}' but the active model is '${activeModel}'. Remove the store and its ledger to rebuild.`,
    );
    this.name = "IncompatibleIndexError";
  }
}

export class IngestionInProgressError extends RagError {
  public constructor() {
    super("An ingestion pass is already running");
    this.name = "IngestionInProgressError";
  }
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}

/**
 * True for credential failures: our own {@link AuthorizationError}, or any
 * SDK error carrying an HTTP 401 / 403 status (e.g. openai's APIError).
 */
export function isAuthorizationFailure(err: unknown): boolean {
  if (err instanceof AuthorizationError) return true;
  const status = statusOf(err);
  return status === 401 || status === 403;
}

/** Readable one-line description of an unknown thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
