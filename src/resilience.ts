import { setTimeout as delay } from "node:timers/promises";
import { IndexNotReadyError, TimeoutError, describeError, isAuthorizationFailure } from "./errors";
import { log } from "./log";

/** Timeout for index metadata / administrative calls. */
export const ADMINISTRATIVE_TIMEOUT_MS = 3_000;
/** Timeout for embedding and index data calls. */
export const DATA_PATH_TIMEOUT_MS = 7_000;

export interface ResilienceOptions {
  /** Label used in log lines and timeout messages. */
  name: string;
  /** Budget for a single attempt. */
  timeoutMs: number;
  /** Retries after the first attempt (default 3). */
  maxRetries: number;
  /** First backoff ceiling; doubles per retry (default 200ms). */
  baseDelayMs: number;
  /** Upper bound on any single backoff (default 5s). */
  maxDelayMs: number;
  /**
   * Extra retry predicate. Control signals, credential failures and caller
   * cancellation are never retried regardless of what this returns.
   */
  shouldRetry: (err: unknown) => boolean;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Source of jitter in [0, 1). */
  random: () => number;
}

const DEFAULTS: Omit<ResilienceOptions, "name" | "timeoutMs"> = {
  maxRetries: 3,
  baseDelayMs: 200,
  maxDelayMs: 5_000,
  shouldRetry: () => true,
  sleep: (ms, signal) => delay(ms, undefined, { signal }),
  random: Math.random,
};

/**
 * Bounded retry with full-jitter exponential backoff plus an independent
 * timeout per attempt, applied as a decorator around an async call.
 *
 * The operation receives a per-attempt AbortSignal that fires on timeout or
 * when the caller's signal aborts; it is additionally raced against both, so
 * an operation that ignores its signal still cannot outlive its budget.
 */
export class ResiliencePolicy {
  private readonly opts: ResilienceOptions;

  public constructor(opts: Partial<ResilienceOptions> & Pick<ResilienceOptions, "timeoutMs">) {
    this.opts = { ...DEFAULTS, name: "external call", ...opts };
  }

  /** 3s timeout preset (existence checks, schema creation). */
  public static administrative(overrides: Partial<ResilienceOptions> = {}): ResiliencePolicy {
    return new ResiliencePolicy({
      name: "administrative call",
      timeoutMs: ADMINISTRATIVE_TIMEOUT_MS,
      ...overrides,
    });
  }

  /** 7s timeout preset (embeddings, upserts, searches, deletes). */
  public static dataPath(overrides: Partial<ResilienceOptions> = {}): ResiliencePolicy {
    return new ResiliencePolicy({
      name: "data call",
      timeoutMs: DATA_PATH_TIMEOUT_MS,
      ...overrides,
    });
  }

  /** Copy of this policy with a different log label. */
  public named(name: string): ResiliencePolicy {
    return new ResiliencePolicy({ ...this.opts, name });
  }

  public get maxRetries(): number {
    return this.opts.maxRetries;
  }

  public get timeoutMs(): number {
    return this.opts.timeoutMs;
  }

  /**
   * Run `operation`, retrying transient failures. After the last retry the
   * original error propagates unchanged.
   */
  public async execute<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const { name, maxRetries } = this.opts;
    for (let attempt = 0; ; attempt++) {
      signal?.throwIfAborted();
      try {
        return await this.attempt(operation, signal);
      } catch (err) {
        if (signal?.aborted) throw err;
        if (isAuthorizationFailure(err)) {
          log.auth(`${name} rejected credentials. Check the configured keys.`, describeError(err));
          throw err;
        }
        if (!this.isRetryable(err) || attempt >= maxRetries) throw err;
        const wait = this.backoff(attempt + 1);
        log.debug(
          `${name} failed (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${wait}ms: ${describeError(err)}`,
        );
        await this.opts.sleep(wait, signal);
      }
    }
  }

  /** Full jitter: uniform in [0, min(maxDelay, base * 2^(retry-1))]. */
  public backoff(retry: number): number {
    const { baseDelayMs, maxDelayMs, random } = this.opts;
    const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** (retry - 1));
    return Math.floor(random() * ceiling);
  }

  private isRetryable(err: unknown): boolean {
    if (err instanceof IndexNotReadyError) return false;
    return this.opts.shouldRetry(err);
  }

  private async attempt<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    outer?: AbortSignal,
  ): Promise<T> {
    const { name, timeoutMs } = this.opts;
    const controller = new AbortController();
    let interrupt: (reason: unknown) => void = () => undefined;
    const interrupted = new Promise<never>((_, reject) => {
      interrupt = reject;
    });
    const timer = setTimeout(() => {
      const err = new TimeoutError(name, timeoutMs);
      controller.abort(err);
      interrupt(err);
    }, timeoutMs);
    const onAbort = () => {
      controller.abort(outer?.reason);
      interrupt(outer?.reason);
    };
    outer?.addEventListener("abort", onAbort, { once: true });

    let abandoned = false;
    const pending = (async () => operation(controller.signal))();
    // An abandoned attempt may still reject later; that must not surface as unhandled.
    pending.catch((e: unknown) => {
      if (abandoned) log.debug(`${name} failed after being abandoned: ${describeError(e)}`);
    });
    try {
      return await Promise.race([pending, interrupted]);
    } finally {
      abandoned = true;
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    }
  }
}
