/**
 * Exponential backoff retry with jitter, for one provider attempt.
 *
 * Only TransientError is retried. Everything an adapter throws is first
 * passed through `classifyError` so unknown errors get a reason.
 */

import {
  CancelledError,
  ErrorCodes,
  ProviderError,
  SpeechError,
  TransientError,
} from "@speech-relay/shared-types";

export interface RetryOptions {
  /** Maximum number of retry attempts. */
  readonly maxRetries: number;
  /** Initial delay in ms before first retry. */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. */
  readonly maxDelayMs: number;
  /** Abort signal for cancellation. */
  readonly signal?: AbortSignal | undefined;
  /** Provider name stamped on classified errors. */
  readonly provider?: string | undefined;
  /** Called before each backoff wait. */
  readonly onRetry?: ((attempt: number, delayMs: number, err: ProviderError) => void) | undefined;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 1,
  baseDelayMs: 1000,
  maxDelayMs: 2000,
};

/** Message fragments that mark a plain Error as a network failure. */
const NETWORK_MARKERS = [
  "econnrefused",
  "econnreset",
  "etimedout",
  "enotfound",
  "eai_again",
  "epipe",
  "fetch failed",
  "socket hang up",
  "network",
];

/**
 * Give an unknown adapter error a reason.
 *
 * Provider errors and cancellations pass through. Network-looking errors
 * become TransientError; anything else is a non-retryable ProviderError.
 */
export function classifyError(
  err: unknown,
  provider?: string,
): ProviderError | CancelledError {
  if (err instanceof ProviderError || err instanceof CancelledError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof Error && !(err instanceof SpeechError)) {
    const lower = message.toLowerCase();
    if (NETWORK_MARKERS.some((marker) => lower.includes(marker))) {
      return new TransientError(message, ErrorCodes.PROVIDER_UNAVAILABLE, {
        provider,
        cause: err,
      });
    }
  }

  return new ProviderError(ErrorCodes.PROVIDER_FAILED, "unknown", message, {
    provider,
    cause: err,
  });
}

/**
 * Execute a function with exponential backoff retry.
 * Only retries on transient errors.
 *
 * @param fn - receives the zero-based try index
 * @throws the classified error of the last try, or CancelledError
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: Partial<RetryOptions>,
): Promise<T> {
  const options = { ...DEFAULT_OPTIONS, ...opts };
  let lastError: ProviderError | undefined;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    try {
      return await fn(attempt);
    } catch (err) {
      const classified = classifyError(err, options.provider);
      if (classified instanceof CancelledError) throw classified;
      lastError = classified;

      // Don't retry non-transient errors
      if (!(classified instanceof TransientError)) {
        throw classified;
      }

      // Don't retry if we've exhausted attempts
      if (attempt >= options.maxRetries) {
        break;
      }

      // Calculate delay with exponential backoff + jitter
      const exponentialDelay = options.baseDelayMs * Math.pow(2, attempt);
      const jitter = Math.random() * options.baseDelayMs;
      const delay = Math.min(exponentialDelay + jitter, options.maxDelayMs);

      options.onRetry?.(attempt + 1, delay, classified);
      await sleep(delay, options.signal);
    }
  }

  throw lastError ?? new TransientError("Retry exhausted", ErrorCodes.PROVIDER_UNAVAILABLE);
}

/** Abort-aware delay. Rejects with CancelledError when the signal fires. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError("Retry cancelled"));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError("Retry cancelled"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
