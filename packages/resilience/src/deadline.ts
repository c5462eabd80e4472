/**
 * Per-call deadline.
 *
 * The callee gets its own AbortSignal, aborted when the deadline passes or
 * the parent signal fires. The returned promise settles at that moment even
 * if the callee ignores its signal.
 */

import { CancelledError, ErrorCodes, TransientError } from "@speech-relay/shared-types";

export interface DeadlineOptions {
  /** Deadline in ms; 0 or less disables it. */
  readonly timeoutMs: number;
  /** Caller cancellation. */
  readonly signal?: AbortSignal | undefined;
  /** Provider name stamped on the timeout error. */
  readonly provider?: string | undefined;
}

/**
 * @throws TransientError (PROVIDER_TIMEOUT) when the deadline passes
 * @throws CancelledError when the parent signal fires
 */
export function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  opts: DeadlineOptions,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const parent = opts.signal;
    if (parent?.aborted) {
      reject(new CancelledError());
      return;
    }

    const controller = new AbortController();
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      settle();
    };

    const onParentAbort = (): void => {
      finish(() => reject(new CancelledError()));
      controller.abort();
    };

    if (opts.timeoutMs > 0) {
      timer = setTimeout(() => {
        finish(() =>
          reject(
            new TransientError(
              `Provider call timed out after ${opts.timeoutMs}ms`,
              ErrorCodes.PROVIDER_TIMEOUT,
              { provider: opts.provider },
            ),
          ),
        );
        controller.abort();
      }, opts.timeoutMs);
    }

    parent?.addEventListener("abort", onParentAbort, { once: true });

    void Promise.resolve()
      .then(() => fn(controller.signal))
      .then(
        (value) => finish(() => resolve(value)),
        (err: unknown) => finish(() => reject(err)),
      );
  });
}
