/**
 * Buffered metrics recorder.
 *
 * `record()` appends to an in-memory buffer and returns; a timer flushes the
 * buffer to the backend. A failed flush is logged and the batch is put back
 * for the next one. Aggregation happens on read.
 */

import type { Logger } from "@speech-relay/logging";
import type { SpeechCategory } from "@speech-relay/shared-types";
import { UserError, ErrorCodes } from "@speech-relay/shared-types";
import type {
  DailyStats,
  MetricSample,
  MetricsBackend,
  ProviderDailyStats,
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface MetricsRecorderOptions {
  readonly logger: Logger;
  /** Delay between a record() and the flush it schedules. */
  readonly flushIntervalMs?: number | undefined;
  /** Buffer size that triggers an immediate flush. */
  readonly maxBuffer?: number | undefined;
  /** Samples kept across failed flushes before the oldest are dropped. */
  readonly maxRetained?: number | undefined;
  readonly now?: (() => number) | undefined;
}

export class MetricsRecorder {
  private buffer: MetricSample[] = [];
  private timer: NodeJS.Timeout | null = null;
  private flushing: Promise<void> | null = null;

  private readonly logger: Logger;
  private readonly flushIntervalMs: number;
  private readonly maxBuffer: number;
  private readonly maxRetained: number;
  private readonly now: () => number;

  constructor(
    private readonly backend: MetricsBackend,
    options: MetricsRecorderOptions,
  ) {
    this.logger = options.logger.child({ component: "metrics" });
    this.flushIntervalMs = options.flushIntervalMs ?? 1000;
    this.maxBuffer = options.maxBuffer ?? 500;
    this.maxRetained = options.maxRetained ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  /** Buffer one sample. Never throws, never waits. */
  record(sample: Omit<MetricSample, "timestamp"> & { readonly timestamp?: number }): void {
    this.buffer.push({ ...sample, timestamp: sample.timestamp ?? this.now() });

    if (this.buffer.length >= this.maxBuffer) {
      this.clearTimer();
      void this.flush();
      return;
    }

    if (this.timer === null) {
      this.timer = setTimeout(() => {
        this.timer = null;
        void this.flush();
      }, this.flushIntervalMs);
      this.timer.unref();
    }
  }

  /** Write buffered samples to the backend. Never rejects. */
  async flush(): Promise<void> {
    // Serialize flushes so a retained batch keeps its order.
    while (this.flushing !== null) {
      await this.flushing;
    }
    if (this.buffer.length === 0) return;

    const batch = this.buffer;
    this.buffer = [];

    this.flushing = this.backend.write(batch).then(
      () => undefined,
      (err: unknown) => {
        this.logger.warn("Metrics flush failed, retaining batch", {
          samples: batch.length,
          error: err,
        });
        const retained = [...batch, ...this.buffer];
        this.buffer = retained.slice(Math.max(0, retained.length - this.maxRetained));
      },
    );

    try {
      await this.flushing;
    } finally {
      this.flushing = null;
    }
  }

  /**
   * Aggregate samples for one UTC day, per provider and operation.
   *
   * @param day - YYYY-MM-DD; defaults to today (UTC)
   */
  async getDailyStats(provider?: string, day?: string): Promise<DailyStats> {
    await this.flush();

    const dayKey = day ?? new Date(this.now()).toISOString().slice(0, 10);
    const from = DAY_PATTERN.test(dayKey) ? Date.parse(`${dayKey}T00:00:00.000Z`) : Number.NaN;
    if (Number.isNaN(from)) {
      throw new UserError(
        ErrorCodes.INVALID_REQUEST,
        `Invalid day: "${dayKey}". Expected YYYY-MM-DD.`,
      );
    }

    const samples = await this.backend.query(from, from + DAY_MS, provider);
    return { day: dayKey, providers: aggregate(samples) };
  }

  /** Stop the timer and flush what is left. */
  async close(): Promise<void> {
    this.clearTimer();
    await this.flush();
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

interface Accumulator {
  provider: string;
  operation: SpeechCategory;
  attempts: number;
  successes: number;
  failures: number;
  cancellations: number;
  latencyTotal: number;
  payloadBytes: number;
  cacheHits: number;
}

function aggregate(samples: readonly MetricSample[]): ProviderDailyStats[] {
  const groups = new Map<string, Accumulator>();

  for (const s of samples) {
    const key = `${s.provider}\u0000${s.operation}`;
    let acc = groups.get(key);
    if (!acc) {
      acc = {
        provider: s.provider,
        operation: s.operation,
        attempts: 0,
        successes: 0,
        failures: 0,
        cancellations: 0,
        latencyTotal: 0,
        payloadBytes: 0,
        cacheHits: 0,
      };
      groups.set(key, acc);
    }

    if (s.cacheHit) {
      acc.cacheHits++;
      continue;
    }

    acc.attempts++;
    acc.latencyTotal += s.latencyMs;
    acc.payloadBytes += s.payloadBytes;
    if (s.outcome === "success") acc.successes++;
    else if (s.outcome === "failure") acc.failures++;
    else acc.cancellations++;
  }

  return [...groups.values()]
    .map((acc) => {
      const decided = acc.successes + acc.failures;
      return {
        provider: acc.provider,
        operation: acc.operation,
        attempts: acc.attempts,
        successes: acc.successes,
        failures: acc.failures,
        cancellations: acc.cancellations,
        successRate: decided > 0 ? acc.successes / decided : 0,
        avgLatencyMs: acc.attempts > 0 ? Math.round(acc.latencyTotal / acc.attempts) : 0,
        payloadBytes: acc.payloadBytes,
        cacheHits: acc.cacheHits,
      };
    })
    .sort((a, b) => a.provider.localeCompare(b.provider) || a.operation.localeCompare(b.operation));
}
