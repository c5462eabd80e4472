/**
 * Metric sample and aggregate shapes.
 */

import type { SpeechCategory } from "@speech-relay/shared-types";

export type MetricOutcome = "success" | "failure" | "cancelled";

/** One provider attempt, or one cache hit. */
export interface MetricSample {
  /** Epoch ms. */
  readonly timestamp: number;
  readonly provider: string;
  readonly operation: SpeechCategory;
  readonly outcome: MetricOutcome;
  readonly success: boolean;
  readonly latencyMs: number;
  /** Input bytes (STT) or output bytes (TTS). */
  readonly payloadBytes: number;
  readonly errorCode: string | null;
  readonly cacheHit: boolean;
}

/** Storage for flushed samples. */
export interface MetricsBackend {
  write(samples: readonly MetricSample[]): Promise<void>;
  /** Samples with `from <= timestamp < to`. */
  query(from: number, to: number, provider?: string): Promise<readonly MetricSample[]>;
}

/** Aggregate for one (provider, operation) pair over one UTC day. */
export interface ProviderDailyStats {
  readonly provider: string;
  readonly operation: SpeechCategory;
  /** Provider attempts, cache hits excluded. */
  readonly attempts: number;
  readonly successes: number;
  readonly failures: number;
  readonly cancellations: number;
  /** successes / (successes + failures); 0 when neither happened. */
  readonly successRate: number;
  /** Mean latency over attempts. */
  readonly avgLatencyMs: number;
  readonly payloadBytes: number;
  readonly cacheHits: number;
}

export interface DailyStats {
  /** UTC day, YYYY-MM-DD. */
  readonly day: string;
  readonly providers: readonly ProviderDailyStats[];
}
