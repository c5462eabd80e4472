/**
 * In-memory metrics backend. Keeps the newest `maxSamples` samples.
 */

import type { MetricSample, MetricsBackend } from "./types.js";

export class MemoryMetricsBackend implements MetricsBackend {
  private samples: MetricSample[] = [];

  constructor(private readonly maxSamples = 100_000) {}

  async write(samples: readonly MetricSample[]): Promise<void> {
    this.samples.push(...samples);
    if (this.samples.length > this.maxSamples) {
      this.samples = this.samples.slice(this.samples.length - this.maxSamples);
    }
  }

  async query(from: number, to: number, provider?: string): Promise<readonly MetricSample[]> {
    return this.samples.filter(
      (s) =>
        s.timestamp >= from &&
        s.timestamp < to &&
        (provider === undefined || s.provider === provider),
    );
  }

  get size(): number {
    return this.samples.length;
  }
}
