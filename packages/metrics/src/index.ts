/**
 * @speech-relay/metrics: per-attempt samples, aggregated on read.
 */

export { MetricsRecorder, type MetricsRecorderOptions } from "./recorder.js";
export { MemoryMetricsBackend } from "./memory-backend.js";
export {
  RedisMetricsBackend,
  type MetricsRedisClient,
  type RedisMetricsBackendOptions,
} from "./redis-backend.js";
export type {
  MetricSample,
  MetricOutcome,
  MetricsBackend,
  ProviderDailyStats,
  DailyStats,
} from "./types.js";
