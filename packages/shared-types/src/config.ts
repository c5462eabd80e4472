/**
 * Runtime configuration types.
 */

import type { ProviderName } from "./branded.js";
import type { SpeechCategory } from "./speech.js";

/** Opaque settings handed to an adapter constructor. */
export type ProviderSettings = Readonly<Record<string, unknown>>;

/** Identity and policy for one configured provider instance. */
export interface ProviderDescriptor {
  /** Unique name across both categories. */
  readonly name: ProviderName;
  readonly category: SpeechCategory;
  /** Lower value is tried first. */
  readonly priority: number;
  readonly enabled: boolean;
  /** Key in the driver table. Defaults to `name`. */
  readonly driver?: string | undefined;
  readonly settings: ProviderSettings;
}

/** Circuit breaker knobs. */
export interface BreakerPolicy {
  readonly failureThreshold: number;
  /** How long an opened breaker stays OPEN before a probe is allowed. */
  readonly coolDownMs: number;
  /** Open immediately on a single authentication failure. */
  readonly openOnAuthError: boolean;
}

/** Retry knobs for one provider attempt. */
export interface RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  /** Deadline for each individual call to the adapter. */
  readonly attemptTimeoutMs: number;
}

/** Token bucket + concurrency bound. */
export interface RateLimitPolicy {
  /** Bucket size (max burst). */
  readonly capacity: number;
  readonly refillPerSecond: number;
  /** Max calls in flight at once; 0 disables the bound. */
  readonly maxConcurrent: number;
}

export interface ResiliencePolicy {
  readonly breaker: BreakerPolicy;
  readonly retry: RetryPolicy;
  /** Per-provider limits. */
  readonly rateLimit: RateLimitPolicy;
  /** Per (tenant, provider) limits; null disables tenant fairness. */
  readonly tenantRateLimit: RateLimitPolicy | null;
}

export interface CacheConfig {
  readonly ttlSeconds: number;
  /** Redis connection URL; empty means in-memory cache. */
  readonly redisUrl: string;
  readonly keyPrefix: string;
}

export interface HealthMonitorConfig {
  /** Probe interval; 0 disables the background loop. */
  readonly intervalMs: number;
  readonly probeTimeoutMs: number;
}

export interface StorageConfig {
  /** Directory for synthesized audio objects. */
  readonly directory: string;
}

/** Request-side bounds checked before any provider is tried. */
export interface RequestLimits {
  readonly maxAudioBytes: number;
  /** Max TTS input length in characters. */
  readonly maxTextLength: number;
}

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
}

/** Engine runtime configuration. */
export interface SpeechConfig {
  readonly providers: readonly ProviderDescriptor[];
  readonly policy: ResiliencePolicy;
  readonly cache: CacheConfig;
  readonly health: HealthMonitorConfig;
  readonly limits: RequestLimits;
  readonly storage: StorageConfig;
  readonly server: ServerConfig;
}

/** Safe config for API responses: secrets masked. */
export interface SafeSpeechConfig extends Omit<SpeechConfig, "cache"> {
  readonly cache: Omit<CacheConfig, "redisUrl"> & {
    /** Masked when set; the URL may carry a password. */
    readonly redisUrl: "********" | "";
  };
}
