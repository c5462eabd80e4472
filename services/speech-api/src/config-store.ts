/**
 * ConfigStore: mutable config wrapper with immutable snapshots.
 *
 * Single source of truth for runtime configuration. Readers (server
 * handlers, the provider rebuilder) read from ConfigStore; every external
 * patch goes through `validateSettingsPatch` first.
 */

import type {
  BreakerPolicy,
  HealthMonitorConfig,
  ProviderDescriptor,
  RateLimitPolicy,
  RequestLimits,
  RetryPolicy,
  SafeSpeechConfig,
  SpeechConfig,
} from "@speech-relay/shared-types";
import { UserError, ErrorCodes } from "@speech-relay/shared-types";
import { maskSecrets } from "@speech-relay/logging";
import { validatePositiveInt, validateNonNegativeInt } from "@speech-relay/validation";
import { isRecord, parseProviderDescriptors, type Env } from "./provider-descriptors.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/** A validated partial update for SpeechConfig. */
export interface ValidatedSettingsPatch {
  /** Replaces the whole provider list. */
  readonly providers?: readonly ProviderDescriptor[];
  readonly breaker?: Partial<BreakerPolicy>;
  readonly retry?: Partial<RetryPolicy>;
  readonly rateLimit?: Partial<RateLimitPolicy>;
  /** A full policy, or null to disable tenant limits. */
  readonly tenantRateLimit?: RateLimitPolicy | null;
  readonly cache?: { readonly ttlSeconds?: number };
  readonly health?: Partial<HealthMonitorConfig>;
  readonly limits?: Partial<RequestLimits>;
}

/** Callback fired after ConfigStore.update() with the patch and fully merged config. */
export type ConfigChangeListener = (
  patch: ValidatedSettingsPatch,
  config: Readonly<SpeechConfig>,
) => void;

/**
 * Mutable configuration store with immutable read snapshots.
 *
 * - `get()`: full config for internal consumers
 * - `getSafe()`: masked config for API responses (secrets hidden)
 * - `update()`: applies a validated partial patch
 * - `onChange()`: registers a listener for config changes
 */
export class ConfigStore {
  private config: SpeechConfig;
  private readonly listeners: ConfigChangeListener[] = [];

  constructor(initial: SpeechConfig) {
    this.config = { ...initial };
  }

  onChange(listener: ConfigChangeListener): void {
    this.listeners.push(listener);
  }

  get(): Readonly<SpeechConfig> {
    return this.config;
  }

  /** Returns config with all secrets masked: safe for API responses. */
  getSafe(): SafeSpeechConfig {
    return {
      ...this.config,
      providers: this.config.providers.map((d) => {
        const settings = maskSecrets(d.settings);
        return { ...d, settings: isRecord(settings) ? settings : {} };
      }),
      cache: {
        ...this.config.cache,
        redisUrl: this.config.cache.redisUrl === "" ? "" : "********",
      },
    };
  }

  /**
   * Applies a validated partial update.
   *
   * Nested sections are shallow-merged. If a listener rejects the new
   * config, the previous one is restored and the error rethrown.
   */
  update(patch: ValidatedSettingsPatch): void {
    const previous = this.config;
    const { policy } = previous;

    this.config = {
      ...previous,
      ...(patch.providers !== undefined && { providers: patch.providers }),
      policy: {
        breaker: { ...policy.breaker, ...patch.breaker },
        retry: { ...policy.retry, ...patch.retry },
        rateLimit: { ...policy.rateLimit, ...patch.rateLimit },
        tenantRateLimit:
          patch.tenantRateLimit !== undefined ? patch.tenantRateLimit : policy.tenantRateLimit,
      },
      cache: { ...previous.cache, ...patch.cache },
      health: { ...previous.health, ...patch.health },
      limits: { ...previous.limits, ...patch.limits },
    };

    try {
      for (const fn of this.listeners) fn(patch, this.config);
    } catch (err) {
      this.config = previous;
      throw err;
    }
  }
}

// ── Validation ──

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new UserError(ErrorCodes.INVALID_CONFIG, `${key} must be an object.`);
  }
  return value;
}

function positiveNumber(value: unknown, fieldName: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new UserError(
      ErrorCodes.INVALID_CONFIG,
      `${fieldName} must be a positive number, got: ${String(value)}`,
    );
  }
  return value;
}

function rateLimitFields(
  raw: Record<string, unknown>,
  prefix: string,
): Mutable<Partial<RateLimitPolicy>> {
  const out: Mutable<Partial<RateLimitPolicy>> = {};
  if (raw["capacity"] !== undefined) {
    out.capacity = validatePositiveInt(raw["capacity"], `${prefix}.capacity`);
  }
  if (raw["refillPerSecond"] !== undefined) {
    out.refillPerSecond = positiveNumber(raw["refillPerSecond"], `${prefix}.refillPerSecond`);
  }
  if (raw["maxConcurrent"] !== undefined) {
    out.maxConcurrent = validateNonNegativeInt(raw["maxConcurrent"], `${prefix}.maxConcurrent`);
  }
  return out;
}

/**
 * Validates a raw settings patch from an external source (POST /api/settings).
 *
 * Only present fields are validated. Unknown top-level fields are ignored.
 *
 * @throws UserError with INVALID_CONFIG code for any validation failure
 */
export function validateSettingsPatch(body: unknown, env: Env = process.env): ValidatedSettingsPatch {
  if (!isRecord(body)) {
    throw new UserError(
      ErrorCodes.INVALID_CONFIG,
      "Settings patch must be a non-null object.",
    );
  }

  const patch: Mutable<ValidatedSettingsPatch> = {};

  if (body["providers"] !== undefined) {
    patch.providers = parseProviderDescriptors(body["providers"], env);
  }

  const breakerRaw = section(body, "breaker");
  if (breakerRaw) {
    const breaker: Mutable<Partial<BreakerPolicy>> = {};
    if (breakerRaw["failureThreshold"] !== undefined) {
      breaker.failureThreshold = validatePositiveInt(breakerRaw["failureThreshold"], "breaker.failureThreshold");
    }
    if (breakerRaw["coolDownMs"] !== undefined) {
      breaker.coolDownMs = validatePositiveInt(breakerRaw["coolDownMs"], "breaker.coolDownMs");
    }
    if (breakerRaw["openOnAuthError"] !== undefined) {
      if (typeof breakerRaw["openOnAuthError"] !== "boolean") {
        throw new UserError(ErrorCodes.INVALID_CONFIG, "breaker.openOnAuthError must be a boolean.");
      }
      breaker.openOnAuthError = breakerRaw["openOnAuthError"];
    }
    if (Object.keys(breaker).length > 0) patch.breaker = breaker;
  }

  const retryRaw = section(body, "retry");
  if (retryRaw) {
    const retry: Mutable<Partial<RetryPolicy>> = {};
    if (retryRaw["maxRetries"] !== undefined) {
      retry.maxRetries = validateNonNegativeInt(retryRaw["maxRetries"], "retry.maxRetries");
    }
    if (retryRaw["baseDelayMs"] !== undefined) {
      retry.baseDelayMs = validatePositiveInt(retryRaw["baseDelayMs"], "retry.baseDelayMs");
    }
    if (retryRaw["maxDelayMs"] !== undefined) {
      retry.maxDelayMs = validatePositiveInt(retryRaw["maxDelayMs"], "retry.maxDelayMs");
    }
    if (retryRaw["attemptTimeoutMs"] !== undefined) {
      retry.attemptTimeoutMs = validatePositiveInt(retryRaw["attemptTimeoutMs"], "retry.attemptTimeoutMs");
    }
    if (Object.keys(retry).length > 0) patch.retry = retry;
  }

  const rateRaw = section(body, "rateLimit");
  if (rateRaw) {
    const rateLimit = rateLimitFields(rateRaw, "rateLimit");
    if (Object.keys(rateLimit).length > 0) patch.rateLimit = rateLimit;
  }

  if (body["tenantRateLimit"] === null) {
    patch.tenantRateLimit = null;
  } else {
    const tenantRaw = section(body, "tenantRateLimit");
    if (tenantRaw) {
      const { capacity, refillPerSecond, maxConcurrent } = rateLimitFields(tenantRaw, "tenantRateLimit");
      if (capacity === undefined || refillPerSecond === undefined || maxConcurrent === undefined) {
        throw new UserError(
          ErrorCodes.INVALID_CONFIG,
          "tenantRateLimit needs capacity, refillPerSecond and maxConcurrent, or null to disable it.",
        );
      }
      patch.tenantRateLimit = { capacity, refillPerSecond, maxConcurrent };
    }
  }

  const cacheRaw = section(body, "cache");
  if (cacheRaw && cacheRaw["ttlSeconds"] !== undefined) {
    patch.cache = { ttlSeconds: validateNonNegativeInt(cacheRaw["ttlSeconds"], "cache.ttlSeconds") };
  }

  const healthRaw = section(body, "health");
  if (healthRaw) {
    const health: Mutable<Partial<HealthMonitorConfig>> = {};
    if (healthRaw["intervalMs"] !== undefined) {
      health.intervalMs = validateNonNegativeInt(healthRaw["intervalMs"], "health.intervalMs");
    }
    if (healthRaw["probeTimeoutMs"] !== undefined) {
      health.probeTimeoutMs = validatePositiveInt(healthRaw["probeTimeoutMs"], "health.probeTimeoutMs");
    }
    if (Object.keys(health).length > 0) patch.health = health;
  }

  const limitsRaw = section(body, "limits");
  if (limitsRaw) {
    const limits: Mutable<Partial<RequestLimits>> = {};
    if (limitsRaw["maxAudioBytes"] !== undefined) {
      limits.maxAudioBytes = validatePositiveInt(limitsRaw["maxAudioBytes"], "limits.maxAudioBytes");
    }
    if (limitsRaw["maxTextLength"] !== undefined) {
      limits.maxTextLength = validatePositiveInt(limitsRaw["maxTextLength"], "limits.maxTextLength");
    }
    if (Object.keys(limits).length > 0) patch.limits = limits;
  }

  return patch;
}
