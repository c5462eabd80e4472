/**
 * Configuration loader: reads from environment variables and an optional
 * providers file.
 */

import { readFileSync } from "node:fs";
import type {
  ProviderDescriptor,
  RateLimitPolicy,
  SpeechConfig,
} from "@speech-relay/shared-types";
import {
  OperatorError,
  UserError,
  ErrorCodes,
} from "@speech-relay/shared-types";
import { DEFAULT_MAX_AUDIO_BYTES, DEFAULT_MAX_TEXT_LENGTH } from "@speech-relay/validation";
import { parseProviderDescriptors, type Env } from "./provider-descriptors.js";

export type FileReader = (path: string) => string;

const readUtf8: FileReader = (path) => readFileSync(path, "utf-8");

/**
 * NaN-safe parseInt wrapper. Returns defaultVal when raw is undefined/empty.
 * Throws OperatorError(INVALID_CONFIG) when the parsed result is NaN.
 */
function safeParseInt(
  raw: string | undefined,
  defaultVal: number,
  fieldName: string,
): number {
  if (raw === undefined || raw === "") return defaultVal;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new OperatorError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid integer for ${fieldName}`,
      `parseInt("${raw}", 10) returned NaN`,
    );
  }
  return parsed;
}

/** NaN-safe parseInt that also enforces the value is positive (> 0). */
function safeParsePositiveInt(
  raw: string | undefined,
  defaultVal: number,
  fieldName: string,
): number {
  const value = safeParseInt(raw, defaultVal, fieldName);
  if (value <= 0) {
    throw new OperatorError(
      ErrorCodes.INVALID_CONFIG,
      `${fieldName} must be positive`,
      `Got ${value}`,
    );
  }
  return value;
}

/** NaN-safe parseInt that allows 0 (used where 0 disables a feature). */
function safeParseNonNegativeInt(
  raw: string | undefined,
  defaultVal: number,
  fieldName: string,
): number {
  const value = safeParseInt(raw, defaultVal, fieldName);
  if (value < 0) {
    throw new OperatorError(
      ErrorCodes.INVALID_CONFIG,
      `${fieldName} must not be negative`,
      `Got ${value}`,
    );
  }
  return value;
}

/** Positive finite float, for refill rates. */
function safeParsePositiveNumber(
  raw: string | undefined,
  defaultVal: number,
  fieldName: string,
): number {
  if (raw === undefined || raw === "") return defaultVal;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new OperatorError(
      ErrorCodes.INVALID_CONFIG,
      `${fieldName} must be a positive number`,
      `Got "${raw}"`,
    );
  }
  return parsed;
}

function parseBool(raw: string | undefined, defaultVal: boolean): boolean {
  if (raw === undefined || raw === "") return defaultVal;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function loadRateLimit(env: Env, prefix: string, defaults: RateLimitPolicy): RateLimitPolicy {
  return {
    capacity: safeParsePositiveInt(env[`${prefix}_CAPACITY`], defaults.capacity, `${prefix}_CAPACITY`),
    refillPerSecond: safeParsePositiveNumber(
      env[`${prefix}_REFILL_PER_SECOND`],
      defaults.refillPerSecond,
      `${prefix}_REFILL_PER_SECOND`,
    ),
    maxConcurrent: safeParseNonNegativeInt(
      env[`${prefix}_MAX_CONCURRENT`],
      defaults.maxConcurrent,
      `${prefix}_MAX_CONCURRENT`,
    ),
  };
}

/**
 * Provider descriptors from SPEECH_PROVIDERS_FILE, or the two OpenAI
 * providers when only OPENAI_API_KEY is set.
 */
function loadProviders(env: Env, readFile: FileReader): ProviderDescriptor[] {
  const path = env["SPEECH_PROVIDERS_FILE"];

  if (path === undefined || path === "") {
    if (!env["OPENAI_API_KEY"]) return [];
    return parseProviderDescriptors(
      {
        stt: [{ name: "openai-stt", settings: { apiKey: "env:OPENAI_API_KEY" } }],
        tts: [{ name: "openai-tts", settings: { apiKey: "env:OPENAI_API_KEY" } }],
      },
      env,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFile(path));
  } catch (err) {
    throw new OperatorError(
      ErrorCodes.INVALID_CONFIG,
      "Could not read providers file",
      `${path}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  try {
    return parseProviderDescriptors(raw, env);
  } catch (err) {
    if (err instanceof UserError) {
      throw new OperatorError(ErrorCodes.INVALID_CONFIG, "Invalid providers file", `${path}: ${err.message}`);
    }
    throw err;
  }
}

/** Load engine configuration from environment variables. */
export function loadConfig(
  env: Env = process.env,
  readFile: FileReader = readUtf8,
): SpeechConfig {
  const rateLimit = loadRateLimit(env, "RATE_LIMIT", {
    capacity: 10,
    refillPerSecond: 5,
    maxConcurrent: 10,
  });

  const tenantConfigured = ["CAPACITY", "REFILL_PER_SECOND", "MAX_CONCURRENT"].some(
    (suffix) => (env[`TENANT_RATE_LIMIT_${suffix}`] ?? "") !== "",
  );

  return {
    providers: loadProviders(env, readFile),
    policy: {
      breaker: {
        failureThreshold: safeParsePositiveInt(env["BREAKER_FAILURE_THRESHOLD"], 3, "BREAKER_FAILURE_THRESHOLD"),
        coolDownMs: safeParsePositiveInt(env["BREAKER_COOL_DOWN_MS"], 60_000, "BREAKER_COOL_DOWN_MS"),
        openOnAuthError: parseBool(env["BREAKER_OPEN_ON_AUTH_ERROR"], false),
      },
      retry: {
        maxRetries: safeParseNonNegativeInt(env["RETRY_MAX"], 1, "RETRY_MAX"),
        baseDelayMs: safeParsePositiveInt(env["RETRY_BASE_DELAY_MS"], 1000, "RETRY_BASE_DELAY_MS"),
        maxDelayMs: safeParsePositiveInt(env["RETRY_MAX_DELAY_MS"], 2000, "RETRY_MAX_DELAY_MS"),
        attemptTimeoutMs: safeParsePositiveInt(env["PROVIDER_TIMEOUT_MS"], 30_000, "PROVIDER_TIMEOUT_MS"),
      },
      rateLimit,
      tenantRateLimit: tenantConfigured
        ? loadRateLimit(env, "TENANT_RATE_LIMIT", { capacity: 5, refillPerSecond: 1, maxConcurrent: 2 })
        : null,
    },
    cache: {
      ttlSeconds: safeParseNonNegativeInt(env["CACHE_TTL_SECONDS"], 86_400, "CACHE_TTL_SECONDS"),
      redisUrl: env["REDIS_URL"] ?? "",
      keyPrefix: env["CACHE_KEY_PREFIX"] ?? "speech:",
    },
    health: {
      intervalMs: safeParseNonNegativeInt(env["HEALTH_CHECK_INTERVAL_MS"], 30_000, "HEALTH_CHECK_INTERVAL_MS"),
      probeTimeoutMs: safeParsePositiveInt(env["HEALTH_CHECK_TIMEOUT_MS"], 5000, "HEALTH_CHECK_TIMEOUT_MS"),
    },
    limits: {
      maxAudioBytes: safeParsePositiveInt(env["MAX_AUDIO_BYTES"], DEFAULT_MAX_AUDIO_BYTES, "MAX_AUDIO_BYTES"),
      maxTextLength: safeParsePositiveInt(env["MAX_TEXT_LENGTH"], DEFAULT_MAX_TEXT_LENGTH, "MAX_TEXT_LENGTH"),
    },
    storage: {
      directory: env["AUDIO_STORAGE_DIR"] ?? "./var/audio",
    },
    server: {
      port: safeParseInt(env["PORT"], 4410, "PORT"),
      host: env["HOST"] ?? "0.0.0.0",
    },
  };
}
