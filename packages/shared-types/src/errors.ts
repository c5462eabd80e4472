/**
 * Error taxonomy for the speech engine.
 *
 * - `UserError` / `ValidationError`: safe to surface to the calling agent.
 * - `OperatorError`: configuration and contract violations, detail for logs.
 * - `ProviderError` subclasses: failures reported by a vendor adapter; the
 *   `reason` decides retry and circuit-breaker accounting.
 * - `AllProvidersExhaustedError` / `CancelledError`: terminal request outcomes.
 */

export type ErrorKind = "user" | "operator" | "provider";

/** Why a provider attempt failed. */
export type ProviderErrorReason =
  | "transient"
  | "auth"
  | "validation"
  | "quota"
  | "unknown";

/** Base class for all speech engine errors. */
export abstract class SpeechError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: string;
  readonly timestamp: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }

  /** Structured representation for logging. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      ...(this.cause != null ? { cause: describeCause(this.cause) } : {}),
    };
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  return String(cause);
}

/**
 * Error safe to surface to the calling agent.
 * Message is human-readable and contains no sensitive info.
 */
export class UserError extends SpeechError {
  readonly kind = "user" as const;

  constructor(
    readonly code: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** A malformed request, rejected before any provider is attempted. */
export class ValidationError extends UserError {
  constructor(message: string, code: string = ErrorCodes.INVALID_REQUEST, options?: ErrorOptions) {
    super(code, message, options);
  }
}

/**
 * Error for operator/developer debugging only.
 * May contain sensitive details. Never surface to end user.
 */
export class OperatorError extends SpeechError {
  readonly kind = "operator" as const;
  readonly detail: string;

  constructor(
    readonly code: string,
    message: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.detail = detail;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      detail: this.detail,
    };
  }
}

// ── Provider failures ──

export interface ProviderErrorOptions extends ErrorOptions {
  /** Provider that raised the error, when known. */
  readonly provider?: string | undefined;
  /** HTTP status returned by the vendor, when there was one. */
  readonly status?: number | undefined;
}

/** A failure reported by (or on behalf of) a vendor adapter. */
export class ProviderError extends SpeechError {
  readonly kind = "provider" as const;
  readonly provider: string | null;
  readonly status: number | null;

  constructor(
    readonly code: string,
    readonly reason: ProviderErrorReason,
    message: string,
    options?: ProviderErrorOptions,
  ) {
    super(message, options);
    this.provider = options?.provider ?? null;
    this.status = options?.status ?? null;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
      ...(this.provider !== null ? { provider: this.provider } : {}),
      ...(this.status !== null ? { status: this.status } : {}),
    };
  }
}

/** Network failure, timeout or 5xx. Retried within an attempt. */
export class TransientError extends ProviderError {
  constructor(message: string, code: string = ErrorCodes.PROVIDER_UNAVAILABLE, options?: ProviderErrorOptions) {
    super(code, "transient", message, options);
  }
}

/** Rejected credentials. Never retried. */
export class AuthenticationError extends ProviderError {
  constructor(message: string, options?: ProviderErrorOptions) {
    super(ErrorCodes.PROVIDER_AUTH_FAILED, "auth", message, options);
  }
}

/** The vendor refused the input. Never retried, not charged to the breaker. */
export class ProviderValidationError extends ProviderError {
  constructor(message: string, options?: ProviderErrorOptions) {
    super(ErrorCodes.PROVIDER_REJECTED_INPUT, "validation", message, options);
  }
}

/** Vendor-side rate limit. Treated like a local limiter rejection. */
export class QuotaExceededError extends ProviderError {
  readonly retryAfterMs: number | null;

  constructor(message: string, options?: ProviderErrorOptions & { readonly retryAfterMs?: number | null | undefined }) {
    super(ErrorCodes.PROVIDER_QUOTA_EXCEEDED, "quota", message, options);
    this.retryAfterMs = options?.retryAfterMs ?? null;
  }
}

// ── Terminal request outcomes ──

/** Why a candidate provider was passed over without an attempt. */
export type SkipReason =
  | "circuit_open"
  | "rate_limited"
  | "tenant_rate_limited"
  | "unsupported"
  /** Dropped by a reconfiguration while the request was running. */
  | "removed";

export interface SkippedProvider {
  readonly provider: string;
  readonly reason: SkipReason;
}

/** Every candidate was skipped or failed. */
export class AllProvidersExhaustedError extends SpeechError {
  readonly kind = "operator" as const;
  readonly code: string;
  readonly attemptedProviders: readonly string[];
  readonly skippedProviders: readonly SkippedProvider[];

  constructor(
    category: string,
    attemptedProviders: readonly string[],
    skippedProviders: readonly SkippedProvider[],
    lastError?: unknown,
  ) {
    const nothingAttempted = attemptedProviders.length === 0;
    super(
      nothingAttempted
        ? `No ${category} provider available`
        : `All ${category} providers failed (tried: ${attemptedProviders.join(", ")})`,
      lastError !== undefined ? { cause: lastError } : undefined,
    );
    this.code = nothingAttempted
      ? ErrorCodes.NO_PROVIDER_AVAILABLE
      : ErrorCodes.ALL_PROVIDERS_EXHAUSTED;
    this.attemptedProviders = attemptedProviders;
    this.skippedProviders = skippedProviders;
  }

  /** The last underlying provider error, if any provider was attempted. */
  get lastError(): unknown {
    return this.cause;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attemptedProviders: this.attemptedProviders,
      skippedProviders: this.skippedProviders,
      ...(this.cause instanceof SpeechError ? { lastError: this.cause.toJSON() } : {}),
    };
  }
}

/** The caller aborted the request. Counts as neither success nor failure. */
export class CancelledError extends SpeechError {
  readonly kind = "user" as const;
  readonly code = ErrorCodes.CANCELLED;

  constructor(message = "Request was cancelled", options?: ErrorOptions) {
    super(message, options);
  }
}

// ── Error codes ──

export const ErrorCodes = {
  // Request validation
  INVALID_REQUEST: "INVALID_REQUEST",
  INVALID_AUDIO: "INVALID_AUDIO",
  AUDIO_TOO_LARGE: "AUDIO_TOO_LARGE",
  INVALID_CONTENT_TYPE: "INVALID_CONTENT_TYPE",
  INVALID_LANGUAGE: "INVALID_LANGUAGE",
  INVALID_TEXT: "INVALID_TEXT",

  // Provider attempts
  PROVIDER_UNAVAILABLE: "PROVIDER_UNAVAILABLE",
  PROVIDER_TIMEOUT: "PROVIDER_TIMEOUT",
  PROVIDER_AUTH_FAILED: "PROVIDER_AUTH_FAILED",
  PROVIDER_REJECTED_INPUT: "PROVIDER_REJECTED_INPUT",
  PROVIDER_QUOTA_EXCEEDED: "PROVIDER_QUOTA_EXCEEDED",
  PROVIDER_FAILED: "PROVIDER_FAILED",
  PROVIDER_NOT_FOUND: "PROVIDER_NOT_FOUND",

  // Request outcomes
  ALL_PROVIDERS_EXHAUSTED: "ALL_PROVIDERS_EXHAUSTED",
  NO_PROVIDER_AVAILABLE: "NO_PROVIDER_AVAILABLE",
  CANCELLED: "CANCELLED",

  // Config
  INVALID_CONFIG: "INVALID_CONFIG",
  MISSING_CONFIG: "MISSING_CONFIG",

  // Storage / cache
  STORAGE_FAILED: "STORAGE_FAILED",
  CACHE_UNAVAILABLE: "CACHE_UNAVAILABLE",

  // Lifecycle
  NOT_READY: "NOT_READY",

  // General
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
