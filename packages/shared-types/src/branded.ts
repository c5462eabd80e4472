/**
 * Branded types for critical identifiers.
 * Prevents accidental misuse of string values across different domains.
 */

declare const __brand: unique symbol;

/** A branded type: structurally a string but nominally distinct. */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Correlation ID for one orchestrated speech request. */
export type RequestId = Brand<string, "RequestId">;

/** Name of a configured provider instance (unique across categories). */
export type ProviderName = Brand<string, "ProviderName">;

/** Calling agent / tenant identifier used for fairness limits. */
export type TenantId = Brand<string, "TenantId">;

const PROVIDER_NAME_PATTERN = /^[a-z0-9][a-z0-9._-]{0,63}$/;

// ── Constructors (runtime validation + branding) ──

/** Create a RequestId from a string. Format: `req_<time>_<random>` */
export function createRequestId(id?: string): RequestId {
  const value =
    id ?? `req_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
  return value as RequestId;
}

/** Brand a provider name. Lowercase letters, digits, `.`, `_` and `-`. */
export function createProviderName(name: string): ProviderName {
  if (!PROVIDER_NAME_PATTERN.test(name)) {
    throw new TypeError(
      `Invalid ProviderName: "${name}". Use lowercase letters, digits, ".", "_" or "-" (max 64 chars).`,
    );
  }
  return name as ProviderName;
}

/** Brand a tenant identifier. */
export function createTenantId(id: string): TenantId {
  if (id.trim().length === 0) {
    throw new TypeError("TenantId cannot be empty");
  }
  return id.trim() as TenantId;
}
