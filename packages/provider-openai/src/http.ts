/**
 * Shared HTTP plumbing for the OpenAI adapters: fetch with error mapping.
 */

import {
  AuthenticationError,
  ErrorCodes,
  ProviderError,
  ProviderValidationError,
  QuotaExceededError,
  TransientError,
} from "@speech-relay/shared-types";

/** Longest vendor error body kept in an error message. */
const MAX_BODY_CHARS = 300;

/** Map a non-2xx vendor response to a provider error. */
export function mapHttpError(
  provider: string,
  status: number,
  body: string,
  retryAfter: string | null,
): ProviderError {
  const detail = `HTTP ${status}: ${body.slice(0, MAX_BODY_CHARS)}`;
  const opts = { provider, status };

  if (status === 401 || status === 403) {
    return new AuthenticationError(`${provider} authentication failed (${detail})`, opts);
  }
  if (status === 429) {
    return new QuotaExceededError(`${provider} rate limit exceeded (${detail})`, {
      ...opts,
      retryAfterMs: parseRetryAfter(retryAfter),
    });
  }
  if (status === 400 || status === 413 || status === 415 || status === 422) {
    return new ProviderValidationError(`${provider} rejected the input (${detail})`, opts);
  }
  if (status === 408 || status >= 500) {
    return new TransientError(`${provider} unavailable (${detail})`, ErrorCodes.PROVIDER_UNAVAILABLE, opts);
  }
  return new ProviderError(ErrorCodes.PROVIDER_FAILED, "unknown", `${provider} request failed (${detail})`, opts);
}

/** Retry-After in seconds → ms; null when absent or unparseable. */
function parseRetryAfter(header: string | null): number | null {
  if (header === null) return null;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.round(seconds * 1000) : null;
}

/**
 * fetch() that throws provider errors: non-2xx responses are mapped,
 * network failures become TransientError.
 */
export async function vendorFetch(
  provider: string,
  url: string,
  init: RequestInit,
): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (err) {
    if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
      throw new TransientError(`${provider} request aborted`, ErrorCodes.PROVIDER_TIMEOUT, {
        provider,
        cause: err,
      });
    }
    throw new TransientError(
      `Could not reach ${provider}: ${err instanceof Error ? err.message : String(err)}`,
      ErrorCodes.PROVIDER_UNAVAILABLE,
      { provider, cause: err },
    );
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "");
    throw mapHttpError(provider, response.status, body, response.headers.get("retry-after"));
  }
  return response;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
