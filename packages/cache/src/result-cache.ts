/**
 * Result cache for successful speech operations.
 *
 * Key = sha256(kind, sha256(content), canonical JSON of the settings that
 * change the output). Reads and writes never fail a request: store errors
 * are logged and treated as a miss or a skipped write.
 */

import { createHash } from "node:crypto";
import type { Logger } from "@speech-relay/logging";
import {
  createProviderName,
  type ProviderName,
  type SpeechRequest,
  type SynthesizedAudio,
  type Transcript,
} from "@speech-relay/shared-types";
import type { CacheStore } from "./store.js";

/** Format version of stored entries. Bump to orphan old entries. */
const ENTRY_VERSION = 1;

/** A cached payload and the provider that produced it. */
export interface CachedResult<T> {
  readonly provider: ProviderName;
  readonly payload: T;
  /** Epoch ms when the entry was written. */
  readonly storedAt: number;
}

export interface ResultCacheOptions {
  readonly ttlSeconds: number;
  readonly keyPrefix: string;
  readonly logger: Logger;
}

export type PayloadGuard<T> = (value: unknown) => value is T;

export class ResultCache {
  private ttlSeconds: number;
  private readonly keyPrefix: string;
  private readonly logger: Logger;

  constructor(
    private readonly store: CacheStore,
    options: ResultCacheOptions,
  ) {
    this.ttlSeconds = options.ttlSeconds;
    this.keyPrefix = options.keyPrefix;
    this.logger = options.logger.child({ component: "result-cache" });
  }

  /** Derive the cache key for a request. */
  keyFor(request: SpeechRequest): string {
    const contentHash =
      request.kind === "stt"
        ? sha256(request.audio.data)
        : sha256(normalizeText(request.text));

    const settings =
      request.kind === "stt"
        ? {
            language: request.language.toLowerCase(),
            contentType: request.audio.contentType,
            options: request.options ?? {},
            fingerprint: request.cacheFingerprint ?? null,
          }
        : {
            language: request.language.toLowerCase(),
            voice: request.voice,
            fingerprint: request.cacheFingerprint ?? null,
          };

    const digest = sha256(`${request.kind}\n${contentHash}\n${canonicalJson(settings)}`);
    return `${this.keyPrefix}${request.kind}:${digest}`;
  }

  /**
   * Look up a cached payload. Unreadable or malformed entries are a miss.
   */
  async lookup<T>(
    request: SpeechRequest,
    isPayload: PayloadGuard<T>,
  ): Promise<CachedResult<T> | null> {
    const key = this.keyFor(request);

    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (err) {
      this.logger.warn("Cache read failed, treating as miss", {
        requestId: request.requestId,
        error: err,
      });
      return null;
    }
    if (raw === null) return null;

    const entry = parseEntry(raw, isPayload);
    if (entry === null) {
      this.logger.warn("Discarding malformed cache entry", {
        requestId: request.requestId,
        key,
      });
      return null;
    }
    return entry;
  }

  /** Store a successful payload. Never throws. */
  async save(
    request: SpeechRequest,
    provider: ProviderName,
    payload: Transcript | SynthesizedAudio,
  ): Promise<void> {
    const key = this.keyFor(request);
    const value = JSON.stringify({
      v: ENTRY_VERSION,
      provider,
      payload,
      storedAt: Date.now(),
    });
    try {
      await this.store.set(key, value, this.ttlSeconds);
    } catch (err) {
      this.logger.warn("Cache write failed", {
        requestId: request.requestId,
        provider,
        error: err,
      });
    }
  }

  setTtl(ttlSeconds: number): void {
    this.ttlSeconds = ttlSeconds;
  }
}

// ── Payload guards ──

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isTranscript(value: unknown): value is Transcript {
  return (
    isRecord(value) &&
    typeof value["text"] === "string" &&
    value["text"].length > 0 &&
    (value["confidence"] === null || typeof value["confidence"] === "number") &&
    typeof value["language"] === "string"
  );
}

export function isSynthesizedAudio(value: unknown): value is SynthesizedAudio {
  return (
    isRecord(value) &&
    typeof value["audioRef"] === "string" &&
    value["audioRef"].length > 0 &&
    typeof value["format"] === "string" &&
    typeof value["contentType"] === "string" &&
    typeof value["bytes"] === "number"
  );
}

// ── Helpers ──

function parseEntry<T>(raw: string, isPayload: PayloadGuard<T>): CachedResult<T> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (
    !isRecord(parsed) ||
    parsed["v"] !== ENTRY_VERSION ||
    typeof parsed["provider"] !== "string" ||
    typeof parsed["storedAt"] !== "number"
  ) {
    return null;
  }

  const payload = parsed["payload"];
  if (!isPayload(payload)) return null;

  let provider: ProviderName;
  try {
    provider = createProviderName(parsed["provider"]);
  } catch {
    return null;
  }

  return { provider, payload, storedAt: parsed["storedAt"] };
}

function sha256(input: string | Uint8Array): string {
  return createHash("sha256").update(input).digest("hex");
}

/** Trim and collapse runs of whitespace. */
export function normalizeText(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

/** JSON with object keys sorted at every level and undefined fields dropped. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const v = value[key];
      if (v !== undefined) out[key] = sortKeys(v);
    }
    return out;
  }
  return value;
}
