/**
 * Core domain types for orchestrated speech operations.
 *
 * Request in → cache → provider fallback chain → normalized result out.
 */

import type { ProviderName, RequestId, TenantId } from "./branded.js";
import type {
  AllProvidersExhaustedError,
  CancelledError,
  ValidationError,
} from "./errors.js";

/** The two provider categories. */
export type SpeechCategory = "stt" | "tts";

// ── Audio ──

/** Supported audio content types. */
export type AudioContentType =
  | "audio/wav"
  | "audio/x-wav"
  | "audio/pcm"
  | "audio/ogg"
  | "audio/mpeg"
  | "audio/webm"
  | "audio/flac"
  | "audio/aac";

/** Output formats a TTS provider can be asked for. */
export type AudioFormat = "mp3" | "wav" | "ogg" | "opus" | "aac" | "flac" | "pcm";

/** Audio bytes plus metadata. */
export interface AudioPayload {
  /** Raw audio buffer. */
  readonly data: Buffer;
  /** MIME content type of the audio. */
  readonly contentType: AudioContentType;
  /** Optional sample rate hint (Hz). */
  readonly sampleRate?: number | undefined;
}

// ── Requests ──

/** Fields shared by STT and TTS requests. */
interface BaseRequest {
  /** Correlation ID for tracing. */
  readonly requestId: RequestId;
  /** BCP-47 style language tag, or "auto". */
  readonly language: string;
  /** Calling agent / tenant, for per-tenant fairness limits. */
  readonly tenantId?: TenantId | undefined;
  /** Caller-supplied fingerprint of settings that affect the output. */
  readonly cacheFingerprint?: string | undefined;
}

/** Provider-agnostic transcription options. */
export interface SttOptions {
  readonly model?: string | undefined;
  /** Domain vocabulary / context prompt. */
  readonly prompt?: string | undefined;
  readonly profanityFilter?: boolean | undefined;
}

export interface SttRequest extends BaseRequest {
  readonly kind: "stt";
  readonly audio: AudioPayload;
  readonly options?: SttOptions | undefined;
}

/** Provider-agnostic synthesis options. */
export interface VoiceOptions {
  readonly voice?: string | undefined;
  readonly format: AudioFormat;
  /** Playback speed multiplier, 0.25–4.0. */
  readonly speed?: number | undefined;
  readonly quality?: "standard" | "high" | undefined;
}

export interface TtsRequest extends BaseRequest {
  readonly kind: "tts";
  readonly text: string;
  readonly voice: VoiceOptions;
}

export type SpeechRequest = SttRequest | TtsRequest;

// ── Payloads ──

/** Normalized transcription output. */
export interface Transcript {
  readonly text: string;
  /** Confidence score 0.0–1.0 (null if the provider doesn't report it). */
  readonly confidence: number | null;
  /** Detected or requested language. */
  readonly language: string;
}

/** Normalized synthesis output. The audio lives in object storage. */
export interface SynthesizedAudio {
  /** Opaque object storage reference. */
  readonly audioRef: string;
  readonly format: AudioFormat;
  readonly contentType: string;
  readonly bytes: number;
}

// ── Results ──

/** Error types a failed result can carry. */
export type OperationError =
  | ValidationError
  | AllProvidersExhaustedError
  | CancelledError;

export interface OperationSuccess<T> {
  readonly success: true;
  readonly payload: T;
  /** Provider that produced the payload (the original one on a cache hit). */
  readonly provider: ProviderName;
  /** Wall-clock processing time for this request (ms). */
  readonly durationMs: number;
  readonly cacheHit: boolean;
  /** Providers actually invoked for this request, in order. */
  readonly attemptedProviders: readonly ProviderName[];
}

export interface OperationFailure {
  readonly success: false;
  readonly payload: null;
  readonly provider: null;
  readonly durationMs: number;
  readonly cacheHit: false;
  readonly attemptedProviders: readonly ProviderName[];
  readonly error: OperationError;
}

export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

export type SttResponse = OperationResult<Transcript>;
export type TtsResponse = OperationResult<SynthesizedAudio>;

/** Payload type for a request kind. */
export type PayloadFor<R extends SpeechRequest> = R extends SttRequest
  ? Transcript
  : SynthesizedAudio;
