/**
 * Speech provider abstraction.
 *
 * Every vendor adapter implements this interface. The orchestrator depends
 * only on this contract, never on concrete adapters.
 */

import type {
  AudioFormat,
  AudioPayload,
  ProviderSettings,
  RequestId,
  SpeechCategory,
  SttOptions,
  SynthesizedAudio,
  Transcript,
  VoiceOptions,
} from "@speech-relay/shared-types";
import type { Logger } from "@speech-relay/logging";

/** Context passed to the adapter for each call. */
export interface ProviderContext {
  /** Correlation ID for tracing this request. */
  readonly requestId: RequestId;
  /** Aborted on caller cancellation or when the attempt deadline passes. */
  readonly signal: AbortSignal;
}

/** Static description of what an adapter can do. */
export interface ProviderCapabilities {
  readonly category: SpeechCategory;
  /** Language tags the vendor accepts; empty means any. */
  readonly supportedLanguages: readonly string[];
  /** Audio formats accepted (STT) or produced (TTS). */
  readonly supportedFormats: readonly AudioFormat[];
}

/** Result of a health probe. */
export interface ProviderHealthStatus {
  /** Whether the provider is reachable and ready. */
  readonly ok: boolean;
  /** Latency of the probe in ms. */
  readonly latencyMs: number;
  /** Human-readable status message. */
  readonly message: string;
}

/**
 * Type-safe speech provider interface.
 *
 * An adapter implements `transcribe` (category "stt") or `synthesize`
 * (category "tts"). Instances are shared across requests and hold no
 * per-request state.
 */
export interface SpeechProvider {
  capabilities(): ProviderCapabilities;

  /**
   * Transcribe an audio payload to text.
   *
   * @throws TransientError for network failures, timeouts and 5xx
   * @throws AuthenticationError, ProviderValidationError or QuotaExceededError
   */
  transcribe?(
    audio: AudioPayload,
    language: string,
    options: SttOptions,
    ctx: ProviderContext,
  ): Promise<Transcript>;

  /** Synthesize text and store the audio, returning its reference. */
  synthesize?(
    text: string,
    voice: VoiceOptions,
    ctx: ProviderContext,
  ): Promise<SynthesizedAudio>;

  /** Lightweight reachability probe used by the health monitor. */
  health(signal?: AbortSignal): Promise<ProviderHealthStatus>;
}

/** Where synthesized audio is written. */
export interface ObjectStorage {
  /** Store bytes and return an opaque reference. */
  put(bytes: Uint8Array, contentType: string): Promise<string>;
}

/** Collaborators handed to adapter constructors. */
export interface ProviderDeps {
  /** Configured provider name, for logs and error attribution. */
  readonly name: string;
  readonly logger: Logger;
  readonly storage: ObjectStorage;
}

/** Entry in the static driver table. */
export type ProviderConstructor = (
  settings: ProviderSettings,
  deps: ProviderDeps,
) => SpeechProvider;
