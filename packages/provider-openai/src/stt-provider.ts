/**
 * OpenAI STT adapter: synchronous transcription API.
 *
 * Flow:
 * 1. POST /audio/transcriptions with multipart audio + model
 * 2. Get transcript text back synchronously
 */

import type {
  AudioFormat,
  AudioPayload,
  ProviderSettings,
  SttOptions,
  Transcript,
} from "@speech-relay/shared-types";
import { ErrorCodes, ProviderError, ProviderValidationError } from "@speech-relay/shared-types";
import type {
  ProviderCapabilities,
  ProviderContext,
  ProviderDeps,
  ProviderHealthStatus,
  SpeechProvider,
} from "@speech-relay/provider-contract";
import type { Logger } from "@speech-relay/logging";
import { parseOpenAISettings, type OpenAISettings } from "./settings.js";
import { isRecord, vendorFetch } from "./http.js";

const STT_FORMATS: readonly AudioFormat[] = ["wav", "mp3", "ogg", "flac", "aac", "pcm"];

const EXTENSIONS: Record<string, string> = {
  "audio/wav": "wav",
  "audio/x-wav": "wav",
  "audio/pcm": "pcm",
  "audio/ogg": "ogg",
  "audio/mpeg": "mp3",
  "audio/webm": "webm",
  "audio/flac": "flac",
  "audio/aac": "aac",
};

export class OpenAISttProvider implements SpeechProvider {
  private readonly config: OpenAISettings;
  private readonly name: string;
  private readonly log: Logger;

  constructor(settings: ProviderSettings, deps: ProviderDeps) {
    this.config = parseOpenAISettings(settings, { model: "whisper-1" });
    this.name = deps.name;
    this.log = deps.logger.child({ provider: deps.name });
  }

  capabilities(): ProviderCapabilities {
    return { category: "stt", supportedLanguages: [], supportedFormats: STT_FORMATS };
  }

  async transcribe(
    audio: AudioPayload,
    language: string,
    options: SttOptions,
    ctx: ProviderContext,
  ): Promise<Transcript> {
    const startMs = Date.now();
    const log = this.log.child({ requestId: ctx.requestId });
    const model = options.model ?? this.config.model;

    log.debug("Starting OpenAI transcription", {
      contentType: audio.contentType,
      audioBytes: audio.data.length,
      model,
    });

    const formData = new FormData();
    const blob = new Blob([new Uint8Array(audio.data)], { type: audio.contentType });
    formData.append("file", blob, `audio.${EXTENSIONS[audio.contentType] ?? "bin"}`);
    formData.append("model", model);
    formData.append("response_format", "verbose_json");

    // The API takes ISO 639-1 only.
    const primary = language.split("-")[0] ?? language;
    if (language !== "auto") {
      formData.append("language", primary);
    }
    if (options.prompt !== undefined) {
      formData.append("prompt", options.prompt);
    }

    const response = await vendorFetch(this.name, `${this.config.baseUrl}/audio/transcriptions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: formData,
      signal: ctx.signal,
    });

    const data: unknown = await response.json();
    if (!isRecord(data)) {
      throw new ProviderError(ErrorCodes.PROVIDER_FAILED, "unknown", "OpenAI returned a non-object body", {
        provider: this.name,
      });
    }

    const text = typeof data["text"] === "string" ? data["text"].trim() : "";
    if (text.length === 0) {
      throw new ProviderValidationError(
        "Transcription returned empty text. The audio may be silent or too short.",
        { provider: this.name },
      );
    }

    log.debug("OpenAI transcription complete", {
      durationMs: Date.now() - startMs,
      textLength: text.length,
    });

    return {
      text,
      confidence: null, // Whisper API doesn't return confidence
      language: language !== "auto" ? language : detectedLanguage(data["language"]),
    };
  }

  async health(signal?: AbortSignal): Promise<ProviderHealthStatus> {
    return probeModel(this.name, this.config, signal);
  }
}

function detectedLanguage(value: unknown): string {
  return typeof value === "string" && value.length > 0 ? value : "auto";
}

/** Use the models endpoint as a lightweight health check. */
export async function probeModel(
  provider: string,
  config: OpenAISettings,
  signal?: AbortSignal,
): Promise<ProviderHealthStatus> {
  const startMs = Date.now();
  try {
    await vendorFetch(provider, `${config.baseUrl}/models/${encodeURIComponent(config.model)}`, {
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
      },
      signal: signal ?? AbortSignal.timeout(5000),
    });
    return { ok: true, latencyMs: Date.now() - startMs, message: "OpenAI API healthy" };
  } catch (err) {
    return {
      ok: false,
      latencyMs: Date.now() - startMs,
      message: err instanceof Error ? err.message : String(err),
    };
  }
}
