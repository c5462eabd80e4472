/**
 * OpenAI TTS adapter: POST /audio/speech, audio kept in object storage.
 */

import type {
  AudioFormat,
  ProviderSettings,
  SynthesizedAudio,
  VoiceOptions,
} from "@speech-relay/shared-types";
import { ProviderValidationError } from "@speech-relay/shared-types";
import type {
  ObjectStorage,
  ProviderCapabilities,
  ProviderContext,
  ProviderDeps,
  ProviderHealthStatus,
  SpeechProvider,
} from "@speech-relay/provider-contract";
import type { Logger } from "@speech-relay/logging";
import { parseOpenAISettings, type OpenAISettings } from "./settings.js";
import { vendorFetch } from "./http.js";
import { probeModel } from "./stt-provider.js";

const CONTENT_TYPES: Partial<Record<AudioFormat, string>> = {
  mp3: "audio/mpeg",
  opus: "audio/opus",
  aac: "audio/aac",
  flac: "audio/flac",
  wav: "audio/wav",
  pcm: "audio/pcm",
};

const TTS_FORMATS: readonly AudioFormat[] = ["mp3", "opus", "aac", "flac", "wav", "pcm"];

export class OpenAITtsProvider implements SpeechProvider {
  private readonly config: OpenAISettings;
  private readonly name: string;
  private readonly storage: ObjectStorage;
  private readonly log: Logger;

  constructor(settings: ProviderSettings, deps: ProviderDeps) {
    this.config = parseOpenAISettings(settings, { model: "tts-1", voice: "alloy" });
    this.name = deps.name;
    this.storage = deps.storage;
    this.log = deps.logger.child({ provider: deps.name });
  }

  capabilities(): ProviderCapabilities {
    return { category: "tts", supportedLanguages: [], supportedFormats: TTS_FORMATS };
  }

  async synthesize(
    text: string,
    voice: VoiceOptions,
    ctx: ProviderContext,
  ): Promise<SynthesizedAudio> {
    const contentType = CONTENT_TYPES[voice.format];
    if (contentType === undefined) {
      throw new ProviderValidationError(`OpenAI cannot produce ${voice.format} audio`, {
        provider: this.name,
      });
    }

    const model = voice.quality === "high" ? "tts-1-hd" : this.config.model;
    const response = await vendorFetch(this.name, `${this.config.baseUrl}/audio/speech`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model,
        input: text,
        voice: voice.voice ?? this.config.voice,
        response_format: voice.format,
        ...(voice.speed !== undefined ? { speed: voice.speed } : {}),
      }),
      signal: ctx.signal,
    });

    const bytes = new Uint8Array(await response.arrayBuffer());
    if (bytes.length === 0) {
      throw new ProviderValidationError("OpenAI returned empty audio", { provider: this.name });
    }

    const audioRef = await this.storage.put(bytes, contentType);

    this.log.debug("OpenAI synthesis complete", {
      requestId: ctx.requestId,
      bytes: bytes.length,
      model,
    });

    return { audioRef, format: voice.format, contentType, bytes: bytes.length };
  }

  async health(signal?: AbortSignal): Promise<ProviderHealthStatus> {
    return probeModel(this.name, this.config, signal);
  }
}
