/**
 * OpenAI adapter settings, read from a provider descriptor's opaque map.
 */

import type { ProviderSettings } from "@speech-relay/shared-types";
import { OperatorError, ErrorCodes } from "@speech-relay/shared-types";

export const OPENAI_API_BASE = "https://api.openai.com/v1";

export interface OpenAISettings {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly model: string;
  /** TTS only. */
  readonly voice: string;
}

function readString(settings: ProviderSettings, key: string): string | undefined {
  const value = settings[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new OperatorError(
      ErrorCodes.INVALID_CONFIG,
      "Invalid OpenAI provider settings",
      `settings.${key} must be a string, got ${typeof value}`,
    );
  }
  return value;
}

/**
 * @throws OperatorError(MISSING_CONFIG) when no API key is configured
 */
export function parseOpenAISettings(
  settings: ProviderSettings,
  defaults: { readonly model: string; readonly voice?: string | undefined },
): OpenAISettings {
  const apiKey = readString(settings, "apiKey")?.trim() ?? "";
  if (apiKey.length === 0) {
    throw new OperatorError(
      ErrorCodes.MISSING_CONFIG,
      "OpenAI API key not configured",
      "settings.apiKey is empty",
    );
  }

  const baseUrl = (readString(settings, "baseUrl") ?? OPENAI_API_BASE).replace(/\/+$/, "");

  return {
    apiKey,
    baseUrl,
    model: readString(settings, "model") ?? defaults.model,
    voice: readString(settings, "voice") ?? defaults.voice ?? "alloy",
  };
}
