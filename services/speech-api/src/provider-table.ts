/**
 * Static driver table: driver key → adapter constructor.
 *
 * Descriptors pick a driver by key (defaulting to their own name), so two
 * configured instances can share one driver with different settings.
 */

import type { ProviderConstructor } from "@speech-relay/provider-contract";
import { OpenAISttProvider, OpenAITtsProvider } from "@speech-relay/provider-openai";

export type DriverTable = Readonly<Record<string, ProviderConstructor>>;

export const DEFAULT_DRIVERS: DriverTable = {
  "openai-stt": (settings, deps) => new OpenAISttProvider(settings, deps),
  "openai-tts": (settings, deps) => new OpenAITtsProvider(settings, deps),
};
