/**
 * @speech-relay/provider-openai: OpenAI transcription and speech adapters.
 */

export { OpenAISttProvider } from "./stt-provider.js";
export { OpenAITtsProvider } from "./tts-provider.js";
export { parseOpenAISettings, OPENAI_API_BASE, type OpenAISettings } from "./settings.js";
export { mapHttpError } from "./http.js";
