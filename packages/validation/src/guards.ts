/**
 * Runtime validation guards for external boundaries.
 *
 * Request guards throw ValidationError; config guards throw UserError with
 * INVALID_CONFIG so settings endpoints can answer 400.
 */

import type { AudioContentType, AudioFormat } from "@speech-relay/shared-types";
import { UserError, ValidationError, ErrorCodes } from "@speech-relay/shared-types";

/** Valid audio MIME types accepted for transcription. */
const VALID_AUDIO_TYPES = new Set<string>([
  "audio/wav",
  "audio/x-wav",
  "audio/pcm",
  "audio/ogg",
  "audio/mpeg",
  "audio/webm",
  "audio/flac",
  "audio/aac",
]);

const VALID_AUDIO_FORMATS = new Set<string>(["mp3", "wav", "ogg", "opus", "aac", "flac", "pcm"]);

/** Language tag: ISO 639 primary subtag with optional script/region subtags. */
const LANGUAGE_TAG = /^[a-z]{2,3}(-[a-z]{4})?(-([a-z]{2}|\d{3}))?$/i;

/** Default max audio payload size: 25 MB. */
export const DEFAULT_MAX_AUDIO_BYTES = 25 * 1024 * 1024;

/** Default max TTS input length in characters. */
export const DEFAULT_MAX_TEXT_LENGTH = 5000;

function isAudioContentType(value: string): value is AudioContentType {
  return VALID_AUDIO_TYPES.has(value);
}

function isAudioFormat(value: string): value is AudioFormat {
  return VALID_AUDIO_FORMATS.has(value);
}

/** Validate that a content type is a supported audio type. */
export function validateAudioContentType(
  contentType: string | undefined,
): AudioContentType {
  if (contentType == null || contentType.length === 0) {
    throw new ValidationError(
      "Missing audio content type. Expected audio/wav, audio/ogg, or similar.",
      ErrorCodes.INVALID_CONTENT_TYPE,
    );
  }

  // Strip parameters (e.g., "audio/ogg; codecs=opus" → "audio/ogg")
  const baseType = contentType.split(";")[0]?.trim().toLowerCase() ?? "";

  if (!isAudioContentType(baseType)) {
    throw new ValidationError(
      `Unsupported audio type: "${contentType}". Accepted: ${[...VALID_AUDIO_TYPES].join(", ")}`,
      ErrorCodes.INVALID_CONTENT_TYPE,
    );
  }

  return baseType;
}

/** Validate audio payload size. */
export function validateAudioSize(
  sizeBytes: number,
  maxBytes: number = DEFAULT_MAX_AUDIO_BYTES,
): void {
  if (sizeBytes <= 0) {
    throw new ValidationError("Audio payload is empty.", ErrorCodes.INVALID_AUDIO);
  }
  if (sizeBytes > maxBytes) {
    throw new ValidationError(
      `Audio payload too large: ${(sizeBytes / 1024 / 1024).toFixed(1)}MB. Max: ${(maxBytes / 1024 / 1024).toFixed(1)}MB.`,
      ErrorCodes.AUDIO_TOO_LARGE,
    );
  }
}

/** Validate a requested output format. */
export function validateAudioFormat(format: string): AudioFormat {
  const normalized = format.trim().toLowerCase();
  if (!isAudioFormat(normalized)) {
    throw new ValidationError(
      `Unsupported audio format: "${format}". Accepted: ${[...VALID_AUDIO_FORMATS].join(", ")}`,
      ErrorCodes.INVALID_REQUEST,
    );
  }
  return normalized;
}

/**
 * Validate a language tag or "auto".
 * Returns the tag with a lowercase language and uppercase region ("en-US").
 */
export function validateLanguageCode(language: string): string {
  const trimmed = language.trim();
  if (trimmed.toLowerCase() === "auto") return "auto";

  if (!LANGUAGE_TAG.test(trimmed)) {
    throw new ValidationError(
      `Invalid language code: "${language}". Use a tag like "en", "en-US" or "auto".`,
      ErrorCodes.INVALID_LANGUAGE,
    );
  }

  return trimmed
    .split("-")
    .map((part, i) => {
      if (i === 0) return part.toLowerCase();
      if (part.length === 4) return part[0]?.toUpperCase() + part.slice(1).toLowerCase();
      return part.toUpperCase();
    })
    .join("-");
}

/** Validate TTS input text. Returns the trimmed text. */
export function validateText(
  text: string,
  maxLength: number = DEFAULT_MAX_TEXT_LENGTH,
): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new ValidationError("Text to synthesize is empty.", ErrorCodes.INVALID_TEXT);
  }
  if (trimmed.length > maxLength) {
    throw new ValidationError(
      `Text too long: ${trimmed.length} characters. Max: ${maxLength}.`,
      ErrorCodes.INVALID_TEXT,
    );
  }
  return trimmed;
}

/** Validate that a string is non-empty. */
export function requireNonEmpty(
  value: string | undefined | null,
  fieldName: string,
): string {
  if (value == null || value.trim().length === 0) {
    throw new UserError(
      ErrorCodes.INVALID_CONFIG,
      `${fieldName} is required and cannot be empty.`,
    );
  }
  return value.trim();
}

/** Validate a URL string. */
export function validateUrl(value: string, fieldName: string): string {
  const trimmed = requireNonEmpty(value, fieldName);
  try {
    new URL(trimmed);
    return trimmed;
  } catch {
    throw new UserError(
      ErrorCodes.INVALID_CONFIG,
      `${fieldName} is not a valid URL: "${trimmed}"`,
    );
  }
}

/** Validate a positive integer. */
export function validatePositiveInt(
  value: unknown,
  fieldName: string,
): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0) {
    throw new UserError(
      ErrorCodes.INVALID_CONFIG,
      `${fieldName} must be a positive integer, got: ${String(value)}`,
    );
  }
  return num;
}

/** Validate an integer >= 0. */
export function validateNonNegativeInt(
  value: unknown,
  fieldName: string,
): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < 0) {
    throw new UserError(
      ErrorCodes.INVALID_CONFIG,
      `${fieldName} must be a non-negative integer, got: ${String(value)}`,
    );
  }
  return num;
}
