/**
 * @speech-relay/validation: runtime guards for external boundaries.
 */

export {
  validateAudioContentType,
  validateAudioSize,
  validateAudioFormat,
  validateLanguageCode,
  validateText,
  requireNonEmpty,
  validateUrl,
  validatePositiveInt,
  validateNonNegativeInt,
  DEFAULT_MAX_AUDIO_BYTES,
  DEFAULT_MAX_TEXT_LENGTH,
} from "./guards.js";
