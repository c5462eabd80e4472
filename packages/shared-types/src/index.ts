/**
 * @speech-relay/shared-types: canonical domain types for the speech engine.
 */

export {
  type Brand,
  type RequestId,
  type ProviderName,
  type TenantId,
  createRequestId,
  createProviderName,
  createTenantId,
} from "./branded.js";

export {
  SpeechError,
  UserError,
  ValidationError,
  OperatorError,
  ProviderError,
  TransientError,
  AuthenticationError,
  ProviderValidationError,
  QuotaExceededError,
  AllProvidersExhaustedError,
  CancelledError,
  ErrorCodes,
  type ErrorCode,
  type ErrorKind,
  type ProviderErrorReason,
  type ProviderErrorOptions,
  type SkipReason,
  type SkippedProvider,
} from "./errors.js";

export type {
  SpeechCategory,
  AudioContentType,
  AudioFormat,
  AudioPayload,
  SttOptions,
  SttRequest,
  VoiceOptions,
  TtsRequest,
  SpeechRequest,
  Transcript,
  SynthesizedAudio,
  OperationError,
  OperationSuccess,
  OperationFailure,
  OperationResult,
  SttResponse,
  TtsResponse,
  PayloadFor,
} from "./speech.js";

export type {
  ProviderSettings,
  ProviderDescriptor,
  BreakerPolicy,
  RetryPolicy,
  RateLimitPolicy,
  ResiliencePolicy,
  CacheConfig,
  HealthMonitorConfig,
  RequestLimits,
  StorageConfig,
  ServerConfig,
  SpeechConfig,
  SafeSpeechConfig,
} from "./config.js";
