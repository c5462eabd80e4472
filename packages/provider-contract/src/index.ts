/**
 * @speech-relay/provider-contract: the adapter interface every vendor implements.
 */

export type {
  ProviderContext,
  ProviderCapabilities,
  ProviderHealthStatus,
  SpeechProvider,
  ObjectStorage,
  ProviderDeps,
  ProviderConstructor,
} from "./provider.js";
