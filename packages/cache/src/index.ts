/**
 * @speech-relay/cache: result cache and its backing stores.
 */

export type { CacheStore } from "./store.js";
export { MemoryCacheStore, type MemoryCacheStoreOptions } from "./memory-store.js";
export { RedisCacheStore, createRedisClient, type RedisClient } from "./redis-store.js";
export {
  ResultCache,
  isTranscript,
  isSynthesizedAudio,
  normalizeText,
  canonicalJson,
  type CachedResult,
  type ResultCacheOptions,
  type PayloadGuard,
} from "./result-cache.js";
