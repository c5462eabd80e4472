/**
 * Key/value store behind the result cache.
 */

export interface CacheStore {
  /** Stored value, or null when absent or expired. */
  get(key: string): Promise<string | null>;
  /** Store a value; `ttlSeconds` of 0 or less means no expiry. */
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** Release connections. */
  close?(): Promise<void>;
}
