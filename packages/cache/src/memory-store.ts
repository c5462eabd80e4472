/**
 * In-process cache store with per-entry TTL.
 * Oldest entries are evicted first once `maxEntries` is reached.
 */

import type { CacheStore } from "./store.js";

interface Entry {
  readonly value: string;
  /** Epoch ms; null never expires. */
  readonly expiresAt: number | null;
}

export interface MemoryCacheStoreOptions {
  readonly maxEntries?: number | undefined;
  readonly now?: (() => number) | undefined;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, Entry>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    // Re-insert so the key moves to the back of the eviction order.
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, {
      value,
      expiresAt: ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : null,
    });
  }

  get size(): number {
    return this.entries.size;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
