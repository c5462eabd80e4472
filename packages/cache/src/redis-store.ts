/**
 * Redis-backed cache store.
 *
 * Values are written with `SET key value EX ttl`; Redis expires them.
 */

import { Redis } from "ioredis";
import type { Logger } from "@speech-relay/logging";
import type { CacheStore } from "./store.js";

/** Redis client interface (compatible with ioredis) */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>;
  quit(): Promise<unknown>;
  on(event: "error", listener: (err: Error) => void): unknown;
}

/** Create an ioredis client that connects on first command. */
export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: true,
  });
}

export class RedisCacheStore implements CacheStore {
  constructor(
    private readonly client: RedisClient,
    private readonly logger: Logger,
  ) {
    this.client.on("error", (err) => {
      this.logger.warn("Redis connection error", { error: err });
    });
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds > 0) {
      await this.client.set(key, value, "EX", Math.ceil(ttlSeconds));
    } else {
      await this.client.set(key, value);
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
