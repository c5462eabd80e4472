/**
 * Token bucket rate limiter with a concurrency bound.
 *
 * `tryAcquire()` never waits: it hands out a lease or returns null. The
 * lease holds one in-flight slot until released; the token is spent for good.
 */

import type { RateLimitPolicy } from "@speech-relay/shared-types";
import type { Clock } from "./circuit-breaker.js";

/** One admitted call. Releasing twice is a no-op. */
export interface Lease {
  release(): void;
}

export interface LimiterStats {
  readonly tokens: number;
  readonly inFlight: number;
}

export class TokenBucketLimiter {
  private tokens: number;
  private lastRefillMs: number;
  private inFlight = 0;
  private policy: RateLimitPolicy;

  constructor(
    policy: RateLimitPolicy,
    private readonly now: Clock = Date.now,
  ) {
    this.policy = policy;
    this.tokens = policy.capacity;
    this.lastRefillMs = now();
  }

  tryAcquire(): Lease | null {
    this.refill();

    if (this.policy.maxConcurrent > 0 && this.inFlight >= this.policy.maxConcurrent) {
      return null;
    }
    if (this.tokens < 1) {
      return null;
    }

    this.tokens -= 1;
    this.inFlight++;

    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.inFlight--;
      },
    };
  }

  /** Apply a new policy; the bucket is clamped to the new capacity. */
  updatePolicy(policy: RateLimitPolicy): void {
    this.refill();
    this.policy = policy;
    this.tokens = Math.min(this.tokens, policy.capacity);
  }

  /** True when the bucket is full and nothing is in flight. */
  isIdle(): boolean {
    this.refill();
    return this.inFlight === 0 && this.tokens >= this.policy.capacity;
  }

  stats(): LimiterStats {
    this.refill();
    return { tokens: this.tokens, inFlight: this.inFlight };
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = now - this.lastRefillMs;
    if (elapsedMs <= 0) return;
    this.tokens = Math.min(
      this.policy.capacity,
      this.tokens + (elapsedMs / 1000) * this.policy.refillPerSecond,
    );
    this.lastRefillMs = now;
  }
}

/** Upper bound on tracked keys before idle buckets are swept. */
const DEFAULT_MAX_KEYS = 10_000;

/**
 * One token bucket per key, all sharing a policy.
 * Used per provider, and per (tenant, provider) for tenant fairness.
 */
export class KeyedRateLimiter {
  private readonly limiters = new Map<string, TokenBucketLimiter>();
  private policy: RateLimitPolicy;

  constructor(
    policy: RateLimitPolicy,
    private readonly now: Clock = Date.now,
    private readonly maxKeys: number = DEFAULT_MAX_KEYS,
  ) {
    this.policy = policy;
  }

  tryAcquire(key: string): Lease | null {
    return this.limiterFor(key).tryAcquire();
  }

  /** Apply a new policy to every bucket and drop keys not in `keep` (when given). */
  sync(policy: RateLimitPolicy, keep?: Iterable<string>): void {
    this.policy = policy;
    if (keep !== undefined) {
      const wanted = new Set(keep);
      for (const key of [...this.limiters.keys()]) {
        if (!wanted.has(key)) this.limiters.delete(key);
      }
    }
    for (const limiter of this.limiters.values()) {
      limiter.updatePolicy(policy);
    }
  }

  stats(key: string): LimiterStats | undefined {
    return this.limiters.get(key)?.stats();
  }

  get size(): number {
    return this.limiters.size;
  }

  private limiterFor(key: string): TokenBucketLimiter {
    let limiter = this.limiters.get(key);
    if (!limiter) {
      if (this.limiters.size >= this.maxKeys) this.sweepIdle();
      limiter = new TokenBucketLimiter(this.policy, this.now);
      this.limiters.set(key, limiter);
    }
    return limiter;
  }

  /** A full, idle bucket is indistinguishable from a new one. */
  private sweepIdle(): void {
    for (const [key, limiter] of this.limiters) {
      if (limiter.isIdle()) this.limiters.delete(key);
    }
  }
}
