/**
 * Redis metrics backend.
 *
 * One sorted set per UTC day (`<prefix>metrics:<YYYY-MM-DD>`), scored by
 * sample timestamp. Each member is the sample's JSON plus a unique id, so
 * identical samples are not collapsed. Day keys expire after the retention
 * period.
 */

import { randomUUID } from "node:crypto";
import type { MetricSample, MetricsBackend } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** The sorted-set commands this backend needs (compatible with ioredis). */
export interface MetricsRedisClient {
  zadd(key: string, ...scoreMembers: Array<string | number>): Promise<unknown>;
  zrangebyscore(key: string, min: number | string, max: number | string): Promise<string[]>;
  expire(key: string, seconds: number): Promise<unknown>;
}

export interface RedisMetricsBackendOptions {
  /** Prepended to every key, e.g. "speech:". */
  readonly keyPrefix?: string | undefined;
  readonly retentionDays?: number | undefined;
}

export class RedisMetricsBackend implements MetricsBackend {
  private readonly keyPrefix: string;
  private readonly retentionSeconds: number;

  constructor(
    private readonly client: MetricsRedisClient,
    options: RedisMetricsBackendOptions = {},
  ) {
    this.keyPrefix = options.keyPrefix ?? "";
    this.retentionSeconds = (options.retentionDays ?? 30) * 24 * 60 * 60;
  }

  async write(samples: readonly MetricSample[]): Promise<void> {
    const byDay = new Map<string, Array<string | number>>();
    for (const sample of samples) {
      const key = this.keyFor(sample.timestamp);
      let args = byDay.get(key);
      if (!args) {
        args = [];
        byDay.set(key, args);
      }
      args.push(sample.timestamp, JSON.stringify({ id: randomUUID(), ...sample }));
    }

    for (const [key, args] of byDay) {
      await this.client.zadd(key, ...args);
      await this.client.expire(key, this.retentionSeconds);
    }
  }

  async query(from: number, to: number, provider?: string): Promise<readonly MetricSample[]> {
    const out: MetricSample[] = [];
    for (let day = Math.floor(from / DAY_MS) * DAY_MS; day < to; day += DAY_MS) {
      // "(" makes the upper bound exclusive
      const members = await this.client.zrangebyscore(this.keyFor(day), from, `(${to}`);
      for (const member of members) {
        const sample = parseMember(member);
        if (sample !== null && (provider === undefined || sample.provider === provider)) {
          out.push(sample);
        }
      }
    }
    return out;
  }

  private keyFor(timestamp: number): string {
    return `${this.keyPrefix}metrics:${new Date(timestamp).toISOString().slice(0, 10)}`;
  }
}

/** Decode one stored member; null when it is not a sample. */
function parseMember(raw: string): MetricSample | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const { timestamp, provider, operation, outcome, success, latencyMs, payloadBytes, errorCode, cacheHit } =
    parsed;
  if (
    typeof timestamp !== "number" ||
    typeof provider !== "string" ||
    (operation !== "stt" && operation !== "tts") ||
    (outcome !== "success" && outcome !== "failure" && outcome !== "cancelled") ||
    typeof success !== "boolean" ||
    typeof latencyMs !== "number" ||
    typeof payloadBytes !== "number" ||
    (errorCode !== null && typeof errorCode !== "string") ||
    typeof cacheHit !== "boolean"
  ) {
    return null;
  }

  return { timestamp, provider, operation, outcome, success, latencyMs, payloadBytes, errorCode, cacheHit };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
