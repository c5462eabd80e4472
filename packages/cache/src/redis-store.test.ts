import { describe, it, expect, vi } from "vitest";
import { RedisCacheStore, type RedisClient } from "./redis-store.js";
import { Logger } from "@speech-relay/logging";

/** In-process stand-in for the ioredis client. */
function createFakeClient() {
  const data = new Map<string, string>();
  const listeners: Array<(err: Error) => void> = [];
  const setCalls: unknown[][] = [];

  const client: RedisClient = {
    async get(key: string) {
      return data.get(key) ?? null;
    },
    async set(key: string, value: string, ...rest: unknown[]) {
      setCalls.push([key, value, ...rest]);
      data.set(key, value);
      return "OK";
    },
    quit: vi.fn(async () => "OK"),
    on(_event: "error", listener: (err: Error) => void) {
      listeners.push(listener);
      return client;
    },
  };

  return { client, setCalls, emitError: (err: Error) => listeners.forEach((l) => l(err)) };
}

describe("RedisCacheStore", () => {
  it("writes with SET EX and reads back", async () => {
    const fake = createFakeClient();
    const store = new RedisCacheStore(fake.client, new Logger());

    await store.set("speech:stt:abc", "{}", 86_400);

    expect(fake.setCalls).toEqual([["speech:stt:abc", "{}", "EX", 86_400]]);
    expect(await store.get("speech:stt:abc")).toBe("{}");
  });

  it("writes without expiry when TTL is 0", async () => {
    const fake = createFakeClient();
    const store = new RedisCacheStore(fake.client, new Logger());
    await store.set("k", "v", 0);
    expect(fake.setCalls).toEqual([["k", "v"]]);
  });

  it("logs connection errors", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockReturnValue(true);
    const fake = createFakeClient();
    new RedisCacheStore(fake.client, new Logger());

    fake.emitError(new Error("ECONNREFUSED"));

    const line = JSON.parse(String(stderr.mock.calls[0]?.[0]));
    expect(line).toMatchObject({ level: "warn", message: "Redis connection error" });
    stderr.mockRestore();
  });

  it("quits the client on close", async () => {
    const fake = createFakeClient();
    const store = new RedisCacheStore(fake.client, new Logger());
    await store.close();
    expect(fake.client.quit).toHaveBeenCalledOnce();
  });
});
