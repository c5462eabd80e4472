/**
 * End-to-end: orchestrator + OpenAI adapters + cache + file storage + HTTP
 * settings, with the vendor API replaced by a fetch spy routed on base URL.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import type { Server } from "node:http";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MemoryCacheStore } from "@speech-relay/cache";
import { FileObjectStorage } from "@speech-relay/object-storage";
import { Logger } from "@speech-relay/logging";
import type { SpeechConfig } from "@speech-relay/shared-types";
import { SpeechOrchestrator } from "../../services/speech-api/src/orchestrator.js";
import { DEFAULT_DRIVERS } from "../../services/speech-api/src/provider-table.js";
import { ConfigStore } from "../../services/speech-api/src/config-store.js";
import { registerProviderRebuilder } from "../../services/speech-api/src/provider-rebuilder.js";
import { createSpeechServer } from "../../services/speech-api/src/server.js";
import { descriptor, makeConfig, sttRequest, ttsRequest } from "../fixtures/engine.js";

const PRIMARY = "https://primary.test/v1";
const SECONDARY = "https://secondary.test/v1";

function urlOf(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  return input instanceof URL ? input.href : input.url;
}

function engineConfig(): SpeechConfig {
  return makeConfig({
    providers: [
      descriptor("primary", "stt", 1, { driver: "openai-stt", settings: { apiKey: "test-secret", baseUrl: PRIMARY } }),
      descriptor("secondary", "stt", 2, {
        driver: "openai-stt",
        settings: { apiKey: "test-secret", baseUrl: SECONDARY },
      }),
      descriptor("voice", "tts", 1, { driver: "openai-tts", settings: { apiKey: "test-secret", baseUrl: SECONDARY } }),
    ],
  });
}

describe("fallback chain (integration)", () => {
  let fetchSpy: MockInstance<typeof fetch>;
  let storageDir: string;
  let storage: FileObjectStorage;
  let orchestrator: SpeechOrchestrator;
  let primaryDown: boolean;

  beforeEach(async () => {
    vi.spyOn(process.stdout, "write").mockReturnValue(true);
    vi.spyOn(process.stderr, "write").mockReturnValue(true);

    primaryDown = true;
    const realFetch = globalThis.fetch;
    fetchSpy = vi.spyOn(globalThis, "fetch");
    fetchSpy.mockImplementation((input, init) => {
      const url = urlOf(input);
      if (url.startsWith("http://127.0.0.1")) return realFetch(input, init);
      if (url.startsWith(PRIMARY) && primaryDown) {
        return Promise.resolve(new Response("upstream overloaded", { status: 503 }));
      }
      if (url.endsWith("/audio/transcriptions")) {
        const who = url.startsWith(PRIMARY) ? "primary" : "secondary";
        return Promise.resolve(
          new Response(JSON.stringify({ text: `hello from ${who}` }), {
            status: 200,
            headers: { "Content-Type": "application/json" },
          }),
        );
      }
      if (url.endsWith("/audio/speech")) {
        return Promise.resolve(new Response(new Uint8Array([7, 7, 7]), { status: 200 }));
      }
      return Promise.resolve(new Response("{}", { status: 200 }));
    });

    storageDir = await mkdtemp(join(tmpdir(), "speech-int-"));
    storage = new FileObjectStorage(storageDir);
    orchestrator = new SpeechOrchestrator({
      config: engineConfig(),
      drivers: DEFAULT_DRIVERS,
      cacheStore: new MemoryCacheStore(),
      storage,
      logger: new Logger(),
    });
    await orchestrator.init();
  });

  afterEach(async () => {
    await orchestrator.shutdown();
    vi.restoreAllMocks();
    await rm(storageDir, { recursive: true, force: true });
  });

  function vendorCalls(base: string): number {
    return fetchSpy.mock.calls.filter(([input]) => urlOf(input).startsWith(base)).length;
  }

  it("falls back past a failing vendor and caches the result", async () => {
    const request = sttRequest();

    const first = await orchestrator.processStt(request);
    expect(first).toMatchObject({
      success: true,
      provider: "secondary",
      cacheHit: false,
      payload: { text: "hello from secondary", confidence: null, language: "en" },
      attemptedProviders: ["primary", "secondary"],
    });
    // 503 is retried once within the attempt
    expect(vendorCalls(PRIMARY)).toBe(2);
    expect(vendorCalls(SECONDARY)).toBe(1);
    expect(orchestrator.breakers.get("primary")?.health().consecutiveFailures).toBe(1);

    const second = await orchestrator.processStt(request);
    expect(second).toMatchObject({ success: true, provider: "secondary", cacheHit: true });
    expect(fetchSpy).toHaveBeenCalledTimes(3);
  });

  it("opens the primary breaker and stops calling it", async () => {
    for (let i = 0; i < 3; i++) await orchestrator.processStt(sttRequest());
    expect(orchestrator.breakers.get("primary")?.getState()).toBe("OPEN");

    const before = vendorCalls(PRIMARY);
    const result = await orchestrator.processStt(sttRequest());

    expect(result).toMatchObject({ success: true, attemptedProviders: ["secondary"] });
    expect(vendorCalls(PRIMARY)).toBe(before);
  });

  it("stores synthesized audio and returns its reference", async () => {
    const result = await orchestrator.processTts(ttsRequest());

    if (!result.success) throw new Error(`synthesis failed: ${result.error.message}`);
    expect(result.payload).toMatchObject({ format: "mp3", contentType: "audio/mpeg", bytes: 3 });
    expect(result.payload.audioRef).toMatch(/^obj_[0-9a-f-]{36}\.mp3$/);
    expect([...(await storage.get(result.payload.audioRef))]).toEqual([7, 7, 7]);
  });

  it("reorders providers through POST /api/settings", async () => {
    const configStore = new ConfigStore(engineConfig());
    registerProviderRebuilder(configStore, orchestrator, new Logger());
    const deps = { configStore, orchestrator, logger: new Logger(), ready: true };
    const server: Server = createSpeechServer(deps);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const addr = server.address();
    if (addr === null || typeof addr === "string") throw new Error("Server has no TCP address");
    const port = addr.port;

    try {
      const res = await fetch(`http://127.0.0.1:${port}/api/settings`, {
        method: "POST",
        body: JSON.stringify({
          providers: {
            stt: [
              { name: "secondary", driver: "openai-stt", priority: 1, settings: { apiKey: "test-secret", baseUrl: SECONDARY } },
              { name: "primary", driver: "openai-stt", priority: 2, settings: { apiKey: "test-secret", baseUrl: PRIMARY } },
            ],
          },
        }),
      });
      expect(res.status).toBe(200);

      primaryDown = false;
      const result = await orchestrator.processStt(sttRequest());
      expect(result).toMatchObject({ success: true, provider: "secondary", attemptedProviders: ["secondary"] });
      expect(orchestrator.registry.snapshot().names()).toEqual(["secondary", "primary"]);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});
