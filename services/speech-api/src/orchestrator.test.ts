import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  AllProvidersExhaustedError,
  AuthenticationError,
  CancelledError,
  ErrorCodes,
  OperatorError,
  ProviderValidationError,
  QuotaExceededError,
  TransientError,
  ValidationError,
  createTenantId,
} from "@speech-relay/shared-types";
import type {
  OperationFailure,
  OperationResult,
  OperationSuccess,
  ProviderDescriptor,
  SpeechConfig,
} from "@speech-relay/shared-types";
import type { SpeechProvider } from "@speech-relay/provider-contract";
import { MemoryCacheStore, type CacheStore } from "@speech-relay/cache";
import { Logger } from "@speech-relay/logging";
import { SpeechOrchestrator } from "./orchestrator.js";
import type { DriverTable } from "./provider-table.js";
import {
  descriptor,
  fakeStorage,
  fakeStt,
  fakeTts,
  makeConfig,
  sttRequest,
  transcript,
  ttsRequest,
  waitForAbort,
} from "../../../test/fixtures/engine.js";

function successOf<T>(result: OperationResult<T>): OperationSuccess<T> {
  if (!result.success) throw new Error(`expected success, got ${result.error.code}`);
  return result;
}

function failureOf<T>(result: OperationResult<T>): OperationFailure {
  if (result.success) throw new Error("expected a failure result");
  return result;
}

interface BuildOptions {
  readonly providers: readonly ProviderDescriptor[];
  readonly adapters: Readonly<Record<string, SpeechProvider>>;
  readonly config?: Partial<SpeechConfig>;
  readonly cacheStore?: CacheStore;
  readonly now?: () => number;
}

async function build(opts: BuildOptions): Promise<SpeechOrchestrator> {
  const drivers: DriverTable = Object.fromEntries(
    Object.entries(opts.adapters).map(([name, adapter]) => [name, () => adapter]),
  );
  const orchestrator = new SpeechOrchestrator({
    config: makeConfig({ ...opts.config, providers: opts.providers }),
    drivers,
    cacheStore: opts.cacheStore ?? new MemoryCacheStore(),
    storage: fakeStorage(),
    logger: new Logger(),
    now: opts.now,
  });
  await orchestrator.init();
  return orchestrator;
}

const STT_PAIR = [descriptor("a", "stt", 1), descriptor("b", "stt", 2)];

describe("SpeechOrchestrator", () => {
  let orchestrator: SpeechOrchestrator | undefined;

  beforeEach(() => {
    vi.spyOn(process.stdout, "write").mockReturnValue(true);
    vi.spyOn(process.stderr, "write").mockReturnValue(true);
  });

  afterEach(async () => {
    await orchestrator?.shutdown();
    orchestrator = undefined;
    vi.restoreAllMocks();
  });

  describe("fallback chain", () => {
    it("falls through to the next provider after a transient failure", async () => {
      const a = fakeStt({ transcribe: () => Promise.reject(new TransientError("vendor down")) });
      const b = fakeStt({ transcribe: () => Promise.resolve(transcript("hello")) });
      orchestrator = await build({ providers: STT_PAIR, adapters: { a: a.provider, b: b.provider } });

      const result = successOf(await orchestrator.processStt(sttRequest()));

      expect(result.provider).toBe("b");
      expect(result.payload.text).toBe("hello");
      expect(result.cacheHit).toBe(false);
      expect(result.attemptedProviders).toEqual(["a", "b"]);
      // one retry within the attempt
      expect(a.transcribe).toHaveBeenCalledTimes(2);
      expect(orchestrator.breakers.get("a")?.health().consecutiveFailures).toBe(1);
      expect(orchestrator.breakers.get("b")?.health().consecutiveFailures).toBe(0);

      const stats = await orchestrator.getDailyStats();
      expect(stats.providers).toHaveLength(2);
      expect(stats.providers[0]).toMatchObject({ provider: "a", attempts: 1, failures: 1, successes: 0 });
      expect(stats.providers[1]).toMatchObject({ provider: "b", attempts: 1, failures: 0, successes: 1 });
    });

    it("tries providers in priority order regardless of list order", async () => {
      const a = fakeStt({ transcribe: () => Promise.resolve(transcript("from a")) });
      const b = fakeStt({ transcribe: () => Promise.resolve(transcript("from b")) });
      orchestrator = await build({
        providers: [descriptor("a", "stt", 5), descriptor("b", "stt", 1)],
        adapters: { a: a.provider, b: b.provider },
      });

      const result = successOf(await orchestrator.processStt(sttRequest()));

      expect(result.provider).toBe("b");
      expect(a.transcribe).not.toHaveBeenCalled();
    });

    it("honors a per-request provider chain", async () => {
      const a = fakeStt();
      const b = fakeStt({ transcribe: () => Promise.resolve(transcript("chained")) });
      orchestrator = await build({ providers: STT_PAIR, adapters: { a: a.provider, b: b.provider } });

      const result = successOf(await orchestrator.processStt(sttRequest(), { providerChain: ["b"] }));

      expect(result.provider).toBe("b");
      expect(result.attemptedProviders).toEqual(["b"]);
      expect(a.transcribe).not.toHaveBeenCalled();
    });

    it("skips providers that do not support the requested language", async () => {
      const a = fakeStt({ languages: ["de"] });
      const b = fakeStt();
      orchestrator = await build({ providers: STT_PAIR, adapters: { a: a.provider, b: b.provider } });

      const result = successOf(await orchestrator.processStt(sttRequest({ language: "en-US" })));

      expect(result.provider).toBe("b");
      expect(result.attemptedProviders).toEqual(["b"]);
      expect(a.transcribe).not.toHaveBeenCalled();
    });

    it("treats an empty transcript as a provider failure", async () => {
      const a = fakeStt({
        transcribe: () => Promise.resolve({ text: "", confidence: null, language: "en" }),
      });
      const b = fakeStt();
      orchestrator = await build({ providers: STT_PAIR, adapters: { a: a.provider, b: b.provider } });

      const result = successOf(await orchestrator.processStt(sttRequest()));

      expect(result.provider).toBe("b");
      expect(orchestrator.breakers.get("a")?.health().consecutiveFailures).toBe(1);
    });
  });

  describe("circuit breaker accounting", () => {
    it("opens after failureThreshold failures and skips the provider until the cool-down elapses", async () => {
      let now = 1_000_000;
      const a = fakeStt({ transcribe: () => Promise.reject(new Error("boom")) });
      const b = fakeStt();
      orchestrator = await build({
        providers: STT_PAIR,
        adapters: { a: a.provider, b: b.provider },
        now: () => now,
      });

      for (let i = 0; i < 3; i++) {
        successOf(await orchestrator.processStt(sttRequest()));
      }
      const opened = orchestrator.breakers.get("a")?.health();
      expect(opened?.state).toBe("OPEN");
      expect(opened?.consecutiveFailures).toBe(3);
      expect(opened?.openedUntil).toBe(1_060_000);

      const skipped = successOf(await orchestrator.processStt(sttRequest()));
      expect(skipped.attemptedProviders).toEqual(["b"]);
      expect(a.transcribe).toHaveBeenCalledTimes(3);

      now += 60_000;
      a.transcribe.mockResolvedValue(transcript("back"));

      const recovered = successOf(await orchestrator.processStt(sttRequest()));
      expect(recovered.provider).toBe("a");
      expect(recovered.payload.text).toBe("back");
      expect(orchestrator.breakers.get("a")?.getState()).toBe("CLOSED");
    });

    it("opens at once on an authentication failure when configured to", async () => {
      const a = fakeStt({ transcribe: () => Promise.reject(new AuthenticationError("bad key")) });
      const b = fakeStt();
      orchestrator = await build({
        providers: STT_PAIR,
        adapters: { a: a.provider, b: b.provider },
        config: {
          policy: {
            ...makeConfig().policy,
            breaker: { failureThreshold: 3, coolDownMs: 60_000, openOnAuthError: true },
          },
        },
      });

      successOf(await orchestrator.processStt(sttRequest()));

      expect(a.transcribe).toHaveBeenCalledOnce();
      expect(orchestrator.breakers.get("a")?.getState()).toBe("OPEN");
    });

    it("times out a provider that never answers, retries it and falls through", async () => {
      const a = fakeStt({ transcribe: (_audio, _language, _options, ctx) => waitForAbort(ctx.signal) });
      const b = fakeStt({ transcribe: () => Promise.resolve(transcript("from b")) });
      orchestrator = await build({
        providers: STT_PAIR,
        adapters: { a: a.provider, b: b.provider },
        config: {
          policy: {
            ...makeConfig().policy,
            retry: { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 2, attemptTimeoutMs: 20 },
          },
        },
      });

      const result = successOf(await orchestrator.processStt(sttRequest()));

      expect(result.provider).toBe("b");
      expect(result.attemptedProviders).toEqual(["a", "b"]);
      expect(a.transcribe).toHaveBeenCalledTimes(2);
      expect(a.transcribe.mock.calls.map(([, , , ctx]) => ctx.signal.aborted)).toEqual([true, true]);
      expect(orchestrator.breakers.get("a")?.health()).toMatchObject({ state: "CLOSED", consecutiveFailures: 1 });

      const stats = await orchestrator.getDailyStats("a");
      expect(stats.providers[0]).toMatchObject({ attempts: 1, failures: 1 });
    });

    it("does not charge vendor input rejections or quota errors", async () => {
      const a = fakeStt({ transcribe: () => Promise.reject(new ProviderValidationError("bad audio")) });
      const q = fakeStt({ transcribe: () => Promise.reject(new QuotaExceededError("slow down")) });
      const b = fakeStt();
      orchestrator = await build({
        providers: [descriptor("a", "stt", 1), descriptor("q", "stt", 2), descriptor("b", "stt", 3)],
        adapters: { a: a.provider, q: q.provider, b: b.provider },
      });

      const result = successOf(await orchestrator.processStt(sttRequest()));

      expect(result.attemptedProviders).toEqual(["a", "q", "b"]);
      expect(orchestrator.breakers.get("a")?.health()).toMatchObject({ state: "CLOSED", consecutiveFailures: 0 });
      expect(orchestrator.breakers.get("q")?.health()).toMatchObject({ state: "CLOSED", consecutiveFailures: 0 });
    });

    it("fails with no adapter calls and no cache writes when every breaker is open", async () => {
      const store = new MemoryCacheStore();
      const setSpy = vi.spyOn(store, "set");
      const a = fakeStt({ transcribe: () => Promise.reject(new Error("boom")) });
      const b = fakeStt({ transcribe: () => Promise.reject(new Error("boom")) });
      orchestrator = await build({
        providers: STT_PAIR,
        adapters: { a: a.provider, b: b.provider },
        cacheStore: store,
        config: {
          policy: {
            ...makeConfig().policy,
            breaker: { failureThreshold: 1, coolDownMs: 60_000, openOnAuthError: false },
          },
        },
      });

      const first = failureOf(await orchestrator.processStt(sttRequest()));
      expect(first.error).toBeInstanceOf(AllProvidersExhaustedError);
      expect(first.error.code).toBe("ALL_PROVIDERS_EXHAUSTED");
      expect(first.attemptedProviders).toEqual(["a", "b"]);

      const second = failureOf(await orchestrator.processStt(sttRequest()));
      expect(second.error.code).toBe("NO_PROVIDER_AVAILABLE");
      expect(second.attemptedProviders).toEqual([]);
      expect(second.error).toMatchObject({
        skippedProviders: [
          { provider: "a", reason: "circuit_open" },
          { provider: "b", reason: "circuit_open" },
        ],
      });
      expect(a.transcribe).toHaveBeenCalledOnce();
      expect(b.transcribe).toHaveBeenCalledOnce();
      expect(setSpy).not.toHaveBeenCalled();
    });

    it("wraps the last provider error when all attempts fail", async () => {
      const a = fakeStt({ transcribe: () => Promise.reject(new AuthenticationError("bad key")) });
      orchestrator = await build({ providers: [descriptor("a", "stt", 1)], adapters: { a: a.provider } });

      const result = failureOf(await orchestrator.processStt(sttRequest()));

      expect(result.error).toBeInstanceOf(AllProvidersExhaustedError);
      expect(result.error.toJSON()["lastError"]).toMatchObject({ code: "PROVIDER_AUTH_FAILED" });
    });
  });

  describe("rate limiting", () => {
    const tightLimit = { capacity: 1, refillPerSecond: 0.001, maxConcurrent: 0 };

    it("skips a rate-limited provider without counting a failure", async () => {
      const a = fakeStt();
      const b = fakeStt();
      orchestrator = await build({
        providers: STT_PAIR,
        adapters: { a: a.provider, b: b.provider },
        config: { policy: { ...makeConfig().policy, rateLimit: tightLimit } },
        now: () => 5_000,
      });

      expect(successOf(await orchestrator.processStt(sttRequest())).provider).toBe("a");
      const second = successOf(await orchestrator.processStt(sttRequest()));
      expect(second.provider).toBe("b");
      expect(second.attemptedProviders).toEqual(["b"]);
      expect(orchestrator.breakers.get("a")?.health().consecutiveFailures).toBe(0);

      const third = failureOf(await orchestrator.processStt(sttRequest()));
      expect(third.error.code).toBe("NO_PROVIDER_AVAILABLE");
      expect(third.error).toMatchObject({
        skippedProviders: [
          { provider: "a", reason: "rate_limited" },
          { provider: "b", reason: "rate_limited" },
        ],
      });
    });

    it("limits each tenant separately", async () => {
      const a = fakeStt();
      const b = fakeStt();
      orchestrator = await build({
        providers: STT_PAIR,
        adapters: { a: a.provider, b: b.provider },
        config: { policy: { ...makeConfig().policy, tenantRateLimit: tightLimit } },
        now: () => 5_000,
      });
      const t1 = createTenantId("agent-one");
      const t2 = createTenantId("agent-two");

      expect(successOf(await orchestrator.processStt(sttRequest({ tenantId: t1 }))).provider).toBe("a");
      expect(successOf(await orchestrator.processStt(sttRequest({ tenantId: t1 }))).provider).toBe("b");

      const third = failureOf(await orchestrator.processStt(sttRequest({ tenantId: t1 })));
      expect(third.error).toMatchObject({
        skippedProviders: [
          { provider: "a", reason: "tenant_rate_limited" },
          { provider: "b", reason: "tenant_rate_limited" },
        ],
      });

      expect(successOf(await orchestrator.processStt(sttRequest({ tenantId: t2 }))).provider).toBe("a");
    });
  });

  describe("cache", () => {
    it("serves an identical request from cache with one adapter call", async () => {
      const a = fakeStt();
      orchestrator = await build({ providers: [descriptor("a", "stt", 1)], adapters: { a: a.provider } });
      const request = sttRequest();

      const first = successOf(await orchestrator.processStt(request));
      const second = successOf(await orchestrator.processStt(request));

      expect(first.cacheHit).toBe(false);
      expect(second.cacheHit).toBe(true);
      expect(second.provider).toBe("a");
      expect(second.attemptedProviders).toEqual([]);
      expect(second.payload).toEqual(first.payload);
      expect(a.transcribe).toHaveBeenCalledOnce();

      const stats = await orchestrator.getDailyStats("a");
      expect(stats.providers).toEqual([
        expect.objectContaining({ provider: "a", attempts: 1, successes: 1, cacheHits: 1 }),
      ]);
    });

    it("treats a language differing only in case as the same request", async () => {
      const a = fakeStt();
      orchestrator = await build({ providers: [descriptor("a", "stt", 1)], adapters: { a: a.provider } });
      const audio = { data: Buffer.from("same-audio"), contentType: "audio/wav" as const };

      await orchestrator.processStt(sttRequest({ audio, language: "en-us" }));
      const second = successOf(await orchestrator.processStt(sttRequest({ audio, language: "EN-US" })));

      expect(second.cacheHit).toBe(true);
      expect(a.transcribe).toHaveBeenCalledOnce();
    });
  });

  describe("validation", () => {
    it("rejects empty audio before any provider or metric", async () => {
      const a = fakeStt();
      orchestrator = await build({ providers: [descriptor("a", "stt", 1)], adapters: { a: a.provider } });

      const result = failureOf(
        await orchestrator.processStt(
          sttRequest({ audio: { data: Buffer.alloc(0), contentType: "audio/wav" } }),
        ),
      );

      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.code).toBe("INVALID_AUDIO");
      expect(result.attemptedProviders).toEqual([]);
      expect(a.transcribe).not.toHaveBeenCalled();
      expect((await orchestrator.getDailyStats()).providers).toEqual([]);
    });

    it("rejects an invalid language tag", async () => {
      const a = fakeStt();
      orchestrator = await build({ providers: [descriptor("a", "stt", 1)], adapters: { a: a.provider } });

      const result = failureOf(await orchestrator.processStt(sttRequest({ language: "english!" })));

      expect(result.error.code).toBe("INVALID_LANGUAGE");
    });

    it("rejects text over the configured length", async () => {
      const v = fakeTts();
      orchestrator = await build({ providers: [descriptor("v", "tts", 1)], adapters: { v: v.provider } });

      const result = failureOf(await orchestrator.processTts(ttsRequest({ text: "x".repeat(501) })));

      expect(result.error.code).toBe("INVALID_TEXT");
      expect(result.error.message).toBe("Text too long: 501 characters. Max: 500.");
      expect(v.synthesize).not.toHaveBeenCalled();
    });

    it("rejects a speed outside 0.25 to 4", async () => {
      const v = fakeTts();
      orchestrator = await build({ providers: [descriptor("v", "tts", 1)], adapters: { v: v.provider } });

      const result = failureOf(
        await orchestrator.processTts(ttsRequest({ voice: { format: "mp3", speed: 5 } })),
      );

      expect(result.error.message).toBe("Speed must be between 0.25 and 4, got 5.");
    });
  });

  describe("tts", () => {
    it("synthesizes through process() and reports the stored reference", async () => {
      const v = fakeTts();
      orchestrator = await build({ providers: [descriptor("v", "tts", 1)], adapters: { v: v.provider } });

      const result = successOf(await orchestrator.process(ttsRequest({ text: "  Hello   there " })));

      expect(result.payload).toEqual({
        audioRef: "obj_test.mp3",
        format: "mp3",
        contentType: "audio/mpeg",
        bytes: 42,
      });
      expect(v.synthesize).toHaveBeenCalledWith(
        "Hello   there",
        { format: "mp3" },
        expect.objectContaining({ requestId: "req_tts_1" }),
      );
    });

    it("skips providers that cannot produce the requested format", async () => {
      const v = fakeTts({ formats: ["mp3"] });
      orchestrator = await build({ providers: [descriptor("v", "tts", 1)], adapters: { v: v.provider } });

      const result = failureOf(await orchestrator.processTts(ttsRequest({ voice: { format: "ogg" } })));

      expect(result.error.code).toBe("NO_PROVIDER_AVAILABLE");
      expect(result.error).toMatchObject({ skippedProviders: [{ provider: "v", reason: "unsupported" }] });
    });

    it("stops the chain without charging the vendor when object storage fails", async () => {
      const storageDown = (): Promise<never> =>
        Promise.reject(
          new OperatorError(ErrorCodes.STORAGE_FAILED, "Could not store synthesized audio", "var/audio: ENOSPC"),
        );
      const v = fakeTts({ synthesize: storageDown });
      const w = fakeTts();
      orchestrator = await build({
        providers: [descriptor("v", "tts", 1), descriptor("w", "tts", 2)],
        adapters: { v: v.provider, w: w.provider },
        config: {
          policy: {
            ...makeConfig().policy,
            breaker: { failureThreshold: 2, coolDownMs: 60_000, openOnAuthError: false },
          },
        },
      });

      const first = failureOf(await orchestrator.processTts(ttsRequest()));
      failureOf(await orchestrator.processTts(ttsRequest()));

      expect(first.error).toBeInstanceOf(AllProvidersExhaustedError);
      expect(first.attemptedProviders).toEqual(["v"]);
      expect(first.error.cause).toMatchObject({ code: "PROVIDER_FAILED", cause: { code: "STORAGE_FAILED" } });
      expect(v.synthesize).toHaveBeenCalledTimes(2);
      expect(w.synthesize).not.toHaveBeenCalled();
      expect(orchestrator.breakers.get("v")?.health()).toMatchObject({ state: "CLOSED", consecutiveFailures: 0 });

      const stats = await orchestrator.getDailyStats("v");
      expect(stats.providers[0]).toMatchObject({ attempts: 2, failures: 2 });
    });

    it("never offers an stt provider for a tts request", async () => {
      const a = fakeStt();
      const v = fakeTts();
      orchestrator = await build({
        providers: [descriptor("a", "stt", 0), descriptor("v", "tts", 1)],
        adapters: { a: a.provider, v: v.provider },
      });

      const result = successOf(await orchestrator.processTts(ttsRequest()));

      expect(result.attemptedProviders).toEqual(["v"]);
    });
  });

  describe("cancellation", () => {
    it("returns a cancelled result without charging the breaker", async () => {
      const controller = new AbortController();
      const a = fakeStt({
        transcribe: (_audio, _language, _options, ctx) => {
          const pending = waitForAbort(ctx.signal);
          controller.abort();
          return pending;
        },
      });
      const b = fakeStt();
      orchestrator = await build({ providers: STT_PAIR, adapters: { a: a.provider, b: b.provider } });

      const result = failureOf(await orchestrator.processStt(sttRequest(), { signal: controller.signal }));

      expect(result.error).toBeInstanceOf(CancelledError);
      expect(result.attemptedProviders).toEqual(["a"]);
      expect(b.transcribe).not.toHaveBeenCalled();
      expect(orchestrator.breakers.get("a")?.health()).toMatchObject({ state: "CLOSED", consecutiveFailures: 0 });

      const stats = await orchestrator.getDailyStats("a");
      expect(stats.providers[0]).toMatchObject({ attempts: 1, cancellations: 1, failures: 0 });
    });

    it("does nothing for an already-aborted signal", async () => {
      const a = fakeStt();
      orchestrator = await build({ providers: [descriptor("a", "stt", 1)], adapters: { a: a.provider } });

      const result = failureOf(
        await orchestrator.processStt(sttRequest(), { signal: AbortSignal.abort() }),
      );

      expect(result.error.code).toBe("CANCELLED");
      expect(a.transcribe).not.toHaveBeenCalled();
    });
  });

  describe("lifecycle and configuration", () => {
    it("refuses requests before init and after shutdown", async () => {
      const a = fakeStt();
      const idle = new SpeechOrchestrator({
        config: makeConfig({ providers: [descriptor("a", "stt", 1)] }),
        drivers: { a: () => a.provider },
        cacheStore: new MemoryCacheStore(),
        storage: fakeStorage(),
        logger: new Logger(),
      });

      await expect(idle.processStt(sttRequest())).rejects.toMatchObject({ code: "NOT_READY" });

      await idle.init();
      await idle.shutdown();
      await expect(idle.processStt(sttRequest())).rejects.toMatchObject({ code: "NOT_READY" });
    });

    it("keeps the previous providers when a new configuration cannot be built", async () => {
      const a = fakeStt();
      const active = await build({ providers: [descriptor("a", "stt", 1)], adapters: { a: a.provider } });
      orchestrator = active;

      let caught: unknown;
      try {
        active.reconfigure(makeConfig({ providers: [descriptor("ghost", "stt", 1)] }));
      } catch (err) {
        caught = err;
      }
      expect(caught).toMatchObject({ code: "INVALID_CONFIG", message: "Unknown provider driver" });

      expect(successOf(await active.processStt(sttRequest())).provider).toBe("a");
    });

    it("keeps breaker state for providers that survive a reconfiguration", async () => {
      const a = fakeStt({ transcribe: () => Promise.reject(new Error("boom")) });
      const b = fakeStt();
      const active = await build({ providers: STT_PAIR, adapters: { a: a.provider, b: b.provider } });
      orchestrator = active;

      await active.processStt(sttRequest());
      active.reconfigure(makeConfig({ providers: [descriptor("a", "stt", 1)] }));

      expect(active.breakers.get("a")?.health().consecutiveFailures).toBe(1);
      expect(active.breakers.has("b")).toBe(false);
    });

    it("finishes an in-flight request when a reconfiguration drops a later provider", async () => {
      let rejectA: (err: Error) => void = () => undefined;
      const a = fakeStt({
        transcribe: () =>
          new Promise<never>((_resolve, reject) => {
            rejectA = reject;
          }),
      });
      const b = fakeStt({ transcribe: () => Promise.resolve(transcript("from b")) });
      const active = await build({
        providers: STT_PAIR,
        adapters: { a: a.provider, b: b.provider },
        config: {
          policy: {
            ...makeConfig().policy,
            retry: { maxRetries: 0, baseDelayMs: 1, maxDelayMs: 2, attemptTimeoutMs: 1000 },
          },
        },
      });
      orchestrator = active;

      const pending = active.processStt(sttRequest());
      await vi.waitFor(() => expect(a.transcribe).toHaveBeenCalledOnce());
      active.reconfigure(makeConfig({ providers: [descriptor("a", "stt", 1)] }));
      rejectA(new TransientError("vendor down"));

      const result = successOf(await pending);
      expect(result.provider).toBe("b");
      expect(result.attemptedProviders).toEqual(["a", "b"]);
      expect(active.breakers.has("b")).toBe(false);
      expect(active.breakers.get("a")?.health().consecutiveFailures).toBe(1);
    });

    it("reports available providers for readiness", async () => {
      const a = fakeStt();
      orchestrator = await build({
        providers: [descriptor("a", "stt", 1), descriptor("off", "stt", 2, { enabled: false })],
        adapters: { a: a.provider },
      });

      expect(orchestrator.availableProviders()).toEqual(["a"]);
    });
  });

  describe("health", () => {
    it("probes a single provider on demand", async () => {
      const a = fakeStt();
      orchestrator = await build({ providers: [descriptor("a", "stt", 1)], adapters: { a: a.provider } });

      const report = await orchestrator.healthCheck("a");

      expect(report["a"]).toMatchObject({
        provider: "a",
        category: "stt",
        enabled: true,
        probe: { ok: true, latencyMs: 1, message: "ok" },
        health: { status: "ACTIVE", state: "CLOSED" },
      });
    });

    it("rejects an unknown provider name", async () => {
      const a = fakeStt();
      orchestrator = await build({ providers: [descriptor("a", "stt", 1)], adapters: { a: a.provider } });

      await expect(orchestrator.healthCheck("nope")).rejects.toMatchObject({
        code: "PROVIDER_NOT_FOUND",
        message: 'Unknown provider: "nope"',
      });
    });
  });
});
