/**
 * Speech orchestrator: the engine's public entry point.
 *
 * Request → validation → cache → ordered candidates → breaker gate →
 * rate limiter gate → adapter call (retry + deadline) → normalized result.
 */

import type {
  OperationFailure,
  OperationResult,
  OperationSuccess,
  ProviderName,
  RequestLimits,
  ResiliencePolicy,
  SpeechCategory,
  SpeechConfig,
  SpeechRequest,
  SttRequest,
  SttResponse,
  SynthesizedAudio,
  Transcript,
  TtsRequest,
  TtsResponse,
  SkippedProvider,
} from "@speech-relay/shared-types";
import {
  AllProvidersExhaustedError,
  CancelledError,
  ErrorCodes,
  OperatorError,
  ProviderError,
  ValidationError,
} from "@speech-relay/shared-types";
import type {
  ObjectStorage,
  ProviderCapabilities,
  ProviderContext,
  SpeechProvider,
} from "@speech-relay/provider-contract";
import {
  BreakerSet,
  KeyedRateLimiter,
  classifyError,
  withDeadline,
  withRetry,
  type Clock,
  type Lease,
} from "@speech-relay/resilience";
import {
  ResultCache,
  isSynthesizedAudio,
  isTranscript,
  type CacheStore,
  type PayloadGuard,
} from "@speech-relay/cache";
import {
  MemoryMetricsBackend,
  MetricsRecorder,
  type DailyStats,
  type MetricsBackend,
} from "@speech-relay/metrics";
import {
  validateAudioContentType,
  validateAudioFormat,
  validateAudioSize,
  validateLanguageCode,
  validateText,
} from "@speech-relay/validation";
import type { Logger } from "@speech-relay/logging";
import { ProviderRegistry, type RegistrySnapshot } from "./provider-registry.js";
import { HealthMonitor, type HealthReport } from "./health-monitor.js";
import type { DriverTable } from "./provider-table.js";

export interface OrchestratorOptions {
  readonly config: SpeechConfig;
  readonly drivers: DriverTable;
  readonly cacheStore: CacheStore;
  readonly storage: ObjectStorage;
  readonly logger: Logger;
  readonly metricsBackend?: MetricsBackend | undefined;
  readonly now?: Clock | undefined;
}

export interface ProcessOptions {
  /** Provider names to try instead of the configured order. */
  readonly providerChain?: readonly string[] | undefined;
  /** Caller cancellation. */
  readonly signal?: AbortSignal | undefined;
}

/** How one request kind is validated, invoked and measured. */
interface Operation<R extends SpeechRequest, T> {
  readonly category: SpeechCategory;
  normalize(request: R, limits: RequestLimits): R;
  readonly isPayload: PayloadGuard<T>;
  supports(capabilities: ProviderCapabilities, request: R): boolean;
  invoke(adapter: SpeechProvider, request: R, ctx: ProviderContext): Promise<T>;
  /** Input bytes for STT, output bytes for TTS. */
  payloadBytes(request: R, payload: T): number;
}

const MIN_SPEED = 0.25;
const MAX_SPEED = 4;

/** The vendor call succeeded but its audio could not be stored. */
function isStorageFailure(err: ProviderError): boolean {
  return err.cause instanceof OperatorError && err.cause.code === ErrorCodes.STORAGE_FAILED;
}

function supportsLanguage(capabilities: ProviderCapabilities, language: string): boolean {
  if (capabilities.supportedLanguages.length === 0 || language === "auto") return true;
  const primary = language.split("-")[0] ?? language;
  return capabilities.supportedLanguages.some(
    (l) => l.toLowerCase() === language.toLowerCase() || l.toLowerCase() === primary,
  );
}

const STT_OPERATION: Operation<SttRequest, Transcript> = {
  category: "stt",
  normalize(request, limits) {
    validateAudioSize(request.audio.data.length, limits.maxAudioBytes);
    const contentType = validateAudioContentType(request.audio.contentType);
    return {
      ...request,
      language: validateLanguageCode(request.language),
      audio: { ...request.audio, contentType },
    };
  },
  isPayload: isTranscript,
  supports: (capabilities, request) => supportsLanguage(capabilities, request.language),
  async invoke(adapter, request, ctx) {
    if (adapter.transcribe === undefined) {
      throw new ProviderError(ErrorCodes.PROVIDER_FAILED, "unknown", "Adapter cannot transcribe");
    }
    return adapter.transcribe(request.audio, request.language, request.options ?? {}, ctx);
  },
  payloadBytes: (request) => request.audio.data.length,
};

const TTS_OPERATION: Operation<TtsRequest, SynthesizedAudio> = {
  category: "tts",
  normalize(request, limits) {
    const speed = request.voice.speed;
    if (speed !== undefined && !(speed >= MIN_SPEED && speed <= MAX_SPEED)) {
      throw new ValidationError(`Speed must be between ${MIN_SPEED} and ${MAX_SPEED}, got ${speed}.`);
    }
    return {
      ...request,
      text: validateText(request.text, limits.maxTextLength),
      language: validateLanguageCode(request.language),
      voice: { ...request.voice, format: validateAudioFormat(request.voice.format) },
    };
  },
  isPayload: isSynthesizedAudio,
  supports: (capabilities, request) =>
    supportsLanguage(capabilities, request.language) &&
    capabilities.supportedFormats.includes(request.voice.format),
  async invoke(adapter, request, ctx) {
    if (adapter.synthesize === undefined) {
      throw new ProviderError(ErrorCodes.PROVIDER_FAILED, "unknown", "Adapter cannot synthesize");
    }
    return adapter.synthesize(request.text, request.voice, ctx);
  },
  payloadBytes: (_request, payload) => payload.bytes,
};

type Lifecycle = "created" | "ready" | "stopped";

export class SpeechOrchestrator {
  readonly registry: ProviderRegistry;
  readonly breakers: BreakerSet;
  readonly metrics: MetricsRecorder;
  private readonly monitor: HealthMonitor;
  private readonly cache: ResultCache;
  private readonly cacheStore: CacheStore;
  private providerLimiter: KeyedRateLimiter;
  private tenantLimiter: KeyedRateLimiter | null;
  private policy: ResiliencePolicy;
  private limits: RequestLimits;
  private config: SpeechConfig;
  private lifecycle: Lifecycle = "created";

  private readonly log: Logger;
  private readonly now: Clock;

  constructor(options: OrchestratorOptions) {
    const { config } = options;
    this.config = config;
    this.policy = config.policy;
    this.limits = config.limits;
    this.now = options.now ?? Date.now;
    this.log = options.logger.child({ component: "orchestrator" });

    this.registry = new ProviderRegistry(options.drivers, {
      logger: options.logger,
      storage: options.storage,
    });
    this.breakers = new BreakerSet(config.policy.breaker, {
      now: this.now,
      onStateChange: (provider, from, to, reason) => {
        const level = to === "OPEN" ? "warn" : "info";
        this.log[level]("Circuit breaker state change", { provider, from, to, reason });
      },
    });
    this.providerLimiter = new KeyedRateLimiter(config.policy.rateLimit, this.now);
    this.tenantLimiter = config.policy.tenantRateLimit
      ? new KeyedRateLimiter(config.policy.tenantRateLimit, this.now)
      : null;

    this.cacheStore = options.cacheStore;
    this.cache = new ResultCache(options.cacheStore, {
      ttlSeconds: config.cache.ttlSeconds,
      keyPrefix: config.cache.keyPrefix,
      logger: options.logger,
    });
    this.metrics = new MetricsRecorder(options.metricsBackend ?? new MemoryMetricsBackend(), {
      logger: options.logger,
      now: this.now,
    });
    this.monitor = new HealthMonitor(this.registry, this.breakers, config.health, options.logger);
  }

  // ── Lifecycle ──

  /**
   * Build providers and start the health monitor.
   *
   * @throws OperatorError(INVALID_CONFIG) when a provider cannot be built
   */
  async init(): Promise<void> {
    if (this.lifecycle === "ready") return;
    if (this.lifecycle === "stopped") {
      throw new OperatorError(ErrorCodes.NOT_READY, "Orchestrator was shut down", "init() after shutdown()");
    }
    this.reconfigure(this.config);
    this.monitor.start();
    this.lifecycle = "ready";
    this.log.info("Orchestrator ready", {
      providers: this.registry.snapshot().names(),
    });
  }

  /** Stop background work, flush metrics and close the cache store. */
  async shutdown(): Promise<void> {
    if (this.lifecycle === "stopped") return;
    this.lifecycle = "stopped";
    this.monitor.stop();
    await this.metrics.close();
    await this.cacheStore.close?.();
    this.log.info("Orchestrator stopped");
  }

  isReady(): boolean {
    return this.lifecycle === "ready";
  }

  /** Enabled providers whose breaker currently admits traffic. */
  availableProviders(): ProviderName[] {
    return this.registry
      .snapshot()
      .enabled()
      .map((e) => e.descriptor.name)
      .filter((name) => this.breakers.get(name)?.getState() !== "OPEN");
  }

  /**
   * Apply a new configuration atomically.
   * On failure the previous providers, breakers and limiters stay in place.
   */
  reconfigure(config: SpeechConfig): void {
    const snapshot = this.registry.configure(config.providers);
    const names = snapshot.names();

    this.config = config;
    this.policy = config.policy;
    this.limits = config.limits;
    this.breakers.sync(names, config.policy.breaker);
    this.providerLimiter.sync(config.policy.rateLimit, names);

    const tenantPolicy = config.policy.tenantRateLimit;
    if (tenantPolicy === null) {
      this.tenantLimiter = null;
    } else if (this.tenantLimiter === null) {
      this.tenantLimiter = new KeyedRateLimiter(tenantPolicy, this.now);
    } else {
      this.tenantLimiter.sync(tenantPolicy);
    }

    this.cache.setTtl(config.cache.ttlSeconds);
    this.monitor.updateConfig(config.health);
  }

  // ── Caller API ──

  process(request: SttRequest, options?: ProcessOptions): Promise<SttResponse>;
  process(request: TtsRequest, options?: ProcessOptions): Promise<TtsResponse>;
  process(request: SpeechRequest, options?: ProcessOptions): Promise<SttResponse | TtsResponse> {
    return request.kind === "stt"
      ? this.processStt(request, options)
      : this.processTts(request, options);
  }

  processStt(request: SttRequest, options: ProcessOptions = {}): Promise<SttResponse> {
    return this.execute(request, STT_OPERATION, options);
  }

  processTts(request: TtsRequest, options: ProcessOptions = {}): Promise<TtsResponse> {
    return this.execute(request, TTS_OPERATION, options);
  }

  /**
   * Probe one provider or all of them.
   *
   * @throws UserError(PROVIDER_NOT_FOUND) for an unknown provider name
   */
  healthCheck(provider?: string): Promise<HealthReport> {
    this.assertReady();
    return this.monitor.check(provider);
  }

  getDailyStats(provider?: string, day?: string): Promise<DailyStats> {
    return this.metrics.getDailyStats(provider, day);
  }

  // ── Core loop ──

  private async execute<R extends SpeechRequest, T extends Transcript | SynthesizedAudio>(
    raw: R,
    op: Operation<R, T>,
    options: ProcessOptions,
  ): Promise<OperationResult<T>> {
    this.assertReady();

    const startMs = this.now();
    const { signal } = options;
    const log = this.log.child({ requestId: raw.requestId, operation: op.category });

    // 1. Validate
    let request: R;
    try {
      request = op.normalize(raw, this.limits);
    } catch (err) {
      if (err instanceof ValidationError) {
        log.info("Request rejected", { code: err.code, message: err.message });
        return this.failure(err, [], startMs);
      }
      throw err;
    }

    if (signal?.aborted) {
      return this.failure(new CancelledError(), [], startMs);
    }

    // 2. Cache
    const hit = await this.cache.lookup(request, op.isPayload);
    if (hit !== null) {
      this.metrics.record({
        provider: hit.provider,
        operation: op.category,
        outcome: "success",
        success: true,
        latencyMs: 0,
        payloadBytes: op.payloadBytes(request, hit.payload),
        errorCode: null,
        cacheHit: true,
      });
      log.debug("Cache hit", { provider: hit.provider });
      return this.success(hit.payload, hit.provider, true, [], startMs);
    }

    // 3. Candidates, from one snapshot for the whole request
    const snapshot: RegistrySnapshot = this.registry.snapshot();
    const candidates = snapshot.candidates(op.category, options.providerChain);
    const policy = this.policy;
    const tenantLimiter = this.tenantLimiter;
    // Resolved now so a concurrent reconfigure() cannot pull a breaker out
    // from under this request.
    const breakers = new Map(candidates.map(({ descriptor }) => [descriptor.name, this.breakers.get(descriptor.name)]));

    const attempted: ProviderName[] = [];
    const skipped: SkippedProvider[] = [];
    let lastError: ProviderError | undefined;

    // 4. Fallback chain
    for (const { descriptor, adapter } of candidates) {
      const name = descriptor.name;

      if (!op.supports(adapter.capabilities(), request)) {
        skipped.push({ provider: name, reason: "unsupported" });
        continue;
      }

      const breaker = breakers.get(name);
      if (breaker === undefined) {
        skipped.push({ provider: name, reason: "removed" });
        continue;
      }
      const pass = breaker.tryPass();
      if (pass === null) {
        skipped.push({ provider: name, reason: "circuit_open" });
        continue;
      }

      let tenantLease: Lease | null = null;
      if (tenantLimiter !== null && request.tenantId !== undefined) {
        tenantLease = tenantLimiter.tryAcquire(`${request.tenantId}\u0000${name}`);
        if (tenantLease === null) {
          breaker.release(pass);
          skipped.push({ provider: name, reason: "tenant_rate_limited" });
          continue;
        }
      }

      const lease = this.providerLimiter.tryAcquire(name);
      if (lease === null) {
        tenantLease?.release();
        breaker.release(pass);
        skipped.push({ provider: name, reason: "rate_limited" });
        continue;
      }

      attempted.push(name);
      const attemptStart = this.now();
      const attemptLog = log.child({ provider: name });

      try {
        const payload = await withRetry(
          () =>
            withDeadline(
              (callSignal) => op.invoke(adapter, request, { requestId: request.requestId, signal: callSignal }),
              { timeoutMs: policy.retry.attemptTimeoutMs, signal, provider: name },
            ),
          {
            maxRetries: policy.retry.maxRetries,
            baseDelayMs: policy.retry.baseDelayMs,
            maxDelayMs: policy.retry.maxDelayMs,
            signal,
            provider: name,
            onRetry: (retry, delayMs, err) => {
              attemptLog.warn("Retrying provider call", { retry, delayMs, code: err.code });
            },
          },
        );

        if (!op.isPayload(payload)) {
          throw new ProviderError(ErrorCodes.PROVIDER_FAILED, "unknown", "Provider returned an empty or malformed payload", {
            provider: name,
          });
        }

        const latencyMs = this.now() - attemptStart;
        breaker.recordSuccess(latencyMs, pass);
        await this.cache.save(request, name, payload);
        this.metrics.record({
          provider: name,
          operation: op.category,
          outcome: "success",
          success: true,
          latencyMs,
          payloadBytes: op.payloadBytes(request, payload),
          errorCode: null,
          cacheHit: false,
        });

        attemptLog.info("Provider call succeeded", { latencyMs, attempted: attempted.length });
        return this.success(payload, name, false, attempted, startMs);
      } catch (err) {
        const latencyMs = this.now() - attemptStart;
        const classified = classifyError(err, name);

        if (classified instanceof CancelledError || signal?.aborted === true) {
          breaker.release(pass);
          this.metrics.record({
            provider: name,
            operation: op.category,
            outcome: "cancelled",
            success: false,
            latencyMs,
            payloadBytes: 0,
            errorCode: ErrorCodes.CANCELLED,
            cacheHit: false,
          });
          attemptLog.info("Request cancelled", { latencyMs });
          return this.failure(
            classified instanceof CancelledError ? classified : new CancelledError(),
            attempted,
            startMs,
          );
        }

        const storageFailure = isStorageFailure(classified);
        if (storageFailure) {
          breaker.release(pass);
        } else {
          switch (classified.reason) {
            case "validation":
            case "quota":
              breaker.release(pass);
              break;
            case "auth":
              breaker.recordFailure("auth", pass);
              break;
            case "transient":
            case "unknown":
              breaker.recordFailure("failure", pass);
              break;
          }
        }

        this.metrics.record({
          provider: name,
          operation: op.category,
          outcome: "failure",
          success: false,
          latencyMs,
          payloadBytes: 0,
          errorCode: storageFailure ? ErrorCodes.STORAGE_FAILED : classified.code,
          cacheHit: false,
        });

        lastError = classified;
        if (storageFailure) {
          // Storage is shared by every TTS provider.
          attemptLog.error("Object storage failed, stopping the chain", { latencyMs, error: classified });
          break;
        }
        attemptLog.warn("Provider call failed", { latencyMs, error: classified });
      } finally {
        lease.release();
        tenantLease?.release();
      }
    }

    // 5. Exhausted
    const exhausted = new AllProvidersExhaustedError(op.category, attempted, skipped, lastError);
    log.warn("No provider produced a result", {
      code: exhausted.code,
      attempted,
      skipped,
    });
    return this.failure(exhausted, attempted, startMs);
  }

  private success<T>(
    payload: T,
    provider: ProviderName,
    cacheHit: boolean,
    attemptedProviders: readonly ProviderName[],
    startMs: number,
  ): OperationSuccess<T> {
    return {
      success: true,
      payload,
      provider,
      durationMs: this.now() - startMs,
      cacheHit,
      attemptedProviders,
    };
  }

  private failure(
    error: OperationFailure["error"],
    attemptedProviders: readonly ProviderName[],
    startMs: number,
  ): OperationFailure {
    return {
      success: false,
      payload: null,
      provider: null,
      durationMs: this.now() - startMs,
      cacheHit: false,
      attemptedProviders,
      error,
    };
  }

  private assertReady(): void {
    if (this.lifecycle !== "ready") {
      throw new OperatorError(
        ErrorCodes.NOT_READY,
        "Orchestrator is not ready",
        this.lifecycle === "created" ? "process() called before init()" : "process() called after shutdown()",
      );
    }
  }
}
