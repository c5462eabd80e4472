/**
 * Health monitor: probes providers on an interval independent of traffic.
 *
 * A failed probe is charged to the provider's breaker, so a dead provider
 * can open with no requests flowing. A successful probe only records latency;
 * closing a breaker is left to real traffic.
 */

import type { HealthMonitorConfig, SpeechCategory } from "@speech-relay/shared-types";
import { UserError, ErrorCodes } from "@speech-relay/shared-types";
import type { ProviderHealthStatus } from "@speech-relay/provider-contract";
import type { BreakerSet, ProviderHealth } from "@speech-relay/resilience";
import { withDeadline } from "@speech-relay/resilience";
import type { Logger } from "@speech-relay/logging";
import type { ProviderRegistry, RegisteredProvider } from "./provider-registry.js";

/** Health of one configured provider. */
export interface ProviderHealthReport {
  readonly provider: string;
  readonly category: SpeechCategory;
  readonly enabled: boolean;
  readonly health: ProviderHealth;
  /** Latest probe result; null for disabled providers. */
  readonly probe: ProviderHealthStatus | null;
}

export type HealthReport = Record<string, ProviderHealthReport>;

export class HealthMonitor {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<HealthReport> | null = null;
  private config: HealthMonitorConfig;
  private readonly log: Logger;

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly breakers: BreakerSet,
    config: HealthMonitorConfig,
    logger: Logger,
  ) {
    this.config = config;
    this.log = logger.child({ component: "health-monitor" });
  }

  /** Start the background loop. No-op when the interval is 0. */
  start(): void {
    this.stop();
    if (this.config.intervalMs <= 0) return;

    this.timer = setInterval(() => {
      if (this.running !== null) {
        this.log.debug("Skipping health run, previous run still in progress");
        return;
      }
      void this.runOnce();
    }, this.config.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Apply new timings; restarts the loop if it was running. */
  updateConfig(config: HealthMonitorConfig): void {
    const wasRunning = this.timer !== null;
    this.config = config;
    if (wasRunning) this.start();
  }

  /** Probe every enabled provider once. Concurrent callers share one run. */
  runOnce(): Promise<HealthReport> {
    if (this.running === null) {
      this.running = this.probeAll().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  /**
   * On-demand check of one provider or all of them.
   *
   * @throws UserError(PROVIDER_NOT_FOUND) for an unknown provider name
   */
  async check(provider?: string): Promise<HealthReport> {
    if (provider === undefined) {
      return this.runOnce();
    }

    const snapshot = this.registry.snapshot();
    const descriptor = snapshot.descriptor(provider);
    if (descriptor === undefined) {
      throw new UserError(ErrorCodes.PROVIDER_NOT_FOUND, `Unknown provider: "${provider}"`);
    }

    const entry = snapshot.get(provider);
    const probe = entry ? await this.probe(entry) : null;
    const report = this.report(descriptor.name, descriptor.category, descriptor.enabled, probe);
    return report ? { [provider]: report } : {};
  }

  private async probeAll(): Promise<HealthReport> {
    const snapshot = this.registry.snapshot();
    const probes = new Map<string, ProviderHealthStatus>();

    await Promise.all(
      snapshot.enabled().map(async (entry) => {
        probes.set(entry.descriptor.name, await this.probe(entry));
      }),
    );

    const out: HealthReport = {};
    for (const d of snapshot.descriptors) {
      const report = this.report(d.name, d.category, d.enabled, probes.get(d.name) ?? null);
      if (report) out[d.name] = report;
    }
    return out;
  }

  /** Probe one adapter under the probe timeout and feed its breaker. */
  private async probe(entry: RegisteredProvider): Promise<ProviderHealthStatus> {
    const name = entry.descriptor.name;
    const startMs = Date.now();

    let status: ProviderHealthStatus;
    try {
      status = await withDeadline((signal) => entry.adapter.health(signal), {
        timeoutMs: this.config.probeTimeoutMs,
        provider: name,
      });
    } catch (err) {
      status = {
        ok: false,
        latencyMs: Date.now() - startMs,
        message: err instanceof Error ? err.message : String(err),
      };
    }

    const breaker = this.breakers.get(name);
    if (status.ok) {
      breaker?.recordLatency(status.latencyMs);
    } else {
      breaker?.recordFailure();
      this.log.warn("Health probe failed", {
        provider: name,
        message: status.message,
        consecutiveFailures: breaker?.health().consecutiveFailures,
      });
    }
    return status;
  }

  private report(
    provider: string,
    category: SpeechCategory,
    enabled: boolean,
    probe: ProviderHealthStatus | null,
  ): ProviderHealthReport | null {
    const breaker = this.breakers.get(provider);
    if (!breaker) return null;
    return { provider, category, enabled, health: breaker.health(), probe };
  }
}
