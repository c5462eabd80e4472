/**
 * Per-provider circuit breaker.
 *
 * States:
 * - CLOSED: requests flow through; consecutive failures are counted
 * - OPEN: provider is skipped until `openedUntil`
 * - HALF_OPEN: one probe request at a time tests recovery
 *
 * All transitions are synchronous counter updates. Nothing is held across
 * the provider call: callers claim a pass with `tryPass()` and hand it back
 * with `recordSuccess()`, `recordFailure()` or `release()`.
 */

import type { BreakerPolicy } from "@speech-relay/shared-types";

/** Circuit breaker state */
export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

/** Health status derived from the breaker state. */
export type ProviderStatus = "ACTIVE" | "DEGRADED" | "OPEN";

/** Point-in-time view of one provider's breaker. */
export interface ProviderHealth {
  readonly status: ProviderStatus;
  readonly state: CircuitState;
  readonly consecutiveFailures: number;
  /** Epoch ms of the most recent counted failure. */
  readonly lastFailureAt: number | null;
  /** Epoch ms after which an OPEN breaker admits a probe. */
  readonly openedUntil: number | null;
  readonly lastLatencyMs: number | null;
}

/** Injected time source, epoch ms. */
export type Clock = () => number;

export type StateChangeListener = (
  from: CircuitState,
  to: CircuitState,
  reason: string,
) => void;

/** What kind of failure is being charged. */
export type FailureKind = "failure" | "auth";

export interface CircuitBreakerOptions {
  readonly now?: Clock | undefined;
  readonly onStateChange?: StateChangeListener | undefined;
}

/**
 * A claimed pass, handed back with the outcome. Only the pass that carries
 * the current probe id can close or reopen a HALF_OPEN breaker.
 */
export interface BreakerPass {
  readonly probe: number | null;
}

const ORDINARY_PASS: BreakerPass = { probe: null };

export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private consecutiveFailures = 0;
  private lastFailureAt: number | null = null;
  private openedUntil: number | null = null;
  private lastLatencyMs: number | null = null;
  private probeInFlight: number | null = null;
  private probeSeq = 0;

  private policy: BreakerPolicy;
  private readonly now: Clock;
  private readonly onStateChange: StateChangeListener | undefined;

  constructor(
    readonly name: string,
    policy: BreakerPolicy,
    options: CircuitBreakerOptions = {},
  ) {
    this.policy = policy;
    this.now = options.now ?? Date.now;
    this.onStateChange = options.onStateChange;
  }

  /**
   * Claim a pass for one call, or null when the provider must be skipped.
   *
   * Moves OPEN → HALF_OPEN once the cool-down has elapsed. In HALF_OPEN only
   * one caller gets through until the probe reports back.
   */
  tryPass(): BreakerPass | null {
    switch (this.state) {
      case "CLOSED":
        return ORDINARY_PASS;

      case "OPEN":
        if (this.openedUntil !== null && this.now() >= this.openedUntil) {
          this.transitionTo("HALF_OPEN", "Cool-down elapsed");
          return this.claimProbe();
        }
        return null;

      case "HALF_OPEN":
        return this.probeInFlight === null ? this.claimProbe() : null;
    }
  }

  /**
   * Record a successful call. The probe's success closes a HALF_OPEN
   * breaker; a late success from a call admitted before the breaker opened
   * only updates latency.
   */
  recordSuccess(latencyMs: number, pass?: BreakerPass | null): void {
    this.lastLatencyMs = latencyMs;
    if (this.isCurrentProbe(pass)) {
      this.consecutiveFailures = 0;
      this.transitionTo("CLOSED", "Probe succeeded");
      return;
    }
    if (this.state === "CLOSED") {
      this.consecutiveFailures = 0;
    }
  }

  /** Record a latency sample without touching the failure streak. */
  recordLatency(latencyMs: number): void {
    this.lastLatencyMs = latencyMs;
  }

  /**
   * Charge one failure. Outside CLOSED only the probe's failure causes a
   * transition; other late failures just extend the streak.
   */
  recordFailure(kind: FailureKind = "failure", pass?: BreakerPass | null): void {
    this.consecutiveFailures++;
    this.lastFailureAt = this.now();

    if (this.isCurrentProbe(pass)) {
      this.open("Probe failed");
      return;
    }
    if (this.state !== "CLOSED") return;

    if (kind === "auth" && this.policy.openOnAuthError) {
      this.open("Authentication failed");
    } else if (this.consecutiveFailures >= this.policy.failureThreshold) {
      this.open(`Failure threshold reached (${this.consecutiveFailures} failures)`);
    }
  }

  /** Give back a claimed pass without a transition (cancelled or uncharged call). */
  release(pass?: BreakerPass | null): void {
    if (this.isCurrentProbe(pass)) {
      this.probeInFlight = null;
    }
  }

  /** Apply a new policy. Takes effect on the next failure. */
  updatePolicy(policy: BreakerPolicy): void {
    this.policy = policy;
  }

  getState(): CircuitState {
    return this.state;
  }

  health(): ProviderHealth {
    return {
      status: this.deriveStatus(),
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      lastFailureAt: this.lastFailureAt,
      openedUntil: this.state === "CLOSED" ? null : this.openedUntil,
      lastLatencyMs: this.lastLatencyMs,
    };
  }

  /** Return to a fresh CLOSED state. */
  reset(): void {
    if (this.state !== "CLOSED") {
      this.transitionTo("CLOSED", "Reset");
    }
    this.consecutiveFailures = 0;
    this.lastFailureAt = null;
    this.openedUntil = null;
    this.probeInFlight = null;
  }

  private deriveStatus(): ProviderStatus {
    if (this.state === "OPEN") return "OPEN";
    if (this.state === "HALF_OPEN" || this.consecutiveFailures > 0) return "DEGRADED";
    return "ACTIVE";
  }

  private claimProbe(): BreakerPass {
    this.probeSeq++;
    this.probeInFlight = this.probeSeq;
    return { probe: this.probeSeq };
  }

  private isCurrentProbe(pass: BreakerPass | null | undefined): boolean {
    return (
      this.state === "HALF_OPEN" &&
      pass != null &&
      pass.probe !== null &&
      pass.probe === this.probeInFlight
    );
  }

  private open(reason: string): void {
    this.openedUntil = this.now() + this.policy.coolDownMs;
    this.transitionTo("OPEN", reason);
  }

  private transitionTo(newState: CircuitState, reason: string): void {
    const oldState = this.state;
    this.state = newState;
    if (newState !== "HALF_OPEN") {
      this.probeInFlight = null;
    }
    if (newState === "CLOSED") {
      this.openedUntil = null;
    }
    this.onStateChange?.(oldState, newState, reason);
  }
}

/**
 * Exactly one breaker per configured provider name.
 * `sync()` is called on every reconfiguration.
 */
export class BreakerSet {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private policy: BreakerPolicy;

  constructor(
    policy: BreakerPolicy,
    private readonly options: {
      readonly now?: Clock | undefined;
      readonly onStateChange?:
        | ((provider: string, from: CircuitState, to: CircuitState, reason: string) => void)
        | undefined;
    } = {},
  ) {
    this.policy = policy;
  }

  /**
   * Keep breakers for `names`, create missing ones, drop the rest.
   * Surviving breakers keep their state and take the new policy.
   */
  sync(names: Iterable<string>, policy: BreakerPolicy = this.policy): void {
    this.policy = policy;
    const wanted = new Set(names);

    for (const name of [...this.breakers.keys()]) {
      if (!wanted.has(name)) this.breakers.delete(name);
    }

    for (const name of wanted) {
      const existing = this.breakers.get(name);
      if (existing) {
        existing.updatePolicy(policy);
        continue;
      }
      const listener = this.options.onStateChange;
      this.breakers.set(
        name,
        new CircuitBreaker(name, policy, {
          now: this.options.now,
          onStateChange: listener
            ? (from, to, reason) => listener(name, from, to, reason)
            : undefined,
        }),
      );
    }
  }

  get(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  names(): string[] {
    return [...this.breakers.keys()];
  }

  /** Health of every breaker, keyed by provider name. */
  snapshot(): Record<string, ProviderHealth> {
    const out: Record<string, ProviderHealth> = {};
    for (const [name, breaker] of this.breakers) {
      out[name] = breaker.health();
    }
    return out;
  }
}
