/**
 * Provider registry: builds adapters from descriptors and publishes them
 * as immutable snapshots.
 *
 * `configure()` validates the whole descriptor list and constructs every
 * enabled adapter before swapping the snapshot, so a bad configuration
 * leaves the previous one active. In-flight requests keep the snapshot they
 * started with.
 */

import type {
  ProviderDescriptor,
  ProviderName,
  SpeechCategory,
} from "@speech-relay/shared-types";
import { OperatorError, ErrorCodes } from "@speech-relay/shared-types";
import type { ObjectStorage, SpeechProvider } from "@speech-relay/provider-contract";
import type { Logger } from "@speech-relay/logging";
import { canonicalJson } from "@speech-relay/cache";
import type { DriverTable } from "./provider-table.js";

/** An enabled provider with its built adapter. */
export interface RegisteredProvider {
  readonly descriptor: ProviderDescriptor;
  readonly adapter: SpeechProvider;
}

export class RegistrySnapshot {
  private readonly byName: ReadonlyMap<string, RegisteredProvider>;

  constructor(
    /** Enabled providers, ordered by priority then registration order. */
    private readonly entries: readonly RegisteredProvider[],
    /** Every configured descriptor, enabled or not. */
    readonly descriptors: readonly ProviderDescriptor[],
  ) {
    this.byName = new Map(entries.map((e) => [e.descriptor.name, e]));
  }

  /**
   * Ordered candidates for a category. With `chain`, only the named providers
   * of that category, in chain order.
   */
  candidates(category: SpeechCategory, chain?: readonly string[]): RegisteredProvider[] {
    if (chain === undefined) {
      return this.entries.filter((e) => e.descriptor.category === category);
    }
    const seen = new Set<string>();
    const out: RegisteredProvider[] = [];
    for (const name of chain) {
      const entry = this.byName.get(name);
      if (entry && entry.descriptor.category === category && !seen.has(name)) {
        seen.add(name);
        out.push(entry);
      }
    }
    return out;
  }

  get(name: string): RegisteredProvider | undefined {
    return this.byName.get(name);
  }

  descriptor(name: string): ProviderDescriptor | undefined {
    return this.descriptors.find((d) => d.name === name);
  }

  /** Names of all configured providers, enabled or not. */
  names(): ProviderName[] {
    return this.descriptors.map((d) => d.name);
  }

  enabled(): readonly RegisteredProvider[] {
    return this.entries;
  }
}

export interface ProviderRegistryDeps {
  readonly logger: Logger;
  readonly storage: ObjectStorage;
}

export class ProviderRegistry {
  private current = new RegistrySnapshot([], []);
  /** Built adapters keyed by name + driver + settings fingerprint. */
  private instances = new Map<string, SpeechProvider>();
  private readonly log: Logger;

  constructor(
    private readonly drivers: DriverTable,
    private readonly deps: ProviderRegistryDeps,
  ) {
    this.log = deps.logger.child({ component: "provider-registry" });
  }

  snapshot(): RegistrySnapshot {
    return this.current;
  }

  /**
   * Validate, build and atomically publish a new provider set.
   *
   * @throws OperatorError(INVALID_CONFIG) for duplicate names, unknown
   *   drivers, category mismatches or adapter construction failures
   */
  configure(descriptors: readonly ProviderDescriptor[]): RegistrySnapshot {
    const seen = new Set<string>();
    for (const d of descriptors) {
      if (seen.has(d.name)) {
        throw new OperatorError(
          ErrorCodes.INVALID_CONFIG,
          "Duplicate provider name",
          `Provider "${d.name}" is configured more than once`,
        );
      }
      seen.add(d.name);
    }

    const ordered = descriptors
      .map((descriptor, index) => ({ descriptor, index }))
      .sort((a, b) => a.descriptor.priority - b.descriptor.priority || a.index - b.index)
      .map((e) => e.descriptor);

    const nextInstances = new Map<string, SpeechProvider>();
    const entries: RegisteredProvider[] = [];

    for (const descriptor of ordered) {
      if (!descriptor.enabled) continue;

      const key = instanceKey(descriptor);
      const adapter = this.instances.get(key) ?? this.build(descriptor);
      nextInstances.set(key, adapter);
      entries.push({ descriptor, adapter });
    }

    const next = new RegistrySnapshot(entries, ordered);
    const reused = entries.filter((e) => this.instances.has(instanceKey(e.descriptor))).length;
    this.current = next;
    this.instances = nextInstances;

    this.log.info("Provider registry configured", {
      providers: ordered.map((d) => ({
        name: d.name,
        category: d.category,
        priority: d.priority,
        enabled: d.enabled,
      })),
      built: entries.length - reused,
      reused,
    });

    return next;
  }

  private build(descriptor: ProviderDescriptor): SpeechProvider {
    const driverKey = descriptor.driver ?? descriptor.name;
    const construct = Object.hasOwn(this.drivers, driverKey) ? this.drivers[driverKey] : undefined;
    if (construct === undefined) {
      throw new OperatorError(
        ErrorCodes.INVALID_CONFIG,
        "Unknown provider driver",
        `Provider "${descriptor.name}" uses driver "${driverKey}"; known drivers: ${Object.keys(this.drivers).join(", ")}`,
      );
    }

    let adapter: SpeechProvider;
    let category: SpeechCategory;
    try {
      adapter = construct(descriptor.settings, {
        name: descriptor.name,
        logger: this.deps.logger,
        storage: this.deps.storage,
      });
      category = adapter.capabilities().category;
    } catch (err) {
      const detail =
        err instanceof OperatorError
          ? `${err.message}: ${err.detail}`
          : err instanceof Error
            ? err.message
            : String(err);
      throw new OperatorError(
        ErrorCodes.INVALID_CONFIG,
        `Could not build provider "${descriptor.name}"`,
        detail,
        { cause: err },
      );
    }

    if (category !== descriptor.category) {
      throw new OperatorError(
        ErrorCodes.INVALID_CONFIG,
        "Provider category mismatch",
        `Provider "${descriptor.name}" is configured as ${descriptor.category} but driver "${driverKey}" is ${category}`,
      );
    }
    const implemented = category === "stt" ? adapter.transcribe : adapter.synthesize;
    if (implemented === undefined) {
      throw new OperatorError(
        ErrorCodes.INVALID_CONFIG,
        "Provider does not implement its category",
        `Driver "${driverKey}" declares ${category} but has no ${category === "stt" ? "transcribe" : "synthesize"}()`,
      );
    }

    return adapter;
  }
}

function instanceKey(d: ProviderDescriptor): string {
  return `${d.name}\u0000${d.driver ?? d.name}\u0000${canonicalJson(d.settings)}`;
}
