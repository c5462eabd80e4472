/**
 * Runtime reconfiguration on settings change.
 *
 * Registers a ConfigStore listener that pushes every new config into the
 * orchestrator: registry, breakers, limiters, cache TTL and health timings.
 * A provider set that cannot be built is rejected as a user error, so the
 * ConfigStore rolls back and the HTTP layer answers 400.
 */

import type { SpeechConfig } from "@speech-relay/shared-types";
import { OperatorError, UserError, ErrorCodes } from "@speech-relay/shared-types";
import type { Logger } from "@speech-relay/logging";
import type { ConfigStore, ValidatedSettingsPatch } from "./config-store.js";

/** The part of the orchestrator the rebuilder drives. */
export interface Reconfigurable {
  reconfigure(config: SpeechConfig): void;
}

export function registerProviderRebuilder(
  configStore: ConfigStore,
  target: Reconfigurable,
  logger: Logger,
): void {
  const rebuildLog = logger.child({ component: "provider-rebuilder" });

  configStore.onChange((patch: ValidatedSettingsPatch, newConfig: Readonly<SpeechConfig>) => {
    try {
      target.reconfigure(newConfig);
    } catch (err) {
      if (err instanceof OperatorError && err.code === ErrorCodes.INVALID_CONFIG) {
        rebuildLog.warn("Rejected provider configuration", { error: err });
        throw new UserError(
          ErrorCodes.INVALID_CONFIG,
          `Provider configuration rejected: ${err.message}`,
          { cause: err },
        );
      }
      throw err;
    }

    rebuildLog.info("Applied configuration change", {
      sections: Object.keys(patch),
      providers: newConfig.providers.map((d) => d.name),
    });
  });
}
