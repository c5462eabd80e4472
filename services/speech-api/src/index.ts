/**
 * Speech API: main entry point.
 *
 * Loads configuration, builds the orchestrator, and serves the operational
 * endpoints. The readiness gate opens once the port is bound.
 */

import { rootLogger } from "@speech-relay/logging";
import {
  MemoryCacheStore,
  RedisCacheStore,
  createRedisClient,
  type CacheStore,
} from "@speech-relay/cache";
import { MemoryMetricsBackend, RedisMetricsBackend, type MetricsBackend } from "@speech-relay/metrics";
import { FileObjectStorage } from "@speech-relay/object-storage";
import type { SpeechConfig } from "@speech-relay/shared-types";
import { SpeechOrchestrator } from "./orchestrator.js";
import { DEFAULT_DRIVERS } from "./provider-table.js";
import { createSpeechServer, type ServerDeps } from "./server.js";
import { loadConfig } from "./config-loader.js";
import { ConfigStore } from "./config-store.js";
import { registerProviderRebuilder } from "./provider-rebuilder.js";

const log = rootLogger.child({ component: "startup" });

interface Stores {
  readonly cacheStore: CacheStore;
  readonly metricsBackend: MetricsBackend;
}

/** One Redis connection serves cache and metrics; the cache store owns it. */
function buildStores(config: SpeechConfig): Stores {
  if (config.cache.redisUrl === "") {
    log.info("Using in-memory result cache and metrics");
    return { cacheStore: new MemoryCacheStore(), metricsBackend: new MemoryMetricsBackend() };
  }
  log.info("Using Redis result cache and metrics");
  const client = createRedisClient(config.cache.redisUrl);
  return {
    cacheStore: new RedisCacheStore(client, rootLogger),
    metricsBackend: new RedisMetricsBackend(client, { keyPrefix: config.cache.keyPrefix }),
  };
}

async function main(): Promise<void> {
  log.info("Loading configuration");
  const config = loadConfig();
  const configStore = new ConfigStore(config);

  if (config.providers.length === 0) {
    log.warn("No providers configured; set SPEECH_PROVIDERS_FILE or OPENAI_API_KEY");
  }

  const { cacheStore, metricsBackend } = buildStores(config);
  const orchestrator = new SpeechOrchestrator({
    config,
    drivers: DEFAULT_DRIVERS,
    cacheStore,
    metricsBackend,
    storage: new FileObjectStorage(config.storage.directory),
    logger: rootLogger,
  });
  await orchestrator.init();
  registerProviderRebuilder(configStore, orchestrator, rootLogger);

  const deps: ServerDeps = {
    configStore,
    orchestrator,
    logger: rootLogger,
    ready: false,
  };
  const server = createSpeechServer(deps);

  const serverConfig = configStore.get().server;
  server.listen(serverConfig.port, serverConfig.host, () => {
    deps.ready = true;
    log.info("Speech API started", {
      port: serverConfig.port,
      host: serverConfig.host,
      providers: config.providers.map((d) => d.name),
    });
  });

  // Graceful shutdown with bounded timeout
  const shutdown = (): void => {
    log.info("Shutting down");
    deps.ready = false;
    server.close(() => {
      orchestrator
        .shutdown()
        .then(() => {
          log.info("Server closed");
          process.exit(0);
        })
        .catch((err: unknown) => {
          log.error("Shutdown failed", {
            error: err instanceof Error ? err.message : String(err),
          });
          process.exit(1);
        });
    });
    // Force exit after 10 seconds if connections hang
    setTimeout(() => {
      log.warn("Forced shutdown after timeout");
      process.exit(1);
    }, 10_000).unref();
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err) => {
  log.error("Fatal startup error", {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
