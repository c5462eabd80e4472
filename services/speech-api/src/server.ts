/**
 * Operational HTTP server.
 *
 * Endpoints:
 * - GET  /healthz: liveness check
 * - GET  /readyz: readiness (orchestrator up, at least one provider admitting traffic)
 * - GET  /api/providers/health[?provider=]: on-demand provider probe
 * - GET  /api/stats/daily[?provider=&day=]: per-provider daily aggregates
 * - GET  /api/settings: safe config (secrets masked)
 * - POST /api/settings: validate and apply a runtime config patch
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import {
  createRequestId,
  UserError,
  OperatorError,
  ErrorCodes,
} from "@speech-relay/shared-types";
import type { Logger } from "@speech-relay/logging";
import type { SpeechOrchestrator } from "./orchestrator.js";
import { type ConfigStore, validateSettingsPatch } from "./config-store.js";

/** Settings bodies are small JSON. */
const MAX_SETTINGS_BYTES = 64 * 1024;

export interface ServerDeps {
  readonly configStore: ConfigStore;
  readonly orchestrator: Pick<
    SpeechOrchestrator,
    "isReady" | "availableProviders" | "healthCheck" | "getDailyStats"
  >;
  readonly logger: Logger;
  ready: boolean;
}

/** Create and return the HTTP server (not yet listening). */
export function createSpeechServer(deps: ServerDeps): Server {
  const log = deps.logger.child({ component: "http-server" });

  const server = createServer(async (req, res) => {
    const requestId = createRequestId();
    const requestLog = log.child({ requestId, method: req.method, url: req.url });

    try {
      const url = new URL(req.url ?? "/", "http://localhost");
      const method = req.method ?? "GET";

      // Readiness gate: always allow /healthz (liveness probe)
      if (!deps.ready && url.pathname !== "/healthz") {
        sendJson(res, 503, {
          error: "Service is starting up",
          code: ErrorCodes.NOT_READY,
        });
        return;
      }

      if (method === "GET" && url.pathname === "/healthz") {
        handleHealthz(res);
      } else if (method === "GET" && url.pathname === "/readyz") {
        handleReadyz(res, deps);
      } else if (method === "GET" && url.pathname === "/api/providers/health") {
        await handleProviderHealth(res, deps, url);
      } else if (method === "GET" && url.pathname === "/api/stats/daily") {
        await handleDailyStats(res, deps, url);
      } else if (method === "GET" && url.pathname === "/api/settings") {
        sendJson(res, 200, deps.configStore.getSafe());
      } else if (method === "POST" && url.pathname === "/api/settings") {
        await handlePostSettings(req, res, deps, requestLog);
      } else {
        sendJson(res, 404, { error: "Not found" });
      }
    } catch (err) {
      handleError(res, err, requestLog);
    }
  });

  return server;
}

// ── Route Handlers ──

function handleHealthz(res: ServerResponse): void {
  sendJson(res, 200, { status: "ok", timestamp: new Date().toISOString() });
}

function handleReadyz(res: ServerResponse, deps: ServerDeps): void {
  const available = deps.orchestrator.isReady() ? deps.orchestrator.availableProviders() : [];
  const ready = available.length > 0;
  sendJson(res, ready ? 200 : 503, {
    status: ready ? "ready" : "not_ready",
    availableProviders: available,
    timestamp: new Date().toISOString(),
  });
}

async function handleProviderHealth(
  res: ServerResponse,
  deps: ServerDeps,
  url: URL,
): Promise<void> {
  const provider = url.searchParams.get("provider") ?? undefined;
  const report = await deps.orchestrator.healthCheck(provider);
  sendJson(res, 200, report);
}

async function handleDailyStats(
  res: ServerResponse,
  deps: ServerDeps,
  url: URL,
): Promise<void> {
  const provider = url.searchParams.get("provider") ?? undefined;
  const day = url.searchParams.get("day") ?? undefined;
  sendJson(res, 200, await deps.orchestrator.getDailyStats(provider, day));
}

/** POST /api/settings: validate and apply; returns the safe config. */
async function handlePostSettings(
  req: IncomingMessage,
  res: ServerResponse,
  deps: ServerDeps,
  log: Logger,
): Promise<void> {
  const body = await readBody(req, MAX_SETTINGS_BYTES);

  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf-8"));
  } catch {
    throw new UserError(ErrorCodes.INVALID_CONFIG, "Request body is not valid JSON");
  }

  const patch = validateSettingsPatch(parsed);
  deps.configStore.update(patch);

  log.info("Settings updated successfully", { sections: Object.keys(patch) });
  sendJson(res, 200, deps.configStore.getSafe());
}

// ── Helpers ──

function handleError(
  res: ServerResponse,
  err: unknown,
  log: Logger,
): void {
  if (err instanceof UserError) {
    log.warn("User error", { code: err.code, message: err.message });
    sendJson(res, err.code === ErrorCodes.PROVIDER_NOT_FOUND ? 404 : 400, {
      error: err.message,
      code: err.code,
    });
  } else if (err instanceof OperatorError) {
    log.error("Operator error", err.toJSON());
    sendJson(res, err.code === ErrorCodes.NOT_READY ? 503 : 502, {
      error: "An internal error occurred. Please try again.",
      code: err.code,
    });
  } else {
    log.error("Unexpected error", {
      error: err instanceof Error ? err.message : String(err),
    });
    sendJson(res, 500, {
      error: "An unexpected error occurred.",
      code: ErrorCodes.INTERNAL_ERROR,
    });
  }
}

function sendJson(
  res: ServerResponse,
  statusCode: number,
  body: unknown,
): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(
  req: IncomingMessage,
  maxBytes: number,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let rejected = false;

    req.on("data", (chunk: Buffer) => {
      totalBytes += chunk.length;
      if (totalBytes > maxBytes) {
        rejected = true;
        req.destroy();
        reject(
          new UserError(
            ErrorCodes.INVALID_REQUEST,
            `Request body too large. Max: ${maxBytes} bytes`,
          ),
        );
        return;
      }
      chunks.push(chunk);
    });

    req.on("end", () => {
      if (!rejected) resolve(Buffer.concat(chunks));
    });

    req.on("error", (err) => {
      if (rejected) return;
      reject(
        new OperatorError(
          ErrorCodes.INTERNAL_ERROR,
          "Failed to read request body",
          err.message,
        ),
      );
    });
  });
}
