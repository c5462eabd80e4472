/**
 * Structured JSON logger with per-request correlation IDs and secret masking.
 */

import type { RequestId } from "@speech-relay/shared-types";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: string;
  readonly requestId?: RequestId | undefined;
  readonly [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Fields that should be masked in log output. */
const SECRET_FIELDS = new Set([
  "token",
  "apikey",
  "api_key",
  "apiKey",
  "authorization",
  "Authorization",
  "auth",
  "secret",
  "password",
  "credential",
  "credentials",
  "redisUrl",
]);

const MASK = "********";

/** Recursively mask secret fields in an object. */
export function maskSecrets(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map(maskSecrets);
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_FIELDS.has(key) && typeof value === "string") {
      masked[key] = value.length > 0 ? MASK : value;
    } else if (typeof value === "object" && value !== null) {
      masked[key] = maskSecrets(value instanceof Error ? describeError(value) : value);
    } else {
      masked[key] = value;
    }
  }
  return masked;
}

function describeError(err: Error): unknown {
  if ("toJSON" in err && typeof err.toJSON === "function") {
    const json: unknown = err.toJSON();
    return json;
  }
  return { name: err.name, message: err.message };
}

/** Parse a LOG_LEVEL value, falling back to "info". */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

export class Logger {
  private readonly context: Record<string, unknown>;
  private readonly minLevel: LogLevel;

  constructor(context?: Record<string, unknown>, minLevel: LogLevel = "debug") {
    this.context = context ?? {};
    this.minLevel = minLevel;
  }

  /** Create a child logger with additional context (e.g., requestId). */
  child(extra: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...extra }, this.minLevel);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...data,
    };

    const output = JSON.stringify(maskSecrets(entry));

    if (level === "info") {
      process.stdout.write(output + "\n");
    } else {
      process.stderr.write(output + "\n");
    }
  }
}

/** Singleton root logger. */
export const rootLogger = new Logger(
  { service: "speech-relay" },
  parseLogLevel(process.env["LOG_LEVEL"]),
);
