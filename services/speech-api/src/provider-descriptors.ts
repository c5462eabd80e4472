/**
 * Provider descriptor parsing.
 *
 * Accepts `{ "stt": [...], "tts": [...] }` where each entry is
 * `{ name, priority?, enabled?, driver?, settings? }`. String settings of the
 * form `env:NAME` are resolved from the environment, so secrets stay out of
 * the file.
 */

import type {
  ProviderDescriptor,
  ProviderName,
  ProviderSettings,
  SpeechCategory,
} from "@speech-relay/shared-types";
import { createProviderName, UserError, ErrorCodes } from "@speech-relay/shared-types";

export type Env = Readonly<Record<string, string | undefined>>;

const CATEGORIES: readonly SpeechCategory[] = ["stt", "tts"];
const ENV_REF = /^env:([A-Za-z_][A-Za-z0-9_]*)$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse per-category descriptor lists.
 *
 * Priority defaults to the entry's position in its list.
 *
 * @throws UserError(INVALID_CONFIG) for malformed entries or unset env refs
 */
export function parseProviderDescriptors(raw: unknown, env: Env): ProviderDescriptor[] {
  if (!isRecord(raw)) {
    throw new UserError(ErrorCodes.INVALID_CONFIG, "providers must be an object with stt and tts lists.");
  }

  const out: ProviderDescriptor[] = [];
  for (const category of CATEGORIES) {
    const list = raw[category];
    if (list === undefined) continue;
    if (!Array.isArray(list)) {
      throw new UserError(ErrorCodes.INVALID_CONFIG, `providers.${category} must be an array.`);
    }
    list.forEach((entry: unknown, index) => {
      out.push(parseDescriptor(entry, category, index, env));
    });
  }
  return out;
}

function parseDescriptor(
  entry: unknown,
  category: SpeechCategory,
  index: number,
  env: Env,
): ProviderDescriptor {
  const where = `providers.${category}[${index}]`;
  if (!isRecord(entry)) {
    throw new UserError(ErrorCodes.INVALID_CONFIG, `${where} must be an object.`);
  }

  let name: ProviderName;
  try {
    name = createProviderName(String(entry["name"] ?? ""));
  } catch (err) {
    if (err instanceof TypeError) {
      throw new UserError(ErrorCodes.INVALID_CONFIG, `${where}.name: ${err.message}`);
    }
    throw err;
  }

  const priority = entry["priority"] ?? index;
  if (typeof priority !== "number" || !Number.isFinite(priority)) {
    throw new UserError(ErrorCodes.INVALID_CONFIG, `${where}.priority must be a number.`);
  }

  const enabled = entry["enabled"] ?? true;
  if (typeof enabled !== "boolean") {
    throw new UserError(ErrorCodes.INVALID_CONFIG, `${where}.enabled must be a boolean.`);
  }

  const driver = entry["driver"];
  if (driver !== undefined && (typeof driver !== "string" || driver.length === 0)) {
    throw new UserError(ErrorCodes.INVALID_CONFIG, `${where}.driver must be a non-empty string.`);
  }

  const settings = entry["settings"] ?? {};
  if (!isRecord(settings)) {
    throw new UserError(ErrorCodes.INVALID_CONFIG, `${where}.settings must be an object.`);
  }

  return {
    name,
    category,
    priority,
    enabled,
    driver,
    settings: resolveEnvRefs(settings, env, `${where}.settings`),
  };
}

/** Replace `env:NAME` strings (at any depth) with the variable's value. */
export function resolveEnvRefs(settings: Record<string, unknown>, env: Env, where: string): ProviderSettings {
  const resolve = (value: unknown, path: string): unknown => {
    if (typeof value === "string") {
      const match = ENV_REF.exec(value);
      if (match === null) return value;
      const varName = match[1] ?? "";
      const resolved = env[varName];
      if (resolved === undefined || resolved === "") {
        throw new UserError(
          ErrorCodes.INVALID_CONFIG,
          `${path} refers to environment variable ${varName}, which is not set.`,
        );
      }
      return resolved;
    }
    if (Array.isArray(value)) return value.map((v, i) => resolve(v, `${path}[${i}]`));
    if (isRecord(value)) {
      return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, resolve(v, `${path}.${k}`)]));
    }
    return value;
  };

  return Object.fromEntries(Object.entries(settings).map(([k, v]) => [k, resolve(v, `${where}.${k}`)]));
}
