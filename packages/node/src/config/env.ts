/**
 * packages/node/src/config/env.ts — Renderer configuration from the environment.
 *
 * Recognised variables:
 *   - TRELLIS_DEV=1|true|yes|on      devMode
 *   - TRELLIS_MAX_DEPTH=<int>        maxDepth
 *   - TRELLIS_LOG_LEVEL=<level>      logLevel (debug, info, warn, error)
 *   - TRELLIS_BATCHING=<mode>        batching (microtask, manual)
 *
 * Malformed values are ignored so a typo never prevents startup.
 */

import { type BatchingMode, type LogLevel, type RendererConfig, isLogLevel } from "@trellis-ui/core";

export type ProcessEnv = Readonly<Record<string, string | undefined>>;

function readEnv(env: ProcessEnv, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

function envFlag(env: ProcessEnv, name: string): boolean | null {
  const value = readEnv(env, name);
  if (value === null) return null;
  const norm = value.toLowerCase();
  if (norm === "1" || norm === "true" || norm === "yes" || norm === "on") return true;
  if (norm === "0" || norm === "false" || norm === "no" || norm === "off") return false;
  return null;
}

function envPositiveInt(env: ProcessEnv, name: string): number | null {
  const value = readEnv(env, name);
  if (value === null) return null;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !Number.isInteger(parsed) || parsed <= 0) return null;
  return parsed;
}

function envLogLevel(env: ProcessEnv, name: string): LogLevel | null {
  const value = readEnv(env, name)?.toLowerCase() ?? null;
  return isLogLevel(value) ? value : null;
}

function envBatching(env: ProcessEnv, name: string): BatchingMode | null {
  const value = readEnv(env, name)?.toLowerCase() ?? null;
  return value === "microtask" || value === "manual" ? value : null;
}

/**
 * Read renderer configuration from `env`. Fields set in `base` win over the
 * environment.
 */
export function rendererConfigFromEnv(
  env: ProcessEnv = process.env,
  base: RendererConfig = {},
): RendererConfig {
  const devMode = envFlag(env, "TRELLIS_DEV");
  const maxDepth = envPositiveInt(env, "TRELLIS_MAX_DEPTH");
  const logLevel = envLogLevel(env, "TRELLIS_LOG_LEVEL");
  const batching = envBatching(env, "TRELLIS_BATCHING");
  return Object.freeze({
    ...(devMode === null ? {} : { devMode }),
    ...(maxDepth === null ? {} : { maxDepth }),
    ...(logLevel === null ? {} : { logLevel }),
    ...(batching === null || base.scheduleFlush !== undefined ? {} : { batching }),
    ...base,
  });
}
