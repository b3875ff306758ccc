/**
 * packages/core/src/app/config.ts — Renderer configuration defaults and validation.
 *
 * Why: Invalid configuration must fail loudly at session creation, before any
 * node is built. Unknown enum values and non-integer limits throw
 * TRUI_INVALID_CONFIG with the offending field named.
 */

import { TrellisError } from "../errors.js";
import { isLogLevel } from "../logger.js";
import type { ScheduleFlush } from "../runtime/scheduler.js";
import type { BatchingMode, RendererConfig, ResolvedRendererConfig } from "./types.js";

const ROOT_PATH_RE = /^[^.[\]\s]+$/;

const microtaskFlush: ScheduleFlush = (flush) => {
  queueMicrotask(flush);
};

/** Default configuration values. */
export const DEFAULT_RENDERER_CONFIG: ResolvedRendererConfig = Object.freeze({
  rootPath: "root",
  maxDepth: 64,
  devMode: false,
  logLevel: "warn",
  batching: "microtask",
  scheduleFlush: microtaskFlush,
  internal_onCommit: undefined,
});

function invalidConfig(detail: string): never {
  throw new TrellisError("TRUI_INVALID_CONFIG", detail);
}

function requirePositiveInt(name: string, v: unknown): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v <= 0) {
    invalidConfig(`${name} must be a positive integer`);
  }
  return v;
}

function isBatchingMode(v: unknown): v is BatchingMode {
  return v === "microtask" || v === "manual";
}

export function resolveRendererConfig(config: RendererConfig | undefined): ResolvedRendererConfig {
  if (!config) return DEFAULT_RENDERER_CONFIG;

  const rootPath = config.rootPath ?? DEFAULT_RENDERER_CONFIG.rootPath;
  if (typeof rootPath !== "string" || !ROOT_PATH_RE.test(rootPath)) {
    invalidConfig(
      `rootPath must be a non-empty string without ".", "[", "]" or whitespace (got ${JSON.stringify(rootPath)})`,
    );
  }
  const maxDepth =
    config.maxDepth === undefined
      ? DEFAULT_RENDERER_CONFIG.maxDepth
      : requirePositiveInt("maxDepth", config.maxDepth);
  const devMode = config.devMode === true;

  const logLevel = config.logLevel ?? DEFAULT_RENDERER_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    invalidConfig(`logLevel must be one of debug, info, warn, error (got ${String(logLevel)})`);
  }
  const batching = config.batching ?? DEFAULT_RENDERER_CONFIG.batching;
  if (!isBatchingMode(batching)) {
    invalidConfig(`batching must be "microtask" or "manual" (got ${String(batching)})`);
  }

  let scheduleFlush: ScheduleFlush | null = batching === "manual" ? null : microtaskFlush;
  if (config.scheduleFlush !== undefined) {
    if (typeof config.scheduleFlush !== "function") invalidConfig("scheduleFlush must be a function");
    if (batching === "manual") {
      invalidConfig('scheduleFlush cannot be combined with batching: "manual"');
    }
    scheduleFlush = config.scheduleFlush;
  }
  const internal_onCommit =
    typeof config.internal_onCommit === "function" ? config.internal_onCommit : undefined;

  return Object.freeze({
    rootPath,
    maxDepth,
    devMode,
    logLevel,
    batching,
    scheduleFlush,
    internal_onCommit,
  });
}
