/**
 * packages/core/src/logger.ts — Logger contract used by the renderer.
 *
 * Why: The core stays runtime-agnostic, so hosts inject where log lines go.
 * Every message is prefixed with `[trellis][<area>]` so interleaved output from
 * the builder, scheduler and remote coordinator stays attributable.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Sub-system that emitted a log line. */
export type LogArea = "builder" | "scheduler" | "remote" | "renderer";

export type RendererLogger = Readonly<{
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}>;

export const LOG_LEVEL_VALUES: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
});

export function isLogLevel(v: unknown): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

function noop(): void {}

export const SILENT_LOGGER: RendererLogger = Object.freeze({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});

type ConsoleLike = Readonly<{
  debug?: (msg: string) => void;
  info?: (msg: string) => void;
  warn?: (msg: string) => void;
  error?: (msg: string) => void;
}>;

/** Console-backed logger that drops lines below `minLevel`. */
export function createConsoleLogger(minLevel: LogLevel = "warn"): RendererLogger {
  const threshold = LOG_LEVEL_VALUES[minLevel];
  const sink = (level: LogLevel) => {
    if (LOG_LEVEL_VALUES[level] < threshold) return noop;
    return (message: string) => {
      const c = (globalThis as { console?: ConsoleLike }).console;
      c?.[level]?.(message);
    };
  };
  return Object.freeze({
    debug: sink("debug"),
    info: sink("info"),
    warn: sink("warn"),
    error: sink("error"),
  });
}

export function formatLogLine(area: LogArea, message: string): string {
  return `[trellis][${area}] ${message}`;
}

/** Area-scoped view over a logger. */
export type AreaLogger = Readonly<{
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Warn at most once per key for the lifetime of this area logger. */
  warnOnce: (key: string, message: string) => void;
}>;

export function scopeLogger(logger: RendererLogger, area: LogArea): AreaLogger {
  const warnedKeys = new Set<string>();
  return Object.freeze({
    debug: (message: string) => logger.debug(formatLogLine(area, message)),
    info: (message: string) => logger.info(formatLogLine(area, message)),
    warn: (message: string) => logger.warn(formatLogLine(area, message)),
    error: (message: string) => logger.error(formatLogLine(area, message)),
    warnOnce: (key: string, message: string) => {
      if (warnedKeys.has(key)) return;
      warnedKeys.add(key);
      logger.warn(formatLogLine(area, message));
    },
  });
}
