/**
 * packages/node/src/logging/streamLogger.ts — Line-oriented logger for Node streams.
 *
 * Why: Terminal sessions want readable lines; log shippers want JSON lines.
 * Both formats carry the same fields, and the `[trellis][area]` prefix the
 * core adds is lifted into a separate `area` field.
 */

import { LOG_LEVEL_VALUES, type LogLevel, type RendererLogger } from "@trellis-ui/core";

export type LogFormat = "pretty" | "json";

export type LineSink = Readonly<{ write: (chunk: string) => unknown }>;

export type StreamLoggerOptions = Readonly<{
  level?: LogLevel;
  format?: LogFormat;
  /** Defaults to process.stderr. */
  stream?: LineSink;
  now?: () => Date;
}>;

export type LogEntry = Readonly<{
  ts: string;
  level: LogLevel;
  area: string | null;
  msg: string;
}>;

const PREFIX_RE = /^\[trellis\]\[([a-z]+)\] ([\s\S]*)$/u;

export function toLogEntry(level: LogLevel, message: string, at: Date): LogEntry {
  const match = PREFIX_RE.exec(message);
  return {
    ts: at.toISOString(),
    level,
    area: match?.[1] ?? null,
    msg: match?.[2] ?? message,
  };
}

export function formatPretty(entry: LogEntry): string {
  const area = entry.area === null ? "" : ` [${entry.area}]`;
  return `${entry.ts} ${entry.level.toUpperCase().padEnd(5)}${area} ${entry.msg}`;
}

export function createStreamLogger(opts: StreamLoggerOptions = {}): RendererLogger {
  const threshold = LOG_LEVEL_VALUES[opts.level ?? "info"];
  const format = opts.format ?? "pretty";
  const stream = opts.stream ?? process.stderr;
  const now = opts.now ?? (() => new Date());

  const sink = (level: LogLevel) => (message: string) => {
    if (LOG_LEVEL_VALUES[level] < threshold) return;
    const entry = toLogEntry(level, message, now());
    const line = format === "json" ? JSON.stringify(entry) : formatPretty(entry);
    stream.write(`${line}\n`);
  };

  return Object.freeze({
    debug: sink("debug"),
    info: sink("info"),
    warn: sink("warn"),
    error: sink("error"),
  });
}
