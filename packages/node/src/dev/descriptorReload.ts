/**
 * packages/node/src/dev/descriptorReload.ts — Reload a descriptor file on change.
 *
 * Why: Descriptors are re-parsed only when their source configuration
 * changes. During development that source is a JSON file; this watches it,
 * debounces save bursts, and hands the parsed tree to `setDescriptor`, which
 * keeps every handle whose path and kind survived the edit.
 */

import { type FSWatcher, watch } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename, dirname, isAbsolute, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { type Renderer, TrellisError, describeThrown, isNodeDescriptor } from "@trellis-ui/core";

const DEFAULT_DEBOUNCE_MS = 40;

export type DescriptorReloadLogEvent = Readonly<{
  level: "info" | "warn" | "error";
  message: string;
}>;

export type DescriptorReloadOptions = Readonly<{
  renderer: Pick<Renderer<unknown>, "setDescriptor">;
  /** Path (or file URL) of the JSON descriptor file. */
  file: string | URL;
  debounceMs?: number;
  onError?: (error: unknown) => void;
  log?: (event: DescriptorReloadLogEvent) => void;
}>;

export type DescriptorReloadController = Readonly<{
  start: () => void;
  reloadNow: () => Promise<boolean>;
  stop: () => Promise<void>;
  isRunning: () => boolean;
}>;

function toAbsolutePath(input: string | URL, label: string): string {
  if (input instanceof URL) {
    if (input.protocol !== "file:") {
      throw new Error(`${label} must be a file URL when URL is provided`);
    }
    return resolve(fileURLToPath(input));
  }
  if (typeof input !== "string" || input.trim().length === 0) {
    throw new Error(`${label} must be a non-empty string or file URL`);
  }
  return isAbsolute(input) ? resolve(input) : resolve(process.cwd(), input);
}

function ensurePositiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return value;
}

/** Read and validate a JSON descriptor file. */
export async function loadDescriptorFile(file: string | URL): Promise<unknown> {
  const path = toAbsolutePath(file, "file");
  const text = await readFile(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e: unknown) {
    throw new TrellisError("TRUI_MALFORMED_DESCRIPTOR", `${path}: ${describeThrown(e)}`);
  }
  if (!isNodeDescriptor(parsed)) {
    throw new TrellisError("TRUI_MALFORMED_DESCRIPTOR", `${path} does not contain a node descriptor`);
  }
  return parsed;
}

export function createDescriptorReload(opts: DescriptorReloadOptions): DescriptorReloadController {
  const filePath = toAbsolutePath(opts.file, "file");
  const fileName = basename(filePath);
  const debounceMs = ensurePositiveInt("debounceMs", opts.debounceMs ?? DEFAULT_DEBOUNCE_MS);
  const log = opts.log ?? (() => {});
  const onError = opts.onError;

  let watcher: FSWatcher | null = null;
  let running = false;
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  let reloadChain: Promise<boolean> = Promise.resolve(false);

  function clearDebounce(): void {
    if (debounceTimer === null) return;
    clearTimeout(debounceTimer);
    debounceTimer = null;
  }

  function closeWatcher(): void {
    if (watcher === null) return;
    try {
      watcher.close();
    } catch (error: unknown) {
      log({ level: "warn", message: `closing watcher failed: ${describeThrown(error)}` });
    }
    watcher = null;
  }

  function queueReload(phase: "manual" | "watch"): Promise<boolean> {
    const op = reloadChain.then(async () => {
      if (!running) return false;
      try {
        const next = await loadDescriptorFile(filePath);
        if (!running) return false;
        opts.renderer.setDescriptor(next);
        log({
          level: "info",
          message: phase === "manual" ? "descriptor reloaded" : `descriptor reloaded after change to ${fileName}`,
        });
        return true;
      } catch (error: unknown) {
        onError?.(error);
        log({ level: "error", message: `descriptor reload failed; keeping previous tree: ${describeThrown(error)}` });
        return false;
      }
    });
    reloadChain = op.catch(() => false);
    return op;
  }

  function onWatchEvent(filename: string | null): void {
    if (!running) return;
    if (filename !== null && filename !== fileName) return;
    clearDebounce();
    debounceTimer = setTimeout(() => {
      debounceTimer = null;
      void queueReload("watch");
    }, debounceMs);
  }

  return Object.freeze({
    start: () => {
      if (running) return;
      running = true;
      const w = watch(dirname(filePath), { persistent: false }, (_eventType, filename) => {
        onWatchEvent(typeof filename === "string" ? filename : null);
      });
      w.on("error", (error: unknown) => {
        onError?.(error);
        log({ level: "warn", message: `watcher reported an error: ${describeThrown(error)}` });
      });
      watcher = w;
      log({ level: "info", message: `watching ${filePath}` });
    },
    reloadNow: async () => {
      if (!running) return false;
      clearDebounce();
      return queueReload("manual");
    },
    stop: async () => {
      if (!running) return;
      running = false;
      clearDebounce();
      closeWatcher();
      await reloadChain;
      log({ level: "info", message: "watcher stopped" });
    },
    isRunning: () => running,
  });
}
