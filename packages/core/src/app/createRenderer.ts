/**
 * packages/core/src/app/createRenderer.ts — Renderer session.
 *
 * Why: One session per page: the session owns the dependency index, the tree
 * builder, the remote coordinator and the update scheduler, and connects the
 * state store to them. The root handle is built synchronously on creation;
 * every later change goes through the scheduler.
 *
 * Session lifecycle:
 *   - create: validate config and root descriptor, build the tree
 *   - run: store writes -> scheduler -> scoped rebuilds -> commit listeners
 *   - dispose: unmount the tree, detach from the store, drop late fetches
 */

import { classifyValue, isNodeDescriptor } from "../descriptor/classify.js";
import type { Attributes } from "../descriptor/types.js";
import { TrellisError, describeThrown, previewValue } from "../errors.js";
import { createConsoleLogger, scopeLogger } from "../logger.js";
import { createBuildJournal, createTreeBuilder } from "../runtime/builder.js";
import type { NodeHandle } from "../runtime/handle.js";
import { createRemoteCoordinator } from "../runtime/remote.js";
import { type RendererCommit, createUpdateScheduler } from "../runtime/scheduler.js";
import { createPathIndex } from "../state/pathIndex.js";
import { createStateStore } from "../state/store.js";
import { resolveRendererConfig } from "./config.js";
import type { CommitListener, CreateRendererOptions, Renderer, RendererStats } from "./types.js";

/** Upper bound on flush/fetch rounds in one `settle()` call. */
const MAX_SETTLE_ROUNDS = 64;

function requireDescriptor(value: unknown, where: string): void {
  if (isNodeDescriptor(value)) return;
  throw new TrellisError(
    "TRUI_MALFORMED_DESCRIPTOR",
    `${where} must be a node descriptor, got ${classifyValue(value).tag} ${previewValue(value)}`,
  );
}

export function createRenderer<R>(opts: CreateRendererOptions<R>): Renderer<R> {
  const config = resolveRendererConfig(opts.config);
  if (opts.store !== undefined && opts.initialState !== undefined) {
    throw new TrellisError("TRUI_INVALID_CONFIG", "pass either store or initialState, not both");
  }
  requireDescriptor(opts.descriptor, "root descriptor");

  const baseLogger = opts.logger ?? createConsoleLogger(config.logLevel);
  const log = scopeLogger(baseLogger, "renderer");
  const ownsStore = opts.store === undefined;
  const store = opts.store ?? createStateStore(opts.initialState ?? {});

  const index = createPathIndex<NodeHandle<R>>();
  const remote = createRemoteCoordinator({
    store,
    dataSource: opts.dataSource ?? null,
    logger: scopeLogger(baseLogger, "remote"),
    onSettled: (target) => scheduler.notify(target),
  });
  const builder = createTreeBuilder<R>({
    registry: opts.registry,
    store,
    remote,
    index,
    logger: scopeLogger(baseLogger, "builder"),
    maxDepth: config.maxDepth,
  });

  const listeners = new Set<CommitListener>();
  let builds = 0;
  let rebuilds = 0;
  let faults = 0;
  let lastCommit: RendererCommit | null = null;
  let disposed = false;

  function countJournal(
    j: Readonly<{ mounted: readonly string[]; rebuilt: readonly string[]; faults: readonly string[] }>,
  ): void {
    builds += j.mounted.length;
    rebuilds += j.rebuilt.length;
    faults += j.faults.length;
  }

  const scheduler = createUpdateScheduler<R>({
    index,
    rebuild: builder.rebuild,
    scheduleFlush: config.scheduleFlush,
    logger: scopeLogger(baseLogger, "scheduler"),
    onCommit: (commit) => {
      lastCommit = commit;
      countJournal(commit);
      config.internal_onCommit?.(commit);
      for (const listener of [...listeners]) {
        try {
          listener(commit);
        } catch (e: unknown) {
          log.error(`commit listener threw: ${describeThrown(e)}`);
        }
      }
    },
  });

  const unsubscribeStore = store.subscribe((path) => {
    if (config.devMode && builder.building) {
      log.warnOnce(
        `write:${path}`,
        `state write to ${path} during a build; it applies on the next tick`,
      );
    }
    scheduler.notify(path);
  });

  const initial = createBuildJournal();
  const root = builder.mountRoot(opts.descriptor, opts.attributes ?? {}, config.rootPath, initial);
  countJournal(initial);
  log.debug(`mounted ${String(initial.mounted.length)} nodes under ${config.rootPath}`);

  function assertLive(op: string): void {
    if (disposed) throw new TrellisError("TRUI_DISPOSED", `${op} called after dispose()`);
  }

  return Object.freeze({
    root,
    store,
    flush: () => scheduler.flush(),
    settle: async () => {
      for (let round = 0; round < MAX_SETTLE_ROUNDS; round++) {
        if (disposed) return;
        scheduler.flush();
        if (remote.inflight === 0 && scheduler.pending === 0) return;
        await remote.whenIdle();
      }
      log.warn(`settle() stopped after ${String(MAX_SETTLE_ROUNDS)} rounds with work still pending`);
    },
    subscribe: (listener: CommitListener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    setDescriptor: (next: unknown) => {
      assertLive("setDescriptor");
      requireDescriptor(next, "setDescriptor()");
      root.source = next;
      return scheduler.flush([root]);
    },
    setAttributes: (next: Attributes) => {
      assertLive("setAttributes");
      root.inherited = Object.freeze({ ...next });
      return scheduler.flush([root]);
    },
    getHandle: (path: string) => builder.lookup(path),
    stats: (): RendererStats =>
      Object.freeze({
        ticks: scheduler.tick,
        builds,
        rebuilds,
        faults,
        mountedHandles: builder.mountedCount,
        inflightFetches: remote.inflight,
        lastCommit,
      }),
    dispose: () => {
      if (disposed) return;
      disposed = true;
      unsubscribeStore();
      scheduler.dispose();
      remote.dispose();
      builder.unmount(root, createBuildJournal());
      listeners.clear();
      if (ownsStore) store.dispose();
    },
  });
}
