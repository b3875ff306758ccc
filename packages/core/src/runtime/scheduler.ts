/**
 * packages/core/src/runtime/scheduler.ts — Dependency-scoped update scheduler.
 *
 * Why: State writes arrive one path at a time, often several per tick. The
 * scheduler collects the changed paths, and on flush asks the dependency index
 * which mounted handles read any of them. Only those handles are rebuilt, each
 * at most once, and ancestors never are.
 *
 * Flush rules:
 *   - Pending paths are de-duplicated; one flush is scheduled per tick
 *   - A handle whose ancestor is also affected is skipped (the ancestor's
 *     rebuild covers its subtree)
 *   - Rebuild order is shallowest first, then by path
 *   - Writes made during a flush are queued for the next tick
 */

import { describeThrown } from "../errors.js";
import type { AreaLogger } from "../logger.js";
import type { PathIndex } from "../state/pathIndex.js";
import { type BuildJournal, createBuildJournal } from "./builder.js";
import { type NodeHandle, hasAncestorIn } from "./handle.js";

/** Notification emitted after every non-empty flush. */
export type RendererCommit = Readonly<{
  tick: number;
  /** Normalised state paths written since the previous flush, in write order. */
  changedPaths: readonly string[];
  /** Handles rebuilt directly (their descendants are in `rebuilt` too). */
  rebuiltRoots: readonly string[];
  rebuilt: readonly string[];
  mounted: readonly string[];
  unmounted: readonly string[];
  faults: readonly string[];
}>;

export type ScheduleFlush = (flush: () => void) => void;

export type UpdateSchedulerOptions<R> = Readonly<{
  index: PathIndex<NodeHandle<R>>;
  rebuild: (handle: NodeHandle<R>, journal: BuildJournal) => void;
  /** null means flushes only happen when `flush()` is called. */
  scheduleFlush: ScheduleFlush | null;
  onCommit: (commit: RendererCommit) => void;
  logger: AreaLogger;
}>;

export type UpdateScheduler<R> = Readonly<{
  notify: (path: string) => void;
  /**
   * Rebuild everything affected by the pending paths, plus `forced` handles.
   * Returns null when there was nothing to do or a flush is already running.
   */
  flush: (forced?: Iterable<NodeHandle<R>>) => RendererCommit | null;
  readonly pending: number;
  readonly tick: number;
  dispose: () => void;
}>;

function compareHandles<R>(a: NodeHandle<R>, b: NodeHandle<R>): number {
  if (a.depth !== b.depth) return a.depth - b.depth;
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

export function createUpdateScheduler<R>(opts: UpdateSchedulerOptions<R>): UpdateScheduler<R> {
  const { index, rebuild, scheduleFlush, onCommit, logger } = opts;
  const pending = new Set<string>();
  let scheduled = false;
  let flushing = false;
  let disposed = false;
  let tick = 0;

  function request(): void {
    if (scheduled || flushing || disposed || scheduleFlush === null) return;
    scheduled = true;
    scheduleFlush(() => {
      scheduled = false;
      flush();
    });
  }

  function flush(forced: Iterable<NodeHandle<R>> = []): RendererCommit | null {
    if (disposed) return null;
    if (flushing) {
      logger.warn("flush requested while a flush is running; deferred to the next tick");
      return null;
    }
    const changedPaths = [...pending];
    pending.clear();

    const affected = new Set<NodeHandle<R>>();
    for (const path of changedPaths) {
      for (const handle of index.query(path)) {
        if (handle.mounted) affected.add(handle);
      }
    }
    for (const handle of forced) {
      if (handle.mounted) affected.add(handle);
    }
    if (changedPaths.length === 0 && affected.size === 0) return null;

    const roots = [...affected].filter((h) => !hasAncestorIn(h, affected)).sort(compareHandles);
    const journal = createBuildJournal();
    flushing = true;
    try {
      for (const handle of roots) rebuild(handle, journal);
    } finally {
      flushing = false;
    }

    tick++;
    const commit: RendererCommit = Object.freeze({
      tick,
      changedPaths: Object.freeze(changedPaths),
      rebuiltRoots: Object.freeze(roots.map((h) => h.path)),
      rebuilt: Object.freeze(journal.rebuilt),
      mounted: Object.freeze(journal.mounted),
      unmounted: Object.freeze(journal.unmounted),
      faults: Object.freeze(journal.faults),
    });
    logger.debug(
      `tick ${String(tick)}: ${String(changedPaths.length)} changed, ${String(
        journal.rebuilt.length,
      )} rebuilt`,
    );
    try {
      onCommit(commit);
    } catch (e: unknown) {
      logger.error(`commit listener threw: ${describeThrown(e)}`);
    }
    if (pending.size > 0) request();
    return commit;
  }

  return Object.freeze({
    notify: (path: string) => {
      if (disposed) return;
      pending.add(path);
      request();
    },
    flush,
    get pending() {
      return pending.size;
    },
    get tick() {
      return tick;
    },
    dispose: () => {
      disposed = true;
      pending.clear();
    },
  });
}
