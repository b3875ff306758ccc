/**
 * packages/core/src/runtime/builder.ts — Tree builder.
 *
 * Why: Turns descriptors into node handles. Each handle build resolves the
 * node's attributes while recording every state path it reads, builds its
 * children, and instantiates the registered renderable. The recorded paths go
 * to the dependency index so the scheduler can later rebuild just this handle.
 *
 * Build responsibilities:
 *   - Reuse child handles whose path and kind still match; mount new ones
 *   - Unmount handles that are no longer produced
 *   - Isolate failures: a node that cannot build becomes a fault entry on its
 *     own handle, and siblings and ancestors keep building
 */

import { classifyValue, isEmptyValue, isNodeDescriptor, isPrimitive } from "../descriptor/classify.js";
import type { Attributes, NodeDescriptor } from "../descriptor/types.js";
import {
  type BuildFatal,
  type BuildFaultCode,
  TrellisError,
  describeThrown,
  isBuildFaultCode,
  previewValue,
} from "../errors.js";
import type { AreaLogger } from "../logger.js";
import type { PathIndex } from "../state/pathIndex.js";
import type { StateStore } from "../state/store.js";
import {
  type BuiltChild,
  type BuiltEntry,
  type BuiltFault,
  type EmptyContainer,
  type NodeHandle,
  createNodeHandle,
} from "./handle.js";
import type { ComponentRegistry } from "./registry.js";
import type { RemoteCoordinator } from "./remote.js";
import { type ResolveContext, resolveAttributes } from "./resolver.js";
import { attributesPath, describeDuplicate, planChildSlots } from "./slots.js";

/** Paths touched by one build pass, in build order. */
export type BuildJournal = {
  rebuilt: string[];
  mounted: string[];
  unmounted: string[];
  faults: string[];
};

export type BuildResult<R> =
  | Readonly<{ ok: true; value: BuiltChild<R> }>
  | Readonly<{ ok: false; fatal: BuildFatal }>;

export type TreeBuilderOptions<R> = Readonly<{
  registry: ComponentRegistry<R>;
  store: StateStore;
  remote: RemoteCoordinator;
  index: PathIndex<NodeHandle<R>>;
  logger: AreaLogger;
  maxDepth: number;
}>;

export type TreeBuilder<R> = Readonly<{
  /**
   * Build a value in descriptor position. Empty values, primitives and handles
   * pass through; other non-descriptors and faulted roots return `ok: false`.
   * A root already mounted at `path` is unmounted first.
   */
  build: (value: unknown, inherited: Attributes, path: string) => BuildResult<R>;
  /** Create and build a root handle, faulted or not, replacing any root at `path`. */
  mountRoot: (source: unknown, inherited: Attributes, path: string, journal: BuildJournal) => NodeHandle<R>;
  /** Re-run a mounted handle's build, including its subtree. */
  rebuild: (handle: NodeHandle<R>, journal: BuildJournal) => void;
  unmount: (handle: NodeHandle<R>, journal: BuildJournal) => void;
  isHandle: (v: unknown) => v is NodeHandle<R>;
  lookup: (path: string) => NodeHandle<R> | undefined;
  readonly mountedCount: number;
  /** True while a handle build is running. */
  readonly building: boolean;
}>;

export function createBuildJournal(): BuildJournal {
  return { rebuilt: [], mounted: [], unmounted: [], faults: [] };
}

function isEmptyContainer(v: unknown): v is EmptyContainer {
  return typeof v === "object" && v !== null && isEmptyValue(v);
}

function kindOf(source: unknown): string | null {
  return isNodeDescriptor(source) ? source.kind : null;
}

function toFault(path: string, kind: string | null, e: unknown, revision: number): BuiltFault {
  let code: BuildFaultCode = "TRUI_RENDER_THROW";
  let detail = describeThrown(e);
  if (e instanceof TrellisError && isBuildFaultCode(e.code)) {
    code = e.code;
    detail = e.message;
  }
  return Object.freeze({ type: "fault", path, kind, code, detail, revision });
}

export function createTreeBuilder<R>(opts: TreeBuilderOptions<R>): TreeBuilder<R> {
  const { registry, store, remote, index, logger, maxDepth } = opts;
  const known = new WeakSet<object>();
  const byPath = new Map<string, NodeHandle<R>>();
  let revision = 0;
  let buildDepth = 0;

  function isHandle(v: unknown): v is NodeHandle<R> {
    return typeof v === "object" && v !== null && known.has(v);
  }

  function createHandle(
    path: string,
    parent: NodeHandle<R> | null,
    source: unknown,
    inherited: Attributes,
  ): NodeHandle<R> {
    const handle = createNodeHandle<R>(path, parent, source, inherited);
    known.add(handle);
    byPath.set(path, handle);
    return handle;
  }

  function unmount(handle: NodeHandle<R>, journal: BuildJournal): void {
    if (!handle.mounted) return;
    for (const child of handle.owned.values()) unmount(child, journal);
    handle.owned = new Map();
    handle.mounted = false;
    index.untrack(handle);
    if (byPath.get(handle.path) === handle) byPath.delete(handle.path);
    journal.unmounted.push(handle.path);
  }

  type BuildScope = {
    readonly handle: NodeHandle<R>;
    readonly prevOwned: ReadonlyMap<string, NodeHandle<R>>;
    readonly nextOwned: Map<string, NodeHandle<R>>;
    readonly deps: Set<string>;
    readonly journal: BuildJournal;
  };

  function adopt(
    scope: BuildScope,
    source: unknown,
    path: string,
    forced: BuildFatal | null = null,
  ): NodeHandle<R> {
    const prev = scope.prevOwned.get(path);
    if (prev !== undefined && prev.mounted && kindOf(prev.source) === kindOf(source)) {
      prev.source = source;
      scope.nextOwned.set(path, prev);
      buildHandle(prev, scope.journal, forced);
      return prev;
    }
    const handle = createHandle(path, scope.handle, source, {});
    scope.nextOwned.set(path, handle);
    buildHandle(handle, scope.journal, forced);
    return handle;
  }

  function buildChild(scope: BuildScope, value: unknown, path: string): BuiltChild<R> {
    if (isPrimitive(value)) return value;
    if (isEmptyContainer(value)) return value;
    if (isHandle(value)) return value;
    return adopt(scope, value, path);
  }

  function computeEntry(scope: BuildScope, rev: number): BuiltEntry<R> {
    const { handle, deps } = scope;
    const source = handle.source;
    if (handle.depth > maxDepth) {
      throw new TrellisError(
        "TRUI_MALFORMED_DESCRIPTOR",
        `${handle.path} is nested deeper than maxDepth=${maxDepth}`,
      );
    }
    if (!isNodeDescriptor(source)) {
      const shape = classifyValue(source).tag;
      throw new TrellisError(
        "TRUI_MALFORMED_DESCRIPTOR",
        `expected a node descriptor at ${handle.path}, got ${shape} ${previewValue(source)}`,
      );
    }
    const renderable = registry.lookup(source.kind);
    if (renderable === undefined) {
      throw new TrellisError(
        "TRUI_UNKNOWN_COMPONENT_KIND",
        `no component registered for kind "${source.kind}" at ${handle.path}`,
      );
    }

    const ctx: ResolveContext<R> = {
      read: (path) => {
        deps.add(path);
        return store.get(path);
      },
      remote: (directive, params) => {
        deps.add(directive.target);
        return remote.resolve({
          source: directive.source,
          target: directive.target,
          params,
          current: store.get(directive.target),
          owner: handle,
        });
      },
      buildNested: (descriptor: NodeDescriptor, path: string) => adopt(scope, descriptor, path),
      isHandle,
      maxDepth,
    };

    const resolved = resolveAttributes(source.attributes ?? {}, ctx, attributesPath(handle.path));
    const attributes = Object.freeze({ ...resolved, ...handle.inherited });

    const children: BuiltChild<R>[] = [];
    for (const slot of planChildSlots(handle.path, source.children ?? [])) {
      if (slot.duplicateOf !== null) {
        const fatal: BuildFatal = {
          code: "TRUI_MALFORMED_DESCRIPTOR",
          detail: describeDuplicate(handle.path, slot),
        };
        children.push(adopt(scope, slot.value, slot.path, fatal));
        continue;
      }
      children.push(buildChild(scope, slot.value, slot.path));
    }
    Object.freeze(children);

    const output = renderable({
      kind: source.kind,
      path: handle.path,
      attributes,
      children,
      store,
    });

    return Object.freeze({
      type: "node",
      path: handle.path,
      kind: source.kind,
      attributes,
      children,
      output,
      revision: rev,
    });
  }

  function buildHandle(
    handle: NodeHandle<R>,
    journal: BuildJournal,
    forced: BuildFatal | null = null,
  ): void {
    const scope: BuildScope = {
      handle,
      prevOwned: handle.owned,
      nextOwned: new Map(),
      deps: new Set(),
      journal,
    };
    const rev = ++revision;
    (handle.buildCount === 0 ? journal.mounted : journal.rebuilt).push(handle.path);
    handle.buildCount++;

    buildDepth++;
    let entry: BuiltEntry<R>;
    try {
      if (forced !== null) throw new TrellisError(forced.code, forced.detail);
      entry = computeEntry(scope, rev);
    } catch (e: unknown) {
      entry = toFault(handle.path, kindOf(handle.source), e, rev);
    } finally {
      buildDepth--;
    }

    if (entry.type === "fault") {
      journal.faults.push(handle.path);
      logger.warn(`${entry.code}: ${entry.detail}`);
    }
    handle.current = entry;
    handle.owned = scope.nextOwned;
    for (const [path, prev] of scope.prevOwned) {
      if (scope.nextOwned.get(path) !== prev) unmount(prev, journal);
    }
    if (handle.mounted) index.track(handle, scope.deps);
  }

  function createRoot(
    path: string,
    source: unknown,
    inherited: Attributes,
    journal: BuildJournal,
  ): NodeHandle<R> {
    const existing = byPath.get(path);
    if (existing !== undefined && existing.parent === null) unmount(existing, journal);
    const handle = createHandle(path, null, source, inherited);
    buildHandle(handle, journal);
    return handle;
  }

  return Object.freeze({
    build: (value: unknown, inherited: Attributes, path: string): BuildResult<R> => {
      if (isPrimitive(value) || isEmptyContainer(value) || isHandle(value)) {
        return { ok: true, value };
      }
      if (!isNodeDescriptor(value)) {
        return {
          ok: false,
          fatal: {
            code: "TRUI_MALFORMED_DESCRIPTOR",
            detail: `expected a node descriptor at ${path}, got ${classifyValue(value).tag} ${previewValue(value)}`,
          },
        };
      }
      const journal = createBuildJournal();
      const handle = createRoot(path, value, inherited, journal);
      const entry = handle.current;
      if (entry.type === "fault") {
        unmount(handle, journal);
        return { ok: false, fatal: { code: entry.code, detail: entry.detail } };
      }
      return { ok: true, value: handle };
    },
    mountRoot: (source: unknown, inherited: Attributes, path: string, journal: BuildJournal) =>
      createRoot(path, source, inherited, journal),
    rebuild: (handle: NodeHandle<R>, journal: BuildJournal) => {
      if (!handle.mounted) return;
      buildHandle(handle, journal);
    },
    unmount,
    isHandle,
    lookup: (path: string) => byPath.get(path),
    get mountedCount() {
      return byPath.size;
    },
    get building() {
      return buildDepth > 0;
    },
  });
}
