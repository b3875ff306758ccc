/**
 * packages/core/src/runtime/handle.ts — Node handles and built entries.
 *
 * Why: A handle is the dependency-tracking wrapper the builder creates for each
 * node position. It keeps its object identity for as long as its path stays
 * mounted, while `current` is replaced by every rebuild. Hosts hold handles;
 * parents hold handles for their children, so a child can rebuild without its
 * ancestors being touched.
 *
 * Handle lifecycle:
 *   - Created the first time a descriptor position is built
 *   - Reused on parent rebuilds when path and kind still match
 *   - Unmounted (mounted = false, dependency record dropped) when its position
 *     disappears or its kind changes
 */

import type { Attributes, Primitive } from "../descriptor/types.js";
import type { BuildFaultCode } from "../errors.js";

export const HANDLE_BRAND: unique symbol = Symbol.for("trellis.nodeHandle");

/** Empty sequence or empty structured value, passed through unchanged. */
export type EmptyContainer = readonly unknown[] | Readonly<Record<string, unknown>>;

/** What a child position holds after building. */
export type BuiltChild<R> = Primitive | EmptyContainer | NodeHandle<R>;

export type BuiltNode<R> = Readonly<{
  type: "node";
  path: string;
  kind: string;
  /** Resolved attributes merged with inherited attributes. */
  attributes: Attributes;
  children: readonly BuiltChild<R>[];
  /** Whatever the registered renderable returned. */
  output: R;
  revision: number;
}>;

export type BuiltFault = Readonly<{
  type: "fault";
  path: string;
  /** Descriptor kind when the source was a descriptor. */
  kind: string | null;
  code: BuildFaultCode;
  detail: string;
  revision: number;
}>;

export type BuiltEntry<R> = BuiltNode<R> | BuiltFault;

export type NodeHandle<R> = {
  readonly [HANDLE_BRAND]: true;
  readonly path: string;
  readonly depth: number;
  readonly parent: NodeHandle<R> | null;
  /** Value found at this position: a descriptor, or a malformed value that faults. */
  source: unknown;
  inherited: Attributes;
  current: BuiltEntry<R>;
  /** Handles created while building this node (children and attribute descriptors). */
  owned: Map<string, NodeHandle<R>>;
  mounted: boolean;
  buildCount: number;
};

export function isNodeHandle<R = unknown>(v: unknown): v is NodeHandle<R> {
  return typeof v === "object" && v !== null && HANDLE_BRAND in v;
}

const NOT_BUILT: BuiltFault = Object.freeze({
  type: "fault",
  path: "",
  kind: null,
  code: "TRUI_RENDER_THROW",
  detail: "build did not complete",
  revision: 0,
});

export function createNodeHandle<R>(
  path: string,
  parent: NodeHandle<R> | null,
  source: unknown,
  inherited: Attributes,
): NodeHandle<R> {
  return {
    [HANDLE_BRAND]: true,
    path,
    depth: parent === null ? 0 : parent.depth + 1,
    parent,
    source,
    inherited,
    current: NOT_BUILT,
    owned: new Map(),
    mounted: true,
    buildCount: 0,
  };
}

/** Visit a handle and every handle it owns, parents first. */
export function walkHandles<R>(handle: NodeHandle<R>, visit: (h: NodeHandle<R>) => void): void {
  visit(handle);
  for (const child of handle.owned.values()) walkHandles(child, visit);
}

/** True when any ancestor of `handle` is in `set`. */
export function hasAncestorIn<R>(handle: NodeHandle<R>, set: ReadonlySet<NodeHandle<R>>): boolean {
  for (let p = handle.parent; p !== null; p = p.parent) {
    if (set.has(p)) return true;
  }
  return false;
}
