/**
 * packages/core/src/runtime/registry.ts — Component registry contract.
 *
 * The registry maps a descriptor `kind` to the renderable that instantiates
 * it. Hosts supply their own; `createComponentRegistry` is the map-backed one.
 */

import type { Attributes } from "../descriptor/types.js";
import type { StateStore } from "../state/store.js";
import type { BuiltChild } from "./handle.js";

export type RenderInput<R> = Readonly<{
  kind: string;
  path: string;
  attributes: Attributes;
  children: readonly BuiltChild<R>[];
  store: StateStore;
}>;

export type Renderable<R> = (input: RenderInput<R>) => R;

export type ComponentRegistry<R> = Readonly<{
  /** Returns undefined for unknown kinds; the builder turns that into a fault. */
  lookup: (kind: string) => Renderable<R> | undefined;
}>;

export type MutableComponentRegistry<R> = ComponentRegistry<R> &
  Readonly<{
    register: (kind: string, renderable: Renderable<R>) => void;
    has: (kind: string) => boolean;
    kinds: () => readonly string[];
  }>;

export function createComponentRegistry<R>(
  entries: Readonly<Record<string, Renderable<R>>> = {},
): MutableComponentRegistry<R> {
  const table = new Map<string, Renderable<R>>(Object.entries(entries));

  return Object.freeze({
    lookup: (kind: string) => table.get(kind),
    register: (kind: string, renderable: Renderable<R>) => {
      table.set(kind, renderable);
    },
    has: (kind: string) => table.has(kind),
    kinds: () => Object.freeze([...table.keys()].sort()),
  });
}
