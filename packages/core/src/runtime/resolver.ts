/**
 * packages/core/src/runtime/resolver.ts — Attribute value resolution.
 *
 * Why: Turns descriptor attribute values into materialized values for one node.
 * Every state read goes through `ctx.read`, which is how the builder learns the
 * node's dependency record. Nested node descriptors are handed back to the
 * builder so they become handles with their own records.
 *
 * Resolution rules:
 *   - `"$state.a.b"` -> raw state value; `"x {{ $state.a }}"` -> interpolated string
 *   - `{ "$remote": {...} }` -> value at the target, or PENDING while fetching
 *   - descriptors -> handles (via ctx.buildNested)
 *   - sequences / structured values -> resolved recursively
 *   - handles, functions, primitives -> unchanged
 */

import {
  isRemoteDirectiveShape,
  parseRemoteDirective,
  parseStringBinding,
} from "../descriptor/bindings.js";
import { classifyValue, isPlainObject } from "../descriptor/classify.js";
import type { Attributes, NodeDescriptor, RemoteDirective, TemplatePart } from "../descriptor/types.js";
import { TrellisError, previewValue } from "../errors.js";
import type { NodeHandle } from "./handle.js";
import { isPending, isRemoteFetchError } from "./remote.js";

export type ResolveContext<R> = Readonly<{
  /** Tracked state read. */
  read: (path: string) => unknown;
  /** Value for a remote directive whose params are already resolved. */
  remote: (directive: RemoteDirective, params: Readonly<Record<string, unknown>>) => unknown;
  buildNested: (descriptor: NodeDescriptor, path: string) => NodeHandle<R>;
  isHandle: (v: unknown) => v is NodeHandle<R>;
  maxDepth: number;
}>;

function malformed(detail: string): never {
  throw new TrellisError("TRUI_MALFORMED_DESCRIPTOR", detail);
}

function templateText(v: unknown): string {
  if (v === undefined || v === null || isPending(v) || isRemoteFetchError(v)) return "";
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean" || typeof v === "bigint") return String(v);
  try {
    return JSON.stringify(v) ?? "";
  } catch {
    return "";
  }
}

export function interpolate(parts: readonly TemplatePart[], read: (path: string) => unknown): string {
  let out = "";
  for (const part of parts) {
    out += part.kind === "text" ? part.value : templateText(read(part.path));
  }
  return out;
}

function resolveString(value: string, read: (path: string) => unknown): unknown {
  const binding = parseStringBinding(value);
  switch (binding.kind) {
    case "literal":
      return binding.value;
    case "state":
      return read(binding.path);
    case "template":
      return interpolate(binding.parts, read);
  }
}

function resolveInner<R>(
  value: unknown,
  ctx: ResolveContext<R>,
  path: string,
  depth: number,
  ancestors: Set<object>,
): unknown {
  if (typeof value === "string") return resolveString(value, ctx.read);
  if (ctx.isHandle(value)) return value;

  const classified = classifyValue(value);
  switch (classified.tag) {
    case "primitive":
    case "opaque":
      return classified.value;
    case "descriptor":
      return ctx.buildNested(classified.value, path);
    default:
      break;
  }

  if (depth > ctx.maxDepth) malformed(`value at ${path} nests deeper than ${ctx.maxDepth}`);
  const container = classified.value;
  if (ancestors.has(container)) malformed(`cyclic value at ${path}`);
  ancestors.add(container);
  try {
    if (classified.tag === "sequence") {
      return classified.value.map((item, i) =>
        resolveInner(item, ctx, `${path}[${i}]`, depth + 1, ancestors),
      );
    }
    if (isRemoteDirectiveShape(container)) {
      const directive = parseRemoteDirective(container.$remote);
      const params = resolveRecord(directive.params ?? {}, ctx, `${path}.$remote.params`, depth + 1, ancestors);
      return ctx.remote(directive, params);
    }
    if (!isPlainObject(container)) return container;
    return resolveRecord(container, ctx, path, depth + 1, ancestors);
  } finally {
    ancestors.delete(container);
  }
}

function resolveRecord<R>(
  record: Readonly<Record<string, unknown>>,
  ctx: ResolveContext<R>,
  path: string,
  depth: number,
  ancestors: Set<object>,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(record)) {
    out[key] = resolveInner(item, ctx, `${path}.${key}`, depth, ancestors);
  }
  return out;
}

/** Resolve any attribute value. `path` is the value's position for nested handles. */
export function resolveValue<R>(value: unknown, ctx: ResolveContext<R>, path: string): unknown {
  return resolveInner(value, ctx, path, 0, new Set());
}

/**
 * Resolve a node's attributes. Each attribute resolves at `<basePath>.<name>`.
 * Throws TRUI_MALFORMED_DESCRIPTOR for bad bindings or cyclic values.
 */
export function resolveAttributes<R>(
  attributes: Attributes,
  ctx: ResolveContext<R>,
  basePath: string,
): Record<string, unknown> {
  if (!isPlainObject(attributes)) malformed(`attributes at ${basePath} are ${previewValue(attributes)}`);
  return resolveRecord(attributes, ctx, basePath, 0, new Set());
}
