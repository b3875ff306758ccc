/**
 * packages/core/src/descriptor/bindings.ts — Binding token parsing.
 *
 * Why: Attribute values reference state in two ways and both are parsed once,
 * up front, into tagged values the resolver can act on:
 *
 *   - `"$state.user.name"` (whole string): the raw value at that state path
 *   - `"Hi {{ $state.user.name }}!"`: string interpolation
 *   - `"$$state.x"`: escaped literal `"$state.x"`
 *
 * Remote bindings are structured: `{ "$remote": { source, target, params? } }`.
 */

import { TrellisError, previewValue } from "../errors.js";
import { tryNormalizeStatePath } from "../state/paths.js";
import { isPlainObject } from "./classify.js";
import type { RemoteDirective, StringBinding, TemplatePart } from "./types.js";

const STATE_PREFIX = "$state.";
const ESCAPED_PREFIX = "$$";
const TEMPLATE_RE = /\{\{\s*\$state\.([^}\s]+)\s*\}\}/g;

export const REMOTE_DIRECTIVE_KEY = "$remote";

function malformed(detail: string): never {
  throw new TrellisError("TRUI_MALFORMED_DESCRIPTOR", detail);
}

function requireStatePath(raw: string, token: string): string {
  const path = tryNormalizeStatePath(raw);
  if (path === null) malformed(`binding ${token} has an invalid state path`);
  return path;
}

/**
 * Parse a string attribute value.
 * Throws TRUI_MALFORMED_DESCRIPTOR when a binding names an invalid path.
 */
export function parseStringBinding(value: string): StringBinding {
  if (value.startsWith(ESCAPED_PREFIX)) return { kind: "literal", value: value.slice(1) };
  if (value.startsWith(STATE_PREFIX) && !value.includes("{{")) {
    return { kind: "state", path: requireStatePath(value.slice(STATE_PREFIX.length), value) };
  }
  if (!value.includes("{{")) return { kind: "literal", value };

  const parts: TemplatePart[] = [];
  let last = 0;
  for (const match of value.matchAll(TEMPLATE_RE)) {
    const index = match.index ?? 0;
    const raw = match[1] ?? "";
    if (index > last) parts.push({ kind: "text", value: value.slice(last, index) });
    parts.push({ kind: "state", path: requireStatePath(raw, match[0]) });
    last = index + match[0].length;
  }
  if (parts.length === 0) return { kind: "literal", value };
  if (last < value.length) parts.push({ kind: "text", value: value.slice(last) });
  return { kind: "template", parts };
}

/** True for `{ "$remote": ... }` and nothing else on the object. */
export function isRemoteDirectiveShape(v: unknown): v is Readonly<{ $remote: unknown }> {
  if (!isPlainObject(v)) return false;
  const keys = Object.keys(v);
  return keys.length === 1 && keys[0] === REMOTE_DIRECTIVE_KEY;
}

/** Validate the body of a `$remote` directive. */
export function parseRemoteDirective(body: unknown): RemoteDirective {
  if (!isPlainObject(body)) malformed(`$remote expects an object, got ${previewValue(body)}`);
  const source = body.source;
  if (typeof source !== "string" || source.length === 0) {
    malformed("$remote.source must be a non-empty string");
  }
  const rawTarget = body.target;
  if (typeof rawTarget !== "string") malformed("$remote.target must be a state path string");
  const target = tryNormalizeStatePath(rawTarget);
  if (target === null) malformed(`$remote.target "${rawTarget}" is not a valid state path`);
  const params = body.params;
  if (params !== undefined && !isPlainObject(params)) {
    malformed("$remote.params must be an object when present");
  }
  return params === undefined ? { source, target } : { source, target, params };
}
