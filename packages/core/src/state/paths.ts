/**
 * packages/core/src/state/paths.ts — State path parsing and path relations.
 *
 * Paths are dot-separated segments (`user.name`, `items.0.title`). Bracket
 * indices are accepted on input and normalised (`items[0]` -> `items.0`).
 */

import { TrellisError } from "../errors.js";

export type StatePath = string;

const BRACKET_INDEX_RE = /\[(\d+)\]/g;
const SEGMENT_RE = /^[^.[\]\s]+$/;

function invalidPath(path: string, why: string): never {
  throw new TrellisError("TRUI_INVALID_STATE_PATH", `invalid state path "${path}": ${why}`);
}

export function parseStatePath(path: string): readonly string[] {
  if (path.length === 0) invalidPath(path, "empty path");
  const segments = path.replace(BRACKET_INDEX_RE, ".$1").split(".");
  for (const segment of segments) {
    if (segment.length === 0) invalidPath(path, "empty segment");
    if (!SEGMENT_RE.test(segment)) invalidPath(path, `bad segment "${segment}"`);
  }
  return segments;
}

export function normalizeStatePath(path: string): StatePath {
  return parseStatePath(path).join(".");
}

/** Non-throwing variant for callers that treat a bad path as data. */
export function tryNormalizeStatePath(path: string): StatePath | null {
  try {
    return normalizeStatePath(path);
  } catch (e: unknown) {
    if (e instanceof TrellisError) return null;
    throw e;
  }
}

/** True when `prefix` equals `path` or is one of its ancestors (segment-wise). */
export function isPathPrefix(prefix: StatePath, path: StatePath): boolean {
  if (prefix === path) return true;
  return path.length > prefix.length && path.startsWith(prefix) && path[prefix.length] === ".";
}

/**
 * Two normalised paths intersect when a write to one can change what a read of
 * the other observes: equal, or either is an ancestor of the other.
 */
export function pathsIntersect(a: StatePath, b: StatePath): boolean {
  return isPathPrefix(a, b) || isPathPrefix(b, a);
}
