/**
 * packages/core/src/state/store.ts — Session state store.
 *
 * Why: The store is the only source of dynamic data for a renderer session. It
 * is created explicitly, passed explicitly, and torn down explicitly. Writes
 * copy every object along the written path (structural sharing), so values a
 * build already handed to a renderable never change underneath it.
 *
 * Write rules:
 *   - Writing an Object.is-equal value is not a change (no notification)
 *   - Missing or non-object intermediates are replaced by plain objects
 *   - Numeric segments index into arrays when the container is an array;
 *     any other segment under an array is TRUI_INVALID_STATE_PATH
 *   - Listeners receive the normalised path of each change, synchronously
 */

import { TrellisError } from "../errors.js";
import { parseStatePath } from "./paths.js";

export type StateRecord = Readonly<Record<string, unknown>>;

export type StateChangeListener = (path: string) => void;

export type StateStore = Readonly<{
  /** Read the value at a path (undefined when absent). */
  get: (path: string) => unknown;
  /** Write a value at a path. Returns true when the store changed. */
  set: (path: string, value: unknown) => boolean;
  /** Read-modify-write at a path. */
  update: (path: string, fn: (prev: unknown) => unknown) => boolean;
  /** Current root snapshot. */
  snapshot: () => StateRecord;
  subscribe: (listener: StateChangeListener) => () => void;
  dispose: () => void;
  readonly disposed: boolean;
}>;

function readSegment(container: unknown, segment: string): unknown {
  if (typeof container !== "object" || container === null) return undefined;
  if (Array.isArray(container)) {
    const index = Number(segment);
    return Number.isInteger(index) ? container[index] : undefined;
  }
  if (!Object.prototype.hasOwnProperty.call(container, segment)) return undefined;
  const value: unknown = Reflect.get(container, segment);
  return value;
}

export function readPath(root: unknown, segments: readonly string[]): unknown {
  let current = root;
  for (const segment of segments) {
    current = readSegment(current, segment);
    if (current === undefined) return undefined;
  }
  return current;
}

function writeSegment(container: unknown, segment: string, value: unknown): object {
  if (Array.isArray(container)) {
    const index = Number(segment);
    if (Number.isInteger(index) && index >= 0) {
      const next = container.slice();
      next[index] = value;
      return next;
    }
    throw new TrellisError(
      "TRUI_INVALID_STATE_PATH",
      `cannot write "${segment}" into an array (expected a non-negative index)`,
    );
  }
  const base =
    typeof container === "object" && container !== null && !Array.isArray(container)
      ? container
      : {};
  return { ...base, [segment]: value };
}

function writePath(
  container: unknown,
  segments: readonly string[],
  depth: number,
  value: unknown,
): object {
  const segment = segments[depth];
  if (segment === undefined) {
    throw new TrellisError("TRUI_INVALID_STATE_PATH", "writePath: depth out of range");
  }
  if (depth === segments.length - 1) return writeSegment(container, segment, value);
  const child = readSegment(container, segment);
  return writeSegment(container, segment, writePath(child, segments, depth + 1, value));
}

function toStateRecord(root: object): StateRecord {
  return Object.freeze({ ...root });
}

/** Create a store for one session. */
export function createStateStore(initial: StateRecord = {}): StateStore {
  let root: StateRecord = toStateRecord(initial);
  let disposed = false;
  const listeners = new Set<StateChangeListener>();

  function assertLive(method: string): void {
    if (disposed) throw new TrellisError("TRUI_DISPOSED", `state store: ${method}() after dispose`);
  }

  function set(path: string, value: unknown): boolean {
    assertLive("set");
    const segments = parseStatePath(path);
    if (Object.is(readPath(root, segments), value)) return false;
    root = toStateRecord(writePath(root, segments, 0, value));
    const normalized = segments.join(".");
    for (const listener of [...listeners]) listener(normalized);
    return true;
  }

  return Object.freeze({
    get: (path: string) => readPath(root, parseStatePath(path)),
    set,
    update: (path: string, fn: (prev: unknown) => unknown) => {
      assertLive("update");
      return set(path, fn(readPath(root, parseStatePath(path))));
    },
    snapshot: () => root,
    subscribe: (listener: StateChangeListener) => {
      assertLive("subscribe");
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    dispose: () => {
      disposed = true;
      listeners.clear();
    },
    get disposed() {
      return disposed;
    },
  });
}
