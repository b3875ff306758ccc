/**
 * packages/core/src/state/pathIndex.ts — Dependency index keyed by state path.
 *
 * Why: Maps each recorded state path to the subscribers that read it, arranged
 * as a segment trie so one changed path finds every intersecting record in
 * time proportional to the path depth plus the matches:
 *
 *   - subscribers of an ancestor path (they read a containing object)
 *   - subscribers of the exact path
 *   - subscribers of any descendant path (their value may have been replaced)
 */

import { parseStatePath } from "./paths.js";

type TrieNode<T> = {
  readonly children: Map<string, TrieNode<T>>;
  readonly subscribers: Set<T>;
};

export type PathIndex<T> = Readonly<{
  /** Replace the recorded paths for a subscriber. */
  track: (subscriber: T, paths: Iterable<string>) => void;
  /** Remove every record of a subscriber. */
  untrack: (subscriber: T) => void;
  /** Subscribers whose records intersect `changedPath`. */
  query: (changedPath: string) => Set<T>;
  /** Recorded paths for a subscriber (empty when untracked). */
  pathsOf: (subscriber: T) => ReadonlySet<string>;
  readonly size: number;
}>;

const EMPTY_PATHS: ReadonlySet<string> = new Set<string>();

function createTrieNode<T>(): TrieNode<T> {
  return { children: new Map(), subscribers: new Set() };
}

function collectSubtree<T>(node: TrieNode<T>, out: Set<T>): void {
  for (const s of node.subscribers) out.add(s);
  for (const child of node.children.values()) collectSubtree(child, out);
}

export function createPathIndex<T>(): PathIndex<T> {
  const root = createTrieNode<T>();
  const bySubscriber = new Map<T, ReadonlySet<string>>();

  function nodeFor(path: string, create: boolean): TrieNode<T> | null {
    let node = root;
    for (const segment of parseStatePath(path)) {
      let next = node.children.get(segment);
      if (next === undefined) {
        if (!create) return null;
        next = createTrieNode<T>();
        node.children.set(segment, next);
      }
      node = next;
    }
    return node;
  }

  function prune(path: string): void {
    const segments = parseStatePath(path);
    const stack: TrieNode<T>[] = [root];
    for (const segment of segments) {
      const top = stack[stack.length - 1];
      const next = top?.children.get(segment);
      if (next === undefined) return;
      stack.push(next);
    }
    for (let i = segments.length; i > 0; i--) {
      const node = stack[i];
      const parent = stack[i - 1];
      const segment = segments[i - 1];
      if (!node || !parent || segment === undefined) return;
      if (node.subscribers.size > 0 || node.children.size > 0) return;
      parent.children.delete(segment);
    }
  }

  function untrack(subscriber: T): void {
    const prev = bySubscriber.get(subscriber);
    if (prev === undefined) return;
    bySubscriber.delete(subscriber);
    for (const path of prev) {
      const node = nodeFor(path, false);
      if (node === null) continue;
      node.subscribers.delete(subscriber);
      prune(path);
    }
  }

  return Object.freeze({
    track: (subscriber: T, paths: Iterable<string>) => {
      untrack(subscriber);
      const recorded = new Set(paths);
      if (recorded.size === 0) return;
      for (const path of recorded) nodeFor(path, true)?.subscribers.add(subscriber);
      bySubscriber.set(subscriber, recorded);
    },
    untrack,
    query: (changedPath: string) => {
      const out = new Set<T>();
      let node: TrieNode<T> | undefined = root;
      for (const segment of parseStatePath(changedPath)) {
        for (const s of node.subscribers) out.add(s);
        node = node.children.get(segment);
        if (node === undefined) return out;
      }
      collectSubtree(node, out);
      return out;
    },
    pathsOf: (subscriber: T) => bySubscriber.get(subscriber) ?? EMPTY_PATHS,
    get size() {
      return bySubscriber.size;
    },
  });
}
