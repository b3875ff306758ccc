/**
 * packages/core/src/runtime/remote.ts — Remote fetch coordination.
 *
 * Why: Remote bindings must never block or throw into a build. The resolver
 * asks the coordinator for a target's value; the coordinator either returns
 * what is already in state or starts (or joins) a fetch and hands back the
 * PENDING marker. Completions are written to state, which schedules the scoped
 * rebuild like any other write.
 *
 * Completion rules:
 *   - Success writes the fetched value at the target path; when that write
 *     leaves the store unchanged (same value, or undefined on an absent
 *     path) `onSettled` is called so the waiting owners still rebuild
 *   - Failure (rejection or synchronous throw) writes a RemoteFetchError value
 *   - A completion is dropped when the coordinator was disposed, when a newer
 *     request for the same target superseded it, or when every node waiting
 *     on it has been unmounted
 */

import type { RemoteRequest } from "../descriptor/types.js";
import { describeThrown } from "../errors.js";
import type { AreaLogger } from "../logger.js";
import type { StateStore } from "../state/store.js";

const PENDING_BRAND: unique symbol = Symbol.for("trellis.pending");
const REMOTE_ERROR_BRAND: unique symbol = Symbol.for("trellis.remoteFetchError");

export type PendingMarker = Readonly<{ [PENDING_BRAND]: true; status: "pending" }>;

/** Placeholder a remote binding resolves to while its fetch is in flight. */
export const PENDING: PendingMarker = Object.freeze<PendingMarker>({ [PENDING_BRAND]: true, status: "pending" });

export type RemoteFetchError = Readonly<{
  [REMOTE_ERROR_BRAND]: true;
  code: "TRUI_REMOTE_FETCH_ERROR";
  source: string;
  target: string;
  message: string;
}>;

export function isPending(v: unknown): v is PendingMarker {
  return v === PENDING;
}

export function isRemoteFetchError(v: unknown): v is RemoteFetchError {
  return typeof v === "object" && v !== null && REMOTE_ERROR_BRAND in v;
}

export function createRemoteFetchError(
  source: string,
  target: string,
  message: string,
): RemoteFetchError {
  return Object.freeze<RemoteFetchError>({
    [REMOTE_ERROR_BRAND]: true,
    code: "TRUI_REMOTE_FETCH_ERROR",
    source,
    target,
    message,
  });
}

export type RemoteDataSource = Readonly<{
  fetch: (request: RemoteRequest) => Promise<unknown>;
}>;

/** Anything that waits on a fetch; node handles satisfy this. */
export type RemoteOwner = Readonly<{ path: string; mounted: boolean }>;

export type RemoteResolveArgs = Readonly<{
  source: string;
  target: string;
  params: Readonly<Record<string, unknown>>;
  /** Value currently stored at `target`. */
  current: unknown;
  owner: RemoteOwner;
}>;

export type RemoteCoordinator = Readonly<{
  resolve: (args: RemoteResolveArgs) => unknown;
  /** Resolves once every fetch started so far has completed. */
  whenIdle: () => Promise<void>;
  readonly inflight: number;
  dispose: () => void;
}>;

type InflightRequest = {
  readonly key: string;
  readonly owners: Set<RemoteOwner>;
};

function stableStringify(v: unknown): string {
  if (Array.isArray(v)) return `[${v.map(stableStringify).join(",")}]`;
  if (typeof v === "object" && v !== null) {
    const entries = Object.entries(v)
      .filter(([, value]) => value !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, value]) => `${JSON.stringify(k)}:${stableStringify(value)}`).join(",")}}`;
  }
  if (typeof v === "bigint") return `${v.toString()}n`;
  return JSON.stringify(v) ?? "null";
}

export function remoteRequestKey(request: RemoteRequest): string {
  return `${request.source}?${stableStringify(request.params)}`;
}

export function createRemoteCoordinator(
  opts: Readonly<{
    store: StateStore;
    dataSource: RemoteDataSource | null;
    logger: AreaLogger;
    /** Called with the target when a completion did not change the store. */
    onSettled?: (target: string) => void;
  }>,
): RemoteCoordinator {
  const { store, dataSource, logger, onSettled } = opts;
  const inflightByTarget = new Map<string, InflightRequest>();
  const settledKeyByTarget = new Map<string, string>();
  const running = new Set<Promise<void>>();
  let disposed = false;

  function complete(target: string, req: InflightRequest, value: unknown): void {
    if (disposed || store.disposed) {
      logger.debug(`dropped completion for ${target}: session disposed`);
      return;
    }
    if (inflightByTarget.get(target) !== req) {
      logger.debug(`dropped completion for ${target}: superseded`);
      return;
    }
    inflightByTarget.delete(target);
    let anyMounted = false;
    for (const owner of req.owners) {
      if (owner.mounted) {
        anyMounted = true;
        break;
      }
    }
    if (!anyMounted) {
      logger.debug(`dropped completion for ${target}: no mounted owner`);
      return;
    }
    settledKeyByTarget.set(target, req.key);
    if (!store.set(target, value)) onSettled?.(target);
  }

  function start(request: RemoteRequest, target: string, key: string, owner: RemoteOwner): void {
    const req: InflightRequest = { key, owners: new Set([owner]) };
    inflightByTarget.set(target, req);
    logger.debug(`fetch ${key} -> ${target}`);

    const run = Promise.resolve()
      .then(() => {
        if (dataSource === null) throw new Error("no remote data source configured");
        return dataSource.fetch(request);
      })
      .then(
        (value) => complete(target, req, value),
        (e: unknown) => {
          logger.warn(`fetch ${key} failed: ${describeThrown(e)}`);
          complete(target, req, createRemoteFetchError(request.source, target, describeThrown(e)));
        },
      )
      .catch((e: unknown) => {
        logger.error(`writing ${target} failed: ${describeThrown(e)}`);
      })
      .finally(() => {
        running.delete(run);
      });
    running.add(run);
  }

  return Object.freeze({
    resolve: (args: RemoteResolveArgs) => {
      const request: RemoteRequest = { source: args.source, params: args.params };
      const key = remoteRequestKey(request);
      const inflight = inflightByTarget.get(args.target);
      const settledKey = settledKeyByTarget.get(args.target);

      if (inflight === undefined) {
        if (settledKey === key) return args.current;
        // seeded from outside
        if (settledKey === undefined && args.current !== undefined) return args.current;
      }
      if (disposed) return PENDING;
      if (inflight !== undefined && inflight.key === key) {
        inflight.owners.add(args.owner);
        return PENDING;
      }
      start(request, args.target, key, args.owner);
      return PENDING;
    },
    whenIdle: async () => {
      while (running.size > 0) {
        await Promise.allSettled([...running]);
      }
    },
    get inflight() {
      return inflightByTarget.size;
    },
    dispose: () => {
      disposed = true;
      inflightByTarget.clear();
    },
  });
}
