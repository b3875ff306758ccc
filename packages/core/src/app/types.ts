import type { Attributes } from "../descriptor/types.js";
import type { LogLevel, RendererLogger } from "../logger.js";
import type { NodeHandle } from "../runtime/handle.js";
import type { ComponentRegistry } from "../runtime/registry.js";
import type { RemoteDataSource } from "../runtime/remote.js";
import type { RendererCommit, ScheduleFlush } from "../runtime/scheduler.js";
import type { StateRecord, StateStore } from "../state/store.js";

export type BatchingMode = "microtask" | "manual";

export type RendererConfig = Readonly<{
  /** Path of the root node. Must be a single path segment. */
  rootPath?: string;
  maxDepth?: number;
  /** Enables extra diagnostics such as warnings for writes made during a build. */
  devMode?: boolean;
  /** Threshold of the default console logger. */
  logLevel?: LogLevel;
  batching?: BatchingMode;
  /** Host hook that runs a flush later, e.g. on the next animation frame. */
  scheduleFlush?: ScheduleFlush;
  internal_onCommit?: (commit: RendererCommit) => void;
}>;

export type ResolvedRendererConfig = Readonly<{
  rootPath: string;
  maxDepth: number;
  devMode: boolean;
  logLevel: LogLevel;
  batching: BatchingMode;
  scheduleFlush: ScheduleFlush | null;
  internal_onCommit: ((commit: RendererCommit) => void) | undefined;
}>;

export type CreateRendererOptions<R> = Readonly<{
  /** Root node descriptor, usually parsed from JSON. */
  descriptor: unknown;
  registry: ComponentRegistry<R>;
  /** Session store. When omitted the renderer owns one built from `initialState`. */
  store?: StateStore;
  initialState?: StateRecord;
  dataSource?: RemoteDataSource;
  /** Inherited attributes for the root node. */
  attributes?: Attributes;
  config?: RendererConfig;
  logger?: RendererLogger;
}>;

export type RendererStats = Readonly<{
  ticks: number;
  /** First builds of a handle. */
  builds: number;
  rebuilds: number;
  faults: number;
  mountedHandles: number;
  inflightFetches: number;
  lastCommit: RendererCommit | null;
}>;

export type CommitListener = (commit: RendererCommit) => void;

export interface Renderer<R> {
  readonly root: NodeHandle<R>;
  readonly store: StateStore;
  /** Rebuild what pending writes affect now. Returns null when nothing was pending. */
  flush(): RendererCommit | null;
  /** Resolves once no flush is pending and no fetch is in flight. */
  settle(): Promise<void>;
  subscribe(listener: CommitListener): () => void;
  /** Replace the configuration tree, rebuilding from the root. */
  setDescriptor(next: unknown): RendererCommit | null;
  /** Replace the root's inherited attributes, rebuilding from the root. */
  setAttributes(next: Attributes): RendererCommit | null;
  getHandle(path: string): NodeHandle<R> | undefined;
  stats(): RendererStats;
  dispose(): void;
}
