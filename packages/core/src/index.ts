/**
 * @trellis-ui/core
 *
 * Runtime-agnostic core for Trellis: builds live node trees from serializable
 * descriptors and rebuilds only the nodes whose state dependencies changed.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors and logging
// =============================================================================

export {
  TrellisError,
  type TrellisErrorCode,
  type BuildFaultCode,
  type BuildFatal,
  isBuildFaultCode,
  describeThrown,
  previewValue,
} from "./errors.js";

export {
  type LogLevel,
  type LogArea,
  type RendererLogger,
  type AreaLogger,
  LOG_LEVEL_VALUES,
  SILENT_LOGGER,
  createConsoleLogger,
  formatLogLine,
  isLogLevel,
  scopeLogger,
} from "./logger.js";

// =============================================================================
// Descriptors
// =============================================================================

export type {
  Attributes,
  DescriptorKey,
  NodeDescriptor,
  Primitive,
  RemoteDirective,
  RemoteRequest,
  StringBinding,
  TemplatePart,
} from "./descriptor/types.js";

export {
  type ClassifiedValue,
  type ValueTag,
  classifyValue,
  isEmptyValue,
  isNodeDescriptor,
  isPlainObject,
  isPrimitive,
} from "./descriptor/classify.js";

export {
  REMOTE_DIRECTIVE_KEY,
  isRemoteDirectiveShape,
  parseRemoteDirective,
  parseStringBinding,
} from "./descriptor/bindings.js";

// =============================================================================
// State
// =============================================================================

export {
  type StatePath,
  isPathPrefix,
  normalizeStatePath,
  parseStatePath,
  pathsIntersect,
  tryNormalizeStatePath,
} from "./state/paths.js";

export {
  type StateChangeListener,
  type StateRecord,
  type StateStore,
  createStateStore,
  readPath,
} from "./state/store.js";

export { type PathIndex, createPathIndex } from "./state/pathIndex.js";

// =============================================================================
// Runtime
// =============================================================================

export {
  type BuiltChild,
  type BuiltEntry,
  type BuiltFault,
  type BuiltNode,
  type EmptyContainer,
  type NodeHandle,
  hasAncestorIn,
  isNodeHandle,
  walkHandles,
} from "./runtime/handle.js";

export {
  type ComponentRegistry,
  type MutableComponentRegistry,
  type RenderInput,
  type Renderable,
  createComponentRegistry,
} from "./runtime/registry.js";

export {
  type PendingMarker,
  type RemoteCoordinator,
  type RemoteDataSource,
  type RemoteFetchError,
  type RemoteOwner,
  PENDING,
  createRemoteCoordinator,
  createRemoteFetchError,
  isPending,
  isRemoteFetchError,
  remoteRequestKey,
} from "./runtime/remote.js";

export { type ResolveContext, interpolate, resolveAttributes, resolveValue } from "./runtime/resolver.js";

export {
  type ChildSlot,
  type SlotId,
  attributesPath,
  childPath,
  planChildSlots,
  slotIdForChild,
} from "./runtime/slots.js";

export {
  type BuildJournal,
  type BuildResult,
  type TreeBuilder,
  type TreeBuilderOptions,
  createBuildJournal,
  createTreeBuilder,
} from "./runtime/builder.js";

export {
  type RendererCommit,
  type ScheduleFlush,
  type UpdateScheduler,
  type UpdateSchedulerOptions,
  createUpdateScheduler,
} from "./runtime/scheduler.js";

// =============================================================================
// Renderer session
// =============================================================================

export type {
  BatchingMode,
  CommitListener,
  CreateRendererOptions,
  Renderer,
  RendererConfig,
  RendererStats,
  ResolvedRendererConfig,
} from "./app/types.js";

export { DEFAULT_RENDERER_CONFIG, resolveRendererConfig } from "./app/config.js";
export { createRenderer } from "./app/createRenderer.js";
