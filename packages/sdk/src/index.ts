/**
 * TaskBridge SDK
 *
 * Change-gated access to a CouchDB task store, short friendly IDs, and a
 * compact hierarchy rendering sized for language-model context windows.
 */

export type {
  StoreDocument,
  NewDocument,
  Selector,
  ChangeProbe,
  RemoteStore,
  ParentRef,
  ContainerKind,
  Priority,
  PriorityInput,
  Namespace,
  ContainerRecord,
  WorkUnitRecord,
  TaskSummary,
  DayTaskSummary,
  HierarchyNode,
  Hierarchy,
  CreateWorkUnitInput,
  CreateContainerInput,
  UpdateWorkUnitInput,
  WorkUnitEcho,
  WorkUnitResult,
  ContainerEcho,
  ContainerResult,
  DayListing,
} from "./types.js";

export {
  TaskBridgeError,
  ConfigurationError,
  InvalidTokenError,
  InvalidInputError,
  StoreError,
  describeError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

export { loadConfig, DEFAULT_FIND_LIMIT, DEFAULT_REQUEST_TIMEOUT_MS } from "./config.js";
export type { TaskBridgeConfig, StoreConnection, ConfigOverrides } from "./config.js";

export { Logger, logger, silentLogger, errorFields, isLogLevel, LOG_LEVELS } from "./observability/logs.js";
export type { LogLevel, LogEvent, LogSink } from "./observability/logs.js";

export { CouchStoreClient } from "./couch.js";
export type { CouchClientOptions, FetchLike } from "./couch.js";

export { ChangeGatedCache, fetchChangeGated, INITIAL_CURSOR } from "./cache.js";
export type { CacheStats, ChangeGatedCacheOptions, GatedFetch } from "./cache.js";

export { FriendlyIdRegistry, INBOX_TOKEN, NAMESPACE_PREFIX } from "./registry.js";
export type { TokenResolver } from "./registry.js";

export { buildHierarchy, summarizeWorkUnit, summarizeDayWorkUnit, INBOX_TITLE } from "./hierarchy.js";
export { renderCompact } from "./compact.js";
export { formatTimeEstimate, parseTimeEstimate } from "./time-estimate.js";
export { requireTitle, validateDate, parsePriority, normalizePriority } from "./validation.js";
export { matches, getPath } from "./query.js";
export {
  ROOT_PARENT,
  UNASSIGNED_PARENT,
  BOOKKEEPING_FIELD,
  isRecord,
  parseParentId,
  formatParentRef,
  stripBookkeeping,
  toContainerRecord,
  toWorkUnitRecord,
} from "./documents.js";
export { SerialLock } from "./lock.js";

export {
  TaskRepository,
  CONTAINER_SELECTOR,
  WORK_UNIT_SELECTOR,
  childWorkUnitSelector,
  dayWorkUnitSelector,
} from "./repository.js";
export type { WorkUnitDraft, ContainerDraft, WorkUnitChanges, RepositoryOptions } from "./repository.js";

export { TaskAdapter } from "./adapter.js";
export type { TaskAdapterOptions } from "./adapter.js";
