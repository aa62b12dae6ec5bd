/**
 * Live Results Controller
 *
 * Sectioned, cached change tracking for live query results. A controller
 * turns each re-fetch of a query into the ordered section and row events a
 * list view needs to animate from the old state to the new one.
 */

// ============================================================================
// Controller
// ============================================================================

export { ResultsController } from './controller/results-controller.js';

export type {
  ControllerState,
  ResultsControllerOptions,
  SectionInfo,
  ResultsListener,
  ListenerHandle,
} from './controller/controller.types.js';

// ============================================================================
// Rows & Queries
// ============================================================================

export type { StableKey, SectionKey, SortValue, RowIdentity, IndexPath } from './row/row.types.js';

export {
  createRowIdentity,
  createRestoredRow,
  cloneRowIdentity,
  compareSortValues,
  rowNeedsUpdate,
} from './row/row-identity.js';

export {
  FetchRequestSchema,
  SortDescriptorSchema,
  ConditionSchema,
} from './query/fetch-request.schemas.js';

export type {
  FetchRequest,
  FetchRequestInput,
  SortDescriptor,
  Condition,
  ConditionOperator,
} from './query/fetch-request.schemas.js';

export type { ChangeBatch, QueryEngine, QuerySubscription } from './query/query.types.js';

export { matchesRequest, sortByDescriptors } from './query/predicate.js';

export { MemoryObjectStore } from './query/memory-object-store.js';
export type { StoredObject } from './query/memory-object-store.js';

// ============================================================================
// Diff
// ============================================================================

export type {
  ChangeEvent,
  ChangeEventType,
  SectionChangeEvent,
  SectionInsertEvent,
  SectionDeleteEvent,
  RowChangeEvent,
  RowInsertEvent,
  RowDeleteEvent,
  RowMoveEvent,
  RowUpdateEvent,
  DiffOptions,
  DiffResult,
} from './diff/diff.types.js';

export { isSectionEvent } from './diff/diff.types.js';
export { buildLayout, computeChanges, diffLayouts } from './diff/diff-engine.js';
export { applyChangeEvents } from './diff/apply-events.js';

// ============================================================================
// Layout Cache
// ============================================================================

export type { Layout, Section } from './layout/layout.types.js';
export { emptyLayout } from './layout/layout.types.js';
export type { PersistedLayout, PersistedSection } from './layout/layout.schemas.js';
export { LayoutCursor } from './layout/layout-cursor.js';
export { LayoutCache, deleteCache } from './layout/layout-cache.js';
export type { LayoutCacheOptions, DeleteCacheOptions } from './layout/layout-cache.js';
export type { LayoutStorage } from './layout/layout-storage.js';
export { MemoryLayoutStorage } from './layout/layout-storage.js';
export { FileLayoutStorage } from './layout/file-layout-storage.js';
export { LayoutCacheRegistry, defaultCacheRegistry } from './layout/cache-registry.js';

// ============================================================================
// Configuration, Errors & Diagnostics
// ============================================================================

export {
  getCacheConfig,
  createDefaultStorage,
  getDefaultStorage,
  isDebugEventsEnabled,
} from './config/cache-config.js';
export type { CacheConfig } from './config/cache-config.js';

export { ResultsControllerError } from './shared/errors/results-controller.error.js';
export type { ResultsControllerErrorCode } from './shared/errors/results-controller.error.js';

export { ChangeEventLogger, formatChangeEvent } from './diagnostics/change-event-logger.js';
export type { ChangeEventEntry, ChangeEventLoggerOptions } from './diagnostics/change-event-logger.js';
