/**
 * Results Controller Types
 */

import type { ChangeEventLogger } from '../diagnostics/change-event-logger.js';
import type { RowChangeEvent, SectionChangeEvent } from '../diff/diff.types.js';
import type { LayoutCacheRegistry } from '../layout/cache-registry.js';
import type { LayoutStorage, MemoryLayoutStorage } from '../layout/layout-storage.js';
import type { FetchRequestInput } from '../query/fetch-request.schemas.js';
import type { QueryEngine } from '../query/query.types.js';
import type { SectionKey } from '../row/row.types.js';
import type { ResultsController } from './results-controller.js';

/**
 * Controller lifecycle.
 * `observing` is entered after the first notification-driven cycle.
 */
export type ControllerState =
  | 'uninitialized'
  | 'fetched'
  | 'observing'
  | 'diffing'
  | 'reset'
  | 'closed';

/**
 * Controller construction options
 */
export interface ResultsControllerOptions<T> {
  /** Query configuration, validated at construction */
  fetchRequest: FetchRequestInput;

  /** Live query engine */
  queryEngine: QueryEngine<T>;

  /** Key path used to group rows into sections; must be the first sort key path */
  sectionNameKeyPath?: string;

  /** Durable cache name. Undefined = in-memory cache, not persisted */
  cacheName?: string;

  /** Storage for a named cache (default: storage from the environment) */
  storage?: LayoutStorage;

  /** Storage for an unnamed cache, e.g. to inspect it from tests */
  inMemoryCache?: MemoryLayoutStorage;

  /** Attachment registry (default: process-wide registry) */
  registry?: LayoutCacheRegistry;

  /** Report rows of removed sections as row deletes (default: false) */
  rowEventsForRemovedSections?: boolean;

  /** Receives every delivered event (default: echoing logger if RESULTS_DEBUG_EVENTS=true) */
  eventLogger?: ChangeEventLogger;
}

/**
 * Section information passed to listeners and returned by accessors.
 */
export interface SectionInfo<T> {
  /** Section key, `null` for the untitled section */
  name: SectionKey | null;
  numberOfObjects: number;
  /** Live objects of the section, resolved on demand */
  objects(): T[];
}

/**
 * Presentation-layer listener. Every callback is optional.
 */
export interface ResultsListener<T> {
  willChange?(controller: ResultsController<T>): void;
  didChangeSection?(
    controller: ResultsController<T>,
    event: SectionChangeEvent,
    section: SectionInfo<T>
  ): void;
  didChangeObject?(controller: ResultsController<T>, event: RowChangeEvent): void;
  didChange?(controller: ResultsController<T>): void;
}

/**
 * Non-owning listener registration.
 */
export interface ListenerHandle {
  unregister(): void;
}
