/**
 * Query Engine Types
 *
 * The capability a controller needs from a live object store.
 */

import type { FetchRequest } from './fetch-request.schemas.js';
import type { RowIdentity, StableKey } from '../row/row.types.js';

/**
 * Raw object-level notifications delivered together.
 * One batch is diffed once, however many objects it names.
 */
export interface ChangeBatch<T> {
  added: T[];
  removed: T[];
  modified: T[];
}

/**
 * Handle returned by `QueryEngine.subscribe`.
 */
export interface QuerySubscription {
  unsubscribe(): void;
}

/**
 * Live query engine consumed by ResultsController.
 */
export interface QueryEngine<T> {
  /**
   * Run the request and return matching objects in sort order.
   * Throws on malformed requests or engine failure.
   */
  execute(request: FetchRequest): T[];

  /**
   * Register for change batches affecting the request's entity.
   */
  subscribe(request: FetchRequest, onChange: (batch: ChangeBatch<T>) => void): QuerySubscription;

  /**
   * Produce a copyable row snapshot of a live object.
   */
  snapshot(object: T, request: FetchRequest, sectionNameKeyPath?: string): RowIdentity;

  /**
   * Look up the live object with the given primary key.
   */
  resolve(request: FetchRequest, id: StableKey): T | undefined;
}
