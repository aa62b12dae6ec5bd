/**
 * Layout Cache
 *
 * Keeps the last materialized layout of one controller configuration and
 * persists it through a LayoutStorage. Without a cache name the layout is kept
 * under a fixed record of an in-memory storage for the process lifetime.
 *
 * @module layout/layout-cache
 */

import { ResultsControllerError } from '../shared/errors/results-controller.error.js';
import { defaultCacheRegistry, type LayoutCacheRegistry } from './cache-registry.js';
import { LayoutCursor } from './layout-cursor.js';
import { MemoryLayoutStorage, type LayoutStorage } from './layout-storage.js';
import { emptyLayout, type Layout } from './layout.types.js';
import { cloneLayout, fromPersistedLayout, sameStructure, toPersistedLayout } from './utils.js';

/** Record name used inside the private storage of an in-memory cache */
const IN_MEMORY_RECORD = 'in-memory';

/**
 * Layout cache configuration options
 */
export interface LayoutCacheOptions {
  /** Configuration signature the cached layout must match */
  signature: string;
  /** Durable cache name. Undefined = in-memory, never persisted */
  cacheName?: string;
  /** Record storage. Defaults to a private in-memory storage */
  storage?: LayoutStorage;
}

/**
 * Options for deleting caches by name
 */
export interface DeleteCacheOptions {
  storage: LayoutStorage;
  registry?: LayoutCacheRegistry;
}

export class LayoutCache {
  readonly cacheName: string | undefined;
  readonly signature: string;
  readonly storage: LayoutStorage;

  /** Last loaded or stored layout, with recorded values when known */
  private current: Layout | null = null;

  constructor(options: LayoutCacheOptions) {
    this.cacheName = options.cacheName;
    this.signature = options.signature;
    this.storage = options.storage ?? new MemoryLayoutStorage();
  }

  /**
   * Whether the layout outlives this cache instance.
   */
  get isPersistent(): boolean {
    return this.cacheName !== undefined;
  }

  private get recordName(): string {
    return this.cacheName ?? IN_MEMORY_RECORD;
  }

  /**
   * Last stored layout for this name and configuration, or an empty layout.
   * A record written for a different configuration is ignored.
   *
   * @throws ResultsControllerError (CACHE_IO_ERROR) when storage cannot be read
   */
  load(): Layout {
    if (this.current === null) {
      const record = this.storage.read(this.recordName);
      this.current =
        record && record.signature === this.signature ? fromPersistedLayout(record) : emptyLayout();
    }
    return cloneLayout(this.current);
  }

  /**
   * Replace the whole layout. The storage write happens first; on failure
   * the cache keeps its previous layout.
   *
   * @throws ResultsControllerError (CACHE_IO_ERROR) when storage cannot be written
   */
  store(layout: Layout): void {
    const snapshot = cloneLayout(layout);
    this.storage.write(this.recordName, toPersistedLayout(snapshot, this.signature));
    this.current = snapshot;
  }

  /**
   * Mutable working copy of the cached layout for one diff cycle.
   */
  cursor(): LayoutCursor {
    return LayoutCursor.fromLayout(this.load());
  }

  /**
   * Keep the state a cursor reached. The storage is only written when the
   * structure changed; values alone are not persisted.
   *
   * @returns true if the record was written
   */
  commit(cursor: LayoutCursor): boolean {
    const layout = cursor.toLayout();
    if (this.current !== null && sameStructure(this.current, layout)) {
      this.current = layout;
      return false;
    }
    this.store(layout);
    return true;
  }

  /**
   * Discard the cached layout for this configuration.
   */
  clear(): void {
    this.storage.remove(this.recordName);
    this.current = emptyLayout();
  }
}

/**
 * Delete the durable layout for a cache name, or for every name.
 * Deleting a name with no record is a no-op.
 *
 * @throws ResultsControllerError (PRECONDITION_VIOLATION) if a controller is still attached
 */
export function deleteCache(cacheName: string | undefined, options: DeleteCacheOptions): void {
  const registry = options.registry ?? defaultCacheRegistry;

  if (cacheName === undefined) {
    const attached = registry.attachedNames(options.storage);
    if (attached.length > 0) {
      throw ResultsControllerError.cacheInUse(attached);
    }
    options.storage.removeAll();
    return;
  }

  if (registry.isAttached(options.storage, cacheName)) {
    throw ResultsControllerError.cacheInUse([cacheName]);
  }
  options.storage.remove(cacheName);
}
