/**
 * Memory Object Store
 *
 * In-process live object store implementing the QueryEngine capability.
 * Objects are kept per entity, keyed by primary key. Every mutation produces
 * a change notification; mutations inside `write()` are delivered together
 * as one batch when the outermost block ends.
 *
 * @module query/memory-object-store
 */

import { createRowIdentity, readKeyPath } from '../row/row-identity.js';
import type { RowIdentity, StableKey } from '../row/row.types.js';
import { ResultsControllerError } from '../shared/errors/results-controller.error.js';
import type { FetchRequest } from './fetch-request.schemas.js';
import { matchesRequest, sortByDescriptors } from './predicate.js';
import type { ChangeBatch, QueryEngine, QuerySubscription } from './query.types.js';

export type StoredObject = Record<string, unknown>;

/** Primary key used by entities that were not defined explicitly */
const DEFAULT_PRIMARY_KEY = 'id';

/**
 * Registered change listener
 */
interface Subscriber {
  entityName: string;
  onChange: (batch: ChangeBatch<StoredObject>) => void;
}

/**
 * Objects of one entity
 */
interface EntityTable {
  primaryKey: string;
  objects: Map<StableKey, StoredObject>;
}

function emptyBatch(): ChangeBatch<StoredObject> {
  return { added: [], removed: [], modified: [] };
}

export class MemoryObjectStore implements QueryEngine<StoredObject> {
  /** Map of entity name → table */
  private readonly tables = new Map<string, EntityTable>();

  private readonly subscribers = new Set<Subscriber>();

  /** Batches collected by the open write block, per entity */
  private pending: Map<string, ChangeBatch<StoredObject>> | null = null;

  // ==========================================================================
  // Schema
  // ==========================================================================

  /**
   * Declare an entity and its primary key path.
   * Redefining an entity with objects in it is refused.
   */
  defineEntity(entityName: string, primaryKey: string = DEFAULT_PRIMARY_KEY): this {
    const existing = this.tables.get(entityName);
    if (existing && existing.objects.size > 0 && existing.primaryKey !== primaryKey) {
      throw new Error(`Entity "${entityName}" already holds objects keyed by "${existing.primaryKey}"`);
    }
    this.tables.set(entityName, { primaryKey, objects: existing?.objects ?? new Map() });
    return this;
  }

  private tableFor(entityName: string): EntityTable {
    let table = this.tables.get(entityName);
    if (!table) {
      table = { primaryKey: DEFAULT_PRIMARY_KEY, objects: new Map() };
      this.tables.set(entityName, table);
    }
    return table;
  }

  private keyOf(table: EntityTable, entityName: string, object: StoredObject): StableKey {
    const key = readKeyPath(object, table.primaryKey);
    if (typeof key === 'string' || (typeof key === 'number' && Number.isFinite(key))) {
      return key;
    }
    throw ResultsControllerError.queryFailed(
      entityName,
      new Error(`Object has no usable primary key at "${table.primaryKey}"`)
    );
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Run a block of mutations and deliver their notifications as one batch
   * per entity. Nested blocks join the outermost one.
   */
  write<R>(block: (store: this) => R): R {
    if (this.pending) {
      return block(this);
    }

    this.pending = new Map();
    try {
      return block(this);
    } finally {
      const batches = this.pending;
      this.pending = null;
      for (const [entityName, batch] of batches) {
        this.deliver(entityName, batch);
      }
    }
  }

  /**
   * Insert an object, or replace the object with the same primary key.
   *
   * @returns The stored copy
   */
  add(entityName: string, object: StoredObject): StoredObject {
    const table = this.tableFor(entityName);
    const stored = { ...object };
    const key = this.keyOf(table, entityName, stored);
    const replaced = table.objects.has(key);

    table.objects.set(key, stored);
    this.notify(entityName, replaced ? 'modified' : 'added', stored);
    return stored;
  }

  /**
   * Merge a patch into an existing object. The primary key cannot change.
   *
   * @returns The updated object
   * @throws ResultsControllerError (QUERY_EXECUTION_FAILED) for an unknown key
   */
  update(entityName: string, id: StableKey, patch: StoredObject): StoredObject {
    const table = this.tableFor(entityName);
    const current = table.objects.get(id);
    if (!current) {
      throw ResultsControllerError.queryFailed(
        entityName,
        new Error(`No object with primary key ${String(id)}`),
        { id }
      );
    }

    const updated = { ...current, ...patch };
    if (this.keyOf(table, entityName, updated) !== id) {
      throw ResultsControllerError.queryFailed(
        entityName,
        new Error('The primary key of a stored object cannot change'),
        { id }
      );
    }

    table.objects.set(id, updated);
    this.notify(entityName, 'modified', updated);
    return updated;
  }

  /**
   * Delete an object.
   *
   * @throws ResultsControllerError (QUERY_EXECUTION_FAILED) for an unknown key
   */
  remove(entityName: string, id: StableKey): void {
    const table = this.tableFor(entityName);
    const current = table.objects.get(id);
    if (!current) {
      throw ResultsControllerError.queryFailed(
        entityName,
        new Error(`No object with primary key ${String(id)}`),
        { id }
      );
    }

    table.objects.delete(id);
    this.notify(entityName, 'removed', current);
  }

  /**
   * Number of objects stored for an entity.
   */
  count(entityName: string): number {
    return this.tables.get(entityName)?.objects.size ?? 0;
  }

  // ==========================================================================
  // QueryEngine
  // ==========================================================================

  execute(request: FetchRequest): StoredObject[] {
    const table = this.tables.get(request.entityName);
    if (!table) {
      throw new Error(`Unknown entity "${request.entityName}"`);
    }
    if (table.primaryKey !== request.primaryKey) {
      throw new Error(
        `Entity "${request.entityName}" is keyed by "${table.primaryKey}", not "${request.primaryKey}"`
      );
    }

    const matching = Array.from(table.objects.values()).filter((object) =>
      matchesRequest(object, request)
    );
    return sortByDescriptors(matching, request);
  }

  subscribe(
    request: FetchRequest,
    onChange: (batch: ChangeBatch<StoredObject>) => void
  ): QuerySubscription {
    const subscriber: Subscriber = { entityName: request.entityName, onChange };
    this.subscribers.add(subscriber);
    return {
      unsubscribe: () => {
        this.subscribers.delete(subscriber);
      },
    };
  }

  snapshot(object: StoredObject, request: FetchRequest, sectionNameKeyPath?: string): RowIdentity {
    return createRowIdentity(object, request, sectionNameKeyPath);
  }

  resolve(request: FetchRequest, id: StableKey): StoredObject | undefined {
    return this.tables.get(request.entityName)?.objects.get(id);
  }

  /**
   * Number of active subscriptions.
   */
  get subscriberCount(): number {
    return this.subscribers.size;
  }

  // ==========================================================================
  // Notifications
  // ==========================================================================

  private notify(entityName: string, kind: keyof ChangeBatch<StoredObject>, object: StoredObject): void {
    if (this.pending) {
      let batch = this.pending.get(entityName);
      if (!batch) {
        batch = emptyBatch();
        this.pending.set(entityName, batch);
      }
      batch[kind].push(object);
      return;
    }

    const batch = emptyBatch();
    batch[kind].push(object);
    this.deliver(entityName, batch);
  }

  private deliver(entityName: string, batch: ChangeBatch<StoredObject>): void {
    // Copy: a subscriber may unsubscribe while being notified
    for (const subscriber of Array.from(this.subscribers)) {
      if (subscriber.entityName === entityName) {
        subscriber.onChange(batch);
      }
    }
  }
}
