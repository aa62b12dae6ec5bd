/**
 * Results Controller
 *
 * Binds one fetch request to one layout cache. Fetches through the query
 * engine, turns notification batches into diff cycles and reports the
 * resulting change events to a registered listener.
 *
 * All operations are synchronous and must be called from the owning context.
 * One cycle's events are delivered in full, between willChange and
 * didChange, before the next cycle starts.
 *
 * @module controller/results-controller
 */

import { getDefaultStorage, isDebugEventsEnabled } from '../config/cache-config.js';
import { ChangeEventLogger } from '../diagnostics/change-event-logger.js';
import { buildLayout, computeChanges } from '../diff/diff-engine.js';
import { isSectionEvent, type ChangeEvent, type DiffOptions } from '../diff/diff.types.js';
import { defaultCacheRegistry, type LayoutCacheRegistry } from '../layout/cache-registry.js';
import { deleteCache, LayoutCache } from '../layout/layout-cache.js';
import type { LayoutStorage } from '../layout/layout-storage.js';
import { emptyLayout, type Layout, type Section } from '../layout/layout.types.js';
import { configurationSignature } from '../layout/utils.js';
import {
  FetchRequestSchema,
  type FetchRequest,
  type FetchRequestInput,
} from '../query/fetch-request.schemas.js';
import type { ChangeBatch, QueryEngine, QuerySubscription } from '../query/query.types.js';
import { cloneRowIdentity } from '../row/row-identity.js';
import type { IndexPath, RowIdentity, SectionKey, StableKey } from '../row/row.types.js';
import { ResultsControllerError } from '../shared/errors/results-controller.error.js';
import type {
  ControllerState,
  ListenerHandle,
  ResultsControllerOptions,
  ResultsListener,
  SectionInfo,
} from './controller.types.js';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Validate the request and its relation to the section key path.
 *
 * @throws ResultsControllerError (CONFIGURATION_ERROR)
 */
function parseConfiguration(
  input: FetchRequestInput,
  sectionNameKeyPath: string | undefined
): FetchRequest {
  const result = FetchRequestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw ResultsControllerError.configuration(issues.join('; '));
  }

  const request = result.data;
  if (sectionNameKeyPath !== undefined && request.sortDescriptors[0].keyPath !== sectionNameKeyPath) {
    throw ResultsControllerError.configuration(
      `section key path "${sectionNameKeyPath}" must be the first sort descriptor`,
      { sectionNameKeyPath, firstSortKeyPath: request.sortDescriptors[0].keyPath }
    );
  }
  return request;
}

export class ResultsController<T> {
  readonly fetchRequest: FetchRequest;
  readonly sectionNameKeyPath: string | undefined;
  readonly cacheName: string | undefined;

  private readonly engine: QueryEngine<T>;
  private readonly cache: LayoutCache;
  private readonly registry: LayoutCacheRegistry;
  private readonly diffOptions: DiffOptions;
  private readonly eventLogger: ChangeEventLogger | undefined;

  private state: ControllerState = 'uninitialized';

  /** Layout the read accessors answer from */
  private layout: Layout = emptyLayout();

  /** Map of row id → index path in `layout` */
  private readonly indexPaths = new Map<StableKey, IndexPath>();

  private subscription: QuerySubscription | null = null;
  private listener: ResultsListener<T> | null = null;

  /** Batches received while a cycle was running */
  private queuedBatches = 0;

  private lastErrorValue: ResultsControllerError | null = null;

  /**
   * @throws ResultsControllerError (CONFIGURATION_ERROR) for an invalid request
   */
  constructor(options: ResultsControllerOptions<T>) {
    this.fetchRequest = parseConfiguration(options.fetchRequest, options.sectionNameKeyPath);
    this.sectionNameKeyPath = options.sectionNameKeyPath;
    this.cacheName = options.cacheName;
    this.engine = options.queryEngine;
    this.registry = options.registry ?? defaultCacheRegistry;
    this.diffOptions = { rowEventsForRemovedSections: options.rowEventsForRemovedSections ?? false };
    this.eventLogger =
      options.eventLogger ??
      (isDebugEventsEnabled() ? new ChangeEventLogger({ echo: true }) : undefined);

    const storage: LayoutStorage | undefined =
      options.cacheName === undefined
        ? options.inMemoryCache
        : (options.storage ?? getDefaultStorage());

    this.cache = new LayoutCache({
      signature: configurationSignature(this.fetchRequest, this.sectionNameKeyPath),
      cacheName: options.cacheName,
      storage,
    });

    if (this.cacheName !== undefined) {
      this.registry.attach(this.cache.storage, this.cacheName);
    }
  }

  // ==========================================================================
  // Administration
  // ==========================================================================

  /**
   * Delete the cached layout for a name, or for every name when omitted.
   * Only call this once no controller uses the cache.
   *
   * @throws ResultsControllerError (PRECONDITION_VIOLATION) if a controller is attached
   */
  static deleteCache(
    cacheName?: string,
    options: { storage?: LayoutStorage; registry?: LayoutCacheRegistry } = {}
  ): void {
    deleteCache(cacheName, {
      storage: options.storage ?? getDefaultStorage(),
      registry: options.registry,
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  get currentState(): ControllerState {
    return this.state;
  }

  /**
   * Last query failure, if any.
   */
  get lastError(): ResultsControllerError | null {
    return this.lastErrorValue;
  }

  /**
   * Run the query, rebuild the layout and start observing changes.
   * The cache is only rewritten when the fetched structure differs from it.
   *
   * @returns false if the query failed (the cache is left untouched)
   * @throws ResultsControllerError (CACHE_IO_ERROR) when the cache cannot be read or written
   */
  performFetch(): boolean {
    this.assertOpen('performFetch');

    const next = this.fetchLayout();
    if (!next) {
      return false;
    }

    const cursor = this.cache.cursor();
    computeChanges(cursor, next, this.diffOptions);
    const written = this.cache.commit(cursor);
    if (!written && this.cache.isPersistent) {
      console.error(`[CACHE] Reused cached layout "${String(this.cacheName)}"`);
    }

    this.setLayout(cursor.toLayout());
    this.state = 'fetched';

    if (!this.subscription) {
      this.subscription = this.engine.subscribe(this.fetchRequest, (batch) => {
        this.handleBatch(batch);
      });
    }
    return true;
  }

  /**
   * Discard the cached layout. The next fetch or notification cycle
   * rebuilds it from scratch.
   */
  reset(): void {
    this.assertOpen('reset');
    this.cache.clear();
    this.setLayout(emptyLayout());
    this.queuedBatches = 0;
    this.state = 'reset';
  }

  /**
   * Stop observing, release the cache name and drop the listener.
   * Safe to call more than once.
   */
  close(): void {
    if (this.state === 'closed') return;

    this.subscription?.unsubscribe();
    this.subscription = null;
    this.listener = null;
    if (this.cacheName !== undefined) {
      this.registry.detach(this.cache.storage, this.cacheName);
    }
    this.state = 'closed';
  }

  // ==========================================================================
  // Listener
  // ==========================================================================

  /**
   * Register the listener receiving change events. Replaces any previous one.
   */
  setListener(listener: ResultsListener<T>): ListenerHandle {
    this.listener = listener;
    return {
      unregister: () => {
        if (this.listener === listener) {
          this.listener = null;
        }
      },
    };
  }

  // ==========================================================================
  // Read Accessors
  // ==========================================================================

  numberOfSections(): number {
    return this.layout.sections.length;
  }

  numberOfRowsForSectionIndex(index: number): number {
    return this.layout.sections[index]?.rows.length ?? 0;
  }

  /**
   * Title of a section; undefined for the untitled section or a bad index.
   */
  titleForHeaderInSection(index: number): string | undefined {
    return this.layout.sections[index]?.name ?? undefined;
  }

  sectionIndexForTitle(title: SectionKey): number {
    return this.layout.sections.findIndex((section) => section.name === title);
  }

  sectionInfo(index: number): SectionInfo<T> | undefined {
    const section = this.layout.sections[index];
    return section ? this.toSectionInfo(section) : undefined;
  }

  sections(): SectionInfo<T>[] {
    return this.layout.sections.map((section) => this.toSectionInfo(section));
  }

  /**
   * Copy of the row at an index path, safe to pass to another context.
   */
  rowIdentityAtIndexPath(indexPath: IndexPath): RowIdentity | undefined {
    const row = this.layout.sections[indexPath.section]?.rows[indexPath.row];
    return row ? cloneRowIdentity(row) : undefined;
  }

  /**
   * Live object at an index path, resolved through the query engine.
   */
  objectAtIndexPath(indexPath: IndexPath): T | undefined {
    const row = this.layout.sections[indexPath.section]?.rows[indexPath.row];
    return row ? this.engine.resolve(this.fetchRequest, row.id) : undefined;
  }

  /**
   * Live objects in layout order.
   */
  fetchedObjects(): T[] {
    return this.resolveRows(this.layout.sections.flatMap((section) => section.rows));
  }

  indexPathForRowIdentity(row: Pick<RowIdentity, 'id'>): IndexPath | undefined {
    const indexPath = this.indexPaths.get(row.id);
    return indexPath ? { ...indexPath } : undefined;
  }

  indexPathForObject(object: T): IndexPath | undefined {
    return this.indexPathForRowIdentity(
      this.engine.snapshot(object, this.fetchRequest, this.sectionNameKeyPath)
    );
  }

  // ==========================================================================
  // Diff Cycles
  // ==========================================================================

  /**
   * Coalesce notification batches: one cycle per batch, and batches that
   * arrive during a cycle are folded into a single follow-up cycle.
   */
  private handleBatch(_batch: ChangeBatch<T>): void {
    if (this.state === 'uninitialized' || this.state === 'closed') return;

    this.queuedBatches++;
    if (this.state === 'diffing') return;

    while (this.queuedBatches > 0 && this.currentState !== 'closed') {
      this.queuedBatches = 0;
      this.runCycle();
    }
  }

  /**
   * Diff the current query result against the cache and deliver the events.
   * A failure before delivery leaves the cache and the listener untouched.
   */
  private runCycle(): void {
    this.state = 'diffing';
    try {
      const next = this.fetchLayout();
      if (!next) return;

      const cursor = this.cache.cursor();
      const { events, layout } = computeChanges(cursor, next, this.diffOptions);
      this.cache.commit(cursor);
      this.setLayout(layout);
      this.deliver(events);
    } finally {
      if (this.state === 'diffing') {
        this.state = 'observing';
      }
    }
  }

  private deliver(events: ChangeEvent[]): void {
    if (events.length === 0) return;

    this.eventLogger?.beginCycle();
    const listener = this.listener;

    listener?.willChange?.(this);
    for (const event of events) {
      this.eventLogger?.record(event, this.cacheName);
      if (isSectionEvent(event)) {
        listener?.didChangeSection?.(this, event, this.sectionInfoFor(event.section));
      } else {
        listener?.didChangeObject?.(this, event);
      }
    }
    listener?.didChange?.(this);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Run the query and group the result.
   *
   * @returns undefined if the query failed; the failure is kept in lastError
   */
  private fetchLayout(): Layout | undefined {
    let objects: T[];
    try {
      objects = this.engine.execute(this.fetchRequest);
    } catch (error) {
      this.lastErrorValue = ResultsControllerError.queryFailed(
        this.fetchRequest.entityName,
        toError(error),
        { cacheName: this.cacheName }
      );
      console.error(`[FETCH] ${this.lastErrorValue.message}`);
      return undefined;
    }

    this.lastErrorValue = null;
    return buildLayout(
      objects.map((object) =>
        this.engine.snapshot(object, this.fetchRequest, this.sectionNameKeyPath)
      )
    );
  }

  private setLayout(layout: Layout): void {
    this.layout = layout;
    this.indexPaths.clear();
    layout.sections.forEach((section, sectionIndex) => {
      section.rows.forEach((row, rowIndex) => {
        this.indexPaths.set(row.id, { section: sectionIndex, row: rowIndex });
      });
    });
  }

  private resolveRows(rows: readonly RowIdentity[]): T[] {
    const objects: T[] = [];
    for (const row of rows) {
      const object = this.engine.resolve(this.fetchRequest, row.id);
      if (object !== undefined) {
        objects.push(object);
      }
    }
    return objects;
  }

  private toSectionInfo(section: Section): SectionInfo<T> {
    const rows = section.rows;
    return {
      name: section.name,
      numberOfObjects: rows.length,
      objects: () => this.resolveRows(rows),
    };
  }

  /**
   * Section info by name against the current layout; a deleted section
   * reports no objects.
   */
  private sectionInfoFor(name: SectionKey | null): SectionInfo<T> {
    const section = this.layout.sections.find((s) => s.name === name);
    return this.toSectionInfo(section ?? { name, rows: [] });
  }

  private assertOpen(operation: string): void {
    if (this.state === 'closed') {
      throw ResultsControllerError.invalidState(this.state, operation);
    }
  }
}
