/**
 * Results Controller Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ResultsController } from '../../../src/controller/results-controller.js';
import type {
  ResultsControllerOptions,
  ResultsListener,
  SectionInfo,
} from '../../../src/controller/controller.types.js';
import {
  ChangeEventLogger,
  formatChangeEvent,
} from '../../../src/diagnostics/change-event-logger.js';
import { LayoutCacheRegistry } from '../../../src/layout/cache-registry.js';
import { FileLayoutStorage } from '../../../src/layout/file-layout-storage.js';
import { MemoryLayoutStorage } from '../../../src/layout/layout-storage.js';
import type { FetchRequestInput } from '../../../src/query/fetch-request.schemas.js';
import { MemoryObjectStore, type StoredObject } from '../../../src/query/memory-object-store.js';
import type { QueryEngine } from '../../../src/query/query.types.js';
import { ResultsControllerError } from '../../../src/shared/errors/results-controller.error.js';
import { captureError } from '../../mocks/layout.fixtures.js';

const byPriority: FetchRequestInput = {
  entityName: 'Task',
  primaryKey: 'id',
  sortDescriptors: [{ keyPath: 'priority' }],
  trackedKeyPaths: ['title'],
};

const byList: FetchRequestInput = {
  entityName: 'Task',
  primaryKey: 'id',
  sortDescriptors: [{ keyPath: 'list' }, { keyPath: 'priority' }],
  trackedKeyPaths: ['title'],
};

function createStore(): MemoryObjectStore {
  const store = new MemoryObjectStore().defineEntity('Task');
  store.add('Task', { id: 1, title: 'a', priority: 1, list: 'work' });
  store.add('Task', { id: 2, title: 'b', priority: 2, list: 'home' });
  store.add('Task', { id: 3, title: 'c', priority: 3, list: 'work' });
  return store;
}

function recordingListener(log: string[]): ResultsListener<StoredObject> {
  return {
    willChange: () => {
      log.push('willChange');
    },
    didChangeSection: (_controller, event) => {
      log.push(formatChangeEvent(event));
    },
    didChangeObject: (_controller, event) => {
      log.push(formatChangeEvent(event));
    },
    didChange: () => {
      log.push('didChange');
    },
  };
}

function idsOf(controller: ResultsController<StoredObject>): unknown[] {
  return controller.fetchedObjects().map((object) => object.id);
}

describe('ResultsController', () => {
  let store: MemoryObjectStore;
  let log: string[];

  function createController(
    options: Partial<ResultsControllerOptions<StoredObject>> = {}
  ): ResultsController<StoredObject> {
    const controller = new ResultsController<StoredObject>({
      fetchRequest: byPriority,
      queryEngine: store,
      ...options,
    });
    controller.setListener(recordingListener(log));
    return controller;
  }

  beforeEach(() => {
    store = createStore();
    log = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('construction', () => {
    it('should reject a section key path that is not the first sort key', () => {
      const error = captureError(() => createController({ sectionNameKeyPath: 'list' }));

      expect(error).toBeInstanceOf(ResultsControllerError);
      expect(error).toMatchObject({
        code: 'CONFIGURATION_ERROR',
        message: expect.stringContaining('section key path "list" must be the first sort descriptor'),
      });
    });

    it('should reject a request without sort descriptors', () => {
      expect(() => createController({ fetchRequest: { ...byPriority, sortDescriptors: [] } })).toThrow(
        /sortDescriptors: At least one sort descriptor is required/
      );
    });

    it('should not read the storage settings without a cache name', () => {
      vi.stubEnv('RESULTS_CACHE_MODE', 'redis');

      const controller = createController();

      expect(controller.performFetch()).toBe(true);
    });

    it('should reject an empty primary key', () => {
      expect(() => createController({ fetchRequest: { ...byPriority, primaryKey: '' } })).toThrow(
        /Invalid controller configuration: primaryKey/
      );
    });
  });

  describe('before the first fetch', () => {
    it('should answer with empty values', () => {
      const controller = createController();

      expect(controller.currentState).toBe('uninitialized');
      expect(controller.numberOfSections()).toBe(0);
      expect(controller.numberOfRowsForSectionIndex(0)).toBe(0);
      expect(controller.titleForHeaderInSection(0)).toBeUndefined();
      expect(controller.sectionInfo(0)).toBeUndefined();
      expect(controller.objectAtIndexPath({ section: 0, row: 0 })).toBeUndefined();
      expect(controller.fetchedObjects()).toEqual([]);
    });

    it('should ignore notifications', () => {
      createController();

      store.add('Task', { id: 4, title: 'd', priority: 4 });

      expect(log).toEqual([]);
    });
  });

  describe('performFetch()', () => {
    it('should fetch the sorted result silently', () => {
      const controller = createController();

      expect(controller.performFetch()).toBe(true);

      expect(log).toEqual([]);
      expect(controller.currentState).toBe('fetched');
      expect(controller.numberOfSections()).toBe(1);
      expect(controller.numberOfRowsForSectionIndex(0)).toBe(3);
      expect(controller.titleForHeaderInSection(0)).toBeUndefined();
      expect(idsOf(controller)).toEqual([1, 2, 3]);
    });

    it('should answer index path lookups', () => {
      const controller = createController();
      controller.performFetch();

      expect(controller.rowIdentityAtIndexPath({ section: 0, row: 2 })).toEqual({
        id: 3,
        sectionKey: null,
        sortValues: [3],
        trackedValues: ['c'],
      });

      const object = controller.objectAtIndexPath({ section: 0, row: 1 });
      expect(object?.id).toBe(2);
      if (object) {
        expect(controller.indexPathForObject(object)).toEqual({ section: 0, row: 1 });
      }
      expect(controller.indexPathForRowIdentity({ id: 3 })).toEqual({ section: 0, row: 2 });
      expect(controller.indexPathForRowIdentity({ id: 99 })).toBeUndefined();
      expect(controller.rowIdentityAtIndexPath({ section: 0, row: 3 })).toBeUndefined();
    });

    it('should describe sections', () => {
      const controller = createController();
      controller.performFetch();

      const [section] = controller.sections();

      expect(section.name).toBeNull();
      expect(section.numberOfObjects).toBe(3);
      expect(section.objects().map((object) => object.id)).toEqual([1, 2, 3]);
    });

    it('should return false and keep the cache when the query fails', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const inMemoryCache = new MemoryLayoutStorage();
      const controller = createController({
        fetchRequest: { ...byPriority, entityName: 'Note' },
        inMemoryCache,
      });

      expect(controller.performFetch()).toBe(false);

      expect(controller.lastError?.code).toBe('QUERY_EXECUTION_FAILED');
      expect(controller.lastError?.message).toBe('Query on "Note" failed: Unknown entity "Note"');
      expect(error).toHaveBeenCalledWith('[FETCH] Query on "Note" failed: Unknown entity "Note"');
      expect(inMemoryCache.size).toBe(0);
      expect(controller.currentState).toBe('uninitialized');

      store.defineEntity('Note');
      store.add('Note', { id: 1, title: 'n', priority: 1 });
      expect(controller.performFetch()).toBe(true);
      expect(controller.lastError).toBeNull();
      expect(inMemoryCache.list()).toEqual(['in-memory']);
    });
  });

  describe('change delivery', () => {
    it('should report an inserted row between willChange and didChange', () => {
      const controller = createController();
      controller.performFetch();

      store.add('Task', { id: 4, title: 'd', priority: 0 });

      expect(log).toEqual(['willChange', 'row-insert 4 @0:0', 'didChange']);
      expect(controller.currentState).toBe('observing');
      expect(idsOf(controller)).toEqual([4, 1, 2, 3]);
    });

    it('should report a reordered row as a single move', () => {
      const controller = createController();
      controller.performFetch();

      store.update('Task', 3, { priority: 0, title: 'c2' });

      expect(log).toEqual(['willChange', 'row-move 3 0:2 -> 0:0', 'didChange']);
      expect(idsOf(controller)).toEqual([3, 1, 2]);
    });

    it('should report a tracked value change as an update', () => {
      const controller = createController();
      controller.performFetch();

      store.update('Task', 2, { title: 'b2' });

      expect(log).toEqual(['willChange', 'row-update 2 @0:1', 'didChange']);
    });

    it('should report a deleted row', () => {
      const controller = createController();
      controller.performFetch();

      store.remove('Task', 1);

      expect(log).toEqual(['willChange', 'row-delete 1 @0:0', 'didChange']);
    });

    it('should stay silent when nothing visible changed', () => {
      const controller = createController();
      controller.performFetch();

      store.update('Task', 1, { list: 'errands' });

      expect(log).toEqual([]);
    });

    it('should diff a write block once', () => {
      const controller = createController();
      controller.performFetch();

      store.write((s) => {
        s.add('Task', { id: 4, title: 'd', priority: 4 });
        s.update('Task', 1, { title: 'a2' });
      });

      expect(log).toEqual(['willChange', 'row-update 1 @0:0', 'row-insert 4 @0:3', 'didChange']);
    });

    it('should process a change made during delivery after didChange', () => {
      const controller = createController();
      controller.performFetch();
      let added = false;
      controller.setListener({
        ...recordingListener(log),
        didChange: () => {
          log.push('didChange');
          if (!added) {
            added = true;
            store.add('Task', { id: 5, title: 'e', priority: 5 });
          }
        },
      });

      store.add('Task', { id: 4, title: 'd', priority: 4 });

      expect(log).toEqual([
        'willChange',
        'row-insert 4 @0:3',
        'didChange',
        'willChange',
        'row-insert 5 @0:4',
        'didChange',
      ]);
    });

    it('should read the new state from inside callbacks', () => {
      const controller = createController();
      controller.performFetch();
      const counts: number[] = [];
      controller.setListener({
        willChange: (c) => {
          counts.push(c.numberOfRowsForSectionIndex(0));
        },
      });

      store.add('Task', { id: 4, title: 'd', priority: 4 });

      expect(counts).toEqual([4]);
    });

    it('should skip a cycle whose query fails and keep the cache', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const controller = createController();
      controller.performFetch();
      vi.spyOn(store, 'execute').mockImplementationOnce(() => {
        throw new Error('engine offline');
      });

      store.add('Task', { id: 4, title: 'd', priority: 4 });

      expect(log).toEqual([]);
      expect(controller.lastError?.message).toBe('Query on "Task" failed: engine offline');
      expect(controller.numberOfRowsForSectionIndex(0)).toBe(3);

      store.add('Task', { id: 5, title: 'e', priority: 5 });

      expect(log).toEqual(['willChange', 'row-insert 4 @0:3', 'row-insert 5 @0:4', 'didChange']);
      expect(controller.lastError).toBeNull();
    });

    it('should stay silent for rows whose sort value is NaN', () => {
      store.add('Task', { id: 5, title: 'e', priority: Number.NaN });
      const controller = createController();
      controller.performFetch();

      store.update('Task', 1, { list: 'errands' });
      store.update('Task', 1, { list: 'home' });

      expect(log).toEqual([]);
      expect(idsOf(controller)).toEqual([5, 1, 2, 3]);
      expect(controller.rowIdentityAtIndexPath({ section: 0, row: 0 })?.sortValues).toEqual([null]);
    });

    it('should leave cache and listener untouched when the snapshot is inconsistent', () => {
      let duplicateFirst = false;
      const engine: QueryEngine<StoredObject> = {
        execute: (request) => {
          const objects = store.execute(request);
          return duplicateFirst ? [...objects, objects[0]] : objects;
        },
        subscribe: (request, onChange) => store.subscribe(request, onChange),
        snapshot: (object, request, sectionNameKeyPath) =>
          store.snapshot(object, request, sectionNameKeyPath),
        resolve: (request, id) => store.resolve(request, id),
      };
      const inMemoryCache = new MemoryLayoutStorage();
      const controller = createController({ queryEngine: engine, inMemoryCache });
      controller.performFetch();
      const write = vi.spyOn(inMemoryCache, 'write');

      duplicateFirst = true;
      const error = captureError(() => store.add('Task', { id: 4, title: 'd', priority: 4 }));

      expect(error).toBeInstanceOf(ResultsControllerError);
      expect(error).toMatchObject({
        code: 'INVARIANT_VIOLATION',
        message: 'Layout invariant violated: duplicate row id 1 in snapshot',
      });
      expect(log).toEqual([]);
      expect(write).not.toHaveBeenCalled();
      expect(inMemoryCache.read('in-memory')?.sections[0].rowIds).toEqual([1, 2, 3]);
      expect(idsOf(controller)).toEqual([1, 2, 3]);
      expect(controller.currentState).toBe('observing');

      duplicateFirst = false;
      controller.reset();
      store.update('Task', 4, { title: 'd2' });

      expect(log).toEqual([
        'willChange',
        'section-insert null @0',
        'row-insert 1 @0:0',
        'row-insert 2 @0:1',
        'row-insert 3 @0:2',
        'row-insert 4 @0:3',
        'didChange',
      ]);
      expect(write).toHaveBeenCalledTimes(1);
      expect(idsOf(controller)).toEqual([1, 2, 3, 4]);
    });

    it('should record delivered events in the event logger', () => {
      const eventLogger = new ChangeEventLogger();
      const controller = createController({ eventLogger });
      controller.performFetch();

      store.add('Task', { id: 4, title: 'd', priority: 4 });

      expect(eventLogger.getEvents().map((e) => [e.cycle, formatChangeEvent(e.event)])).toEqual([
        [1, 'row-insert 4 @0:3'],
      ]);
    });
  });

  describe('sections', () => {
    it('should group rows by the section key path', () => {
      const controller = createController({ fetchRequest: byList, sectionNameKeyPath: 'list' });
      controller.performFetch();

      expect(controller.numberOfSections()).toBe(2);
      expect(controller.titleForHeaderInSection(0)).toBe('home');
      expect(controller.titleForHeaderInSection(1)).toBe('work');
      expect(controller.sectionIndexForTitle('work')).toBe(1);
      expect(controller.sectionIndexForTitle('errands')).toBe(-1);
      expect(controller.numberOfRowsForSectionIndex(1)).toBe(2);
    });

    it('should report inserted and deleted sections with their info', () => {
      const controller = createController({ fetchRequest: byList, sectionNameKeyPath: 'list' });
      controller.performFetch();
      const infos: [string, SectionInfo<StoredObject>][] = [];
      controller.setListener({
        ...recordingListener(log),
        didChangeSection: (_c, event, info) => {
          log.push(formatChangeEvent(event));
          infos.push([event.type, info]);
        },
      });

      store.add('Task', { id: 4, title: 'd', priority: 1, list: 'errands' });
      store.remove('Task', 2);

      expect(log).toEqual([
        'willChange',
        'section-insert "errands" @0',
        'row-insert 4 @0:0',
        'didChange',
        'willChange',
        'section-delete "home" @1',
        'didChange',
      ]);
      expect(infos.map(([type, info]) => [type, info.name, info.numberOfObjects])).toEqual([
        ['section-insert', 'errands', 1],
        ['section-delete', 'home', 0],
      ]);
    });

    it('should move a row to another section', () => {
      const controller = createController({ fetchRequest: byList, sectionNameKeyPath: 'list' });
      controller.performFetch();

      store.update('Task', 1, { list: 'home' });

      expect(log).toEqual(['willChange', 'row-move 1 1:0 -> 0:0', 'didChange']);
      expect(controller.numberOfRowsForSectionIndex(0)).toBe(2);
    });

    it('should report rows of a removed section when asked', () => {
      const controller = createController({
        fetchRequest: byList,
        sectionNameKeyPath: 'list',
        rowEventsForRemovedSections: true,
      });
      controller.performFetch();

      store.remove('Task', 2);

      expect(log).toEqual(['willChange', 'row-delete 2 @0:0', 'section-delete "home" @0', 'didChange']);
    });
  });

  describe('listener registration', () => {
    it('should stop delivering after unregister', () => {
      const controller = new ResultsController<StoredObject>({ fetchRequest: byPriority, queryEngine: store });
      const handle = controller.setListener(recordingListener(log));
      controller.performFetch();

      handle.unregister();
      store.add('Task', { id: 4, title: 'd', priority: 4 });

      expect(log).toEqual([]);
      expect(idsOf(controller)).toEqual([1, 2, 3, 4]);
    });
  });

  describe('reset()', () => {
    it('should clear the cache and rebuild on the next notification', () => {
      const inMemoryCache = new MemoryLayoutStorage();
      const controller = createController({ inMemoryCache });
      controller.performFetch();

      controller.reset();

      expect(controller.currentState).toBe('reset');
      expect(controller.numberOfSections()).toBe(0);
      expect(inMemoryCache.list()).toEqual([]);

      store.add('Task', { id: 4, title: 'd', priority: 4 });

      expect(log).toEqual([
        'willChange',
        'section-insert null @0',
        'row-insert 1 @0:0',
        'row-insert 2 @0:1',
        'row-insert 3 @0:2',
        'row-insert 4 @0:3',
        'didChange',
      ]);
      expect(controller.currentState).toBe('observing');
    });

    it('should rebuild silently on the next fetch', () => {
      const controller = createController();
      controller.performFetch();
      controller.reset();

      expect(controller.performFetch()).toBe(true);

      expect(log).toEqual([]);
      expect(controller.currentState).toBe('fetched');
      expect(idsOf(controller)).toEqual([1, 2, 3]);
    });
  });

  describe('close()', () => {
    it('should unsubscribe and refuse further fetches', () => {
      const controller = createController();
      controller.performFetch();
      expect(store.subscriberCount).toBe(1);

      controller.close();
      controller.close();
      store.add('Task', { id: 4, title: 'd', priority: 4 });

      expect(store.subscriberCount).toBe(0);
      expect(controller.currentState).toBe('closed');
      expect(log).toEqual([]);
      expect(() => controller.performFetch()).toThrow(
        'Invalid operation "performFetch" in state "closed"'
      );
    });
  });

  describe('named caches', () => {
    let storage: MemoryLayoutStorage;
    let registry: LayoutCacheRegistry;

    beforeEach(() => {
      storage = new MemoryLayoutStorage();
      registry = new LayoutCacheRegistry();
    });

    it('should reuse a stored layout without rewriting it', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const first = createController({ cacheName: 'tasks', storage, registry });
      first.performFetch();
      first.close();
      expect(storage.list()).toEqual(['tasks']);

      const write = vi.spyOn(storage, 'write');
      const second = createController({ cacheName: 'tasks', storage, registry });
      second.performFetch();

      expect(write).not.toHaveBeenCalled();
      expect(error).toHaveBeenCalledWith('[CACHE] Reused cached layout "tasks"');
      expect(idsOf(second)).toEqual([1, 2, 3]);

      store.update('Task', 3, { priority: 0 });

      expect(log).toEqual(['willChange', 'row-move 3 0:2 -> 0:0', 'didChange']);
      expect(write).toHaveBeenCalledTimes(1);
    });

    it('should only delete a cache once its controller is closed', () => {
      const controller = createController({ cacheName: 'tasks', storage, registry });
      controller.performFetch();

      expect(() => ResultsController.deleteCache('tasks', { storage, registry })).toThrow(
        'Cannot delete cache while a controller is attached: tasks'
      );

      controller.close();
      ResultsController.deleteCache('tasks', { storage, registry });
      ResultsController.deleteCache('tasks', { storage, registry });

      expect(storage.list()).toEqual([]);
    });

    it('should refuse deletion through another handle on the same directory', () => {
      const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'results-controller-'));
      try {
        const controller = createController({
          cacheName: 'tasks',
          storage: new FileLayoutStorage(directory),
          registry,
        });
        controller.performFetch();
        const otherHandle = new FileLayoutStorage(directory);

        const error = captureError(() =>
          ResultsController.deleteCache('tasks', { storage: otherHandle, registry })
        );

        expect(error).toBeInstanceOf(ResultsControllerError);
        expect(error).toMatchObject({ code: 'PRECONDITION_VIOLATION' });
        expect(otherHandle.list()).toEqual(['tasks']);

        controller.close();
        ResultsController.deleteCache('tasks', { storage: otherHandle, registry });

        expect(otherHandle.list()).toEqual([]);
      } finally {
        fs.rmSync(directory, { recursive: true, force: true });
      }
    });

    it('should tag logged events with the cache name', () => {
      const eventLogger = new ChangeEventLogger();
      const controller = createController({ cacheName: 'tasks', storage, registry, eventLogger });
      controller.performFetch();

      store.remove('Task', 2);

      expect(eventLogger.getEvents()[0].source).toBe('tasks');
    });
  });
});
