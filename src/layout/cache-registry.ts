/**
 * Layout Cache Registry
 *
 * Tracks which cache names live controllers are attached to, per storage
 * location. Deleting a cache that is still attached is refused, whichever
 * handle on that location the delete goes through.
 */

import type { LayoutStorage } from './layout-storage.js';

export class LayoutCacheRegistry {
  /** Map of storage location → (cache name → attachment count) */
  private readonly attachments = new Map<string, Map<string, number>>();

  /**
   * Record a controller attaching to a cache name.
   * A cache has a single writer; a second attachment is reported, not refused.
   */
  attach(storage: LayoutStorage, cacheName: string): void {
    let names = this.attachments.get(storage.location);
    if (!names) {
      names = new Map();
      this.attachments.set(storage.location, names);
    }
    const count = names.get(cacheName) ?? 0;
    if (count > 0) {
      console.warn(
        `[WARN] Cache "${cacheName}" already has ${count} attached controller(s); concurrent writers are unsupported`
      );
    }
    names.set(cacheName, count + 1);
  }

  detach(storage: LayoutStorage, cacheName: string): void {
    const names = this.attachments.get(storage.location);
    const count = names?.get(cacheName);
    if (!names || count === undefined) return;

    if (count > 1) {
      names.set(cacheName, count - 1);
    } else if (names.size > 1) {
      names.delete(cacheName);
    } else {
      this.attachments.delete(storage.location);
    }
  }

  isAttached(storage: LayoutStorage, cacheName: string): boolean {
    return (this.attachments.get(storage.location)?.get(cacheName) ?? 0) > 0;
  }

  attachedNames(storage: LayoutStorage): string[] {
    return Array.from(this.attachments.get(storage.location)?.keys() ?? []);
  }
}

/** Registry shared by controllers that are not given their own */
export const defaultCacheRegistry = new LayoutCacheRegistry();
