/**
 * Layout Storage
 *
 * Durable keyed store for layout records, one record per cache name.
 */

import { randomUUID } from 'crypto';
import type { PersistedLayout } from './layout.schemas.js';

/**
 * Record store a LayoutCache persists through.
 * Implementations must make `write` all-or-nothing.
 */
export interface LayoutStorage {
  /** Where the records live. Handles with equal locations share records */
  readonly location: string;

  /** Read the record for a name, undefined when none exists */
  read(cacheName: string): PersistedLayout | undefined;

  /** Replace the record for a name */
  write(cacheName: string, record: PersistedLayout): void;

  /** Remove the record for a name. Returns false when there was none */
  remove(cacheName: string): boolean;

  /** Remove every record. Returns the number removed */
  removeAll(): number;

  /** Names that currently have a record */
  list(): string[];
}

/**
 * Process-lifetime storage. Records are copied in and out so callers never
 * share state with the store.
 */
export class MemoryLayoutStorage implements LayoutStorage {
  readonly location = `memory:${randomUUID()}`;

  /** Map of cache name → record */
  private readonly records = new Map<string, PersistedLayout>();

  read(cacheName: string): PersistedLayout | undefined {
    const record = this.records.get(cacheName);
    return record ? structuredClone(record) : undefined;
  }

  write(cacheName: string, record: PersistedLayout): void {
    this.records.set(cacheName, structuredClone(record));
  }

  remove(cacheName: string): boolean {
    return this.records.delete(cacheName);
  }

  removeAll(): number {
    const count = this.records.size;
    this.records.clear();
    return count;
  }

  list(): string[] {
    return Array.from(this.records.keys());
  }

  get size(): number {
    return this.records.size;
  }
}
