/**
 * Layout Utilities
 *
 * Configuration signatures and conversions between in-memory layouts and
 * their persisted records.
 */

import { createHash } from 'crypto';
import type { FetchRequest } from '../query/fetch-request.schemas.js';
import { cloneRowIdentity, createRestoredRow } from '../row/row-identity.js';
import type { SortValue } from '../row/row.types.js';
import type { Layout } from './layout.types.js';
import { PERSISTED_LAYOUT_VERSION, type PersistedLayout } from './layout.schemas.js';

// ============================================================================
// Hash Functions
// ============================================================================

/**
 * Compute SHA-256 hash of a string.
 */
function sha256(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

function serializeValue(value: SortValue | SortValue[]): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => serializeValue(item));
  }
  return value instanceof Date ? { date: value.toISOString() } : value;
}

/**
 * Signature of a controller configuration.
 * A cached layout is only reused by a controller with the same signature.
 */
export function configurationSignature(
  request: FetchRequest,
  sectionNameKeyPath: string | undefined
): string {
  // Explicit field order keeps the signature independent of input key order
  const canonical = {
    entityName: request.entityName,
    primaryKey: request.primaryKey,
    sortDescriptors: request.sortDescriptors.map((d) => [d.keyPath, d.ascending]),
    predicate: request.predicate.map((c) => [c.keyPath, c.op, serializeValue(c.value)]),
    trackedKeyPaths: request.trackedKeyPaths,
    sectionNameKeyPath: sectionNameKeyPath ?? null,
  };
  return sha256(JSON.stringify(canonical));
}

// ============================================================================
// Layout Conversion
// ============================================================================

/**
 * Deep copy of a layout.
 */
export function cloneLayout(layout: Layout): Layout {
  return {
    sections: layout.sections.map((section) => ({
      name: section.name,
      rows: section.rows.map(cloneRowIdentity),
    })),
  };
}

/**
 * Reduce a layout to its durable record.
 */
export function toPersistedLayout(layout: Layout, signature: string): PersistedLayout {
  return {
    version: PERSISTED_LAYOUT_VERSION,
    signature,
    storedAt: Date.now(),
    sections: layout.sections.map((section) => ({
      name: section.name,
      rowIds: section.rows.map((row) => row.id),
    })),
  };
}

/**
 * Rebuild a layout from its durable record. Rows carry no recorded values.
 */
export function fromPersistedLayout(record: PersistedLayout): Layout {
  return {
    sections: record.sections.map((section) => ({
      name: section.name,
      rows: section.rowIds.map((id) => createRestoredRow(id, section.name)),
    })),
  };
}

/**
 * Whether two layouts have the same sections and row ids in the same order.
 */
export function sameStructure(a: Layout, b: Layout): boolean {
  return (
    a.sections.length === b.sections.length &&
    a.sections.every((section, s) => {
      const other = b.sections[s];
      return (
        section.name === other.name &&
        section.rows.length === other.rows.length &&
        section.rows.every((row, r) => row.id === other.rows[r].id)
      );
    })
  );
}
