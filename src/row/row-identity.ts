/**
 * Row Identity
 *
 * Builds RowIdentity snapshots from raw objects and provides the identity
 * and "needs update" comparisons used by the diff engine.
 *
 * @module row/row-identity
 */

import type { FetchRequest } from '../query/fetch-request.schemas.js';
import { ResultsControllerError } from '../shared/errors/results-controller.error.js';
import type { RowIdentity, SectionKey, SortValue, StableKey } from './row.types.js';

// ============================================================================
// Key Path Access
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Read a dotted key path ("author.name") from an object.
 * Returns undefined when any segment is missing.
 */
export function readKeyPath(object: unknown, keyPath: string): unknown {
  let current: unknown = object;
  for (const segment of keyPath.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Normalise a raw key path value to a comparable SortValue.
 * NaN and invalid dates have no place in the order and read as null.
 *
 * @throws ResultsControllerError (CONFIGURATION_ERROR) for arrays and plain objects
 */
export function toSortValue(value: unknown, keyPath: string): SortValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'number' && Number.isNaN(value)) {
    return null;
  }
  if (value instanceof Date && Number.isNaN(value.getTime())) {
    return null;
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  throw ResultsControllerError.configuration(
    `key path "${keyPath}" resolves to a non-comparable value`,
    { keyPath, valueType: typeof value }
  );
}

function toStableKey(value: unknown, keyPath: string): StableKey {
  if (typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
    return value;
  }
  throw ResultsControllerError.invariant(`object has no usable primary key at "${keyPath}"`, {
    keyPath,
    valueType: typeof value,
  });
}

/**
 * Derive a section name from a raw value. Missing values group under "".
 *
 * Names are strings, so values that print alike share a section: null and
 * "" both map to "", 1 and "1" both map to "1". Rows of such a section keep
 * the fetched order, which may interleave the two values.
 */
export function toSectionKey(value: unknown): SectionKey {
  if (value === undefined || value === null) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

// ============================================================================
// Snapshot Construction
// ============================================================================

/**
 * Build the RowIdentity of a raw object for the given request.
 * Pure: the object is only read.
 *
 * @param object - Raw object from the query engine
 * @param request - Validated fetch request
 * @param sectionNameKeyPath - Key path used for grouping (omit for one section)
 */
export function createRowIdentity(
  object: unknown,
  request: FetchRequest,
  sectionNameKeyPath?: string
): RowIdentity {
  return {
    id: toStableKey(readKeyPath(object, request.primaryKey), request.primaryKey),
    sectionKey:
      sectionNameKeyPath === undefined
        ? null
        : toSectionKey(readKeyPath(object, sectionNameKeyPath)),
    sortValues: request.sortDescriptors.map((descriptor) =>
      toSortValue(readKeyPath(object, descriptor.keyPath), descriptor.keyPath)
    ),
    trackedValues: request.trackedKeyPaths.map((keyPath) =>
      toSortValue(readKeyPath(object, keyPath), keyPath)
    ),
  };
}

/**
 * Row as restored from durable storage: identity and section only.
 */
export function createRestoredRow(id: StableKey, sectionKey: SectionKey | null): RowIdentity {
  return { id, sectionKey, sortValues: [], trackedValues: [] };
}

/**
 * Deep copy of a row, safe to pass to another context.
 */
export function cloneRowIdentity(row: RowIdentity): RowIdentity {
  const copy = (value: SortValue): SortValue =>
    value instanceof Date ? new Date(value.getTime()) : value;
  return {
    id: row.id,
    sectionKey: row.sectionKey,
    sortValues: row.sortValues.map(copy),
    trackedValues: row.trackedValues.map(copy),
  };
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Identity equality: two rows are the same row when their ids match.
 */
export function isSameRow(a: RowIdentity, b: RowIdentity): boolean {
  return a.id === b.id;
}

/**
 * Whether sort/tracked values were captured for this row.
 */
export function hasRecordedValues(row: RowIdentity): boolean {
  return row.sortValues.length > 0;
}

export function sortValueEquals(a: SortValue, b: SortValue): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

function valuesEqual(a: SortValue[], b: SortValue[]): boolean {
  return a.length === b.length && a.every((value, i) => sortValueEquals(value, b[i] ?? null));
}

/**
 * Whether a row's sort descriptor values changed between two snapshots.
 * Unknown (restored) values never count as a change.
 */
export function sortValuesChanged(previous: RowIdentity, next: RowIdentity): boolean {
  return hasRecordedValues(previous) && !valuesEqual(previous.sortValues, next.sortValues);
}

/**
 * "Needs update" equality: sort values plus tracked values.
 */
export function rowNeedsUpdate(previous: RowIdentity, next: RowIdentity): boolean {
  if (!hasRecordedValues(previous)) {
    return false;
  }
  return (
    !valuesEqual(previous.sortValues, next.sortValues) ||
    !valuesEqual(previous.trackedValues, next.trackedValues)
  );
}

function typeRank(value: SortValue): number {
  if (value === null) return 0;
  if (typeof value === 'boolean') return 1;
  if (typeof value === 'number') return 2;
  if (typeof value === 'string') return 3;
  return 4;
}

/**
 * Total order over SortValues: null < booleans < numbers < strings < dates.
 */
export function compareSortValues(a: SortValue, b: SortValue): number {
  const rankDiff = typeRank(a) - typeRank(b);
  if (rankDiff !== 0) {
    return Math.sign(rankDiff);
  }
  if (a instanceof Date && b instanceof Date) {
    return Math.sign(a.getTime() - b.getTime());
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return Math.sign(a - b);
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return 0;
}
