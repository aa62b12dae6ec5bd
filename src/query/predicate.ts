/**
 * Predicate Evaluation
 *
 * Evaluates declarative fetch request conditions and sort descriptors
 * against plain objects.
 */

import {
  compareSortValues,
  readKeyPath,
  sortValueEquals,
  toSortValue,
} from '../row/row-identity.js';
import type { SortValue } from '../row/row.types.js';
import type { Condition, FetchRequest } from './fetch-request.schemas.js';

function isSortValue(value: unknown): value is SortValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  );
}

/**
 * Whether an object satisfies one condition.
 * Ordering operators never match a null on either side.
 */
export function matchesCondition(object: unknown, condition: Condition): boolean {
  const raw = readKeyPath(object, condition.keyPath);
  const { op, value } = condition;

  if (op === 'contains') {
    if (typeof raw === 'string' && typeof value === 'string') {
      return raw.includes(value);
    }
    if (Array.isArray(raw) && !Array.isArray(value)) {
      return raw.some((item) => isSortValue(item) && sortValueEquals(item, value));
    }
    return false;
  }

  const actual = toSortValue(raw, condition.keyPath);

  if (op === 'in') {
    return Array.isArray(value) && value.some((candidate) => sortValueEquals(actual, candidate));
  }
  if (Array.isArray(value)) {
    return false;
  }

  switch (op) {
    case 'eq':
      return sortValueEquals(actual, value);
    case 'neq':
      return !sortValueEquals(actual, value);
    case 'lt':
      return compareOrdered(actual, value, (order) => order < 0);
    case 'lte':
      return compareOrdered(actual, value, (order) => order <= 0);
    case 'gt':
      return compareOrdered(actual, value, (order) => order > 0);
    case 'gte':
      return compareOrdered(actual, value, (order) => order >= 0);
  }
}

function compareOrdered(
  actual: SortValue,
  expected: SortValue,
  accept: (order: number) => boolean
): boolean {
  if (actual === null || expected === null) {
    return false;
  }
  return accept(compareSortValues(actual, expected));
}

/**
 * Whether an object satisfies every condition of the request.
 */
export function matchesRequest(object: unknown, request: FetchRequest): boolean {
  return request.predicate.every((condition) => matchesCondition(object, condition));
}

/**
 * Sort objects by the request's descriptors. The sort is stable: objects that
 * compare equal on every descriptor keep their input order.
 */
export function sortByDescriptors<T>(objects: readonly T[], request: FetchRequest): T[] {
  const keyed = objects.map((object) => ({
    object,
    values: request.sortDescriptors.map((d) => toSortValue(readKeyPath(object, d.keyPath), d.keyPath)),
  }));

  keyed.sort((a, b) => {
    for (let i = 0; i < request.sortDescriptors.length; i++) {
      const order = compareSortValues(a.values[i], b.values[i]);
      if (order !== 0) {
        return request.sortDescriptors[i].ascending ? order : -order;
      }
    }
    return 0;
  });

  return keyed.map((entry) => entry.object);
}
