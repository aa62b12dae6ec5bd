/**
 * Diff Engine
 *
 * Computes the ordered change events that turn a cached layout into a newly
 * fetched one. Two passes: sections first, then rows joined by id.
 * Every index path is read from the cursor when the event is emitted and the
 * event is applied to the cursor right away, so replaying the events in order
 * on a copy of the old layout yields the new layout.
 *
 * Row heuristics:
 * - Removed and inserted rows are reported alone; rows after them are
 *   renumbered implicitly.
 * - A row whose sort values changed and no longer fits between its
 *   neighbours is moved. A move implies an update; none is reported.
 * - A row that keeps its place but whose sort or tracked values changed is
 *   updated.
 *
 * @module diff/diff-engine
 */

import { LayoutCursor } from '../layout/layout-cursor.js';
import type { Layout, Section } from '../layout/layout.types.js';
import { isSameRow, rowNeedsUpdate, sortValuesChanged } from '../row/row-identity.js';
import type { RowIdentity, SectionKey, StableKey } from '../row/row.types.js';
import { ResultsControllerError } from '../shared/errors/results-controller.error.js';
import type { ChangeEvent, DiffOptions, DiffResult } from './diff.types.js';
import { longestIncreasingSubsequence } from './utils.js';

/**
 * Where a row ends up in the new layout.
 */
interface TargetLocation {
  row: RowIdentity;
  section: number;
  index: number;
}

/**
 * A cursor row whose target lies in the section it currently occupies.
 */
interface Candidate {
  previous: RowIdentity;
  target: TargetLocation;
}

// ============================================================================
// Snapshot Grouping
// ============================================================================

/**
 * Group an ordered row sequence into sections, by first appearance of each
 * section key. Row order within a section follows the input order.
 */
export function buildLayout(rows: readonly RowIdentity[]): Layout {
  const sections = new Map<SectionKey | null, Section>();
  for (const row of rows) {
    let section = sections.get(row.sectionKey);
    if (!section) {
      section = { name: row.sectionKey, rows: [] };
      sections.set(row.sectionKey, section);
    }
    section.rows.push(row);
  }
  return { sections: Array.from(sections.values()) };
}

/**
 * Index the rows of the new layout by id.
 *
 * @throws ResultsControllerError (INVARIANT_VIOLATION) on duplicate ids or
 *   sections, or an empty section
 */
function indexTargets(next: Layout): Map<StableKey, TargetLocation> {
  const sectionNames = new Set<SectionKey | null>();
  const targets = new Map<StableKey, TargetLocation>();

  next.sections.forEach((section, sectionIndex) => {
    if (sectionNames.has(section.name)) {
      throw ResultsControllerError.invariant(`duplicate section "${String(section.name)}"`, {
        section: section.name,
      });
    }
    if (section.rows.length === 0) {
      throw ResultsControllerError.invariant(`section "${String(section.name)}" is empty`, {
        section: section.name,
      });
    }
    sectionNames.add(section.name);

    section.rows.forEach((row, index) => {
      if (targets.has(row.id)) {
        throw ResultsControllerError.invariant(`duplicate row id ${String(row.id)} in snapshot`, {
          id: row.id,
        });
      }
      targets.set(row.id, { row, section: sectionIndex, index });
    });
  });

  return targets;
}

// ============================================================================
// Pass 1: Sections
// ============================================================================

/**
 * Delete sections that are gone (or out of order), then insert new ones.
 * Afterwards the cursor has exactly the new layout's sections, in order.
 */
function diffSections(
  cursor: LayoutCursor,
  next: Layout,
  events: ChangeEvent[],
  options: DiffOptions
): void {
  const nextIndex = new Map(next.sections.map((section, index) => [section.name, index]));

  // Surviving sections keep their place only if their relative order holds
  const survivorIndexes: number[] = [];
  const survivorTargets: number[] = [];
  cursor.sectionNames().forEach((name, index) => {
    const target = nextIndex.get(name);
    if (target !== undefined) {
      survivorIndexes.push(index);
      survivorTargets.push(target);
    }
  });
  const ordered = longestIncreasingSubsequence(survivorTargets);
  const kept = new Set(survivorIndexes.filter((_, i) => ordered.has(i)));

  for (let atIndex = cursor.sectionCount - 1; atIndex >= 0; atIndex--) {
    if (kept.has(atIndex)) continue;

    if (options.rowEventsForRemovedSections) {
      for (let row = cursor.rowCount(atIndex) - 1; row >= 0; row--) {
        const atIndexPath = { section: atIndex, row };
        const removed = cursor.applyRowDelete(atIndexPath);
        events.push({ type: 'row-delete', row: removed, atIndexPath });
      }
    }

    const removed = cursor.applySectionDelete(atIndex);
    events.push({ type: 'section-delete', section: removed.name, atIndex });
  }

  next.sections.forEach((section, atIndex) => {
    if (cursor.sectionIndexOf(section.name) === -1) {
      cursor.applySectionInsert(section.name, atIndex);
      events.push({ type: 'section-insert', section: section.name, atIndex });
    }
  });
}

// ============================================================================
// Pass 2: Rows
// ============================================================================

/**
 * Delete rows that left the result, last path first.
 */
function deleteRemovedRows(
  cursor: LayoutCursor,
  targets: Map<StableKey, TargetLocation>,
  events: ChangeEvent[]
): void {
  for (let section = cursor.sectionCount - 1; section >= 0; section--) {
    for (let row = cursor.rowCount(section) - 1; row >= 0; row--) {
      const atIndexPath = { section, row };
      const current = cursor.rowAt(atIndexPath);
      if (current && !targets.has(current.id)) {
        cursor.applyRowDelete(atIndexPath);
        events.push({ type: 'row-delete', row: current, atIndexPath });
      }
    }
  }
}

/**
 * Rows that stay where they are.
 *
 * Rows with unchanged sort values anchor each section (the longest run that
 * is already in target order). Rows whose sort values changed stay too when
 * they still fit between the anchors around them.
 */
function findStableRows(
  cursor: LayoutCursor,
  targets: Map<StableKey, TargetLocation>
): Set<StableKey> {
  const stable = new Set<StableKey>();

  for (let section = 0; section < cursor.sectionCount; section++) {
    const candidates: Candidate[] = [];
    for (const previous of cursor.rowsIn(section)) {
      const target = targets.get(previous.id);
      if (target && target.section === section) {
        candidates.push({ previous, target });
      }
    }

    const unchanged = candidates.filter((c) => !sortValuesChanged(c.previous, c.target.row));
    const anchors = longestIncreasingSubsequence(unchanged.map((c) => c.target.index));
    unchanged.forEach((c, i) => {
      if (anchors.has(i)) stable.add(c.previous.id);
    });

    let gap: Candidate[] = [];
    let lower = -1;
    const settleGap = (upper: number): void => {
      const fitting = gap.filter((c) => c.target.index > lower && c.target.index < upper);
      const fits = longestIncreasingSubsequence(fitting.map((c) => c.target.index));
      fitting.forEach((c, i) => {
        if (fits.has(i)) stable.add(c.previous.id);
      });
      gap = [];
    };

    for (const candidate of candidates) {
      if (stable.has(candidate.previous.id)) {
        settleGap(candidate.target.index);
        lower = candidate.target.index;
      } else if (sortValuesChanged(candidate.previous, candidate.target.row)) {
        gap.push(candidate);
      }
    }
    settleGap(Number.POSITIVE_INFINITY);
  }

  return stable;
}

/**
 * Walk the new layout in order, inserting, pulling or keeping each row right
 * after the last row already placed in its section.
 */
function placeRows(
  cursor: LayoutCursor,
  next: Layout,
  stable: Set<StableKey>,
  events: ChangeEvent[]
): void {
  next.sections.forEach((section, sectionIndex) => {
    let lastPlaced = -1;

    for (const row of section.rows) {
      const current = cursor.indexPathOf(row.id);

      if (!current) {
        const atIndexPath = { section: sectionIndex, row: lastPlaced + 1 };
        cursor.applyRowInsert(row, atIndexPath);
        events.push({ type: 'row-insert', row, atIndexPath });
        lastPlaced = atIndexPath.row;
        continue;
      }

      const inPlace =
        current.section === sectionIndex &&
        (stable.has(row.id) || current.row === lastPlaced + 1);

      if (inPlace) {
        const previous = cursor.rowAt(current);
        if (!previous || current.row <= lastPlaced) {
          throw ResultsControllerError.invariant(`row ${String(row.id)} is out of order`, {
            id: row.id,
            indexPath: current,
          });
        }
        if (rowNeedsUpdate(previous, row)) {
          events.push({ type: 'row-update', row, atIndexPath: current });
        }
        cursor.applyRowUpdate(row, current);
        lastPlaced = current.row;
        continue;
      }

      // Removing a row that sits before the last placed one shifts it up
      const shift = current.section === sectionIndex && current.row < lastPlaced ? 1 : 0;
      const toIndexPath = { section: sectionIndex, row: lastPlaced - shift + 1 };
      cursor.applyRowMove(current, toIndexPath, row);
      events.push({ type: 'row-move', row, fromIndexPath: current, toIndexPath });
      lastPlaced = toIndexPath.row;
    }
  });
}

function assertReached(cursor: LayoutCursor, next: Layout): void {
  const reached =
    cursor.sectionCount === next.sections.length &&
    next.sections.every(
      (section, s) =>
        cursor.sectionNameAt(s) === section.name &&
        cursor.rowCount(s) === section.rows.length &&
        section.rows.every((row, r) => {
          const current = cursor.rowAt({ section: s, row: r });
          return current !== undefined && isSameRow(current, row);
        })
    );
  if (!reached) {
    throw ResultsControllerError.invariant('change events do not reproduce the new layout');
  }
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Compute the change events from the cursor's state to `next`.
 * The cursor is mutated and ends in the new layout; on error it must be
 * discarded.
 *
 * @param cursor - Working copy of the previous layout
 * @param next - Newly fetched layout (no empty sections, unique ids)
 * @param options - Diff options
 * @throws ResultsControllerError (INVARIANT_VIOLATION) on a malformed snapshot
 */
export function computeChanges(
  cursor: LayoutCursor,
  next: Layout,
  options: DiffOptions = {}
): DiffResult {
  const targets = indexTargets(next);
  const events: ChangeEvent[] = [];

  diffSections(cursor, next, events, options);
  deleteRemovedRows(cursor, targets, events);
  placeRows(cursor, next, findStableRows(cursor, targets), events);
  assertReached(cursor, next);

  return { events, layout: cursor.toLayout() };
}

/**
 * Diff two plain layouts without touching either.
 */
export function diffLayouts(previous: Layout, next: Layout, options: DiffOptions = {}): DiffResult {
  return computeChanges(LayoutCursor.fromLayout(previous), next, options);
}
