/**
 * Change Event Types
 *
 * Structural changes that transform one layout into the next, in the order a
 * consumer should apply them.
 */

import type { IndexPath, RowIdentity, SectionKey } from '../row/row.types.js';
import type { Layout } from '../layout/layout.types.js';

// ============================================================================
// Section Events
// ============================================================================

export interface SectionInsertEvent {
  type: 'section-insert';
  section: SectionKey | null;
  atIndex: number;
}

export interface SectionDeleteEvent {
  type: 'section-delete';
  section: SectionKey | null;
  atIndex: number;
}

export type SectionChangeEvent = SectionInsertEvent | SectionDeleteEvent;

// ============================================================================
// Row Events
// ============================================================================

export interface RowInsertEvent {
  type: 'row-insert';
  row: RowIdentity;
  atIndexPath: IndexPath;
}

export interface RowDeleteEvent {
  type: 'row-delete';
  row: RowIdentity;
  atIndexPath: IndexPath;
}

/**
 * Row changed position. Applied as remove at `fromIndexPath`, then insert at
 * `toIndexPath` in the resulting state. Implies an update.
 */
export interface RowMoveEvent {
  type: 'row-move';
  row: RowIdentity;
  fromIndexPath: IndexPath;
  toIndexPath: IndexPath;
}

export interface RowUpdateEvent {
  type: 'row-update';
  row: RowIdentity;
  atIndexPath: IndexPath;
}

export type RowChangeEvent = RowInsertEvent | RowDeleteEvent | RowMoveEvent | RowUpdateEvent;

export type ChangeEvent = SectionChangeEvent | RowChangeEvent;

export type ChangeEventType = ChangeEvent['type'];

// ============================================================================
// Diff Options & Result
// ============================================================================

/**
 * Diff engine options.
 */
export interface DiffOptions {
  /**
   * Report each row of a removed section as a row-delete right before the
   * section-delete (default: false, rows leave with their section).
   */
  rowEventsForRemovedSections?: boolean;
}

/**
 * Result of one diff cycle.
 */
export interface DiffResult {
  /** Events in application order */
  events: ChangeEvent[];

  /** Layout reached after applying every event */
  layout: Layout;
}

/**
 * Narrow an event to the section-level variants.
 */
export function isSectionEvent(event: ChangeEvent): event is SectionChangeEvent {
  return event.type === 'section-insert' || event.type === 'section-delete';
}
