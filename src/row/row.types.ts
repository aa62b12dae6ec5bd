/**
 * Row Types
 *
 * Minimal, copyable representation of a matched object as it appears in a
 * sectioned layout.
 */

/**
 * Stable identity of a matched object (its primary key value).
 */
export type StableKey = string | number;

/**
 * Section key derived from the section name key path.
 * `null` is the implicit, untitled section of an ungrouped controller.
 */
export type SectionKey = string;

/**
 * Comparable value captured from a sort descriptor or tracked key path.
 */
export type SortValue = string | number | boolean | Date | null;

/**
 * Snapshot of one row, safe to hand to another context.
 */
export interface RowIdentity {
  /** Primary key value, unique within a result */
  id: StableKey;

  /** Section the row belongs to (`null` when ungrouped) */
  sectionKey: SectionKey | null;

  /**
   * Values of the sort descriptors, in descriptor order.
   * Empty when the row was restored from durable storage.
   */
  sortValues: SortValue[];

  /** Values of the additionally tracked key paths, in configured order */
  trackedValues: SortValue[];
}

/**
 * Position of a row in a sectioned layout.
 */
export interface IndexPath {
  section: number;
  row: number;
}
