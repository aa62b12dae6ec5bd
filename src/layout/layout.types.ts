/**
 * Layout Types
 *
 * Sectioned, ordered row structure as materialized by a controller.
 */

import type { RowIdentity, SectionKey } from '../row/row.types.js';

/**
 * One section of a layout.
 */
export interface Section {
  /** Section key, `null` for the implicit section of an ungrouped controller */
  name: SectionKey | null;

  /** Rows in sort order */
  rows: RowIdentity[];
}

/**
 * Ordered sections. At most one section per key; no empty sections.
 */
export interface Layout {
  sections: Section[];
}

/**
 * Create a layout with no sections.
 */
export function emptyLayout(): Layout {
  return { sections: [] };
}
