/**
 * Layout Cursor
 *
 * Mutable working copy of a layout used during one diff cycle.
 * Every emitted event's index path is read from the cursor at the moment of
 * emission, then applied, so later paths see earlier changes.
 *
 * @module layout/layout-cursor
 */

import { isSameRow } from '../row/row-identity.js';
import { ResultsControllerError } from '../shared/errors/results-controller.error.js';
import type { IndexPath, RowIdentity, SectionKey, StableKey } from '../row/row.types.js';
import type { Layout, Section } from './layout.types.js';
import { cloneLayout } from './utils.js';

/**
 * Section slot owned by the cursor.
 */
interface CursorSection {
  name: SectionKey | null;
  rows: RowIdentity[];
}

export class LayoutCursor {
  private readonly sections: CursorSection[] = [];

  /** Map of row id → section currently holding it */
  private readonly rowSections = new Map<StableKey, CursorSection>();

  /**
   * Create a cursor holding a copy of the given layout.
   *
   * @throws ResultsControllerError (INVARIANT_VIOLATION) on duplicate section keys or row ids
   */
  static fromLayout(layout: Layout): LayoutCursor {
    const cursor = new LayoutCursor();
    const copy = cloneLayout(layout);
    copy.sections.forEach((section, sectionIndex) => {
      cursor.applySectionInsert(section.name, sectionIndex);
      section.rows.forEach((row, rowIndex) => {
        cursor.applyRowInsert(row, { section: sectionIndex, row: rowIndex });
      });
    });
    return cursor;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  get sectionCount(): number {
    return this.sections.length;
  }

  get rowTotal(): number {
    return this.rowSections.size;
  }

  sectionNameAt(index: number): SectionKey | null | undefined {
    return this.sections[index]?.name;
  }

  sectionNames(): (SectionKey | null)[] {
    return this.sections.map((section) => section.name);
  }

  sectionIndexOf(name: SectionKey | null): number {
    return this.sections.findIndex((section) => section.name === name);
  }

  rowCount(sectionIndex: number): number {
    return this.sections[sectionIndex]?.rows.length ?? 0;
  }

  rowAt(indexPath: IndexPath): RowIdentity | undefined {
    return this.sections[indexPath.section]?.rows[indexPath.row];
  }

  /**
   * Rows of a section, in order. Empty for an unknown index.
   */
  rowsIn(sectionIndex: number): readonly RowIdentity[] {
    return this.sections[sectionIndex]?.rows ?? [];
  }

  indexPathOf(id: StableKey): IndexPath | undefined {
    const owner = this.rowSections.get(id);
    if (!owner) {
      return undefined;
    }
    return {
      section: this.sections.indexOf(owner),
      row: owner.rows.findIndex((row) => row.id === id),
    };
  }

  /**
   * Snapshot of the current state as a plain layout.
   */
  toLayout(): Layout {
    return cloneLayout({ sections: this.sections });
  }

  // ==========================================================================
  // Section Mutators
  // ==========================================================================

  applySectionInsert(name: SectionKey | null, atIndex: number): void {
    this.assertIndex(atIndex, this.sections.length, 'section insert index');
    if (this.sectionIndexOf(name) !== -1) {
      throw ResultsControllerError.invariant(`section "${String(name)}" already exists`, {
        name,
      });
    }
    this.sections.splice(atIndex, 0, { name, rows: [] });
  }

  /**
   * Remove a section together with its rows.
   *
   * @returns The removed section
   */
  applySectionDelete(atIndex: number): Section {
    this.assertIndex(atIndex, this.sections.length - 1, 'section delete index');
    const [removed] = this.sections.splice(atIndex, 1);
    for (const row of removed.rows) {
      this.rowSections.delete(row.id);
    }
    return removed;
  }

  // ==========================================================================
  // Row Mutators
  // ==========================================================================

  applyRowInsert(row: RowIdentity, indexPath: IndexPath): void {
    const section = this.sectionFor(indexPath.section);
    this.assertIndex(indexPath.row, section.rows.length, 'row insert index');
    if (this.rowSections.has(row.id)) {
      throw ResultsControllerError.invariant(`duplicate row id ${String(row.id)}`, {
        id: row.id,
      });
    }
    section.rows.splice(indexPath.row, 0, row);
    this.rowSections.set(row.id, section);
  }

  /**
   * @returns The removed row
   */
  applyRowDelete(indexPath: IndexPath): RowIdentity {
    const section = this.sectionFor(indexPath.section);
    this.assertIndex(indexPath.row, section.rows.length - 1, 'row delete index');
    const [removed] = section.rows.splice(indexPath.row, 1);
    this.rowSections.delete(removed.id);
    return removed;
  }

  /**
   * Move a row: remove at `from`, then insert at `to` in the resulting state.
   * The moved row's payload is replaced by `row` when given.
   */
  applyRowMove(from: IndexPath, to: IndexPath, row?: RowIdentity): void {
    const removed = this.applyRowDelete(from);
    this.applyRowInsert(row ?? removed, to);
  }

  /**
   * Replace a row's payload in place. The id must not change.
   */
  applyRowUpdate(row: RowIdentity, indexPath: IndexPath): void {
    const current = this.rowAt(indexPath);
    if (!current || !isSameRow(current, row)) {
      throw ResultsControllerError.invariant(
        `row ${String(row.id)} is not at ${indexPath.section}:${indexPath.row}`,
        { id: row.id, indexPath }
      );
    }
    this.sectionFor(indexPath.section).rows[indexPath.row] = row;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private sectionFor(index: number): CursorSection {
    const section = this.sections[index];
    if (!section) {
      throw ResultsControllerError.invariant(`section index ${index} out of range`, {
        index,
        sectionCount: this.sections.length,
      });
    }
    return section;
  }

  private assertIndex(index: number, max: number, what: string): void {
    if (!Number.isInteger(index) || index < 0 || index > max) {
      throw ResultsControllerError.invariant(`${what} ${index} out of range 0..${max}`, {
        index,
        max,
      });
    }
  }
}
