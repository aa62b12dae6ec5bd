/**
 * Event Replay
 *
 * Applies change events in order to a plain layout, the way a consumer that
 * mirrors the controller's structure would.
 */

import { LayoutCursor } from '../layout/layout-cursor.js';
import type { Layout } from '../layout/layout.types.js';
import type { ChangeEvent } from './diff.types.js';

/**
 * Replay events against a copy of `layout`.
 *
 * @returns The resulting layout; `layout` is left untouched
 * @throws ResultsControllerError (INVARIANT_VIOLATION) if an event does not fit
 */
export function applyChangeEvents(layout: Layout, events: readonly ChangeEvent[]): Layout {
  const cursor = LayoutCursor.fromLayout(layout);

  for (const event of events) {
    switch (event.type) {
      case 'section-insert':
        cursor.applySectionInsert(event.section, event.atIndex);
        break;
      case 'section-delete':
        cursor.applySectionDelete(event.atIndex);
        break;
      case 'row-insert':
        cursor.applyRowInsert(event.row, event.atIndexPath);
        break;
      case 'row-delete':
        cursor.applyRowDelete(event.atIndexPath);
        break;
      case 'row-move':
        cursor.applyRowMove(event.fromIndexPath, event.toIndexPath, event.row);
        break;
      case 'row-update':
        cursor.applyRowUpdate(event.row, event.atIndexPath);
        break;
    }
  }

  return cursor.toLayout();
}
