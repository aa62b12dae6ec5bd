/**
 * Change Event Logger
 *
 * Captures delivered change events for post-mortem analysis of consumer-side
 * inconsistencies (e.g. a table view rejecting an update batch).
 */

import type { ChangeEvent } from '../diff/diff.types.js';
import type { IndexPath } from '../row/row.types.js';

/** Single captured change event */
export interface ChangeEventEntry {
  /** Diff cycle the event belongs to */
  cycle: number;
  /** Cache name of the emitting controller, when it has one */
  source?: string;
  event: ChangeEvent;
  localTimestamp: number;
}

/**
 * Change event logger options
 */
export interface ChangeEventLoggerOptions {
  /** Maximum number of events kept (default: 200) */
  maxEvents?: number;
  /** Also write each event to stderr */
  echo?: boolean;
}

const DEFAULT_MAX_EVENTS = 200;

function formatPath(indexPath: IndexPath): string {
  return `${indexPath.section}:${indexPath.row}`;
}

/**
 * One-line rendering of a change event.
 */
export function formatChangeEvent(event: ChangeEvent): string {
  switch (event.type) {
    case 'section-insert':
    case 'section-delete':
      return `${event.type} ${JSON.stringify(event.section)} @${event.atIndex}`;
    case 'row-insert':
    case 'row-delete':
    case 'row-update':
      return `${event.type} ${String(event.row.id)} @${formatPath(event.atIndexPath)}`;
    case 'row-move':
      return `${event.type} ${String(event.row.id)} ${formatPath(event.fromIndexPath)} -> ${formatPath(event.toIndexPath)}`;
  }
}

/**
 * Bounded buffer of delivered change events.
 *
 * Usage:
 * 1. Pass the logger to a controller (or enable RESULTS_DEBUG_EVENTS)
 * 2. When the consumer fails to apply a batch, read formatForDiagnostics()
 * 3. Clear before the next attempt
 */
export class ChangeEventLogger {
  private events: ChangeEventEntry[] = [];
  private readonly maxEvents: number;
  private readonly echo: boolean;
  private cycle = 0;

  constructor(options: ChangeEventLoggerOptions = {}) {
    this.maxEvents = options.maxEvents ?? DEFAULT_MAX_EVENTS;
    this.echo = options.echo ?? false;
  }

  /**
   * Mark the start of a new diff cycle.
   */
  beginCycle(): void {
    this.cycle++;
  }

  record(event: ChangeEvent, source?: string): void {
    // Trim old events if at capacity
    if (this.events.length >= this.maxEvents) {
      this.events.shift();
    }

    this.events.push({ cycle: this.cycle, source, event, localTimestamp: Date.now() });

    if (this.echo) {
      console.error(`[EVENTS]${source ? ` ${source}` : ''} #${this.cycle} ${formatChangeEvent(event)}`);
    }
  }

  /**
   * Get all captured events.
   */
  getEvents(): ChangeEventEntry[] {
    return [...this.events];
  }

  /**
   * Clear captured events.
   */
  clear(): void {
    this.events = [];
  }

  /**
   * Get events as formatted diagnostic string.
   */
  formatForDiagnostics(): string {
    if (this.events.length === 0) {
      return 'No change events captured';
    }

    return this.events
      .map((e) => `[${e.localTimestamp}] #${e.cycle} ${formatChangeEvent(e.event)}`)
      .join('\n');
  }
}
