/**
 * Interval overlap against existing calendar events.
 */

import type { ExistingEvent, TimeWindow } from '../types.js';

/**
 * Half-open interval overlap: touching intervals do not overlap.
 */
export function intervalsOverlap(a: TimeWindow, b: TimeWindow): boolean {
  return a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();
}

/**
 * Ids of every event overlapping `interval`, in input order.
 */
export function findConflicts(interval: TimeWindow, events: readonly ExistingEvent[]): string[] {
  return events.filter((event) => intervalsOverlap(interval, event)).map((event) => event.id);
}
