/**
 * @fileoverview Calendar tagger wiring.
 */

import config from '../../../config.js';
import { GoogleCalendar } from '../providers/google-calendar.js';
import type { CalendarCollaborator } from '../types.js';

export { detectEvent, scoreExtractedDate, DEFAULT_MIN_CONFIDENCE } from '../service/detect.js';
export type { DetectEventOptions } from '../service/detect.js';
export { findConflicts, intervalsOverlap } from '../service/conflicts.js';
export { GoogleCalendar, toExistingEvent, buildEventResource } from '../providers/google-calendar.js';
export type * from '../types.js';

let calendar: CalendarCollaborator | null = null;

/**
 * The configured calendar, or null when calendar tagging is disabled.
 */
export function getCalendar(): CalendarCollaborator | null {
  if (!config.calendar.enabled) return null;
  if (!calendar) {
    calendar = new GoogleCalendar({
      calendarId: config.calendar.calendarId,
      timezone: config.timezone,
      defaultEventMinutes: config.calendar.defaultEventMinutes,
      conflictTag: config.calendar.conflictTag,
      reminderMinutes: config.calendar.reminderMinutes,
    });
  }
  return calendar;
}
