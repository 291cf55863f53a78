/**
 * @fileoverview Date/time extraction from free text.
 *
 * Uses chrono-node for natural language parsing with Luxon for timezone
 * handling. Shared by the urgency scorer (deadline detection) and the
 * calendar tagger (event candidates).
 */

import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';

export type ExtractedDate = {
  /** Matched phrase as it appears in the input. */
  text: string;
  /** Character offset of the phrase in the input. */
  index: number;
  start: Date;
  end?: Date;
  hasExplicitHour: boolean;
  /** Day, weekday or month was stated (including "today"/"tomorrow"). */
  hasExplicitDay: boolean;
};

export type ExtractDatesOptions = {
  timezone: string; // IANA timezone
  referenceDate: Date;
  /** Resolve ambiguous phrases ("Friday", "3pm") to the future (default: true). */
  forwardDate?: boolean;
};

/**
 * Collaborator contract used by the scorer and tagger so tests can swap in
 * fixed results.
 */
export interface DateExtractor {
  extract(text: string, referenceDate: Date): ExtractedDate[];
}

/**
 * Extract every date/time phrase chrono recognises in `text`.
 */
export function extractDates(text: string, options: ExtractDatesOptions): ExtractedDate[] {
  if (!text.trim()) return [];

  const offsetMinutes = getTimezoneOffsetMinutes(options.referenceDate, options.timezone);
  const results = chrono.parse(
    text,
    { instant: options.referenceDate, timezone: offsetMinutes },
    { forwardDate: options.forwardDate ?? true }
  );

  return results.map((result) => ({
    text: result.text,
    index: result.index,
    start: result.start.date(),
    end: result.end ? result.end.date() : undefined,
    hasExplicitHour: result.start.isCertain('hour'),
    hasExplicitDay:
      result.start.isCertain('day') ||
      result.start.isCertain('weekday') ||
      result.start.isCertain('month'),
  }));
}

/**
 * Build a chrono-backed extractor bound to one timezone.
 */
export function createDateExtractor(timezone: string): DateExtractor {
  return {
    extract: (text, referenceDate) => extractDates(text, { timezone, referenceDate }),
  };
}

/**
 * Validate IANA timezone string.
 */
export function isValidTimezone(timezone: string): boolean {
  return DateTime.now().setZone(timezone).isValid;
}

/**
 * Get timezone offset in minutes for a given date and timezone.
 * Handles DST correctly.
 */
export function getTimezoneOffsetMinutes(date: Date, timezone: string): number {
  const dt = DateTime.fromJSDate(date, { zone: 'utc' }).setZone(timezone);
  if (!dt.isValid) {
    throw new Error(`Invalid timezone: "${timezone}"`);
  }
  return dt.offset;
}

/**
 * Format a date for display in the user's timezone, e.g. "Fri 30 Jan 15:00".
 */
export function formatInTimezone(date: Date, timezone: string, format = 'ccc d LLL HH:mm'): string {
  const dt = DateTime.fromJSDate(date, { zone: 'utc' }).setZone(timezone);
  if (!dt.isValid) {
    return date.toISOString();
  }
  return dt.setLocale('en-US').toFormat(format);
}
