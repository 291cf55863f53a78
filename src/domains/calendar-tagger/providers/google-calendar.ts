/**
 * @fileoverview Google Calendar collaborator.
 *
 * Lists upcoming events for conflict checks and creates events the user
 * accepts from a digest.
 */

import { google, type calendar_v3 } from 'googleapis';
import { DateTime } from 'luxon';
import { getAuthenticatedClient, withRetry } from '../../google-core/providers/auth.js';
import { createLogger } from '../../../utils/observability/index.js';
import { AppError } from '../../../utils/errors.js';
import type { CalendarCollaborator, EventCandidate, ExistingEvent, TimeWindow } from '../types.js';

const log = createLogger({ domain: 'google-calendar' });

const SERVICE_NAME = 'Calendar';

export interface GoogleCalendarOptions {
  calendarId: string;
  timezone: string;
  defaultEventMinutes: number;
  /** Prefixed to the title of an event created despite conflicts. */
  conflictTag: string;
  reminderMinutes: number;
}

async function getCalendarClient(): Promise<calendar_v3.Calendar> {
  const auth = await getAuthenticatedClient(SERVICE_NAME);
  return google.calendar({ version: 'v3', auth });
}

function toDate(time: calendar_v3.Schema$EventDateTime | undefined, timezone: string): Date | null {
  if (time?.dateTime) {
    const parsed = new Date(time.dateTime);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  if (time?.date) {
    // All-day events start at local midnight
    const day = DateTime.fromISO(time.date, { zone: time.timeZone ?? timezone });
    return day.isValid ? day.toJSDate() : null;
  }
  return null;
}

/**
 * Convert an API event into an ExistingEvent. Cancelled events, events marked
 * as free, and events without usable times are skipped.
 */
export function toExistingEvent(event: calendar_v3.Schema$Event, timezone: string): ExistingEvent | null {
  if (!event.id || event.status === 'cancelled' || event.transparency === 'transparent') {
    return null;
  }
  const start = toDate(event.start, timezone);
  const end = toDate(event.end, timezone);
  if (!start || !end) return null;

  return {
    id: event.id,
    title: event.summary ?? '(untitled)',
    start,
    end,
  };
}

/**
 * Request body for a created event.
 */
export function buildEventResource(
  candidate: EventCandidate,
  options: GoogleCalendarOptions
): calendar_v3.Schema$Event {
  const end = candidate.end ?? new Date(candidate.start.getTime() + options.defaultEventMinutes * 60 * 1000);
  const title = candidate.conflictsWith.length > 0
    ? `${options.conflictTag} ${candidate.title}`
    : candidate.title;
  const description = candidate.meetingLink ? `Join: ${candidate.meetingLink}` : undefined;

  return {
    summary: title,
    location: candidate.location,
    description,
    start: { dateTime: candidate.start.toISOString(), timeZone: options.timezone },
    end: { dateTime: end.toISOString(), timeZone: options.timezone },
    reminders: {
      useDefault: false,
      overrides: [{ method: 'popup', minutes: options.reminderMinutes }],
    },
  };
}

export class GoogleCalendar implements CalendarCollaborator {
  constructor(private readonly options: GoogleCalendarOptions) {}

  async listUpcomingEvents(window: TimeWindow): Promise<ExistingEvent[]> {
    const calendar = await getCalendarClient();
    const response = await withRetry(
      () => calendar.events.list({
        calendarId: this.options.calendarId,
        timeMin: window.start.toISOString(),
        timeMax: window.end.toISOString(),
        singleEvents: true,
        orderBy: 'startTime',
        maxResults: 250,
      }),
      SERVICE_NAME
    );

    const events = (response.data.items ?? [])
      .map((item) => toExistingEvent(item, this.options.timezone))
      .filter((event): event is ExistingEvent => event !== null);

    log.debug('calendar_events_listed', { count: events.length });
    return events;
  }

  async createEvent(candidate: EventCandidate): Promise<string> {
    const calendar = await getCalendarClient();
    const response = await withRetry(
      () => calendar.events.insert({
        calendarId: this.options.calendarId,
        requestBody: buildEventResource(candidate, this.options),
      }),
      SERVICE_NAME
    );

    const id = response.data.id;
    if (!id) {
      throw new AppError('Calendar did not return an event id', 'CALENDAR_CREATE_FAILED', true);
    }
    log.info('calendar_event_created', { eventId: id, hasConflicts: candidate.conflictsWith.length > 0 });
    return id;
  }
}
