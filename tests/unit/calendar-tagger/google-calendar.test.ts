import { beforeEach, describe, expect, it } from 'vitest';
import {
  GoogleCalendar,
  buildEventResource,
  toExistingEvent,
  type GoogleCalendarOptions,
} from '../../../src/domains/calendar-tagger/providers/google-calendar.js';
import type { EventCandidate } from '../../../src/domains/calendar-tagger/types.js';
import { clearClientCache } from '../../../src/domains/google-core/providers/auth.js';
import {
  clearMockState,
  getLastInsertedEvent,
  mockEventsList,
  setMockEvents,
} from '../../mocks/googleapis.js';

const calendarOptions: GoogleCalendarOptions = {
  calendarId: 'primary',
  timezone: 'UTC',
  defaultEventMinutes: 60,
  conflictTag: '**CONFLICT**',
  reminderMinutes: 30,
};

const candidate: EventCandidate = {
  title: 'Project sync',
  start: new Date('2026-01-29T10:00:00Z'),
  location: 'Room 4B',
  meetingLink: 'https://zoom.us/j/123',
  conflictsWith: [],
  confidence: 0.85,
};

describe('toExistingEvent', () => {
  it('converts timed events', () => {
    expect(
      toExistingEvent(
        {
          id: 'e1',
          summary: 'Standup',
          start: { dateTime: '2026-01-29T10:30:00Z' },
          end: { dateTime: '2026-01-29T11:00:00Z' },
        },
        'UTC'
      )
    ).toEqual({
      id: 'e1',
      title: 'Standup',
      start: new Date('2026-01-29T10:30:00Z'),
      end: new Date('2026-01-29T11:00:00Z'),
    });
  });

  it('places all-day events at local midnight', () => {
    const event = toExistingEvent(
      { id: 'e2', start: { date: '2026-01-29' }, end: { date: '2026-01-30' } },
      'America/New_York'
    );

    expect(event).toEqual({
      id: 'e2',
      title: '(untitled)',
      start: new Date('2026-01-29T05:00:00Z'),
      end: new Date('2026-01-30T05:00:00Z'),
    });
  });

  it('skips cancelled, free and malformed events', () => {
    const times = { start: { dateTime: '2026-01-29T10:30:00Z' }, end: { dateTime: '2026-01-29T11:00:00Z' } };
    expect(toExistingEvent({ id: 'c', status: 'cancelled', ...times }, 'UTC')).toBeNull();
    expect(toExistingEvent({ id: 'f', transparency: 'transparent', ...times }, 'UTC')).toBeNull();
    expect(toExistingEvent({ ...times }, 'UTC')).toBeNull();
    expect(toExistingEvent({ id: 'm', start: { dateTime: 'not a date' }, end: times.end }, 'UTC')).toBeNull();
  });
});

describe('buildEventResource', () => {
  it('fills in the default duration, link and reminder', () => {
    expect(buildEventResource(candidate, calendarOptions)).toEqual({
      summary: 'Project sync',
      location: 'Room 4B',
      description: 'Join: https://zoom.us/j/123',
      start: { dateTime: '2026-01-29T10:00:00.000Z', timeZone: 'UTC' },
      end: { dateTime: '2026-01-29T11:00:00.000Z', timeZone: 'UTC' },
      reminders: { useDefault: false, overrides: [{ method: 'popup', minutes: 30 }] },
    });
  });

  it('tags the title when the event conflicts', () => {
    const resource = buildEventResource({ ...candidate, conflictsWith: ['standup'] }, calendarOptions);
    expect(resource.summary).toBe('**CONFLICT** Project sync');
  });
});

describe('GoogleCalendar', () => {
  beforeEach(() => {
    clearMockState();
    clearClientCache();
  });

  it('lists upcoming events in the window', async () => {
    setMockEvents([
      {
        id: 'e1',
        summary: 'Standup',
        start: { dateTime: '2026-01-29T10:30:00Z' },
        end: { dateTime: '2026-01-29T11:00:00Z' },
      },
      {
        id: 'e2',
        summary: 'Holiday',
        status: 'cancelled',
        start: { date: '2026-01-30' },
        end: { date: '2026-01-31' },
      },
    ]);
    const window = { start: new Date('2026-01-26T09:00:00Z'), end: new Date('2026-02-25T09:00:00Z') };

    const events = await new GoogleCalendar(calendarOptions).listUpcomingEvents(window);

    expect(events.map((event) => event.id)).toEqual(['e1']);
    expect(mockEventsList).toHaveBeenCalledWith({
      calendarId: 'primary',
      timeMin: '2026-01-26T09:00:00.000Z',
      timeMax: '2026-02-25T09:00:00.000Z',
      singleEvents: true,
      orderBy: 'startTime',
      maxResults: 250,
    });
  });

  it('creates events and returns the new id', async () => {
    const id = await new GoogleCalendar(calendarOptions).createEvent({ ...candidate, conflictsWith: ['standup'] });

    expect(id).toBe('new-event-id');
    expect(getLastInsertedEvent()?.summary).toBe('**CONFLICT** Project sync');
  });
});
