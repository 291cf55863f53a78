import { describe, expect, it } from 'vitest';
import { detectEvent, scoreExtractedDate, type DetectEventOptions } from '../../../src/domains/calendar-tagger/service/detect.js';
import type { ExistingEvent } from '../../../src/domains/calendar-tagger/types.js';
import type { ExtractedDate } from '../../../src/services/date/extractor.js';
import {
  REFERENCE_DATE,
  fixedExtractor,
  makeMessage,
  makeSummary,
  phraseExtractor,
  utcExtractor,
} from '../../helpers/fixtures.js';

function options(overrides: Partial<DetectEventOptions> = {}): DetectEventOptions {
  return {
    extractor: utcExtractor,
    referenceDate: REFERENCE_DATE,
    defaultDurationMinutes: 60,
    ...overrides,
  };
}

const existing: ExistingEvent[] = [
  {
    id: 'standup',
    title: 'Standup',
    start: new Date('2026-01-29T10:30:00Z'),
    end: new Date('2026-01-29T11:30:00Z'),
  },
  {
    id: 'review',
    title: 'Review',
    start: new Date('2026-01-29T11:00:00Z'),
    end: new Date('2026-01-29T12:00:00Z'),
  },
];

function extracted(overrides: Partial<ExtractedDate>): ExtractedDate {
  return {
    text: 'Tuesday 3pm',
    index: 0,
    start: new Date('2026-01-27T15:00:00Z'),
    hasExplicitHour: true,
    hasExplicitDay: true,
    ...overrides,
  };
}

describe('scoreExtractedDate', () => {
  it('adds up the signals', () => {
    const text = 'Call on Tuesday 3pm';
    const full = extracted({ index: 8, end: new Date('2026-01-27T16:00:00Z') });
    expect(scoreExtractedDate(text, full)).toBe(1);
    expect(scoreExtractedDate(text, extracted({ index: 8 }))).toBe(0.85);
    expect(scoreExtractedDate('Tuesday 3pm works', extracted({}))).toBe(0.65);
    expect(scoreExtractedDate('Tuesday works', extracted({ text: 'Tuesday', hasExplicitHour: false }))).toBe(0.25);
  });

  it('only counts meeting words in the same sentence', () => {
    const text = 'Dinner was great. Tuesday 3pm works.';
    expect(scoreExtractedDate(text, extracted({ index: 18 }))).toBe(0.65);
  });
});

describe('detectEvent', () => {
  const message = makeMessage({
    subject: 'Project sync',
    bodyText: 'Let us meet Thursday at 10am.\nLocation: Room 4B\nJoin https://zoom.us/j/123',
  });
  const thursday10 = new Date('2026-01-29T10:00:00Z');

  it('builds a candidate with location, link and conflicts', () => {
    const candidate = detectEvent(message, null, existing, options({
      extractor: phraseExtractor('Thursday at 10am', thursday10),
    }));

    expect(candidate).toEqual({
      title: 'Project sync',
      start: thursday10,
      end: undefined,
      location: 'Room 4B',
      meetingLink: 'https://zoom.us/j/123',
      conflictsWith: ['standup'],
      confidence: 0.85,
    });
  });

  it('uses an explicit end time for conflicts', () => {
    const candidate = detectEvent(message, null, existing, options({
      extractor: phraseExtractor('Thursday at 10am', thursday10, new Date('2026-01-29T11:15:00Z')),
    }));

    expect(candidate?.conflictsWith).toEqual(['standup', 'review']);
    expect(candidate?.confidence).toBe(1);
  });

  it('returns null below the confidence threshold', () => {
    const weak = fixedExtractor([extracted({ text: 'Tuesday', hasExplicitHour: false })]);
    expect(detectEvent(makeMessage({ subject: 'Note', bodyText: 'Tuesday works.' }), null, [], options({ extractor: weak }))).toBeNull();
  });

  it('ignores times that already passed', () => {
    const past = fixedExtractor([extracted({ start: new Date('2026-01-26T08:00:00Z') })]);
    expect(detectEvent(makeMessage({ subject: 'Call', bodyText: 'Call at 8am.' }), null, [], options({ extractor: past }))).toBeNull();
  });

  it('keeps the earliest phrase on a confidence tie', () => {
    const first = extracted({ text: 'Tuesday 3pm', index: 13, start: new Date('2026-01-27T15:00:00Z') });
    const second = extracted({ text: 'Wednesday 3pm', index: 28, start: new Date('2026-01-28T15:00:00Z') });
    const candidate = detectEvent(
      makeMessage({ subject: 'Availability', bodyText: 'Tuesday 3pm or Wednesday 3pm works.' }),
      null,
      [],
      options({ extractor: fixedExtractor([first, second]) })
    );

    expect(candidate?.start).toEqual(new Date('2026-01-27T15:00:00Z'));
  });

  it('falls back to the summary when the message has no date', () => {
    const friday = new Date('2026-01-30T12:00:00Z');
    const candidate = detectEvent(
      makeMessage({ subject: 'Plans', bodyText: 'See the summary.' }),
      makeSummary('Dinner Friday at noon.'),
      [],
      options({ extractor: phraseExtractor('Friday at noon', friday) })
    );

    expect(candidate?.start).toEqual(friday);
    expect(candidate?.confidence).toBe(0.85);
  });

  it('titles untitled mail and finds links in the HTML body', () => {
    const candidate = detectEvent(
      makeMessage({
        subject: '  ',
        bodyText: 'Interview Thursday at 10am.',
        bodyHtml: '<a href="https://meet.google.com/abc-defg-hij">Join</a>',
      }),
      null,
      [],
      options({ extractor: phraseExtractor('Thursday at 10am', thursday10) })
    );

    expect(candidate?.title).toBe('Event from email');
    expect(candidate?.meetingLink).toBe('https://meet.google.com/abc-defg-hij');
    expect(candidate?.location).toBeUndefined();
  });

  it('finds natural language times', () => {
    const candidate = detectEvent(
      makeMessage({ subject: 'Catch up', bodyText: 'See you tomorrow at 3pm.' }),
      null,
      [],
      options()
    );

    expect(candidate?.start).toEqual(new Date('2026-01-27T15:00:00Z'));
    expect(candidate?.confidence).toBe(0.65);
  });
});
