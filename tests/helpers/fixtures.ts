/**
 * Shared builders for digest test data.
 */

import type { DateExtractor, ExtractedDate } from '../../src/services/date/extractor.js';
import { createDateExtractor } from '../../src/services/date/extractor.js';
import type { Message } from '../../src/domains/mailbox/types.js';
import type { SummaryResult, Summarizer, SummarySource } from '../../src/domains/summarization/types.js';

/** Monday 2026-01-26 09:00 UTC. */
export const REFERENCE_DATE = new Date('2026-01-26T09:00:00Z');

let counter = 0;

export function makeMessage(overrides: Partial<Message> = {}): Message {
  counter += 1;
  return {
    id: `msg-${counter}`,
    threadId: `thread-${counter}`,
    sender: { name: 'Test Sender', address: 'sender@example.com' },
    subject: 'Hello',
    bodyText: 'Just checking in.',
    receivedAt: new Date('2026-01-26T08:00:00Z'),
    ...overrides,
  };
}

export function makeSummary(text: string, overrides: Partial<SummaryResult> = {}): SummaryResult {
  return { text, provider: 'primary', fallbackUsed: false, truncated: false, ...overrides };
}

export const utcExtractor: DateExtractor = createDateExtractor('UTC');

/** Extractor returning fixed results regardless of input. */
export function fixedExtractor(dates: ExtractedDate[]): DateExtractor {
  return { extract: () => dates };
}

/**
 * Summarizer echoing the first sentence of the source, recording each call.
 */
export class FakeSummarizer implements Summarizer {
  readonly calls: { source: SummarySource; maxLength: number }[] = [];

  async summarize(source: SummarySource, maxLength: number): Promise<SummaryResult> {
    this.calls.push({ source, maxLength });
    const text = (source.text.split(/(?<=[.!?])\s+/)[0] || source.subject).slice(0, maxLength);
    return makeSummary(text);
  }
}

/** Extractor that finds one literal phrase and resolves it to `start`. */
export function phraseExtractor(phrase: string, start: Date, end?: Date): DateExtractor {
  return {
    extract: (text) => {
      const index = text.indexOf(phrase);
      if (index < 0) return [];
      return [{ text: phrase, index, start, end, hasExplicitHour: true, hasExplicitDay: true }];
    },
  };
}
