/**
 * @fileoverview Event detection for digest items.
 *
 * Every date phrase in the subject and body is scored:
 *   +0.40  explicit hour
 *   +0.25  explicit day, weekday or month
 *   +0.15  explicit end time
 *   +0.20  meeting vocabulary in the same sentence
 * The best phrase at or above the threshold (0.6) becomes the candidate; ties
 * go to the phrase that appears first. Past times are ignored. If the
 * message text yields nothing, the summary text is tried the same way.
 */

import type { DateExtractor, ExtractedDate } from '../../../services/date/extractor.js';
import type { Message } from '../../mailbox/types.js';
import { messagePlainText } from '../../summarization/service/source.js';
import type { SummaryResult } from '../../summarization/types.js';
import type { EventCandidate, ExistingEvent } from '../types.js';
import { findConflicts } from './conflicts.js';

export const DEFAULT_MIN_CONFIDENCE = 0.6;

const MEETING_KEYWORDS =
  /\b(meeting|meet|call|appointment|interview|webinar|invite|invitation|lunch|dinner|breakfast|coffee|sync|standup|demo|presentation|conference|workshop|session|zoom|teams|hangout|event|party|reservation)\b/i;

const LOCATION_LINE = /^[ \t]*(?:location|where|venue|place|address)[ \t]*:[ \t]*(.+)$/im;

const MEETING_LINK =
  /https?:\/\/(?:[\w-]+\.)*(?:zoom\.us|meet\.google\.com|teams\.microsoft\.com|teams\.live\.com|webex\.com)\/[^\s<>"')\]]*/i;

export interface DetectEventOptions {
  extractor: DateExtractor;
  referenceDate: Date;
  /** Assumed duration when the message gives no end time. */
  defaultDurationMinutes: number;
  minConfidence?: number;
}

type ScoredDate = { date: ExtractedDate; confidence: number };

function sentenceAround(text: string, index: number, length: number): string {
  const before = text.slice(0, index);
  const start = Math.max(before.lastIndexOf('.'), before.lastIndexOf('!'), before.lastIndexOf('?'), before.lastIndexOf('\n')) + 1;
  const afterMatch = /[.!?\n]/.exec(text.slice(index + length));
  const end = afterMatch ? index + length + afterMatch.index : text.length;
  return text.slice(start, end);
}

export function scoreExtractedDate(text: string, date: ExtractedDate): number {
  let confidence = 0;
  if (date.hasExplicitHour) confidence += 0.4;
  if (date.hasExplicitDay) confidence += 0.25;
  if (date.end) confidence += 0.15;
  if (MEETING_KEYWORDS.test(sentenceAround(text, date.index, date.text.length))) confidence += 0.2;
  return Math.round(Math.min(1, confidence) * 100) / 100;
}

function bestDate(text: string, options: DetectEventOptions): ScoredDate | null {
  const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  let best: ScoredDate | null = null;

  for (const date of options.extractor.extract(text, options.referenceDate)) {
    if (date.start.getTime() <= options.referenceDate.getTime()) continue;
    const confidence = scoreExtractedDate(text, date);
    if (confidence < minConfidence) continue;
    if (!best || confidence > best.confidence) {
      best = { date, confidence };
    }
  }
  return best;
}

function extractLocation(text: string): string | undefined {
  const match = LOCATION_LINE.exec(text);
  const location = match?.[1].trim();
  return location ? location.slice(0, 200) : undefined;
}

function extractMeetingLink(text: string): string | undefined {
  return MEETING_LINK.exec(text)?.[0];
}

/**
 * Detect at most one event in `message`. Returns null when nothing clears the
 * confidence threshold; that is not an error.
 */
export function detectEvent(
  message: Message,
  summary: SummaryResult | null,
  existingEvents: readonly ExistingEvent[],
  options: DetectEventOptions
): EventCandidate | null {
  const messageText = `${message.subject}\n${messagePlainText(message)}`;
  const found = bestDate(messageText, options) ?? (summary ? bestDate(summary.text, options) : null);
  if (!found) return null;

  const { date, confidence } = found;
  const effectiveEnd = date.end ?? new Date(date.start.getTime() + options.defaultDurationMinutes * 60 * 1000);
  const rawText = `${messageText}\n${message.bodyHtml ?? ''}`;

  return {
    title: message.subject.trim() || 'Event from email',
    start: date.start,
    end: date.end,
    location: extractLocation(messageText),
    meetingLink: extractMeetingLink(rawText),
    conflictsWith: findConflicts({ start: date.start, end: effectiveEnd }, existingEvents),
    confidence,
  };
}
