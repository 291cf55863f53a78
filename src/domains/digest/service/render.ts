/**
 * @fileoverview HTML rendering and transport-sized blocks.
 */

import { escapeHtml, truncateText } from '../../../utils/text.js';
import { formatInTimezone } from '../../../services/date/extractor.js';
import type { EventCandidate } from '../../calendar-tagger/types.js';
import type { SummaryProviderName } from '../../summarization/types.js';
import type { UrgencyTier } from '../../urgency/types.js';
import type { ActionKind, DigestBlock, DigestControl, DigestItem } from '../types.js';

export const EXHAUSTED_TEXT = 'No more emails in this digest.';
export const STALE_TEXT = 'This digest is stale, run /digest again.';
export const EMPTY_DIGEST_TEXT = 'No unread emails. 📭';

const BLOCK_SEPARATOR = '\n\n';

// Caps on raw header fields, applied before escaping
const SENDER_NAME_MAX_CHARS = 100;
const ADDRESS_MAX_CHARS = 254;
const LOCATION_MAX_CHARS = 200;
const MEETING_LINK_MAX_CHARS = 300;

const TIER_MARKERS: Record<UrgencyTier, string> = {
  urgent: '🔴 Urgent',
  important: '⭐ Important',
  normal: '🟢 Normal',
};

const PROVENANCE_MARKERS: Record<SummaryProviderName, string | null> = {
  primary: null,
  secondary: '[Fallback summary]',
  local: '[Local summary]',
  heuristic: '[Fallback summary]',
};

const CONTROL_LABELS: Record<ActionKind, string> = {
  mark_important: '⭐ Mark Important',
  forward: '📤 Forward',
  leave_unread: '🚫 Leave Unread',
  next: '➡️ Next Email',
  add_event: '📅 Add to Calendar',
  ignore_event: '🙈 Ignore Event',
};

export interface RenderOptions {
  timezone: string;
  /** Transport limit per block. */
  maxChars: number;
}

export function tierMarker(tier: UrgencyTier): string {
  return TIER_MARKERS[tier];
}

export function provenanceMarker(provider: SummaryProviderName): string | null {
  return PROVENANCE_MARKERS[provider];
}

function formatReadingTime(minutes: number): string {
  return minutes < 0.5 ? '⏱ &lt;1 min read' : `⏱ ~${minutes} min read`;
}

export function renderEventLine(candidate: EventCandidate, timezone: string): string {
  const when = candidate.end
    ? `${formatInTimezone(candidate.start, timezone)}–${formatInTimezone(candidate.end, timezone, 'HH:mm')}`
    : formatInTimezone(candidate.start, timezone);
  const parts = [`📅 ${escapeHtml(when)}`];
  if (candidate.location) {
    parts.push(`📍 ${escapeHtml(truncateText(candidate.location, LOCATION_MAX_CHARS))}`);
  }
  if (candidate.meetingLink) {
    parts.push(`🔗 ${escapeHtml(truncateText(candidate.meetingLink, MEETING_LINK_MAX_CHARS))}`);
  }
  if (candidate.conflictsWith.length > 0) {
    const count = candidate.conflictsWith.length;
    parts.push(`⚠️ Conflicts with ${count} event${count === 1 ? '' : 's'}`);
  }
  return parts.join(' · ');
}

/**
 * Render one item. `summaryMaxChars` caps the raw summary text.
 */
export function renderItem(
  item: DigestItem,
  total: number,
  timezone: string,
  summaryMaxChars = item.summary.text.length
): string {
  const address = escapeHtml(truncateText(item.sender.address, ADDRESS_MAX_CHARS));
  const sender = item.sender.name
    ? `${escapeHtml(truncateText(item.sender.name, SENDER_NAME_MAX_CHARS))} &lt;${address}&gt;`
    : address;
  const count = item.groupSize > 1 ? ` (${item.groupSize} messages)` : '';
  const marker = provenanceMarker(item.summary.provider);
  const summaryText = escapeHtml(truncateText(item.summary.text, summaryMaxChars));
  const summary = marker ? `<i>${marker}</i> ${summaryText}` : summaryText;

  const lines = [
    `<b>${item.index + 1}/${total}</b> ${tierMarker(item.urgency.tier)}`,
    `<b>From:</b> ${sender}${count}`,
    `<b>Subject:</b> ${escapeHtml(item.subject || '(no subject)')}`,
    summary,
    formatReadingTime(item.readingMinutes),
  ];
  if (item.eventCandidate) {
    lines.push(renderEventLine(item.eventCandidate, timezone));
  }
  return lines.join('\n');
}

function itemControls(item: DigestItem, prefix: string): DigestControl[][] {
  const control = (action: ActionKind): DigestControl => ({
    label: `${prefix}${CONTROL_LABELS[action]}`,
    itemIndex: item.index,
    action,
  });
  const rows = [
    [control('mark_important'), control('forward')],
    [control('leave_unread'), control('next')],
  ];
  if (item.eventCandidate) {
    rows.push([control('add_event'), control('ignore_event')]);
  }
  return rows;
}

function toBlock(entries: { item: DigestItem; text: string }[]): DigestBlock {
  // Buttons are numbered only when one message holds several items
  const numbered = entries.length > 1;
  return {
    text: entries.map((entry) => entry.text).join(BLOCK_SEPARATOR),
    controls: entries.flatMap((entry) => itemControls(entry.item, numbered ? `${entry.item.index + 1}. ` : '')),
    itemIndexes: entries.map((entry) => entry.item.index),
  };
}

/**
 * Render an item within `maxChars`, shortening its summary when needed.
 */
export function renderItemWithin(item: DigestItem, total: number, timezone: string, maxChars: number): string {
  const full = renderItem(item, total, timezone);
  if (full.length <= maxChars) return full;

  // Longest summary that fits, found by bisection on the raw summary length
  let best = renderItem(item, total, timezone, 0);
  let low = 1;
  let high = item.summary.text.length - 1;
  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    const text = renderItem(item, total, timezone, mid);
    if (text.length <= maxChars) {
      best = text;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return best;
}

/**
 * Pack items greedily into blocks no longer than `maxChars`, splitting only
 * between items. An item too long on its own has its summary shortened.
 */
export function renderBlocks(items: readonly DigestItem[], total: number, options: RenderOptions): DigestBlock[] {
  const blocks: DigestBlock[] = [];
  let pending: { item: DigestItem; text: string }[] = [];
  let length = 0;

  for (const item of items) {
    const text = renderItemWithin(item, total, options.timezone, options.maxChars);
    const added = pending.length === 0 ? text.length : length + BLOCK_SEPARATOR.length + text.length;

    if (pending.length > 0 && added > options.maxChars) {
      blocks.push(toBlock(pending));
      pending = [{ item, text }];
      length = text.length;
    } else {
      pending.push({ item, text });
      length = added;
    }
  }
  if (pending.length > 0) {
    blocks.push(toBlock(pending));
  }
  return blocks;
}

export function textBlock(text: string): DigestBlock {
  return { text, controls: [], itemIndexes: [] };
}
