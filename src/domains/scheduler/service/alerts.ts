/**
 * @fileoverview Important-email alert selection and formatting.
 */

import { escapeHtml, truncateText } from '../../../utils/text.js';
import { formatInTimezone } from '../../../services/date/extractor.js';
import { formatAddress } from '../../mailbox/service/address.js';
import { messagePlainText } from '../../summarization/service/source.js';
import type { Message } from '../../mailbox/types.js';
import type { UrgencyResult } from '../../urgency/types.js';

export const ALERT_HEADER = '🚨 Important Email Alert!';
const PREVIEW_CHARS = 300;

/** Alert for anything from an important sender or scored above normal. */
export function shouldAlert(urgency: UrgencyResult): boolean {
  return urgency.tier !== 'normal';
}

export function renderAlert(message: Message, timezone: string): string {
  const preview = truncateText(messagePlainText(message).replace(/\s+/g, ' '), PREVIEW_CHARS);
  const lines = [
    `<b>${ALERT_HEADER}</b>`,
    `<b>From:</b> ${escapeHtml(formatAddress(message.sender))}`,
    `<b>Subject:</b> ${escapeHtml(message.subject || '(no subject)')}`,
    `<b>Received:</b> ${escapeHtml(formatInTimezone(message.receivedAt, timezone))}`,
  ];
  if (preview) {
    lines.push('', escapeHtml(preview));
  }
  return lines.join('\n');
}
