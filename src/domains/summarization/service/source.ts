/**
 * Turns mailbox messages into summarization input.
 */

import type { Message } from '../../mailbox/types.js';
import { normalizeWhitespace, stripHtmlTags } from '../../../utils/text.js';
import type { SummarySource } from '../types.js';

/**
 * Plain text for a message: the text/plain body, else the HTML body with
 * tags stripped.
 */
export function messagePlainText(message: Message): string {
  const text = message.bodyText.trim() ? message.bodyText : stripHtmlTags(message.bodyHtml ?? '');
  return normalizeWhitespace(text);
}

export function toSummarySource(message: Message): SummarySource {
  return { subject: message.subject, text: messagePlainText(message) };
}
