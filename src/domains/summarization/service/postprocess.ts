/**
 * @fileoverview Provider-independent cleanup of summary text.
 */

import { normalizeWhitespace, stripHtmlTags, truncateText } from '../../../utils/text.js';
import type { SummaryProviderName, SummaryResult } from '../types.js';

/**
 * Remove links, images and markup that do not read well in chat, then
 * collapse whitespace to single spaces.
 */
export function cleanSummaryText(text: string): string {
  const withoutMarkup = stripHtmlTags(text)
    // Markdown images, then links (keeping the link text)
    .replace(/!\[[^\]]*\]\([^)]*\)/g, ' ')
    .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
    // Mail client placeholders for inline attachments
    .replace(/\[(image|cid):[^\]]*\]/gi, ' ')
    .replace(/\bhttps?:\/\/\S+/gi, ' ')
    .replace(/\bwww\.\S+/gi, ' ')
    // Leftover markdown emphasis and headings
    .replace(/(\*\*|__)(.+?)\1/g, '$2')
    .replace(/^#+\s*/gm, '');

  return normalizeWhitespace(withoutMarkup).replace(/\s+/g, ' ');
}

/**
 * Turn raw provider output into a capped, provenance-tagged result.
 */
export function finalizeSummary(
  raw: string,
  provider: SummaryProviderName,
  maxLength: number
): SummaryResult {
  const cleaned = cleanSummaryText(raw);
  return {
    text: truncateText(cleaned, maxLength),
    provider,
    fallbackUsed: provider !== 'primary',
    truncated: raw.length > maxLength || cleaned.length > maxLength,
  };
}
