/**
 * @fileoverview Plain-text helpers shared by mail normalization,
 * summarization and rendering.
 */

/**
 * Strip HTML tags from a string, preserving alt text from images.
 */
export function stripHtmlTags(html: string): string {
  if (!html) return '';

  return html
    // Drop script/style blocks entirely
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    // Extract alt text from images
    .replace(/<img[^>]+alt=["']([^"']*)["'][^>]*>/gi, ' $1 ')
    // Block-level breaks become newlines
    .replace(/<(br|\/p|\/div|\/li|\/tr|\/h[1-6])[^>]*>/gi, '\n')
    // Remove all remaining tags
    .replace(/<[^>]+>/g, ' ')
    // Decode common HTML entities
    .replace(/&nbsp;/gi, ' ')
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'")
    .replace(/&amp;/gi, '&');
}

/**
 * Collapse runs of whitespace into single spaces/newlines.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Split prose into sentences on terminal punctuation or line breaks.
 * Empty fragments are dropped; punctuation stays with its sentence.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Escape text for Telegram's HTML parse mode.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Cut `text` to at most `maxLength` characters, ending in `...` when cut.
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.slice(0, maxLength);
  return `${text.slice(0, maxLength - 3).trimEnd()}...`;
}

/**
 * Estimate reading time in minutes at `wordsPerMinute`, rounded to the
 * nearest half minute.
 */
export function estimateReadingMinutes(text: string, wordsPerMinute = 225): number {
  const words = text.match(/\w+/g)?.length ?? 0;
  return Math.round((words / wordsPerMinute) * 2) / 2;
}
