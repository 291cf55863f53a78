/**
 * Summary prompt shared by the remote providers.
 */

import type { SummarySource } from '../types.js';

/** Source text sent to a remote model is capped to keep requests small. */
export const MAX_PROMPT_SOURCE_CHARS = 8000;

export const SUMMARY_SYSTEM_PROMPT = `You summarize emails for a chat digest.
Write plain text only: no markdown, no links, no greetings, no preamble.
Lead with what the reader must know or do, including any dates, deadlines or amounts.`;

export function buildSummaryPrompt(source: SummarySource, maxLength: number): string {
  const body = source.text.slice(0, MAX_PROMPT_SOURCE_CHARS);
  return `Summarize this email in at most ${maxLength} characters.

Subject: ${source.subject || '(no subject)'}

${body}`;
}

/**
 * True when the model echoed the instruction back instead of summarizing.
 */
export function isPromptEcho(text: string): boolean {
  return /^\s*(summarize this email|subject:)/i.test(text);
}
