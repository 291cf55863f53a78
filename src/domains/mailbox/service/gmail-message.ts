/**
 * @fileoverview Gmail API message normalization and raw message building.
 */

import type { gmail_v1 } from 'googleapis';
import { normalizeWhitespace } from '../../../utils/text.js';
import type { Message } from '../types.js';
import { formatAddress, parseAddress } from './address.js';

/** Bodies beyond this are cut before summarization. */
const MAX_BODY_CHARS = 20000;

/**
 * Decode base64url-encoded body data from Gmail API.
 */
function decodeBodyData(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

/**
 * Walk MIME parts collecting text/plain and text/html bodies.
 * Attachments (parts with a filename) are skipped.
 */
function extractBodies(payload: gmail_v1.Schema$MessagePart | undefined): { text: string; html: string } {
  let text = '';
  let html = '';

  function walkParts(part: gmail_v1.Schema$MessagePart): void {
    const mimeType = part.mimeType ?? '';
    const bodyData = part.body?.data;

    if (bodyData && !part.filename) {
      if (mimeType === 'text/plain') text += decodeBodyData(bodyData);
      else if (mimeType === 'text/html') html += decodeBodyData(bodyData);
    }

    for (const child of part.parts ?? []) {
      walkParts(child);
    }
  }

  if (payload) walkParts(payload);
  return { text, html };
}

function resolveReceivedAt(message: gmail_v1.Schema$Message, dateHeader: string): Date {
  if (message.internalDate) {
    const millis = Number(message.internalDate);
    if (Number.isFinite(millis)) return new Date(millis);
  }
  const parsed = Date.parse(dateHeader);
  return Number.isNaN(parsed) ? new Date() : new Date(parsed);
}

/**
 * Normalize a Gmail message into a digest Message.
 * Returns null for messages without an id.
 */
export function toMessage(message: gmail_v1.Schema$Message): Message | null {
  if (!message.id) return null;

  const headers = message.payload?.headers ?? [];
  const getHeader = (name: string): string =>
    headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ?? '';

  const { text, html } = extractBodies(message.payload ?? undefined);
  const bodyText = normalizeWhitespace(text)
    // Strip base64 inline image data
    .replace(/data:image\/[^;]+;base64,[A-Za-z0-9+/=]+/g, '[inline image]')
    .slice(0, MAX_BODY_CHARS);

  return {
    id: message.id,
    threadId: message.threadId ?? message.id,
    sender: parseAddress(getHeader('From')),
    subject: getHeader('Subject'),
    bodyText: bodyText || (message.snippet ?? ''),
    bodyHtml: html ? html.slice(0, MAX_BODY_CHARS * 2) : undefined,
    receivedAt: resolveReceivedAt(message, getHeader('Date')),
  };
}

/**
 * Encode a header value as an RFC 2047 word when it is not plain ASCII.
 */
function encodeHeader(value: string): string {
  return /^[\x20-\x7e]*$/.test(value) ? value : `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

/**
 * Build the base64url raw payload for forwarding `original` to `destination`.
 */
export function buildForwardRaw(original: Message, destination: string): string {
  const subject = /^fwd:/i.test(original.subject) ? original.subject : `Fwd: ${original.subject}`;
  const lines = [
    `To: ${destination}`,
    `Subject: ${encodeHeader(subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: 8bit',
    '',
    '---------- Forwarded message ----------',
    `From: ${formatAddress(original.sender)}`,
    `Date: ${original.receivedAt.toUTCString()}`,
    `Subject: ${original.subject}`,
    '',
    original.bodyText,
  ];
  return Buffer.from(lines.join('\r\n'), 'utf-8').toString('base64url');
}
