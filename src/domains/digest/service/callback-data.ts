/**
 * @fileoverview Inline button payloads: `dg|<sessionId>|<itemIndex>|<code>`.
 *
 * Telegram rejects callback data over 64 bytes.
 */

import { AppError } from '../../../utils/errors.js';
import { ACTION_KINDS, type ActionKind } from '../types.js';

export const CALLBACK_PREFIX = 'dg';
export const MAX_CALLBACK_BYTES = 64;

const ACTION_CODES = {
  mark_important: 'mi',
  forward: 'fw',
  leave_unread: 'lu',
  next: 'nx',
  add_event: 'ae',
  ignore_event: 'ie',
} as const satisfies Record<ActionKind, string>;

export interface DigestCallback {
  sessionId: string;
  itemIndex: number;
  action: ActionKind;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,40}$/;
const INDEX_PATTERN = /^\d{1,4}$/;

export function encodeCallbackData(sessionId: string, itemIndex: number, action: ActionKind): string {
  const data = [CALLBACK_PREFIX, sessionId, String(itemIndex), ACTION_CODES[action]].join('|');
  if (Buffer.byteLength(data, 'utf8') > MAX_CALLBACK_BYTES) {
    throw new AppError('Callback data exceeds Telegram limit', 'CALLBACK_TOO_LONG', false, { sessionId });
  }
  return data;
}

/**
 * Parse callback data. Returns null for anything that is not a digest button.
 */
export function decodeCallbackData(data: string | undefined): DigestCallback | null {
  if (!data) return null;
  const parts = data.split('|');
  if (parts.length !== 4) return null;

  const [prefix, sessionId, index, code] = parts;
  if (prefix !== CALLBACK_PREFIX || !SESSION_ID_PATTERN.test(sessionId) || !INDEX_PATTERN.test(index)) {
    return null;
  }
  const action = ACTION_KINDS.find((kind) => ACTION_CODES[kind] === code);
  if (!action) return null;

  return { sessionId, itemIndex: Number(index), action };
}
