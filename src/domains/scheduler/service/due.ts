/**
 * @fileoverview Scheduled-digest timing.
 */

import type { ChatSettings } from '../../../services/chat-settings/types.js';

const HOUR_MS = 60 * 60 * 1000;

export const MIN_DIGEST_INTERVAL_HOURS = 0.5;
export const MAX_DIGEST_INTERVAL_HOURS = 24;

/**
 * A chat is due once its interval has elapsed since the last digest. Chats
 * that never received one are due immediately; an interval of 0 is off.
 */
export function isDigestDue(settings: ChatSettings, now: number): boolean {
  if (settings.digestIntervalHours <= 0) return false;
  if (settings.lastDigestAt === undefined) return true;
  return now - settings.lastDigestAt >= settings.digestIntervalHours * HOUR_MS;
}

/**
 * Parse a user-supplied interval. Returns null when out of range.
 */
export function parseDigestInterval(input: string): number | null {
  const hours = Number(input.trim());
  if (!input.trim() || !Number.isFinite(hours)) return null;
  if (hours < MIN_DIGEST_INTERVAL_HOURS || hours > MAX_DIGEST_INTERVAL_HOURS) return null;
  return hours;
}
