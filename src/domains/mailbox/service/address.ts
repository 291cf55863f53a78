/**
 * Parsing and formatting of RFC 5322 address headers.
 */

import type { EmailAddress } from '../types.js';

const ANGLE_ADDRESS = /^\s*(?:"?([^"<]*?)"?\s*)?<([^>]+)>\s*$/;

export function normalizeAddress(address: string): string {
  return address.trim().toLowerCase();
}

const EMAIL_PATTERN = /^[^\s@<>]+@[^\s@<>]+\.[^\s@<>]+$/;

export function isEmailAddress(value: string): boolean {
  return EMAIL_PATTERN.test(value.trim());
}

/**
 * Parse a `From`-style header: `"Alice Smith" <Alice@Example.com>` or a bare address.
 */
export function parseAddress(header: string): EmailAddress {
  const match = ANGLE_ADDRESS.exec(header);
  if (match) {
    return { name: (match[1] ?? '').trim(), address: normalizeAddress(match[2]) };
  }
  return { name: '', address: normalizeAddress(header) };
}

export function formatAddress(sender: EmailAddress): string {
  return sender.name ? `${sender.name} <${sender.address}>` : sender.address;
}
