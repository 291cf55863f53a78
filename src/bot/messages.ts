/**
 * @fileoverview User-facing bot texts.
 */

import { escapeHtml } from '../utils/text.js';
import type { ChatSettings } from '../services/chat-settings/types.js';

export const WELCOME_TEXT = [
  '👋 Welcome to Mail Digest!',
  '',
  'I summarize your unread email and let you triage it one message at a time.',
  'Send /digest to get started, or /help for every command.',
].join('\n');

export const COMMANDS_TEXT = [
  '<b>Commands</b>',
  '/digest - build a digest of unread email',
  '/mark_important &lt;email&gt; - always flag this sender',
  '/unmark_important &lt;email&gt; - stop flagging this sender',
  '/set_interval &lt;hours&gt; - scheduled digest interval (0.5-24)',
  '/toggle_notifications - important-email alerts on/off',
  '/settings - show current settings',
  '/help - this list',
].join('\n');

export const BUILDING_TEXT = '⏳ Building your digest...';
export const DIGEST_ERROR_TEXT = 'Sorry, there was an error generating your digest. Please try again later.';
export const GENERIC_ERROR_TEXT = '⚠️ Something went wrong. Please try again.';
export const UNKNOWN_COMMAND_TEXT = 'Unknown command. Send /help for the list.';
export const UNKNOWN_ACTION_TEXT = 'Unknown action.';

function formatInterval(hours: number): string {
  if (hours <= 0) return 'off';
  return hours === 1 ? 'every hour' : `every ${hours} hours`;
}

export function settingsText(settings: ChatSettings, importantSenders: readonly string[]): string {
  const senders = importantSenders.length > 0
    ? importantSenders.map((sender) => `• ${escapeHtml(sender)}`).join('\n')
    : 'none';
  return [
    '<b>⚙️ Settings</b>',
    `Scheduled digest: ${formatInterval(settings.digestIntervalHours)}`,
    `Important-email alerts: ${settings.notificationsEnabled ? 'on' : 'off'}`,
    '<b>Important senders:</b>',
    senders,
  ].join('\n');
}
