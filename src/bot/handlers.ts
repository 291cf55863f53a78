/**
 * @fileoverview Telegram update handlers.
 *
 * Commands and digest button presses. Every update is handled in isolation:
 * failures are logged and answered with a non-fatal message, never thrown.
 */

import type TelegramBot from 'node-telegram-bot-api';
import type { ChatSettingsStore } from '../services/chat-settings/types.js';
import { decodeCallbackData, encodeCallbackData } from '../domains/digest/service/callback-data.js';
import type { DigestService } from '../domains/digest/runtime/service.js';
import type { BuildDigestResult, DigestBlock } from '../domains/digest/types.js';
import { isEmailAddress, normalizeAddress } from '../domains/mailbox/service/address.js';
import type { ImportantSenderStore, MailboxCollaborator } from '../domains/mailbox/types.js';
import { parseDigestInterval } from '../domains/scheduler/service/due.js';
import type { ChatNotifier } from '../domains/scheduler/types.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, createRequestId, withLogContext, type AppLogger } from '../utils/observability/index.js';
import { escapeHtml } from '../utils/text.js';
import {
  BUILDING_TEXT,
  COMMANDS_TEXT,
  DIGEST_ERROR_TEXT,
  GENERIC_ERROR_TEXT,
  UNKNOWN_ACTION_TEXT,
  UNKNOWN_COMMAND_TEXT,
  WELCOME_TEXT,
  settingsText,
} from './messages.js';
import type { BotClient } from './types.js';

export interface BotHandlerDeps {
  client: BotClient;
  digest: Pick<DigestService, 'buildDigest' | 'applyAction'>;
  settings: ChatSettingsStore;
  mailbox: Pick<MailboxCollaborator, 'setSenderImportant'>;
  importantSenders: Pick<ImportantSenderStore, 'list'>;
  /** Empty allows every chat. */
  allowedChatIds: readonly string[];
  logger?: AppLogger;
}

const COMMAND_PATTERN = /^\/([a-z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/i;

export function parseCommand(text: string): { command: string; args: string } | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) return null;
  return { command: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
}

export function toInlineKeyboard(sessionId: string, block: DigestBlock): TelegramBot.InlineKeyboardButton[][] {
  return block.controls.map((row) =>
    row.map((control) => ({
      text: control.label,
      callback_data: encodeCallbackData(sessionId, control.itemIndex, control.action),
    }))
  );
}

export class BotHandlers implements ChatNotifier {
  private readonly log: AppLogger;

  constructor(private readonly deps: BotHandlerDeps) {
    this.log = deps.logger ?? createLogger({ domain: 'telegram-transport' });
  }

  isAllowed(chatId: string): boolean {
    const allowed = this.deps.allowedChatIds;
    return allowed.length === 0 || allowed.includes(chatId);
  }

  async handleMessage(message: TelegramBot.Message): Promise<void> {
    const chatId = String(message.chat.id);
    const parsed = message.text ? parseCommand(message.text) : null;
    if (!parsed) return;

    if (!this.isAllowed(chatId)) {
      this.log.warn('chat_not_allowed', { chatId });
      return;
    }

    await withLogContext({ requestId: createRequestId(), chatId }, async () => {
      const startTime = Date.now();
      try {
        await this.dispatchCommand(chatId, parsed.command, parsed.args);
        this.log.info('command_handled', { command: parsed.command, durationMs: Date.now() - startTime });
      } catch (error) {
        this.log.error('command_failed', { command: parsed.command, error: errorMessage(error) });
        await this.safeSend(chatId, GENERIC_ERROR_TEXT);
      }
    });
  }

  async handleCallbackQuery(query: TelegramBot.CallbackQuery): Promise<void> {
    const chatId = query.message ? String(query.message.chat.id) : undefined;
    if (!chatId || !this.isAllowed(chatId)) {
      await this.safeAnswer(query.id, UNKNOWN_ACTION_TEXT);
      return;
    }

    await withLogContext({ requestId: createRequestId(), chatId }, async () => {
      const callback = decodeCallbackData(query.data);
      if (!callback) {
        this.log.warn('callback_malformed', { hasData: Boolean(query.data) });
        await this.safeAnswer(query.id, UNKNOWN_ACTION_TEXT);
        return;
      }

      try {
        const result = await this.deps.digest.applyAction(
          chatId,
          callback.sessionId,
          callback.itemIndex,
          callback.action
        );
        await this.safeAnswer(query.id, result.notice);
        if (result.block) {
          await this.sendBlock(chatId, callback.sessionId, result.block);
        }
      } catch (error) {
        this.log.error('callback_failed', { action: callback.action, error: errorMessage(error) });
        await this.safeAnswer(query.id, GENERIC_ERROR_TEXT);
      }
    });
  }

  async sendDigest(chatId: string, result: BuildDigestResult): Promise<void> {
    for (const block of result.blocks) {
      await this.sendBlock(chatId, result.sessionId, block);
    }
  }

  async sendAlert(chatId: string, html: string): Promise<void> {
    await this.deps.client.sendMessage(chatId, html, { parse_mode: 'HTML', disable_web_page_preview: true });
  }

  private async dispatchCommand(chatId: string, command: string, args: string): Promise<void> {
    switch (command) {
      case 'start':
        await this.handleStart(chatId);
        return;
      case 'digest':
        await this.handleDigest(chatId);
        return;
      case 'mark_important':
        await this.handleImportant(chatId, args, true);
        return;
      case 'unmark_important':
        await this.handleImportant(chatId, args, false);
        return;
      case 'set_interval':
        await this.handleSetInterval(chatId, args);
        return;
      case 'settings':
        await this.handleSettings(chatId);
        return;
      case 'toggle_notifications':
        await this.handleToggleNotifications(chatId);
        return;
      case 'commands':
      case 'help':
        await this.send(chatId, COMMANDS_TEXT);
        return;
      default:
        await this.send(chatId, UNKNOWN_COMMAND_TEXT);
    }
  }

  private async handleStart(chatId: string): Promise<void> {
    const existing = await this.deps.settings.get(chatId);
    if (!existing) {
      await this.deps.settings.set(chatId, {});
      this.log.info('chat_registered', { chatId });
    }
    await this.send(chatId, WELCOME_TEXT);
  }

  private async handleDigest(chatId: string): Promise<void> {
    await this.send(chatId, BUILDING_TEXT);

    let result: BuildDigestResult;
    try {
      result = await this.deps.digest.buildDigest(chatId);
    } catch (error) {
      this.log.error('digest_failed', { error: errorMessage(error) });
      await this.send(chatId, DIGEST_ERROR_TEXT);
      return;
    }

    if (await this.deps.settings.get(chatId)) {
      await this.deps.settings.set(chatId, { lastDigestAt: Date.now() });
    }
    await this.sendDigest(chatId, result);
  }

  private async handleImportant(chatId: string, args: string, important: boolean): Promise<void> {
    const command = important ? 'mark_important' : 'unmark_important';
    if (!isEmailAddress(args)) {
      await this.send(chatId, `Usage: /${command} &lt;email&gt;\nExample: /${command} someone@example.com`);
      return;
    }
    const address = normalizeAddress(args);
    await this.deps.mailbox.setSenderImportant(address, important);
    await this.send(
      chatId,
      important
        ? `⭐ ${escapeHtml(address)} is now marked important.`
        : `${escapeHtml(address)} is no longer marked important.`
    );
  }

  private async handleSetInterval(chatId: string, args: string): Promise<void> {
    const hours = parseDigestInterval(args);
    if (hours === null) {
      await this.send(chatId, 'Usage: /set_interval &lt;hours&gt; with hours between 0.5 and 24.\nExample: /set_interval 3.5');
      return;
    }
    await this.deps.settings.set(chatId, { digestIntervalHours: hours });
    await this.send(chatId, `⏰ Digest interval set to ${hours} hour${hours === 1 ? '' : 's'}.`);
  }

  private async handleSettings(chatId: string): Promise<void> {
    const settings = await this.deps.settings.get(chatId) ?? await this.deps.settings.set(chatId, {});
    await this.send(chatId, settingsText(settings, this.deps.importantSenders.list()));
  }

  private async handleToggleNotifications(chatId: string): Promise<void> {
    const current = await this.deps.settings.get(chatId) ?? await this.deps.settings.set(chatId, {});
    const updated = await this.deps.settings.set(chatId, { notificationsEnabled: !current.notificationsEnabled });
    await this.send(
      chatId,
      updated.notificationsEnabled ? '🔔 Important-email alerts are on.' : '🔕 Important-email alerts are off.'
    );
  }

  private async sendBlock(chatId: string, sessionId: string, block: DigestBlock): Promise<void> {
    const inlineKeyboard = toInlineKeyboard(sessionId, block);
    await this.deps.client.sendMessage(chatId, block.text, {
      parse_mode: 'HTML',
      disable_web_page_preview: true,
      reply_markup: inlineKeyboard.length > 0 ? { inline_keyboard: inlineKeyboard } : undefined,
    });
  }

  private async send(chatId: string, text: string): Promise<void> {
    await this.deps.client.sendMessage(chatId, text, { parse_mode: 'HTML' });
  }

  private async safeSend(chatId: string, text: string): Promise<void> {
    try {
      await this.send(chatId, text);
    } catch (error) {
      this.log.error('send_failed', { error: errorMessage(error) });
    }
  }

  private async safeAnswer(callbackQueryId: string, text: string): Promise<void> {
    try {
      await this.deps.client.answerCallbackQuery(callbackQueryId, { text });
    } catch (error) {
      this.log.error('answer_callback_failed', { error: errorMessage(error) });
    }
  }
}
