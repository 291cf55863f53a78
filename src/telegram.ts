/**
 * @fileoverview Telegram bot lifecycle.
 *
 * Long-polls by default; registers a webhook when TELEGRAM_WEBHOOK_URL is set,
 * in which case updates arrive through the Express route and are fed to
 * processUpdate().
 */

import TelegramBot from 'node-telegram-bot-api';
import { createLogger } from './utils/observability/index.js';
import { errorMessage } from './utils/errors.js';
import type { BotHandlers } from './bot/handlers.js';

const log = createLogger({ domain: 'telegram-transport' });

export interface TelegramBotOptions {
  token: string;
  webhookUrl?: string;
  webhookSecret?: string;
}

export function createTelegramBot(token: string): TelegramBot {
  return new TelegramBot(token, { polling: false });
}

/**
 * Route bot events to the handlers.
 */
export function attachHandlers(bot: TelegramBot, handlers: BotHandlers): void {
  bot.on('message', (message) => {
    handlers.handleMessage(message).catch((error: unknown) => {
      log.error('message_handler_failed', { error: errorMessage(error) });
    });
  });
  bot.on('callback_query', (query) => {
    handlers.handleCallbackQuery(query).catch((error: unknown) => {
      log.error('callback_handler_failed', { error: errorMessage(error) });
    });
  });
  bot.on('polling_error', (error) => {
    log.error('polling_error', { error: errorMessage(error) });
  });
  bot.on('webhook_error', (error) => {
    log.error('webhook_error', { error: errorMessage(error) });
  });
}

/**
 * Begin receiving updates.
 */
export async function startTelegramBot(bot: TelegramBot, options: TelegramBotOptions): Promise<void> {
  if (options.webhookUrl) {
    const webhookOptions = { secret_token: options.webhookSecret, max_connections: 40 };
    await bot.setWebHook(options.webhookUrl, webhookOptions);
    log.info('webhook_registered', { hasSecret: Boolean(options.webhookSecret) });
    return;
  }

  await bot.deleteWebHook();
  await bot.startPolling();
  log.info('polling_started');
}

export async function stopTelegramBot(bot: TelegramBot): Promise<void> {
  if (bot.isPolling()) {
    await bot.stopPolling();
  }
}
