/**
 * @fileoverview Telegram client surface the handlers depend on.
 */

import type TelegramBot from 'node-telegram-bot-api';

/** The subset of node-telegram-bot-api the handlers call. */
export type BotClient = Pick<TelegramBot, 'sendMessage' | 'answerCallbackQuery'>;
