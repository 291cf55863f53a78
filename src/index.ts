/**
 * @fileoverview Entry point for the mail digest bot.
 *
 * Validates configuration, starts the Telegram bot, the HTTP server (health
 * and webhook), the session sweeper and the scheduler, and shuts them down
 * in reverse order on SIGTERM/SIGINT.
 */

import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();
import { createApp } from './app.js';
import { BotHandlers } from './bot/handlers.js';
import { attachHandlers, createTelegramBot, startTelegramBot, stopTelegramBot } from './telegram.js';
import { createSessionSweeper, getDigestService } from './domains/digest/runtime/index.js';
import { closeImportantSenderStore, getImportantSenderStore, getMailbox } from './domains/mailbox/runtime/index.js';
import { startScheduler, stopScheduler } from './domains/scheduler/runtime/index.js';
import { closeChatSettingsStore, getChatSettingsStore } from './services/chat-settings/index.js';
import { closeAlertDedupeStore } from './services/alerts/dedupe.js';
import { createLogger, initObservability } from './utils/observability/index.js';
import { errorMessage } from './utils/errors.js';

initObservability();

const log = createLogger({ domain: 'server' });

const telegramOptions = {
  token: config.telegram.botToken ?? '',
  webhookUrl: config.telegram.webhookUrl,
  webhookSecret: config.telegram.webhookSecret,
};

const bot = createTelegramBot(telegramOptions.token);
const handlers = new BotHandlers({
  client: bot,
  digest: getDigestService(),
  settings: getChatSettingsStore(),
  mailbox: getMailbox(),
  importantSenders: getImportantSenderStore(),
  allowedChatIds: config.telegram.allowedChatIds,
});
attachHandlers(bot, handlers);

const app = createApp({
  webhookSecret: config.telegram.webhookSecret,
  onUpdate: (update) => bot.processUpdate(update),
});

const sweeper = createSessionSweeper();

const server = app.listen(config.port, () => {
  log.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    mode: config.telegram.webhookUrl ? 'webhook' : 'polling',
  });

  startTelegramBot(bot, telegramOptions).catch((error: unknown) => {
    log.error('telegram_start_failed', { error: errorMessage(error) });
  });
  sweeper.start();
  startScheduler(handlers);
});

let isShuttingDown = false;

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  log.info('shutdown_signal_received', { signal });

  // Stop background work first, waiting for in-flight operations
  await Promise.all([
    stopScheduler(),
    sweeper.stop(),
    stopTelegramBot(bot),
  ]);

  // Then close database connections
  closeChatSettingsStore();
  closeImportantSenderStore();
  closeAlertDedupeStore();

  const forceExitTimer = setTimeout(() => {
    log.warn('shutdown_forced');
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    log.info('server_closed');
    process.exit(0);
  });
}

function handleSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    log.error('shutdown_failed', { error: errorMessage(error) });
    process.exit(1);
  });
}

process.on('SIGTERM', () => handleSignal('SIGTERM'));
process.on('SIGINT', () => handleSignal('SIGINT'));
