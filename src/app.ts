/**
 * @fileoverview Express application factory.
 */

import express from 'express';
import type TelegramBot from 'node-telegram-bot-api';
import { healthHandler } from './routes/health.js';
import { createTelegramRouter } from './routes/telegram.js';

export interface AppOptions {
  webhookSecret?: string;
  onUpdate(update: TelegramBot.Update): void;
}

export function createApp(options: AppOptions): express.Application {
  const app = express();

  // Telegram posts updates as JSON
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', healthHandler);

  // Bot webhook
  app.use(createTelegramRouter({ secret: options.webhookSecret, onUpdate: options.onUpdate }));

  return app;
}
