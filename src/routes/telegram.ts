/**
 * Telegram Webhook Route
 *
 * Receives bot updates when the bot runs in webhook mode:
 * 1. Rate limit per client IP
 * 2. Verify the X-Telegram-Bot-Api-Secret-Token header (when a secret is configured)
 * 3. Acknowledge with 200 and hand the update to the bot
 *
 * Telegram retries any non-2xx response, so update handling errors never
 * reach the response.
 */
import { Router, type Request, type Response } from 'express';
import type TelegramBot from 'node-telegram-bot-api';
import { timingSafeEqual } from 'crypto';
import { SlidingWindowRateLimiter } from '../utils/rate-limit.js';
import { createLogger } from '../utils/observability/index.js';

const log = createLogger({ domain: 'telegram-webhook' });

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

const RATE_LIMIT_WINDOW_MS = 60_000; // 1 minute
const RATE_LIMIT_MAX = 120; // max updates per window per IP

export interface TelegramRouterOptions {
  /** Expected secret token; verification is skipped when unset. */
  secret?: string;
  onUpdate(update: TelegramBot.Update): void;
  rateLimit?: { windowMs: number; max: number };
}

function secretMatches(expected: string, received: string | undefined): boolean {
  if (!received) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
}

function isUpdate(body: unknown): body is TelegramBot.Update {
  return typeof body === 'object' && body !== null && 'update_id' in body && typeof body.update_id === 'number';
}

export function createTelegramRouter(options: TelegramRouterOptions): Router {
  const router = Router();
  const limiter = new SlidingWindowRateLimiter(
    options.rateLimit ?? { windowMs: RATE_LIMIT_WINDOW_MS, max: RATE_LIMIT_MAX }
  );

  router.post('/telegram/webhook', (req: Request, res: Response) => {
    const clientKey = req.ip ?? 'unknown';
    if (!limiter.check(clientKey)) {
      log.warn('webhook_rate_limited');
      res.status(429).json({ error: 'Too many requests' });
      return;
    }

    if (options.secret && !secretMatches(options.secret, req.get(SECRET_HEADER))) {
      log.warn('webhook_secret_mismatch');
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    const body: unknown = req.body;
    if (!isUpdate(body)) {
      res.status(400).json({ error: 'Invalid update' });
      return;
    }

    res.sendStatus(200);
    options.onUpdate(body);
  });

  return router;
}
