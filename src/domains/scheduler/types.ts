/**
 * Scheduler domain types.
 */

import type { BuildDigestResult } from '../digest/types.js';

/**
 * Outbound delivery for background jobs, implemented by the bot.
 */
export interface ChatNotifier {
  sendDigest(chatId: string, result: BuildDigestResult): Promise<void>;
  sendAlert(chatId: string, html: string): Promise<void>;
}

export interface SchedulerTickResult {
  digestsSent: number;
  alertsSent: number;
  failures: number;
}
