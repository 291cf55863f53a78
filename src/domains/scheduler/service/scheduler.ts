/**
 * @fileoverview One scheduler pass: due digests, then important-email alerts.
 *
 * A failure for one chat is logged and counted; the pass continues with the
 * next chat.
 */

import type { DateExtractor } from '../../../services/date/extractor.js';
import type { AlertDedupeStore } from '../../../services/alerts/dedupe.js';
import type { ChatSettings, ChatSettingsStore } from '../../../services/chat-settings/types.js';
import { errorMessage } from '../../../utils/errors.js';
import { createLogger, type AppLogger } from '../../../utils/observability/index.js';
import type { DigestService } from '../../digest/runtime/service.js';
import type { MailboxCollaborator, Message } from '../../mailbox/types.js';
import { scoreUrgency, type ScoreUrgencyOptions } from '../../urgency/service/scorer.js';
import type { ChatNotifier, SchedulerTickResult } from '../types.js';
import { renderAlert, shouldAlert } from './alerts.js';
import { isDigestDue } from './due.js';

export interface DigestSchedulerDeps {
  store: ChatSettingsStore;
  digest: DigestService;
  mailbox: MailboxCollaborator;
  dedupe: AlertDedupeStore;
  notifier: ChatNotifier;
  extractor: DateExtractor;
  urgency: ScoreUrgencyOptions;
  timezone: string;
  alertMaxMessages: number;
  threadWindowHours: number;
  now?: () => Date;
  logger?: AppLogger;
}

const HOUR_MS = 60 * 60 * 1000;

export class DigestScheduler {
  private readonly log: AppLogger;
  private readonly now: () => Date;

  constructor(private readonly deps: DigestSchedulerDeps) {
    this.log = deps.logger ?? createLogger({ domain: 'scheduler' });
    this.now = deps.now ?? (() => new Date());
  }

  async tick(): Promise<SchedulerTickResult> {
    const result: SchedulerTickResult = { digestsSent: 0, alertsSent: 0, failures: 0 };
    const chats = await this.deps.store.list();
    if (chats.length === 0) return result;

    for (const chat of chats) {
      if (!isDigestDue(chat, this.now().getTime())) continue;
      try {
        if (await this.sendScheduledDigest(chat)) result.digestsSent++;
      } catch (error) {
        result.failures++;
        this.log.error('scheduled_digest_failed', { chatId: chat.chatId, error: errorMessage(error) });
      }
    }

    const alertChats = chats.filter((chat) => chat.notificationsEnabled);
    if (alertChats.length > 0) {
      try {
        const alerts = await this.sendAlerts(alertChats);
        result.alertsSent += alerts.sent;
        result.failures += alerts.failures;
      } catch (error) {
        result.failures++;
        this.log.error('alert_check_failed', { error: errorMessage(error) });
      }
    }

    return result;
  }

  private async sendScheduledDigest(chat: ChatSettings): Promise<boolean> {
    const built = await this.deps.digest.buildDigestIfUnread(chat.chatId);
    await this.deps.store.set(chat.chatId, { lastDigestAt: this.now().getTime() });
    if (!built || built.itemCount === 0 || built.blocks.length === 0) {
      this.log.debug('scheduled_digest_empty', { chatId: chat.chatId });
      return false;
    }
    await this.deps.notifier.sendDigest(chat.chatId, built);
    this.log.info('scheduled_digest_sent', { chatId: chat.chatId, itemCount: built.itemCount });
    return true;
  }

  /**
   * Messages from the mailbox that warrant an alert, newest first.
   */
  async findAlertMessages(): Promise<Message[]> {
    const { mailbox, extractor, urgency } = this.deps;
    const now = this.now();
    const unread = (await mailbox.fetchUnread())
      .sort((a, b) => b.receivedAt.getTime() - a.receivedAt.getTime())
      .slice(0, this.deps.alertMaxMessages);

    const since = now.getTime() - this.deps.threadWindowHours * HOUR_MS;
    const flagged: Message[] = [];
    for (const message of unread) {
      const isSenderImportant = await mailbox.isSenderImportant(message.sender.address);
      const threadActivity = unread.filter(
        (other) => other.threadId === message.threadId && other.receivedAt.getTime() >= since
      ).length;
      const result = scoreUrgency(message, null, { isSenderImportant, threadActivity, now, extractor }, urgency);
      if (shouldAlert(result)) flagged.push(message);
    }
    return flagged;
  }

  private async sendAlerts(chats: ChatSettings[]): Promise<{ sent: number; failures: number }> {
    const messages = await this.findAlertMessages();
    const checkedAt = this.now().getTime();
    let sent = 0;
    let failures = 0;

    for (const chat of chats) {
      const since = chat.lastAlertCheckAt ?? chat.createdAt;
      for (const message of messages) {
        if (message.receivedAt.getTime() < since) continue;
        if (!this.deps.dedupe.register(chat.chatId, message.id, checkedAt)) continue;
        try {
          await this.deps.notifier.sendAlert(chat.chatId, renderAlert(message, this.deps.timezone));
          sent++;
        } catch (error) {
          failures++;
          this.log.error('alert_send_failed', { chatId: chat.chatId, messageId: message.id, error: errorMessage(error) });
        }
      }
      await this.deps.store.set(chat.chatId, { lastAlertCheckAt: checkedAt });
    }

    if (sent > 0) {
      this.log.info('alerts_sent', { count: sent });
    }
    return { sent, failures };
  }
}
