/**
 * @fileoverview Gmail-backed mailbox collaborator.
 *
 * Sender importance is kept in the local important-sender store rather than
 * as Gmail labels, so lookups during a digest build cost no API calls.
 */

import { google, type gmail_v1 } from 'googleapis';
import { getAuthenticatedClient, withRetry } from '../../google-core/providers/auth.js';
import { createLogger } from '../../../utils/observability/index.js';
import { AppError } from '../../../utils/errors.js';
import type { ImportantSenderStore, MailboxCollaborator, Message } from '../types.js';
import { buildForwardRaw, toMessage } from '../service/gmail-message.js';

const log = createLogger({ domain: 'gmail-mailbox' });

const SERVICE_NAME = 'Gmail';

export interface GmailMailboxOptions {
  query: string;
  maxResults: number;
  /** Only messages received within this many hours are returned (0 = no limit). */
  windowHours: number;
  importantSenders: ImportantSenderStore;
}

async function getGmailClient(): Promise<gmail_v1.Gmail> {
  const auth = await getAuthenticatedClient(SERVICE_NAME);
  return google.gmail({ version: 'v1', auth });
}

export class GmailMailbox implements MailboxCollaborator {
  /** Messages seen by the last fetch, so forward() can reuse their bodies. */
  private readonly recent = new Map<string, Message>();

  constructor(private readonly options: GmailMailboxOptions) {}

  async fetchUnread(): Promise<Message[]> {
    const gmail = await getGmailClient();
    const query = this.options.windowHours > 0
      ? `${this.options.query} newer_than:${Math.ceil(this.options.windowHours)}h`
      : this.options.query;

    const response = await withRetry(
      () => gmail.users.messages.list({ userId: 'me', q: query, maxResults: this.options.maxResults }),
      SERVICE_NAME
    );

    const ids = (response.data.messages ?? [])
      .map((entry) => entry.id)
      .filter((id): id is string => typeof id === 'string' && id.length > 0);

    const messages = await Promise.all(ids.map((id) => this.getMessage(gmail, id)));
    const found = messages.filter((message): message is Message => message !== null);

    this.recent.clear();
    for (const message of found) {
      this.recent.set(message.id, message);
    }

    log.info('unread_fetched', { count: found.length, listed: ids.length });
    return found;
  }

  async markReadAndArchive(messageId: string): Promise<void> {
    const gmail = await getGmailClient();
    await withRetry(
      () => gmail.users.messages.modify({
        userId: 'me',
        id: messageId,
        requestBody: { removeLabelIds: ['UNREAD', 'INBOX'] },
      }),
      SERVICE_NAME
    );
    log.info('message_archived', { messageId });
  }

  async forward(messageId: string, destination: string): Promise<void> {
    const gmail = await getGmailClient();
    const original = this.recent.get(messageId) ?? await this.getMessage(gmail, messageId);
    if (!original) {
      throw new AppError(`Message ${messageId} not found`, 'MESSAGE_NOT_FOUND', false, { messageId });
    }

    await withRetry(
      () => gmail.users.messages.send({
        userId: 'me',
        requestBody: { raw: buildForwardRaw(original, destination) },
      }),
      SERVICE_NAME
    );
    log.info('message_forwarded', { messageId, destination });
  }

  async setSenderImportant(address: string, important: boolean): Promise<void> {
    this.options.importantSenders.setImportant(address, important);
    log.info('sender_importance_set', { address, important });
  }

  async isSenderImportant(address: string): Promise<boolean> {
    return this.options.importantSenders.isImportant(address);
  }

  private async getMessage(gmail: gmail_v1.Gmail, id: string): Promise<Message | null> {
    const detail = await withRetry(
      () => gmail.users.messages.get({ userId: 'me', id, format: 'full' }),
      SERVICE_NAME
    );
    return toMessage(detail.data);
  }
}
