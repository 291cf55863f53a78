/**
 * @fileoverview Mailbox domain wiring.
 */

import config from '../../../config.js';
import { GmailMailbox } from '../providers/gmail.js';
import { getImportantSenderStore } from '../repo/important-senders.js';
import type { MailboxCollaborator } from '../types.js';

export { GmailMailbox } from '../providers/gmail.js';
export { parseAddress, formatAddress, normalizeAddress, isEmailAddress } from '../service/address.js';
export { toMessage, buildForwardRaw } from '../service/gmail-message.js';
export {
  getImportantSenderStore,
  closeImportantSenderStore,
  MemoryImportantSenderStore,
  SqliteImportantSenderStore,
} from '../repo/important-senders.js';
export type * from '../types.js';

let mailbox: MailboxCollaborator | null = null;

export function getMailbox(): MailboxCollaborator {
  if (!mailbox) {
    mailbox = new GmailMailbox({
      query: config.digest.gmailQuery,
      maxResults: config.digest.maxEmails,
      windowHours: config.digest.windowHours,
      importantSenders: getImportantSenderStore(),
    });
  }
  return mailbox;
}
