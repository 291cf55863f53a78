/**
 * Mailbox domain types.
 */

export interface EmailAddress {
  /** Display name, empty when the header carries only an address. */
  name: string;
  /** Lower-cased address. */
  address: string;
}

/**
 * One fetched email. Immutable once fetched; the digest pipeline only reads it.
 */
export interface Message {
  id: string;
  threadId: string;
  sender: EmailAddress;
  subject: string;
  bodyText: string;
  bodyHtml?: string;
  receivedAt: Date;
}

/**
 * Mail operations the digest pipeline consumes. The sender-importance set is
 * shared state owned by the implementation.
 */
export interface MailboxCollaborator {
  fetchUnread(): Promise<Message[]>;
  markReadAndArchive(messageId: string): Promise<void>;
  forward(messageId: string, destination: string): Promise<void>;
  setSenderImportant(address: string, important: boolean): Promise<void>;
  isSenderImportant(address: string): Promise<boolean>;
}

export interface ImportantSenderStore {
  isImportant(address: string): boolean;
  setImportant(address: string, important: boolean): void;
  list(): string[];
  close(): void;
}
