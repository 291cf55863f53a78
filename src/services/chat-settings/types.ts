/**
 * @fileoverview Chat settings store interface.
 *
 * Per-chat preferences for scheduled digests and important-email alerts.
 * The Telegram chat id is the primary key.
 */

export interface ChatSettings {
  chatId: string;
  /** Hours between scheduled digests; 0 turns them off. */
  digestIntervalHours: number;
  notificationsEnabled: boolean;
  lastDigestAt?: number; // Unix timestamp in milliseconds
  lastAlertCheckAt?: number; // Unix timestamp in milliseconds
  createdAt: number;
  updatedAt: number;
}

export type ChatSettingsUpdate = Partial<Omit<ChatSettings, 'chatId' | 'createdAt' | 'updatedAt'>>;

export interface ChatSettingsStore {
  /**
   * @returns Settings or null if the chat never registered.
   */
  get(chatId: string): Promise<ChatSettings | null>;

  /**
   * Create or update settings. Fields left out keep their value, or the
   * store defaults for a new chat.
   */
  set(chatId: string, update: ChatSettingsUpdate): Promise<ChatSettings>;

  delete(chatId: string): Promise<void>;

  list(): Promise<ChatSettings[]>;

  close(): void;
}

export interface ChatSettingsDefaults {
  digestIntervalHours: number;
  notificationsEnabled: boolean;
}
