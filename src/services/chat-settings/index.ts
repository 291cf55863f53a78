/**
 * @fileoverview Chat settings store factory.
 *
 * Singleton: in-memory under test, SQLite otherwise.
 */

import config from '../../config.js';
import { MemoryChatSettingsStore } from './memory.js';
import { SqliteChatSettingsStore } from './sqlite.js';
import type { ChatSettingsDefaults, ChatSettingsStore } from './types.js';

export type { ChatSettings, ChatSettingsStore, ChatSettingsUpdate, ChatSettingsDefaults } from './types.js';
export { MemoryChatSettingsStore } from './memory.js';
export { SqliteChatSettingsStore } from './sqlite.js';

let instance: ChatSettingsStore | null = null;

export function chatSettingsDefaults(): ChatSettingsDefaults {
  return {
    digestIntervalHours: config.scheduler.defaultDigestIntervalHours,
    notificationsEnabled: true,
  };
}

export function getChatSettingsStore(): ChatSettingsStore {
  if (instance) {
    return instance;
  }

  instance = config.nodeEnv === 'test'
    ? new MemoryChatSettingsStore(chatSettingsDefaults())
    : new SqliteChatSettingsStore(config.storage.sqlitePath, chatSettingsDefaults());
  return instance;
}

/**
 * Close and reset the store. Useful for tests.
 */
export function closeChatSettingsStore(): void {
  if (!instance) {
    return;
  }
  instance.close();
  instance = null;
}
