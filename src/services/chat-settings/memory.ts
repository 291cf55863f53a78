/**
 * @fileoverview In-memory chat settings store for tests and local runs.
 */

import type { ChatSettings, ChatSettingsDefaults, ChatSettingsStore, ChatSettingsUpdate } from './types.js';

export class MemoryChatSettingsStore implements ChatSettingsStore {
  private readonly chats = new Map<string, ChatSettings>();

  constructor(private readonly defaults: ChatSettingsDefaults) {}

  async get(chatId: string): Promise<ChatSettings | null> {
    const settings = this.chats.get(chatId);
    return settings ? { ...settings } : null;
  }

  async set(chatId: string, update: ChatSettingsUpdate): Promise<ChatSettings> {
    const now = Date.now();
    const existing = this.chats.get(chatId);
    const next: ChatSettings = {
      chatId,
      digestIntervalHours: this.defaults.digestIntervalHours,
      notificationsEnabled: this.defaults.notificationsEnabled,
      createdAt: now,
      ...existing,
      ...update,
      updatedAt: now,
    };
    this.chats.set(chatId, next);
    return { ...next };
  }

  async delete(chatId: string): Promise<void> {
    this.chats.delete(chatId);
  }

  async list(): Promise<ChatSettings[]> {
    return [...this.chats.values()].map((settings) => ({ ...settings }));
  }

  close(): void {
    this.chats.clear();
  }
}
