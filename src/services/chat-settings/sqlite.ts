/**
 * @fileoverview SQLite chat settings store.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { ChatSettings, ChatSettingsDefaults, ChatSettingsStore, ChatSettingsUpdate } from './types.js';

type ChatSettingsRow = {
  chat_id: string;
  digest_interval_hours: number;
  notifications_enabled: number;
  last_digest_at: number | null;
  last_alert_check_at: number | null;
  created_at: number;
  updated_at: number;
};

const SELECT_COLUMNS = `chat_id, digest_interval_hours, notifications_enabled, last_digest_at,
  last_alert_check_at, created_at, updated_at`;

function fromRow(row: ChatSettingsRow): ChatSettings {
  return {
    chatId: row.chat_id,
    digestIntervalHours: row.digest_interval_hours,
    notificationsEnabled: row.notifications_enabled === 1,
    lastDigestAt: row.last_digest_at ?? undefined,
    lastAlertCheckAt: row.last_alert_check_at ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteChatSettingsStore implements ChatSettingsStore {
  private readonly db: Database.Database;

  /**
   * @param dbPath Path to SQLite database file, or `:memory:`
   */
  constructor(dbPath: string, private readonly defaults: ChatSettingsDefaults) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chat_settings (
        chat_id TEXT PRIMARY KEY,
        digest_interval_hours REAL NOT NULL,
        notifications_enabled INTEGER NOT NULL DEFAULT 1,
        last_digest_at INTEGER,
        last_alert_check_at INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
  }

  async get(chatId: string): Promise<ChatSettings | null> {
    const row = this.db
      .prepare<[string], ChatSettingsRow>(`SELECT ${SELECT_COLUMNS} FROM chat_settings WHERE chat_id = ?`)
      .get(chatId);
    return row ? fromRow(row) : null;
  }

  async set(chatId: string, update: ChatSettingsUpdate): Promise<ChatSettings> {
    const now = Date.now();
    const existing = await this.get(chatId);
    const next: ChatSettings = {
      chatId,
      digestIntervalHours: this.defaults.digestIntervalHours,
      notificationsEnabled: this.defaults.notificationsEnabled,
      createdAt: now,
      ...existing,
      ...update,
      updatedAt: now,
    };

    this.db
      .prepare(
        `INSERT INTO chat_settings (chat_id, digest_interval_hours, notifications_enabled,
           last_digest_at, last_alert_check_at, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(chat_id) DO UPDATE SET
           digest_interval_hours = excluded.digest_interval_hours,
           notifications_enabled = excluded.notifications_enabled,
           last_digest_at = excluded.last_digest_at,
           last_alert_check_at = excluded.last_alert_check_at,
           updated_at = excluded.updated_at`
      )
      .run(
        chatId,
        next.digestIntervalHours,
        next.notificationsEnabled ? 1 : 0,
        next.lastDigestAt ?? null,
        next.lastAlertCheckAt ?? null,
        next.createdAt,
        next.updatedAt
      );
    return next;
  }

  async delete(chatId: string): Promise<void> {
    this.db.prepare('DELETE FROM chat_settings WHERE chat_id = ?').run(chatId);
  }

  async list(): Promise<ChatSettings[]> {
    return this.db
      .prepare<[], ChatSettingsRow>(`SELECT ${SELECT_COLUMNS} FROM chat_settings ORDER BY created_at`)
      .all()
      .map(fromRow);
  }

  close(): void {
    this.db.close();
  }
}
