/**
 * @fileoverview Important-email alert deduplication.
 *
 * Records which messages were already alerted to which chat so each message
 * produces at most one alert per chat.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import config from '../../config.js';

const RETENTION_MS = 7 * 24 * 60 * 60 * 1000; // 7 days

export interface AlertDedupeStore {
  /** Returns false if the chat was already alerted about the message. */
  register(chatId: string, messageId: string, now?: number): boolean;
  clear(): void;
  close(): void;
}

function alertKey(chatId: string, messageId: string): string {
  return `${chatId}:${messageId}`;
}

export class MemoryAlertDedupeStore implements AlertDedupeStore {
  private readonly map = new Map<string, number>();

  register(chatId: string, messageId: string, now = Date.now()): boolean {
    this.prune(now);
    const key = alertKey(chatId, messageId);
    if (this.map.has(key)) {
      return false;
    }
    this.map.set(key, now);
    return true;
  }

  clear(): void {
    this.map.clear();
  }

  close(): void {
    this.map.clear();
  }

  private prune(now: number): void {
    const cutoff = now - RETENTION_MS;
    for (const [key, seenAt] of this.map.entries()) {
      if (seenAt < cutoff) {
        this.map.delete(key);
      }
    }
  }
}

export class SqliteAlertDedupeStore implements AlertDedupeStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS alert_receipts (
        chat_id TEXT NOT NULL,
        message_id TEXT NOT NULL,
        alerted_at INTEGER NOT NULL,
        PRIMARY KEY (chat_id, message_id)
      );
      CREATE INDEX IF NOT EXISTS idx_alert_receipts_alerted_at
        ON alert_receipts(alerted_at);
    `);
  }

  register(chatId: string, messageId: string, now = Date.now()): boolean {
    this.db
      .prepare('DELETE FROM alert_receipts WHERE alerted_at < ?')
      .run(now - RETENTION_MS);

    const result = this.db
      .prepare('INSERT OR IGNORE INTO alert_receipts (chat_id, message_id, alerted_at) VALUES (?, ?, ?)')
      .run(chatId, messageId, now);

    return result.changes === 1;
  }

  clear(): void {
    this.db.prepare('DELETE FROM alert_receipts').run();
  }

  close(): void {
    this.db.close();
  }
}

let store: AlertDedupeStore | null = null;

export function getAlertDedupeStore(): AlertDedupeStore {
  if (store) {
    return store;
  }

  store = config.nodeEnv === 'test'
    ? new MemoryAlertDedupeStore()
    : new SqliteAlertDedupeStore(config.storage.sqlitePath);
  return store;
}

/**
 * Close and reset the dedupe store.
 */
export function closeAlertDedupeStore(): void {
  if (!store) {
    return;
  }
  store.close();
  store = null;
}
