/**
 * @fileoverview Persistent set of senders the user flagged important.
 *
 * Shared across digest sessions; `mark_important` and the
 * /mark_important command are the only writers.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import config from '../../../config.js';
import type { ImportantSenderStore } from '../types.js';
import { normalizeAddress } from '../service/address.js';

export class MemoryImportantSenderStore implements ImportantSenderStore {
  private readonly senders = new Set<string>();

  isImportant(address: string): boolean {
    return this.senders.has(normalizeAddress(address));
  }

  setImportant(address: string, important: boolean): void {
    const key = normalizeAddress(address);
    if (important) {
      this.senders.add(key);
    } else {
      this.senders.delete(key);
    }
  }

  list(): string[] {
    return [...this.senders].sort();
  }

  close(): void {
    this.senders.clear();
  }
}

export class SqliteImportantSenderStore implements ImportantSenderStore {
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
      CREATE TABLE IF NOT EXISTS important_senders (
        address TEXT PRIMARY KEY,
        created_at INTEGER NOT NULL
      )
    `);
  }

  isImportant(address: string): boolean {
    const row = this.db
      .prepare<[string], { address: string }>('SELECT address FROM important_senders WHERE address = ?')
      .get(normalizeAddress(address));
    return row !== undefined;
  }

  setImportant(address: string, important: boolean): void {
    const key = normalizeAddress(address);
    if (important) {
      this.db
        .prepare('INSERT OR IGNORE INTO important_senders (address, created_at) VALUES (?, ?)')
        .run(key, Date.now());
    } else {
      this.db.prepare('DELETE FROM important_senders WHERE address = ?').run(key);
    }
  }

  list(): string[] {
    return this.db
      .prepare<[], { address: string }>('SELECT address FROM important_senders ORDER BY address')
      .all()
      .map((row) => row.address);
  }

  close(): void {
    this.db.close();
  }
}

let store: ImportantSenderStore | null = null;

/**
 * Get the important-sender store. In-memory under test, SQLite otherwise.
 */
export function getImportantSenderStore(): ImportantSenderStore {
  if (store) {
    return store;
  }

  store = config.nodeEnv === 'test'
    ? new MemoryImportantSenderStore()
    : new SqliteImportantSenderStore(config.storage.sqlitePath);
  return store;
}

/**
 * Close and reset the store.
 */
export function closeImportantSenderStore(): void {
  if (!store) {
    return;
  }
  store.close();
  store = null;
}
