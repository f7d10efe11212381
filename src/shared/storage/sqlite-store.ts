/**
 * SQLite-backed key/value store
 *
 * A single `kv` table holding JSON strings. Pass ':memory:' for a throwaway database.
 */

import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { createLogger } from '../lib/logger';
import type { KeyValueStore } from './types';

const log = createLogger('storage');

interface KvRow {
  value: string;
}

interface KeyRow {
  key: string;
}

export function createSqliteStore(dbPath: string): KeyValueStore {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(`
    CREATE TABLE IF NOT EXISTS kv (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );
  `);
  log.debug(`Database initialized at ${dbPath}`);

  const selectValue = db.prepare<[string], KvRow>('SELECT value FROM kv WHERE key = ?');
  const upsert = db.prepare<[string, string, number]>(`
    INSERT INTO kv (key, value, updated_at) VALUES (?, ?, ?)
    ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
  `);
  const remove = db.prepare<[string]>('DELETE FROM kv WHERE key = ?');
  const selectKeys = db.prepare<[number, string], KeyRow>(
    'SELECT key FROM kv WHERE substr(key, 1, ?) = ? ORDER BY key'
  );

  let closed = false;

  return {
    async get(key) {
      return selectValue.get(key)?.value ?? null;
    },

    async put(key, value) {
      upsert.run(key, value, Date.now());
    },

    async delete(key) {
      remove.run(key);
    },

    async list(prefix = '') {
      return selectKeys.all(prefix.length, prefix).map((row) => row.key);
    },

    close() {
      if (!closed) {
        db.close();
        closed = true;
        log.debug('Database closed');
      }
    },
  };
}
