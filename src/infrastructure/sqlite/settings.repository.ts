import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import type { SettingValue, SettingsStore } from '../../loyalty/settings.js';
import type { LedgerDatabase } from './database.js';
import type { SettingRow } from './rows.js';

const settingValueSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Settings persisted in the `settings` table, one JSON value per key
 */
export class SqliteSettingsStore implements SettingsStore {
  private readonly conn: Database;

  constructor(db: LedgerDatabase) {
    this.conn = db.connection;
  }

  get(key: string): SettingValue | undefined {
    const row = this.conn
      .prepare<[string], SettingRow>('SELECT key, value FROM settings WHERE key = ?')
      .get(key);
    if (!row) {
      return undefined;
    }
    const value: unknown = JSON.parse(row.value);
    return settingValueSchema.parse(value);
  }

  set(key: string, value: SettingValue): void {
    this.conn
      .prepare<[string, string]>(
        `INSERT INTO settings (key, value) VALUES (?, ?)
         ON CONFLICT (key) DO UPDATE SET value = excluded.value`
      )
      .run(key, JSON.stringify(value));
  }

  delete(key: string): void {
    this.conn.prepare<[string]>('DELETE FROM settings WHERE key = ?').run(key);
  }
}
