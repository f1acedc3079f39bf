/**
 * Meta Store
 *
 * Small key/value table for store-wide bookkeeping.
 */

import type Database from 'better-sqlite3';

export class MetaStore {
  constructor(private db: Database.Database) {}

  get(key: string): string | undefined {
    const row = this.db
      .prepare('SELECT value FROM store_meta WHERE key = ?')
      .get(key) as { value: string } | undefined;
    return row?.value;
  }

  set(key: string, value: string, now: number): void {
    this.db.prepare(`
      INSERT INTO store_meta (key, value, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `).run(key, value, now);
  }

  delete(key: string): boolean {
    return this.db.prepare('DELETE FROM store_meta WHERE key = ?').run(key).changes > 0;
  }
}
