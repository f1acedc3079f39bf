/**
 * Database Migrations
 *
 * Manages schema versioning, upgrades and verification.
 */

import type Database from 'better-sqlite3';
import { SchemaError } from '@cmdrecall/common';

export interface Migration {
  version: number;
  name: string;
  up: string;
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'cache_and_feedback',
    up: `
      -- One row per normalized query
      CREATE TABLE IF NOT EXISTS cache_entries (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        query_text TEXT NOT NULL,
        query_hash TEXT NOT NULL UNIQUE,
        command TEXT NOT NULL,
        confirmation_count INTEGER NOT NULL DEFAULT 0 CHECK (confirmation_count >= 0),
        rejection_count INTEGER NOT NULL DEFAULT 0 CHECK (rejection_count >= 0),
        confidence_score REAL NOT NULL DEFAULT 0 CHECK (confidence_score BETWEEN 0 AND 1),
        created_at INTEGER NOT NULL,
        last_used_at INTEGER NOT NULL,
        os_type TEXT,
        shell_type TEXT
      );

      -- Append-only audit trail, linked by hash only
      CREATE TABLE IF NOT EXISTS feedback_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        query_hash TEXT NOT NULL,
        command TEXT NOT NULL,
        action TEXT NOT NULL CHECK (action IN ('confirm', 'reject')),
        timestamp INTEGER NOT NULL
      );

      -- Indexes
      CREATE INDEX IF NOT EXISTS idx_cache_entries_hash ON cache_entries(query_hash);
      CREATE INDEX IF NOT EXISTS idx_cache_entries_last_used ON cache_entries(last_used_at DESC);
      CREATE INDEX IF NOT EXISTS idx_cache_entries_confidence ON cache_entries(confidence_score);
      CREATE INDEX IF NOT EXISTS idx_feedback_events_hash ON feedback_events(query_hash);
      CREATE INDEX IF NOT EXISTS idx_feedback_events_timestamp ON feedback_events(timestamp);
    `,
  },
  {
    version: 2,
    name: 'store_meta',
    up: `
      CREATE TABLE IF NOT EXISTS store_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `,
  },
];

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version;

/**
 * Tables, columns and indexes the stores rely on
 */
const REQUIRED_SCHEMA: Record<string, string[]> = {
  cache_entries: [
    'id',
    'query_text',
    'query_hash',
    'command',
    'confirmation_count',
    'rejection_count',
    'confidence_score',
    'created_at',
    'last_used_at',
    'os_type',
    'shell_type',
  ],
  feedback_events: ['id', 'query_hash', 'command', 'action', 'timestamp'],
  store_meta: ['key', 'value', 'updated_at'],
};

const REQUIRED_INDEXES = [
  'idx_cache_entries_hash',
  'idx_cache_entries_last_used',
  'idx_cache_entries_confidence',
  'idx_feedback_events_hash',
  'idx_feedback_events_timestamp',
];

/**
 * Run all pending migrations. Returns the migrations applied by this call.
 */
export function runMigrations(db: Database.Database): Migration[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `);

  const applied: Migration[] = [];

  // Another process may be migrating the same file, so the version is read
  // inside the write lock.
  db.transaction(() => {
    const version = getSchemaVersion(db);
    for (const migration of migrations) {
      if (migration.version > version) {
        db.exec(migration.up);
        db.prepare('INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)').run(
          migration.version,
          migration.name,
          Date.now()
        );
        applied.push(migration);
      }
    }
  }).immediate();

  return applied;
}

/**
 * Get the current schema version
 */
export function getSchemaVersion(db: Database.Database): number {
  try {
    const result = db
      .prepare('SELECT MAX(version) as version FROM schema_migrations')
      .get() as { version: number | null } | undefined;
    return result?.version ?? 0;
  } catch {
    return 0;
  }
}

/**
 * Check that every table, column and index the stores use exists
 */
export function verifySchema(db: Database.Database): void {
  const missing: string[] = [];

  for (const [table, columns] of Object.entries(REQUIRED_SCHEMA)) {
    const present = new Set(
      (db.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[]).map(c => c.name)
    );
    if (present.size === 0) {
      missing.push(`table:${table}`);
      continue;
    }
    for (const column of columns) {
      if (!present.has(column)) missing.push(`column:${table}.${column}`);
    }
  }

  const indexes = new Set(
    (db.prepare("SELECT name FROM sqlite_master WHERE type = 'index'").all() as { name: string }[])
      .map(i => i.name)
  );
  for (const index of REQUIRED_INDEXES) {
    if (!indexes.has(index)) missing.push(`index:${index}`);
  }

  if (missing.length > 0) {
    throw new SchemaError(`Cache schema is incomplete: ${missing.join(', ')}`, missing);
  }
}
