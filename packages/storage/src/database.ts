/**
 * Core Database Connection Manager
 *
 * One connection per CacheDatabase, opened lazily, migrated and verified on
 * first use. Every access goes through withConnection(), which retries lock
 * contention with exponential backoff and turns any other failure into
 * StoreUnavailableError.
 */

import Database from 'better-sqlite3';
import { existsSync, statSync } from 'node:fs';
import {
  SchemaError,
  StoreUnavailableError,
  isBusyError,
  retry,
  type StoreSettings,
} from '@cmdrecall/common';
import { getSchemaVersion, runMigrations, verifySchema } from './migrations.js';
import type { StoreLocation } from './location.js';

export interface DatabaseOptions {
  /** File path, ':memory:', or null when no writable location exists */
  path: string | null;
  busyRetries?: number;
  busyBaseDelayMs?: number;
  busyTimeoutMs?: number;
  verbose?: boolean;
  /** Reasons the location could not be resolved, reported on every access */
  unavailableReasons?: string[];
}

export interface StoreStats {
  path: string | null;
  sizeBytes: number;
  schemaVersion: number;
  cacheEntries: number;
  feedbackEvents: number;
}

type Connection = Database.Database;

export class CacheDatabase {
  readonly path: string | null;
  private db: Connection | null = null;
  private readonly busyRetries: number;
  private readonly busyBaseDelayMs: number;
  private readonly busyTimeoutMs: number;
  private readonly verbose: boolean;
  private readonly unavailableReasons: string[];

  constructor(options: DatabaseOptions) {
    this.path = options.path;
    this.busyRetries = options.busyRetries ?? 5;
    this.busyBaseDelayMs = options.busyBaseDelayMs ?? 50;
    this.busyTimeoutMs = options.busyTimeoutMs ?? 1000;
    this.verbose = options.verbose ?? false;
    this.unavailableReasons = options.unavailableReasons ?? [];
  }

  /**
   * Build a database for a resolved location
   */
  static fromLocation(
    location: StoreLocation,
    settings: StoreSettings,
    verbose = false
  ): CacheDatabase {
    return new CacheDatabase({
      path: location.kind === 'file' ? location.path : null,
      unavailableReasons: location.kind === 'unavailable' ? location.reasons : [],
      busyRetries: settings.busyRetries,
      busyBaseDelayMs: settings.busyBaseDelayMs,
      busyTimeoutMs: settings.busyTimeoutMs,
      verbose,
    });
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Open, migrate and verify. Safe to call on every run.
   */
  async initialize(): Promise<void> {
    await this.withConnection(() => undefined);
  }

  /**
   * Run fn against the connection, retrying while the file is locked
   */
  async withConnection<T>(fn: (db: Connection) => T): Promise<T> {
    try {
      return await retry(() => fn(this.connection()), {
        maxAttempts: this.busyRetries,
        initialDelay: this.busyBaseDelayMs,
        maxDelay: this.busyBaseDelayMs * 2 ** (this.busyRetries - 1),
        shouldRetry: (error) => isBusyError(error),
        onRetry: (_error, attempt, delay) => {
          if (this.verbose) {
            console.warn(`[STORE] Database busy, retry ${attempt}/${this.busyRetries - 1} in ${delay}ms`);
          }
        },
      });
    } catch (error) {
      throw this.classify(error);
    }
  }

  /**
   * Run fn inside a write transaction: everything commits or nothing does
   */
  async transaction<T>(fn: (db: Connection) => T): Promise<T> {
    return this.withConnection((db) => db.transaction(() => fn(db)).immediate());
  }

  /**
   * Copy the live database to destination (default: <path>.backup.<timestamp>)
   */
  async backup(destination?: string): Promise<string> {
    const target = destination ?? this.defaultBackupPath();
    await this.withConnection((db) => db.backup(target));
    return target;
  }

  async stats(): Promise<StoreStats> {
    return this.withConnection((db) => {
      const counts = db
        .prepare(`
          SELECT
            (SELECT COUNT(*) FROM cache_entries) as entries,
            (SELECT COUNT(*) FROM feedback_events) as events
        `)
        .get() as { entries: number; events: number };

      return {
        path: this.path,
        sizeBytes: this.fileSize(),
        schemaVersion: getSchemaVersion(db),
        cacheEntries: counts.entries,
        feedbackEvents: counts.events,
      };
    });
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private connection(): Connection {
    if (this.db) return this.db;

    if (this.path === null) {
      throw new StoreUnavailableError('No writable location for the cache database', {
        details: { reasons: this.unavailableReasons },
      });
    }

    const db = new Database(this.path, {
      timeout: this.busyTimeoutMs,
      verbose: this.verbose ? console.log : undefined,
    });

    try {
      if (this.path !== ':memory:') {
        // WAL lets readers proceed while another process writes
        db.pragma('journal_mode = WAL');
      }
      const applied = runMigrations(db);
      if (this.verbose) {
        for (const migration of applied) {
          console.log(`[STORE] Applied migration ${migration.version}: ${migration.name}`);
        }
      }
      verifySchema(db);
    } catch (error) {
      db.close();
      throw error;
    }

    this.db = db;
    return db;
  }

  private classify(error: unknown): Error {
    if (error instanceof SchemaError || error instanceof StoreUnavailableError) {
      return error;
    }
    const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
    const message = error instanceof Error ? error.message : String(error);
    const reason = isBusyError(error)
      ? `database stayed locked after ${this.busyRetries} attempts`
      : message;
    return new StoreUnavailableError(`Cache database unavailable: ${reason}`, {
      path: this.path ?? undefined,
      details: { code, message },
    });
  }

  private fileSize(): number {
    if (!this.path || this.path === ':memory:') return 0;
    let total = 0;
    for (const file of [this.path, `${this.path}-wal`]) {
      if (existsSync(file)) total += statSync(file).size;
    }
    return total;
  }

  private defaultBackupPath(): string {
    if (!this.path || this.path === ':memory:') {
      throw new StoreUnavailableError('An in-memory or unavailable database needs an explicit backup destination');
    }
    const stamp = new Date().toISOString().replace(/[-:]/g, '').replace(/\..+$/, '');
    return `${this.path}.backup.${stamp}`;
  }
}
