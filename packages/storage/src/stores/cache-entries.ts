/**
 * Cache Entry Store
 *
 * Row-level access to cached query → command mappings.
 */

import type Database from 'better-sqlite3';
import type { CacheEntry } from '@cmdrecall/common';

export interface NewCacheEntry {
  queryText: string;
  queryHash: string;
  command: string;
  osType?: string;
  shellType?: string;
}

export interface FeedbackCounts {
  confirmationCount: number;
  rejectionCount: number;
  confidenceScore: number;
}

export interface ConfidenceDistribution {
  veryHigh: number;
  high: number;
  medium: number;
  low: number;
  totalConfirmations: number;
  totalRejections: number;
  averageConfidence: number;
}

export class CacheEntryStore {
  constructor(private db: Database.Database) {}

  /**
   * Get an entry by its normalized query hash
   */
  getByHash(queryHash: string): CacheEntry | undefined {
    const row = this.db
      .prepare('SELECT * FROM cache_entries WHERE query_hash = ?')
      .get(queryHash) as CacheEntryRow | undefined;

    return row ? this.rowToEntry(row) : undefined;
  }

  /**
   * Insert or merge by hash. Re-saving the same command refreshes the entry;
   * a different command replaces it and starts its feedback over.
   */
  upsert(entry: NewCacheEntry, now: number): CacheEntry {
    this.db.prepare(`
      INSERT INTO cache_entries (
        query_text, query_hash, command,
        confirmation_count, rejection_count, confidence_score,
        created_at, last_used_at, os_type, shell_type
      )
      VALUES (@queryText, @queryHash, @command, 0, 0, 0, @now, @now, @osType, @shellType)
      ON CONFLICT(query_hash) DO UPDATE SET
        query_text = excluded.query_text,
        last_used_at = excluded.last_used_at,
        os_type = COALESCE(excluded.os_type, cache_entries.os_type),
        shell_type = COALESCE(excluded.shell_type, cache_entries.shell_type),
        confirmation_count = CASE WHEN cache_entries.command = excluded.command
          THEN cache_entries.confirmation_count ELSE 0 END,
        rejection_count = CASE WHEN cache_entries.command = excluded.command
          THEN cache_entries.rejection_count ELSE 0 END,
        confidence_score = CASE WHEN cache_entries.command = excluded.command
          THEN cache_entries.confidence_score ELSE 0 END,
        command = excluded.command
    `).run({
      queryText: entry.queryText,
      queryHash: entry.queryHash,
      command: entry.command,
      osType: entry.osType ?? null,
      shellType: entry.shellType ?? null,
      now,
    });

    const saved = this.getByHash(entry.queryHash);
    if (!saved) {
      throw new Error(`Upsert of ${entry.queryHash} did not persist`);
    }
    return saved;
  }

  /**
   * Mark an entry as used now
   */
  touch(queryHash: string, now: number): boolean {
    const result = this.db
      .prepare('UPDATE cache_entries SET last_used_at = ? WHERE query_hash = ?')
      .run(now, queryHash);
    return result.changes > 0;
  }

  /**
   * Most recently used entries first
   */
  listRecent(limit: number): CacheEntry[] {
    const rows = this.db
      .prepare(`
        SELECT * FROM cache_entries
        ORDER BY last_used_at DESC, id DESC
        LIMIT ?
      `)
      .all(limit) as CacheEntryRow[];

    return rows.map((row) => this.rowToEntry(row));
  }

  listHashes(): string[] {
    const rows = this.db
      .prepare('SELECT query_hash FROM cache_entries ORDER BY id ASC')
      .all() as { query_hash: string }[];
    return rows.map((row) => row.query_hash);
  }

  /**
   * Write new counters and score; lastUsedAt only when given
   */
  updateCounts(queryHash: string, counts: FeedbackCounts, lastUsedAt?: number): boolean {
    const result = this.db
      .prepare(`
        UPDATE cache_entries
        SET confirmation_count = ?,
            rejection_count = ?,
            confidence_score = ?,
            last_used_at = COALESCE(?, last_used_at)
        WHERE query_hash = ?
      `)
      .run(
        counts.confirmationCount,
        counts.rejectionCount,
        counts.confidenceScore,
        lastUsedAt ?? null,
        queryHash
      );
    return result.changes > 0;
  }

  deleteByHash(queryHash: string): boolean {
    const result = this.db
      .prepare('DELETE FROM cache_entries WHERE query_hash = ?')
      .run(queryHash);
    return result.changes > 0;
  }

  /**
   * Delete entries last used before the cutoff
   */
  deleteUsedBefore(cutoff: number): number {
    const result = this.db
      .prepare('DELETE FROM cache_entries WHERE last_used_at < ?')
      .run(cutoff);
    return result.changes;
  }

  /**
   * Evict least recently used entries until at most `keep` remain
   */
  evictOldest(keep: number): number {
    const excess = this.count() - keep;
    if (excess <= 0) return 0;

    const result = this.db
      .prepare(`
        DELETE FROM cache_entries
        WHERE id IN (
          SELECT id FROM cache_entries
          ORDER BY last_used_at ASC, id ASC
          LIMIT ?
        )
      `)
      .run(excess);
    return result.changes;
  }

  count(): number {
    const row = this.db
      .prepare('SELECT COUNT(*) as count FROM cache_entries')
      .get() as { count: number };
    return row.count;
  }

  clear(): number {
    return this.db.prepare('DELETE FROM cache_entries').run().changes;
  }

  /**
   * Entry counts per confidence band plus feedback totals
   */
  distribution(): ConfidenceDistribution {
    const row = this.db
      .prepare(`
        SELECT
          SUM(CASE WHEN confidence_score >= 0.9 THEN 1 ELSE 0 END) as very_high,
          SUM(CASE WHEN confidence_score >= 0.8 AND confidence_score < 0.9 THEN 1 ELSE 0 END) as high,
          SUM(CASE WHEN confidence_score >= 0.5 AND confidence_score < 0.8 THEN 1 ELSE 0 END) as medium,
          SUM(CASE WHEN confidence_score < 0.5 THEN 1 ELSE 0 END) as low,
          SUM(confirmation_count) as confirmations,
          SUM(rejection_count) as rejections,
          AVG(confidence_score) as average
        FROM cache_entries
      `)
      .get() as DistributionRow;

    return {
      veryHigh: row.very_high ?? 0,
      high: row.high ?? 0,
      medium: row.medium ?? 0,
      low: row.low ?? 0,
      totalConfirmations: row.confirmations ?? 0,
      totalRejections: row.rejections ?? 0,
      averageConfidence: row.average ?? 0,
    };
  }

  private rowToEntry(row: CacheEntryRow): CacheEntry {
    return {
      id: row.id,
      queryText: row.query_text,
      queryHash: row.query_hash,
      command: row.command,
      confirmationCount: row.confirmation_count,
      rejectionCount: row.rejection_count,
      confidenceScore: row.confidence_score,
      createdAt: row.created_at,
      lastUsedAt: row.last_used_at,
      osType: row.os_type || undefined,
      shellType: row.shell_type || undefined,
    };
  }
}

interface CacheEntryRow {
  id: number;
  query_text: string;
  query_hash: string;
  command: string;
  confirmation_count: number;
  rejection_count: number;
  confidence_score: number;
  created_at: number;
  last_used_at: number;
  os_type: string | null;
  shell_type: string | null;
}

interface DistributionRow {
  very_high: number | null;
  high: number | null;
  medium: number | null;
  low: number | null;
  confirmations: number | null;
  rejections: number | null;
  average: number | null;
}
