/**
 * Cache Manager
 *
 * Saves and finds cached query → command mappings. Composes the store and
 * the matcher; every failure surfaces as CacheUnavailableError.
 */

import { basename } from 'node:path';
import {
  MS_PER_DAY,
  ValidationError,
  type CacheEntry,
  type CacheSettings,
  type Clock,
  type SimilarMatch,
} from '@cmdrecall/common';
import { CacheEntryStore, FeedbackStore, type CacheDatabase } from '@cmdrecall/storage';
import type { QueryMatcher } from '@cmdrecall/matcher';
import { cacheOperation } from './operation.js';

export type CacheManagerSettings = Pick<
  CacheSettings,
  'similarityThreshold' | 'cacheSizeLimit' | 'maxCacheAgeDays'
>;

export interface CleanupResult {
  /** Removed for not being used within the age limit */
  expired: number;
  /** Removed to get back under the size limit */
  evicted: number;
  removed: number;
  remaining: number;
}

export interface ClearResult {
  entries: number;
  feedbackEvents: number;
}

export function defaultOsType(): string {
  return process.platform;
}

export function defaultShellType(): string | undefined {
  const shell = process.env.SHELL ?? process.env.ComSpec;
  return shell ? basename(shell).replace(/\.exe$/i, '').toLowerCase() : undefined;
}

export class CacheManager {
  constructor(
    private readonly database: CacheDatabase,
    private readonly matcher: QueryMatcher,
    private readonly settings: CacheManagerSettings,
    private readonly clock: Clock = Date.now
  ) {}

  hash(query: string): string {
    return this.matcher.hash(query);
  }

  /**
   * Insert or merge by normalized hash
   */
  async save(
    query: string,
    command: string,
    osType: string | undefined = defaultOsType(),
    shellType: string | undefined = defaultShellType()
  ): Promise<CacheEntry> {
    const trimmed = command.trim();
    if (trimmed === '') {
      throw new ValidationError('Refusing to cache an empty command', { query });
    }
    const queryHash = this.hash(query);

    return cacheOperation('save', () =>
      this.database.withConnection((db) =>
        new CacheEntryStore(db).upsert(
          { queryText: query, queryHash, command: trimmed, osType, shellType },
          this.clock()
        )
      )
    );
  }

  async findExact(query: string): Promise<CacheEntry | null> {
    const queryHash = this.hash(query);
    return cacheOperation('findExact', () =>
      this.database.withConnection((db) => new CacheEntryStore(db).getByHash(queryHash) ?? null)
    );
  }

  /**
   * Best match among the `limit` most recently used entries, excluding the
   * query's own entry
   */
  async findSimilar(
    query: string,
    limit: number = this.settings.cacheSizeLimit,
    threshold: number = this.settings.similarityThreshold
  ): Promise<SimilarMatch | null> {
    const [best] = await this.findSimilarCandidates(query, limit, threshold);
    return best ?? null;
  }

  /**
   * Every entry at or above the threshold: highest similarity first, then
   * highest confidence, then most recently used
   */
  async findSimilarCandidates(
    query: string,
    limit: number = this.settings.cacheSizeLimit,
    threshold: number = this.settings.similarityThreshold
  ): Promise<SimilarMatch[]> {
    const ownHash = this.hash(query);
    const scan = Math.max(0, Math.floor(limit));
    const recent = await cacheOperation('findSimilar', () =>
      this.database.withConnection((db) => new CacheEntryStore(db).listRecent(scan))
    );

    const matches: SimilarMatch[] = [];
    for (const entry of recent) {
      if (entry.queryHash === ownHash) continue;
      const similarity = this.matcher.similarity(query, entry.queryText);
      if (similarity >= threshold) {
        matches.push({ entry, similarity });
      }
    }

    return matches.sort(
      (a, b) =>
        b.similarity - a.similarity ||
        b.entry.confidenceScore - a.entry.confidenceScore ||
        b.entry.lastUsedAt - a.entry.lastUsedAt
    );
  }

  /**
   * Mark an entry as used now
   */
  async touch(queryHash: string): Promise<boolean> {
    return cacheOperation('touch', () =>
      this.database.withConnection((db) => new CacheEntryStore(db).touch(queryHash, this.clock()))
    );
  }

  async remove(query: string): Promise<boolean> {
    const queryHash = this.hash(query);
    return cacheOperation('remove', () =>
      this.database.withConnection((db) => new CacheEntryStore(db).deleteByHash(queryHash))
    );
  }

  /**
   * Drop every entry; the feedback log only when asked
   */
  async clear(options: { purgeFeedback?: boolean } = {}): Promise<ClearResult> {
    return cacheOperation('clear', () =>
      this.database.transaction((db) => ({
        entries: new CacheEntryStore(db).clear(),
        feedbackEvents: options.purgeFeedback ? new FeedbackStore(db).clear() : 0,
      }))
    );
  }

  async count(): Promise<number> {
    return cacheOperation('count', () =>
      this.database.withConnection((db) => new CacheEntryStore(db).count())
    );
  }

  /**
   * Delete entries unused for maxAgeDays, then evict least recently used
   * entries until at most sizeLimit remain. One transaction.
   */
  async cleanup(
    maxAgeDays: number = this.settings.maxCacheAgeDays,
    sizeLimit: number = this.settings.cacheSizeLimit
  ): Promise<CleanupResult> {
    if (!(maxAgeDays > 0)) {
      throw new ValidationError(`maxAgeDays must be positive, got ${maxAgeDays}`);
    }
    if (!Number.isInteger(sizeLimit) || sizeLimit < 0) {
      throw new ValidationError(`sizeLimit must be a non-negative integer, got ${sizeLimit}`);
    }

    const cutoff = this.clock() - maxAgeDays * MS_PER_DAY;
    return cacheOperation('cleanup', () =>
      this.database.transaction((db) => {
        const entries = new CacheEntryStore(db);
        const expired = entries.deleteUsedBefore(cutoff);
        const evicted = entries.evictOldest(sizeLimit);
        return { expired, evicted, removed: expired + evicted, remaining: entries.count() };
      })
    );
  }
}
