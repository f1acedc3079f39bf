/**
 * Confidence Model
 *
 * Turns confirm/reject feedback into a bounded score and attenuates it by
 * the time since the entry was last used. Scores only change through
 * updateFeedback() and recalculateAll(); reads never write.
 */

import {
  clamp,
  elapsedDays,
  type CacheEntry,
  type CacheSettings,
  type Clock,
  type DecaySettings,
  type FeedbackEvent,
} from '@cmdrecall/common';
import {
  CacheEntryStore,
  FeedbackStore,
  MetaStore,
  type CacheDatabase,
  type ConfidenceDistribution,
} from '@cmdrecall/storage';
import { cacheOperation } from './operation.js';

/** Bump when calculate() changes shape, so stored scores get recomputed */
export const SCORING_VERSION = 1;

const SIGNATURE_KEY = 'scoring_signature';

export type ScoringSettings = Pick<CacheSettings, 'positiveWeight' | 'negativeWeight' | 'smoothing' | 'decay'>;

export interface RecalculationResult {
  total: number;
  updated: number;
  failed: number;
}

export class ConfidenceModel {
  private readonly decay: DecaySettings;

  constructor(
    private readonly database: CacheDatabase,
    private readonly settings: ScoringSettings,
    private readonly clock: Clock = Date.now
  ) {
    this.decay = settings.decay;
  }

  /**
   * clamp((c·pw − r·nw) / (c·pw + r·nw + smoothing), 0, 1)
   */
  calculate(confirmations: number, rejections: number): number {
    const positive = Math.max(0, confirmations) * this.settings.positiveWeight;
    const negative = Math.max(0, rejections) * this.settings.negativeWeight;
    return clamp((positive - negative) / (positive + negative + this.settings.smoothing), 0, 1);
  }

  /**
   * Multiplier in [floor, 1], non-increasing in elapsed days
   */
  decayFactor(days: number): number {
    const d = Math.max(0, days);
    switch (this.decay.curve) {
      case 'exponential':
        return Math.max(this.decay.floor, 0.5 ** (d / this.decay.halfLifeDays));
      case 'linear':
        return Math.max(this.decay.floor, 1 - d / this.decay.linearSpanDays);
      case 'none':
        return 1;
    }
  }

  /**
   * Score the orchestrator compares against its thresholds
   */
  effective(entry: CacheEntry, now: number = this.clock()): number {
    return entry.confidenceScore * this.decayFactor(elapsedDays(entry.lastUsedAt, now));
  }

  /**
   * Record one confirm or reject. Counter, score and feedback event are
   * written in one transaction. Returns null for an unknown hash.
   */
  async updateFeedback(queryHash: string, confirmed: boolean): Promise<CacheEntry | null> {
    return cacheOperation('updateFeedback', () =>
      this.database.transaction((db) => {
        const entries = new CacheEntryStore(db);
        const entry = entries.getByHash(queryHash);
        if (!entry) return null;

        const now = this.clock();
        const confirmationCount = entry.confirmationCount + (confirmed ? 1 : 0);
        const rejectionCount = entry.rejectionCount + (confirmed ? 0 : 1);

        entries.updateCounts(
          queryHash,
          {
            confirmationCount,
            rejectionCount,
            confidenceScore: this.calculate(confirmationCount, rejectionCount),
          },
          // Only positive feedback counts as use; a rejection must not reset decay
          confirmed ? now : undefined
        );
        new FeedbackStore(db).append({
          queryHash,
          command: entry.command,
          action: confirmed ? 'confirm' : 'reject',
          timestamp: now,
        });

        const meta = new MetaStore(db);
        if (meta.get(SIGNATURE_KEY) === undefined) {
          meta.set(SIGNATURE_KEY, this.signature(), now);
        }

        return entries.getByHash(queryHash) ?? null;
      })
    );
  }

  /**
   * Recompute every stored score with the current weights, one transaction
   * per entry. Failures are logged and counted; the pass keeps going.
   */
  async recalculateAll(): Promise<RecalculationResult> {
    const hashes = await cacheOperation('recalculateAll', () =>
      this.database.withConnection((db) => new CacheEntryStore(db).listHashes())
    );

    let updated = 0;
    let failed = 0;
    for (const hash of hashes) {
      try {
        const changed = await this.database.transaction((db) => {
          const entries = new CacheEntryStore(db);
          const entry = entries.getByHash(hash);
          if (!entry) return false;
          return entries.updateCounts(hash, {
            confirmationCount: entry.confirmationCount,
            rejectionCount: entry.rejectionCount,
            confidenceScore: this.calculate(entry.confirmationCount, entry.rejectionCount),
          });
        });
        if (changed) updated++;
      } catch (error) {
        failed++;
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[CONFIDENCE] Recalculation failed for ${hash}: ${message}`);
      }
    }

    if (failed === 0) {
      await cacheOperation('recalculateAll', () =>
        this.database.withConnection((db) => new MetaStore(db).set(SIGNATURE_KEY, this.signature(), this.clock()))
      );
    }

    return { total: hashes.length, updated, failed };
  }

  /**
   * True when stored scores were computed with different weights
   */
  async needsRecalculation(): Promise<boolean> {
    const stored = await cacheOperation('needsRecalculation', () =>
      this.database.withConnection((db) => new MetaStore(db).get(SIGNATURE_KEY))
    );
    return stored !== undefined && stored !== this.signature();
  }

  async feedbackHistory(queryHash: string, limit = 50): Promise<FeedbackEvent[]> {
    return cacheOperation('feedbackHistory', () =>
      this.database.withConnection((db) => new FeedbackStore(db).listByHash(queryHash, limit))
    );
  }

  async distribution(): Promise<ConfidenceDistribution> {
    return cacheOperation('distribution', () =>
      this.database.withConnection((db) => new CacheEntryStore(db).distribution())
    );
  }

  signature(): string {
    return JSON.stringify({
      version: SCORING_VERSION,
      positiveWeight: this.settings.positiveWeight,
      negativeWeight: this.settings.negativeWeight,
      smoothing: this.settings.smoothing,
    });
  }
}
