/**
 * Tests for the confidence model
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { defaultSettings, MS_PER_DAY, type CacheEntry } from '@cmdrecall/common';
import { QueryMatcher } from '@cmdrecall/matcher';
import { createTestDatabase, createTestClock, type TestClock, type TestDatabaseContext } from '../../../tests/helpers/storage-test-helper.js';
import { ConfidenceModel, type ScoringSettings } from './confidence.js';
import { CacheManager } from './cache-manager.js';

function scoring(overrides: Partial<ScoringSettings> = {}): ScoringSettings {
  return { ...defaultSettings(), ...overrides };
}

function entryWith(score: number, lastUsedAt: number): CacheEntry {
  return {
    id: 1,
    queryText: 'list files',
    queryHash: 'abc',
    command: 'ls',
    confirmationCount: 0,
    rejectionCount: 0,
    confidenceScore: score,
    createdAt: lastUsedAt,
    lastUsedAt,
  };
}

describe('ConfidenceModel', () => {
  let ctx: TestDatabaseContext;
  let clock: TestClock;
  let manager: CacheManager;

  beforeEach(() => {
    ctx = createTestDatabase();
    clock = createTestClock();
    manager = new CacheManager(ctx.database, new QueryMatcher(), defaultSettings(), clock);
  });

  afterEach(() => {
    ctx.cleanup();
  });

  describe('calculate', () => {
    it('rises with confirmations and stays below 1', () => {
      const model = new ConfidenceModel(ctx.database, scoring(), clock);

      expect(model.calculate(0, 0)).toBe(0);
      expect(model.calculate(1, 0)).toBeCloseTo(0.1667, 4);
      expect(model.calculate(2, 0)).toBeCloseTo(0.2857, 4);
      expect(model.calculate(3, 0)).toBeCloseTo(0.375, 4);
      expect(model.calculate(1000, 0)).toBeLessThan(1);
    });

    it('drops to zero when rejections outweigh confirmations', () => {
      const model = new ConfidenceModel(ctx.database, scoring(), clock);

      expect(model.calculate(3, 3)).toBe(0);
      expect(model.calculate(0, 5)).toBe(0);
    });

    it('passes one half after three confirmations with lighter smoothing', () => {
      const model = new ConfidenceModel(ctx.database, scoring({ smoothing: 0.5 }), clock);

      expect(model.calculate(3, 0)).toBeCloseTo(0.5455, 4);
      expect(model.calculate(3, 3)).toBe(0);
    });

    it('treats negative counts as zero', () => {
      const model = new ConfidenceModel(ctx.database, scoring(), clock);
      expect(model.calculate(-2, -2)).toBe(0);
    });
  });

  describe('decayFactor', () => {
    it('halves every half-life down to the floor on the exponential curve', () => {
      const model = new ConfidenceModel(ctx.database, scoring(), clock);

      expect(model.decayFactor(0)).toBe(1);
      expect(model.decayFactor(30)).toBeCloseTo(0.5, 10);
      expect(model.decayFactor(60)).toBeCloseTo(0.25, 10);
      expect(model.decayFactor(200)).toBe(0.1);
      expect(model.decayFactor(-5)).toBe(1);
    });

    it('falls linearly over the span on the linear curve', () => {
      const model = new ConfidenceModel(
        ctx.database,
        scoring({ decay: { curve: 'linear', halfLifeDays: 30, linearSpanDays: 90, floor: 0.1 } }),
        clock
      );

      expect(model.decayFactor(45)).toBeCloseTo(0.5, 10);
      expect(model.decayFactor(90)).toBe(0.1);
    });

    it('never decays with the none curve', () => {
      const model = new ConfidenceModel(
        ctx.database,
        scoring({ decay: { curve: 'none', halfLifeDays: 30, linearSpanDays: 90, floor: 0.1 } }),
        clock
      );
      expect(model.decayFactor(10_000)).toBe(1);
    });

    it('is non-increasing in elapsed days', () => {
      const model = new ConfidenceModel(ctx.database, scoring(), clock);
      let previous = model.decayFactor(0);
      for (let day = 1; day <= 120; day++) {
        const current = model.decayFactor(day);
        expect(current).toBeLessThanOrEqual(previous);
        previous = current;
      }
    });
  });

  describe('effective', () => {
    it('attenuates the stored score by time since last use', () => {
      const model = new ConfidenceModel(ctx.database, scoring(), clock);
      const entry = entryWith(0.8, clock());

      expect(model.effective(entry)).toBe(0.8);
      expect(model.effective(entry, clock() + 30 * MS_PER_DAY)).toBeCloseTo(0.4, 10);
    });
  });

  describe('updateFeedback', () => {
    it('records confirmations and rejections with the event log', async () => {
      const model = new ConfidenceModel(ctx.database, scoring(), clock);
      const saved = await manager.save('list files', 'ls');
      const start = clock();

      clock.advanceDays(10);
      const confirmed = await model.updateFeedback(saved.queryHash, true);
      expect(confirmed?.confirmationCount).toBe(1);
      expect(confirmed?.rejectionCount).toBe(0);
      expect(confirmed?.confidenceScore).toBeCloseTo(0.1667, 4);
      expect(confirmed?.lastUsedAt).toBe(start + 10 * MS_PER_DAY);

      clock.advanceDays(5);
      const rejected = await model.updateFeedback(saved.queryHash, false);
      expect(rejected?.confirmationCount).toBe(1);
      expect(rejected?.rejectionCount).toBe(1);
      expect(rejected?.confidenceScore).toBe(0);
      expect(rejected?.lastUsedAt).toBe(start + 10 * MS_PER_DAY);

      const history = await model.feedbackHistory(saved.queryHash);
      expect(history.map((event) => event.action)).toEqual(['reject', 'confirm']);
      expect(history[0].command).toBe('ls');
      expect(history[0].timestamp).toBe(start + 15 * MS_PER_DAY);
    });

    it('follows the confirm then reject trajectory', async () => {
      const model = new ConfidenceModel(ctx.database, scoring(), clock);
      const { queryHash } = await manager.save('list files', 'ls');

      const scores: number[] = [];
      for (let i = 0; i < 3; i++) {
        const entry = await model.updateFeedback(queryHash, true);
        scores.push(entry?.confidenceScore ?? -1);
      }
      expect(scores[0]).toBeCloseTo(0.1667, 4);
      expect(scores[1]).toBeCloseTo(0.2857, 4);
      expect(scores[2]).toBeCloseTo(0.375, 4);

      let last: CacheEntry | null = null;
      for (let i = 0; i < 3; i++) {
        last = await model.updateFeedback(queryHash, false);
      }
      expect(last?.confidenceScore).toBe(0);
    });

    it('returns null for an unknown hash and writes nothing', async () => {
      const model = new ConfidenceModel(ctx.database, scoring(), clock);

      expect(await model.updateFeedback('0000000000000000', true)).toBeNull();
      expect(await model.feedbackHistory('0000000000000000')).toEqual([]);
    });
  });

  describe('recalculateAll', () => {
    it('recomputes stored scores after the weights change', async () => {
      const before = new ConfidenceModel(ctx.database, scoring(), clock);
      const { queryHash } = await manager.save('list files', 'ls');
      for (let i = 0; i < 3; i++) {
        await before.updateFeedback(queryHash, true);
      }
      expect(await before.needsRecalculation()).toBe(false);

      const after = new ConfidenceModel(ctx.database, scoring({ positiveWeight: 0.5 }), clock);
      expect(await after.needsRecalculation()).toBe(true);

      const result = await after.recalculateAll();
      expect(result).toEqual({ total: 1, updated: 1, failed: 0 });
      expect(await after.needsRecalculation()).toBe(false);

      const entry = await manager.findExact('list files');
      expect(entry?.confidenceScore).toBeCloseTo(0.6, 10);
      expect(entry?.confirmationCount).toBe(3);
    });

    it('needs no recalculation before any score was written', async () => {
      const model = new ConfidenceModel(ctx.database, scoring(), clock);
      expect(await model.needsRecalculation()).toBe(false);
    });

    it('keeps going past entries that fail and keeps the old signature', async () => {
      const before = new ConfidenceModel(ctx.database, scoring(), clock);
      const first = await manager.save('list files', 'ls');
      await manager.save('disk usage', 'du -sh');
      await before.updateFeedback(first.queryHash, true);

      const after = new ConfidenceModel(ctx.database, scoring({ positiveWeight: 0.5 }), clock);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const realTransaction = ctx.database.transaction.bind(ctx.database);
      let calls = 0;
      const transaction = vi.spyOn(ctx.database, 'transaction').mockImplementation((fn) => {
        calls++;
        if (calls === 1) return Promise.reject(new Error('write failed'));
        return realTransaction(fn);
      });

      const result = await after.recalculateAll();

      expect(result).toEqual({ total: 2, updated: 1, failed: 1 });
      expect(warn).toHaveBeenCalledWith(`[CONFIDENCE] Recalculation failed for ${first.queryHash}: write failed`);
      expect(await after.needsRecalculation()).toBe(true);

      transaction.mockRestore();
      warn.mockRestore();
    });
  });

  describe('signature', () => {
    it('changes with the weights', () => {
      const a = new ConfidenceModel(ctx.database, scoring(), clock);
      const b = new ConfidenceModel(ctx.database, scoring({ negativeWeight: 0.7 }), clock);

      expect(a.signature()).toBe('{"version":1,"positiveWeight":0.2,"negativeWeight":0.6,"smoothing":1}');
      expect(a.signature()).not.toBe(b.signature());
    });
  });
});
