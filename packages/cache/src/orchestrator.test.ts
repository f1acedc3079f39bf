/**
 * Tests for the decision orchestrator
 *
 * Runs against a real database file; the translator and the confirmation
 * prompt are mocks.
 */

import fs from 'node:fs';
import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import {
  defaultSettings,
  TranslationError,
  type CacheSettingsInput,
  type ConfirmationAnswer,
  type ConfirmationRequest,
} from '@cmdrecall/common';
import { CacheDatabase, CacheEntryStore } from '@cmdrecall/storage';
import { QueryMatcher } from '@cmdrecall/matcher';
import { DangerousCommandClassifier } from '@cmdrecall/safety';
import { createTestClock, tempPath, type TestClock } from '../../../tests/helpers/storage-test-helper.js';
import { createCacheContext, type CacheContext } from './context.js';
import { CacheManager } from './cache-manager.js';
import { ConfidenceModel } from './confidence.js';
import { DegradationController } from './degradation.js';
import { DecisionOrchestrator } from './orchestrator.js';

describe('DecisionOrchestrator', () => {
  let dbPath: string;
  let clock: TestClock;
  let cache: CacheContext;
  let translate: Mock<(query: string) => Promise<string>>;
  let confirm: Mock<(request: ConfirmationRequest) => Promise<ConfirmationAnswer>>;

  function open(settings: CacheSettingsInput = {}): CacheContext {
    return createCacheContext({
      settings,
      databasePath: dbPath,
      translator: { translate },
      prompt: { confirm },
      clock,
    });
  }

  /**
   * Seed an entry with a given stored score
   */
  async function seed(query: string, command: string, confidenceScore: number, confirmationCount = 50): Promise<string> {
    const saved = await cache.manager.save(query, command);
    await cache.database.withConnection((db) =>
      new CacheEntryStore(db).updateCounts(saved.queryHash, {
        confirmationCount,
        rejectionCount: 0,
        confidenceScore,
      })
    );
    return saved.queryHash;
  }

  beforeEach(() => {
    dbPath = `${tempPath('cmdrecall-orchestrator')}.db`;
    clock = createTestClock();
    translate = vi.fn<(query: string) => Promise<string>>(async () => 'ls -la');
    confirm = vi.fn<(request: ConfirmationRequest) => Promise<ConfirmationAnswer>>(async () => 'confirmed');
    cache = open();
  });

  afterEach(() => {
    cache.close();
    for (const suffix of ['', '-shm', '-wal']) {
      try {
        fs.unlinkSync(dbPath + suffix);
      } catch {
        // Files may not exist
      }
    }
    vi.restoreAllMocks();
  });

  describe('decide', () => {
    it('translates when nothing is cached', async () => {
      const decision = await cache.orchestrator.decide('list files');

      expect(decision).toEqual({
        action: 'Translate',
        query: 'list files',
        reason: 'noMatch',
        entry: null,
        confidence: 0,
      });
    });

    it('auto-uses a confident exact match', async () => {
      await seed('list files', 'ls -la', 0.95);

      const decision = await cache.orchestrator.decide('show the files');

      expect(decision.action).toBe('AutoUse');
      expect(decision.confidence).toBe(0.95);
      if (decision.action === 'AutoUse') {
        expect(decision.entry.command).toBe('ls -la');
        expect(decision.safety.dangerous).toBe(false);
      }
    });

    it('asks before using an exact match between the thresholds', async () => {
      await seed('list files', 'ls -la', 0.85);

      const decision = await cache.orchestrator.decide('list files');

      expect(decision).toMatchObject({ action: 'Confirm', source: 'exact', similarity: 1, confidence: 0.85 });
    });

    it('asks before using a confident match that is dangerous', async () => {
      await seed('wipe everything', 'rm -rf /', 0.95);

      const decision = await cache.orchestrator.decide('wipe everything');

      expect(decision.action).toBe('Confirm');
      if (decision.action === 'Confirm') {
        expect(decision.safety.dangerous).toBe(true);
        expect(decision.safety.severity).toBe('critical');
      }
    });

    it('translates an exact match whose confidence is too low', async () => {
      await seed('list files', 'ls -la', 0.5);

      const decision = await cache.orchestrator.decide('list files');

      expect(decision.action).toBe('Translate');
      if (decision.action === 'Translate') {
        expect(decision.reason).toBe('lowConfidence');
        expect(decision.entry?.command).toBe('ls -la');
        expect(decision.confidence).toBe(0.5);
      }
    });

    it('lets an unused entry decay below the threshold', async () => {
      await seed('list files', 'ls -la', 0.95);
      clock.advanceDays(30);

      const decision = await cache.orchestrator.decide('list files');

      expect(decision.action).toBe('Translate');
      expect(decision.confidence).toBeCloseTo(0.475, 10);
    });

    it('offers a similar match for confirmation', async () => {
      await seed('list all files', 'ls -a', 0.2, 1);

      const decision = await cache.orchestrator.decide('list all hidden files');

      expect(decision).toMatchObject({ action: 'Confirm', source: 'similar', confidence: 0.2 });
      if (decision.action === 'Confirm') {
        expect(decision.similarity).toBeCloseTo(0.775, 10);
        expect(decision.entry.command).toBe('ls -a');
      }
    });

    it('does not write anything', async () => {
      await seed('list files', 'ls -la', 0.95);
      const before = await cache.manager.findExact('list files');

      clock.advanceDays(1);
      await cache.orchestrator.decide('list files');

      expect(await cache.manager.findExact('list files')).toEqual(before);
    });

    it('never reaches the store while the cache is switched off', async () => {
      cache.close();
      cache = open({ cacheEnabled: false });
      const findExact = vi.spyOn(cache.manager, 'findExact');
      vi.spyOn(console, 'warn').mockImplementation(() => {});

      const decision = await cache.orchestrator.decide('list files');

      expect(decision.action).toBe('Translate');
      expect(findExact).not.toHaveBeenCalled();
      expect(cache.controller.health().skipped).toBe(2);
    });
  });

  describe('run', () => {
    it('uses a confident match without asking and counts it as a confirmation', async () => {
      await seed('list files', 'ls -la', 0.95);
      clock.advanceDays(1);

      const outcome = await cache.orchestrator.run('list files');

      expect(outcome).toMatchObject({ command: 'ls -la', origin: 'cache', answer: 'implicit' });
      expect(confirm).not.toHaveBeenCalled();
      expect(translate).not.toHaveBeenCalled();

      const entry = await cache.manager.findExact('list files');
      expect(entry?.confirmationCount).toBe(51);
      expect(entry?.confidenceScore).toBeCloseTo(10.2 / 11.2, 10);
      expect(entry?.lastUsedAt).toBe(clock());
    });

    it('records a confirmed exact match', async () => {
      await seed('list files', 'ls -la', 0.85);

      const outcome = await cache.orchestrator.run('list files');

      expect(outcome).toMatchObject({ command: 'ls -la', origin: 'cache', answer: 'confirmed' });
      expect(confirm).toHaveBeenCalledWith({
        query: 'list files',
        command: 'ls -la',
        source: 'exact',
        confidence: 0.85,
        similarity: 1,
        safety: { dangerous: false, severity: undefined, reason: undefined },
      });
      expect((await cache.manager.findExact('list files'))?.confirmationCount).toBe(51);
    });

    it('caches the new phrasing when a similar match is confirmed', async () => {
      await seed('list all files', 'ls -a', 0.2, 1);

      const outcome = await cache.orchestrator.run('list all hidden files');

      expect(outcome).toMatchObject({ command: 'ls -a', origin: 'cache', answer: 'confirmed' });
      expect((await cache.manager.findExact('list all files'))?.confirmationCount).toBe(2);

      const phrasing = await cache.manager.findExact('list all hidden files');
      expect(phrasing?.command).toBe('ls -a');
      expect(phrasing?.confirmationCount).toBe(0);
    });

    it('translates after a rejected match and asks about the translation', async () => {
      await seed('list all files', 'ls -a', 0.2, 1);
      confirm.mockResolvedValueOnce('rejected').mockResolvedValueOnce('confirmed');
      translate.mockResolvedValueOnce('ls -la --hidden');

      const outcome = await cache.orchestrator.run('list all hidden files');

      expect(outcome).toMatchObject({ command: 'ls -la --hidden', origin: 'translation', answer: 'confirmed' });
      expect(outcome.decision.action).toBe('Confirm');
      expect(translate).toHaveBeenCalledWith('list all hidden files');
      expect(confirm).toHaveBeenCalledTimes(2);
      expect(confirm.mock.calls[1][0]).toMatchObject({ source: 'translation', command: 'ls -la --hidden', similarity: 0 });

      const rejected = await cache.manager.findExact('list all files');
      expect(rejected?.rejectionCount).toBe(1);
      expect(rejected?.confidenceScore).toBe(0);

      const translated = await cache.manager.findExact('list all hidden files');
      expect(translated?.command).toBe('ls -la --hidden');
      expect(translated?.confirmationCount).toBe(1);
      expect(translated?.confidenceScore).toBeCloseTo(0.2 / 1.2, 10);
    });

    it('returns nothing and records nothing when the prompt times out', async () => {
      await seed('list files', 'ls -la', 0.85);
      confirm.mockResolvedValue('timedOut');

      const outcome = await cache.orchestrator.run('list files');

      expect(outcome).toMatchObject({ command: null, origin: null, answer: 'timedOut' });
      expect(translate).not.toHaveBeenCalled();
      const entry = await cache.manager.findExact('list files');
      expect(entry?.confirmationCount).toBe(50);
      expect(await cache.model.feedbackHistory(entry?.queryHash ?? '')).toEqual([]);
    });

    it('translates, caches and learns from the answer when nothing matches', async () => {
      const outcome = await cache.orchestrator.run('list files');

      expect(outcome).toMatchObject({ command: 'ls -la', origin: 'translation', answer: 'confirmed' });
      expect(confirm).toHaveBeenCalledWith({
        query: 'list files',
        command: 'ls -la',
        source: 'translation',
        confidence: 0,
        similarity: 0,
        safety: { dangerous: false, severity: undefined, reason: undefined },
      });

      const entry = await cache.manager.findExact('list files');
      expect(entry?.confirmationCount).toBe(1);
      expect(entry?.confidenceScore).toBeCloseTo(0.1667, 4);
    });

    it('keeps a declined translation with a rejection', async () => {
      confirm.mockResolvedValue('rejected');

      const outcome = await cache.orchestrator.run('list files');

      expect(outcome).toMatchObject({ command: null, origin: 'translation', answer: 'rejected' });
      const entry = await cache.manager.findExact('list files');
      expect(entry?.command).toBe('ls -la');
      expect(entry?.rejectionCount).toBe(1);
    });

    it('reports an unanswered translation without feedback', async () => {
      confirm.mockResolvedValue('timedOut');

      const outcome = await cache.orchestrator.run('list files');

      expect(outcome).toMatchObject({ command: null, origin: 'translation', answer: 'timedOut' });
      const entry = await cache.manager.findExact('list files');
      expect(entry?.confirmationCount).toBe(0);
      expect(entry?.rejectionCount).toBe(0);
    });

    it('treats a failing prompt as no answer', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      confirm.mockRejectedValue(new Error('stdin closed'));

      const outcome = await cache.orchestrator.run('list files');

      expect(outcome.answer).toBe('timedOut');
      expect(outcome.command).toBeNull();
      expect(warn).toHaveBeenCalledWith('[CACHE] Confirmation prompt failed, treating as no answer: stdin closed');
    });

    it('flags a dangerous translation', async () => {
      translate.mockResolvedValue('rm -rf /');
      confirm.mockResolvedValue('rejected');

      const outcome = await cache.orchestrator.run('wipe the disk');

      expect(outcome.safety?.dangerous).toBe(true);
      expect(confirm.mock.calls[0][0].safety.severity).toBe('critical');
    });

    it('raises TranslationError when the translator fails', async () => {
      translate.mockRejectedValue(new Error('rate limited'));

      await expect(cache.orchestrator.run('list files')).rejects.toThrow(TranslationError);
      await expect(cache.orchestrator.run('list files')).rejects.toThrow('Translation failed: rate limited');
      expect(confirm).not.toHaveBeenCalled();
    });

    it('raises TranslationError for an empty translation', async () => {
      translate.mockResolvedValue('   ');

      await expect(cache.orchestrator.run('list files')).rejects.toThrow(
        'Translation failed: translator returned an empty command'
      );
      expect(await cache.manager.count()).toBe(0);
    });
  });

  describe('with a store that always fails', () => {
    it('falls back to translation and switches the cache off', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      vi.spyOn(console, 'error').mockImplementation(() => {});

      const settings = defaultSettings();
      const database = new CacheDatabase({ path: null });
      const controller = new DegradationController({ maxErrorCount: settings.maxErrorCount });
      const orchestrator = new DecisionOrchestrator({
        manager: new CacheManager(database, new QueryMatcher(), settings, clock),
        model: new ConfidenceModel(database, settings, clock),
        controller,
        classifier: DangerousCommandClassifier.fromSettings(settings.safety),
        translator: { translate },
        prompt: { confirm },
        settings,
        clock,
      });

      const outcome = await orchestrator.run('list files');

      expect(outcome.decision).toEqual({
        action: 'Translate',
        query: 'list files',
        reason: 'noMatch',
        entry: null,
        confidence: 0,
      });
      expect(outcome).toMatchObject({ command: 'ls -la', origin: 'translation', answer: 'confirmed' });

      const health = controller.health();
      expect(health.enabled).toBe(false);
      expect(health.errorsByKind).toEqual({ StoreUnavailableError: 3 });
      expect(health.lastError?.operation).toBe('save');

      const again = await orchestrator.run('list files');
      expect(again.command).toBe('ls -la');
      expect(controller.health().skipped).toBe(3);
    });
  });

  describe('context', () => {
    it('wires settings through to every component', () => {
      cache.close();
      cache = open({ confidenceThreshold: 0.6, autoCopyThreshold: 0.7, maxErrorCount: 5 });

      expect(cache.settings.confidenceThreshold).toBe(0.6);
      expect(cache.controller.health().maxErrorCount).toBe(5);
      expect(cache.location).toEqual({ kind: 'file', source: 'configured', directory: '', path: dbPath });
      expect(cache.matcher.jaccardWeight).toBe(0.5);
    });

    it('uses lower thresholds from settings', async () => {
      cache.close();
      cache = open({ confidenceThreshold: 0.3, autoCopyThreshold: 0.35 });
      await seed('list files', 'ls -la', 0.375, 3);

      const decision = await cache.orchestrator.decide('list files');
      expect(decision.action).toBe('AutoUse');
    });

    it('rejects invalid settings', () => {
      expect(() => createCacheContext({ settings: { confidenceThreshold: 2 }, databasePath: dbPath })).toThrow(
        /^Invalid cache settings: confidenceThreshold/
      );
    });
  });
});
