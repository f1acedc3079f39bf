/**
 * Cache context
 *
 * Builds every cache component once per process and wires them together.
 * Nothing here is global: two contexts never share state.
 */

import {
  parseSettings,
  type CacheSettings,
  type Clock,
  type ConfirmationPrompt,
  type SafetyClassifier,
  type Translator,
} from '@cmdrecall/common';
import { CacheDatabase, resolveLocation, type LocationOptions, type StoreLocation } from '@cmdrecall/storage';
import { QueryMatcher, type LexiconInput } from '@cmdrecall/matcher';
import { DangerousCommandClassifier } from '@cmdrecall/safety';
import { CacheManager } from './cache-manager.js';
import { ConfidenceModel } from './confidence.js';
import { DegradationController } from './degradation.js';
import { DecisionOrchestrator } from './orchestrator.js';

export interface CacheContextOptions {
  /** Raw settings; validated here */
  settings?: unknown;
  /** Overrides location resolution, e.g. ':memory:' */
  databasePath?: string;
  location?: Omit<LocationOptions, 'configuredDir' | 'databaseFile'>;
  lexicon?: LexiconInput;
  translator?: Translator;
  prompt?: ConfirmationPrompt;
  classifier?: SafetyClassifier;
  clock?: Clock;
  verbose?: boolean;
}

export interface CacheContext {
  settings: CacheSettings;
  location: StoreLocation;
  database: CacheDatabase;
  matcher: QueryMatcher;
  model: ConfidenceModel;
  manager: CacheManager;
  controller: DegradationController;
  classifier: SafetyClassifier;
  orchestrator: DecisionOrchestrator;
  close(): void;
}

/**
 * Used when no translation client is wired in; decide() never needs one
 */
export const unconfiguredTranslator: Translator = {
  translate: async () => {
    throw new Error('No translation client configured');
  },
};

/**
 * Used when nobody can be asked: every question goes unanswered
 */
export const unattendedPrompt: ConfirmationPrompt = {
  confirm: async () => 'timedOut',
};

export function createCacheContext(options: CacheContextOptions = {}): CacheContext {
  const settings = parseSettings(options.settings ?? {});
  const clock = options.clock ?? Date.now;
  const verbose = options.verbose ?? false;

  const location: StoreLocation = options.databasePath
    ? { kind: 'file', source: 'configured', directory: '', path: options.databasePath }
    : resolveLocation({
        ...options.location,
        configuredDir: settings.cacheDir,
        databaseFile: settings.databaseFile,
      });

  if (location.kind === 'unavailable' && verbose) {
    console.warn(`[STORE] No writable cache location: ${location.reasons.join('; ')}`);
  }

  const database = CacheDatabase.fromLocation(location, settings.store, verbose);
  const matcher = new QueryMatcher({ lexicon: options.lexicon, jaccardWeight: settings.jaccardWeight });
  const model = new ConfidenceModel(database, settings, clock);
  const manager = new CacheManager(database, matcher, settings, clock);
  const controller = new DegradationController({
    maxErrorCount: settings.maxErrorCount,
    disabled: !settings.cacheEnabled,
    clock,
  });
  const classifier = options.classifier ?? DangerousCommandClassifier.fromSettings(settings.safety);
  const orchestrator = new DecisionOrchestrator({
    manager,
    model,
    controller,
    classifier,
    translator: options.translator ?? unconfiguredTranslator,
    prompt: options.prompt ?? unattendedPrompt,
    settings,
    clock,
  });

  return {
    settings,
    location,
    database,
    matcher,
    model,
    manager,
    controller,
    classifier,
    orchestrator,
    close: () => database.close(),
  };
}
