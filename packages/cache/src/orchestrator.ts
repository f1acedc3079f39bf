/**
 * Decision Orchestrator
 *
 * Picks AutoUse, Confirm or Translate for a query from the cached match,
 * its effective confidence and the configured thresholds, then routes the
 * user's answer back into the confidence model. Every cache call goes
 * through the degradation controller; only translation failures reach the
 * caller.
 */

import {
  TranslationError,
  type CacheEntry,
  type CacheSettings,
  type Clock,
  type ConfirmationAnswer,
  type ConfirmationPrompt,
  type ConfirmationRequest,
  type SafetyClassifier,
  type SafetyVerdict,
  type Translator,
} from '@cmdrecall/common';
import type { CacheManager } from './cache-manager.js';
import type { ConfidenceModel } from './confidence.js';
import type { DegradationController } from './degradation.js';

export type DecisionAction = 'AutoUse' | 'Confirm' | 'Translate';

export type Decision =
  | {
      action: 'AutoUse';
      query: string;
      entry: CacheEntry;
      confidence: number;
      safety: SafetyVerdict;
    }
  | {
      action: 'Confirm';
      query: string;
      source: 'exact' | 'similar';
      entry: CacheEntry;
      confidence: number;
      similarity: number;
      safety: SafetyVerdict;
    }
  | {
      action: 'Translate';
      query: string;
      reason: 'noMatch' | 'lowConfidence';
      /** The exact match that scored too low, if any */
      entry: CacheEntry | null;
      confidence: number;
    };

export type CommandOrigin = 'cache' | 'translation';

export interface RunOutcome {
  decision: Decision;
  /** Command to use; null when the user declined or never answered */
  command: string | null;
  origin: CommandOrigin | null;
  /** 'implicit' for AutoUse, where nobody was asked */
  answer: ConfirmationAnswer | 'implicit';
  safety: SafetyVerdict | null;
}

export type OrchestratorSettings = Pick<
  CacheSettings,
  'confidenceThreshold' | 'autoCopyThreshold' | 'similarityThreshold' | 'cacheSizeLimit'
>;

export interface OrchestratorDependencies {
  manager: CacheManager;
  model: ConfidenceModel;
  controller: DegradationController;
  classifier: SafetyClassifier;
  translator: Translator;
  prompt: ConfirmationPrompt;
  settings: OrchestratorSettings;
  clock?: Clock;
}

export class DecisionOrchestrator {
  private readonly manager: CacheManager;
  private readonly model: ConfidenceModel;
  private readonly controller: DegradationController;
  private readonly classifier: SafetyClassifier;
  private readonly translator: Translator;
  private readonly prompt: ConfirmationPrompt;
  private readonly settings: OrchestratorSettings;
  private readonly clock: Clock;

  constructor(deps: OrchestratorDependencies) {
    this.manager = deps.manager;
    this.model = deps.model;
    this.controller = deps.controller;
    this.classifier = deps.classifier;
    this.translator = deps.translator;
    this.prompt = deps.prompt;
    this.settings = deps.settings;
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Decide what to do with a query. Reads only.
   */
  async decide(query: string): Promise<Decision> {
    const now = this.clock();
    const exact = await this.controller.guard('findExact', () => this.manager.findExact(query), () => null);

    if (exact) {
      const confidence = this.model.effective(exact, now);
      if (confidence < this.settings.confidenceThreshold) {
        return { action: 'Translate', query, reason: 'lowConfidence', entry: exact, confidence };
      }

      const safety = this.classifier.classify(exact.command);
      if (confidence >= this.settings.autoCopyThreshold && !safety.dangerous) {
        return { action: 'AutoUse', query, entry: exact, confidence, safety };
      }
      return { action: 'Confirm', query, source: 'exact', entry: exact, confidence, similarity: 1, safety };
    }

    const similar = await this.controller.guard(
      'findSimilar',
      () => this.manager.findSimilar(query, this.settings.cacheSizeLimit, this.settings.similarityThreshold),
      () => null
    );

    if (similar) {
      return {
        action: 'Confirm',
        query,
        source: 'similar',
        entry: similar.entry,
        confidence: this.model.effective(similar.entry, now),
        similarity: similar.similarity,
        safety: this.classifier.classify(similar.entry.command),
      };
    }

    return { action: 'Translate', query, reason: 'noMatch', entry: null, confidence: 0 };
  }

  /**
   * Decide, ask where needed, record feedback and return the command to use
   */
  async run(query: string): Promise<RunOutcome> {
    const decision = await this.decide(query);

    switch (decision.action) {
      case 'AutoUse': {
        await this.recordFeedback(decision.entry.queryHash, true);
        return {
          decision,
          command: decision.entry.command,
          origin: 'cache',
          answer: 'implicit',
          safety: decision.safety,
        };
      }

      case 'Confirm': {
        const answer = await this.ask({
          query,
          command: decision.entry.command,
          source: decision.source,
          confidence: decision.confidence,
          similarity: decision.similarity,
          safety: decision.safety,
        });

        if (answer === 'confirmed') {
          await this.recordFeedback(decision.entry.queryHash, true);
          if (decision.source === 'similar') {
            await this.controller.guard('save', () => this.manager.save(query, decision.entry.command), () => null);
          }
          return { decision, command: decision.entry.command, origin: 'cache', answer, safety: decision.safety };
        }

        if (answer === 'rejected') {
          await this.recordFeedback(decision.entry.queryHash, false);
          return this.translate(decision);
        }

        return { decision, command: null, origin: null, answer, safety: decision.safety };
      }

      case 'Translate':
        return this.translate(decision);
    }
  }

  /**
   * Translate, cache the result and ask the user about it
   */
  private async translate(decision: Decision): Promise<RunOutcome> {
    const { query } = decision;

    let command: string;
    try {
      command = (await this.translator.translate(query)).trim();
    } catch (error) {
      throw new TranslationError(query, error);
    }
    if (command === '') {
      throw new TranslationError(query, new Error('translator returned an empty command'));
    }

    const safety = this.classifier.classify(command);
    const saved = await this.controller.guard('save', () => this.manager.save(query, command), () => null);
    const confidence = saved ? this.model.effective(saved, this.clock()) : 0;

    const answer = await this.ask({ query, command, source: 'translation', confidence, similarity: 0, safety });
    if (saved && answer !== 'timedOut') {
      await this.recordFeedback(saved.queryHash, answer === 'confirmed');
    }

    return {
      decision,
      command: answer === 'confirmed' ? command : null,
      origin: 'translation',
      answer,
      safety,
    };
  }

  private async ask(request: ConfirmationRequest): Promise<ConfirmationAnswer> {
    try {
      return await this.prompt.confirm(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[CACHE] Confirmation prompt failed, treating as no answer: ${message}`);
      return 'timedOut';
    }
  }

  private async recordFeedback(queryHash: string, confirmed: boolean): Promise<void> {
    await this.controller.guard(
      'updateFeedback',
      () => this.model.updateFeedback(queryHash, confirmed),
      () => null
    );
  }
}
