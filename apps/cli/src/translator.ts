/**
 * Pattern Translator
 *
 * Offline stand-in for a translation service: maps a request to a command
 * when it contains one of a few known phrases.
 */

import type { Translator } from '@cmdrecall/common';

export interface TranslationPattern {
  triggers: string[];
  command: string;
}

export const DEFAULT_PATTERNS: TranslationPattern[] = [
  { triggers: ['list files', 'show files', 'ls'], command: 'ls -la' },
  { triggers: ['git status', 'check git'], command: 'git status' },
  { triggers: ['git log', 'commit history'], command: 'git log --oneline -20' },
  { triggers: ['git diff', 'show changes'], command: 'git diff' },
  { triggers: ['current directory', 'where am i', 'pwd'], command: 'pwd' },
  { triggers: ['disk space', 'free space'], command: 'df -h' },
  { triggers: ['running processes', 'ps'], command: 'ps aux' },
  { triggers: ['clear screen'], command: 'clear' },
];

export class PatternTranslator implements Translator {
  constructor(private readonly patterns: TranslationPattern[] = DEFAULT_PATTERNS) {}

  async translate(query: string): Promise<string> {
    const lower = query.toLowerCase();
    for (const pattern of this.patterns) {
      if (pattern.triggers.some((trigger) => lower.includes(trigger))) {
        return pattern.command;
      }
    }
    throw new Error(`no known command for "${query}"`);
  }
}
