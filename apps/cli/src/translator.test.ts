/**
 * Pattern translator tests
 */

import { describe, it, expect } from 'vitest';
import { PatternTranslator } from './translator.js';

describe('PatternTranslator', () => {
  const translator = new PatternTranslator();

  it('maps known phrases to commands', async () => {
    expect(await translator.translate('Please list files here')).toBe('ls -la');
    expect(await translator.translate('how much disk space is left')).toBe('df -h');
    expect(await translator.translate('git log')).toBe('git log --oneline -20');
  });

  it('uses the first pattern whose trigger matches', async () => {
    const custom = new PatternTranslator([
      { triggers: ['deploy'], command: 'make deploy' },
      { triggers: ['deploy staging'], command: 'make deploy-staging' },
    ]);

    expect(await custom.translate('deploy staging')).toBe('make deploy');
  });

  it('fails for unknown requests', async () => {
    await expect(translator.translate('book a flight')).rejects.toThrow('no known command for "book a flight"');
  });
});
