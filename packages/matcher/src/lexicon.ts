/**
 * Lexicon: synonym groups, stop words and category keywords
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ValidationError, validateBody } from '@cmdrecall/common';

export const lexiconSchema = z.object({
  /** canonical word → words that normalize to it */
  synonyms: z.record(z.string().min(1), z.array(z.string().min(1))).default({}),
  stopWords: z.array(z.string().min(1)).default([]),
  /** category → substrings that tag a query with it */
  categories: z.record(z.string().min(1), z.array(z.string().min(1))).default({}),
});

export type Lexicon = z.output<typeof lexiconSchema>;
export type LexiconInput = z.input<typeof lexiconSchema>;

const DEFAULT_LEXICON_URL = new URL('../data/lexicon.json', import.meta.url);

let defaultLexicon: Lexicon | undefined;

export function parseLexicon(input: unknown): Lexicon {
  const result = validateBody(lexiconSchema, input);
  if (!result.success) {
    throw new ValidationError(`Invalid lexicon: ${result.error}`);
  }
  return result.data;
}

/**
 * The bundled lexicon, read once per process
 */
export function loadDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_LEXICON_URL, 'utf-8'));
    defaultLexicon = parseLexicon(raw);
  }
  return defaultLexicon;
}
