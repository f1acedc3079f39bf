/**
 * @cmdrecall/matcher - Query normalization and lexical similarity
 */

export * from './matcher.js';
export * from './similarity.js';
export * from './lexicon.js';
