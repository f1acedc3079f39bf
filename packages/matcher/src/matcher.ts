/**
 * Query Matcher
 *
 * Deterministic canonicalization of natural-language queries and lexical
 * similarity between them. No I/O beyond reading the bundled lexicon.
 */

import { ValidationError, generateHashId } from '@cmdrecall/common';
import { jaccard, sequenceRatio } from './similarity.js';
import { loadDefaultLexicon, parseLexicon, type Lexicon, type LexiconInput } from './lexicon.js';

export interface NormalizedQuery {
  /** Tokens in query order, stop words removed, synonyms applied */
  tokens: string[];
  /** Sorted unique tokens joined by one space */
  canonical: string;
}

export interface QueryParameters {
  paths: string[];
  ports: string[];
  ips: string[];
  flags: string[];
}

export interface MatcherStats {
  synonymGroups: number;
  totalSynonyms: number;
  stopWords: number;
}

export interface MatcherOptions {
  lexicon?: LexiconInput;
  /** Weight of Jaccard similarity; the sequence ratio gets the rest */
  jaccardWeight?: number;
}

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export class QueryMatcher {
  readonly jaccardWeight: number;
  private synonyms: Map<string, string[]>;
  private reverse = new Map<string, string>();
  private stopWords: Set<string>;
  private categoryKeywords: Map<string, string[]>;

  constructor(options: MatcherOptions = {}) {
    const weight = options.jaccardWeight ?? 0.5;
    if (!(weight >= 0 && weight <= 1)) {
      throw new ValidationError(`jaccardWeight must be within [0, 1], got ${weight}`);
    }
    this.jaccardWeight = weight;

    const lexicon: Lexicon = options.lexicon ? parseLexicon(options.lexicon) : loadDefaultLexicon();
    this.stopWords = new Set(lexicon.stopWords.map((w) => w.toLowerCase()));
    this.categoryKeywords = new Map(Object.entries(lexicon.categories));
    this.synonyms = new Map();
    for (const [canonical, words] of Object.entries(lexicon.synonyms)) {
      this.addSynonyms(canonical, words);
    }
  }

  normalize(query: string): NormalizedQuery {
    const words = query.toLowerCase().match(WORD_PATTERN) ?? [];
    const tokens = words
      .filter((word) => !this.stopWords.has(word))
      .map((word) => this.reverse.get(word) ?? word);

    return {
      tokens,
      canonical: [...new Set(tokens)].sort().join(' '),
    };
  }

  /**
   * Cache key: 16 hex chars of SHA-256 over the canonical form
   */
  hash(query: string): string {
    const { canonical } = this.normalize(query);
    const basis = canonical || query.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
    return generateHashId(basis);
  }

  /**
   * Weighted blend of token-set Jaccard and the sequence ratio of the
   * canonical strings. Symmetric, and 1 for identical queries.
   */
  similarity(a: string, b: string): number {
    const left = this.normalize(a);
    const right = this.normalize(b);
    const leftSet = new Set(left.tokens);
    const rightSet = new Set(right.tokens);

    if (leftSet.size === 0 && rightSet.size === 0) return 1;
    if (leftSet.size === 0 || rightSet.size === 0) return 0;

    return (
      this.jaccardWeight * jaccard(leftSet, rightSet) +
      (1 - this.jaccardWeight) * sequenceRatio(left.canonical, right.canonical)
    );
  }

  isExactMatch(a: string, b: string): boolean {
    return this.hash(a) === this.hash(b);
  }

  /**
   * Register words that normalize to `canonical`. A word already mapped to a
   * different group is rejected, as is a canonical form that is itself some
   * other group's synonym: either would make normalization depend on order.
   */
  addSynonyms(canonical: string, words: string[]): void {
    const target = canonical.toLowerCase();
    const mapped = this.reverse.get(target);
    if (mapped !== undefined && mapped !== target) {
      throw new ValidationError(`'${target}' is already a synonym of '${mapped}'`);
    }
    if (this.stopWords.has(target)) {
      throw new ValidationError(`'${target}' is a stop word and cannot be a canonical form`);
    }

    const additions: string[] = [];
    for (const word of words.map((w) => w.toLowerCase())) {
      const existing = this.reverse.get(word);
      if (existing !== undefined && existing !== target) {
        throw new ValidationError(`'${word}' already normalizes to '${existing}'`);
      }
      if (word !== target && !this.stopWords.has(word)) additions.push(word);
    }

    this.reverse.set(target, target);
    for (const word of additions) this.reverse.set(word, target);
    const group = this.synonyms.get(target) ?? [];
    this.synonyms.set(target, [...new Set([...group, ...additions])]);
  }

  /**
   * Synonym groups present in the query plus keyword-based topics
   */
  categories(query: string): string[] {
    const found = new Set<string>();
    for (const token of this.normalize(query).tokens) {
      if (this.synonyms.has(token)) found.add(token);
    }

    const lower = query.toLowerCase();
    for (const [category, keywords] of this.categoryKeywords) {
      if (keywords.some((keyword) => lower.includes(keyword))) found.add(category);
    }

    return [...found].sort();
  }

  /**
   * Paths, ports, IPv4 addresses and option flags mentioned in a query
   */
  extractParameters(query: string): QueryParameters {
    return {
      paths: query.match(/[/~][\w/.-]*|[\w.-]+\.\w+/g) ?? [],
      ports: [...query.matchAll(/:(\d{2,5})\b/g)].map((m) => m[1]),
      ips: query.match(/\b(?:\d{1,3}\.){3}\d{1,3}\b/g) ?? [],
      flags: query.match(/(?<!\w)-+[\w-]+/g) ?? [],
    };
  }

  stats(): MatcherStats {
    let totalSynonyms = 0;
    for (const words of this.synonyms.values()) totalSynonyms += words.length;
    return {
      synonymGroups: this.synonyms.size,
      totalSynonyms,
      stopWords: this.stopWords.size,
    };
  }
}
