/**
 * Store Exports
 */

export { CacheEntryStore } from './cache-entries.js';
export type { NewCacheEntry, FeedbackCounts, ConfidenceDistribution } from './cache-entries.js';
export { FeedbackStore } from './feedback.js';
export { MetaStore } from './meta.js';
