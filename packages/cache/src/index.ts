/**
 * @cmdrecall/cache - Confidence-weighted command cache
 *
 * Decides whether a query's cached command can be reused as-is, reused
 * after confirmation, or must be translated afresh, and learns from the
 * user's answers.
 */

export * from './confidence.js';
export * from './cache-manager.js';
export * from './degradation.js';
export * from './orchestrator.js';
export * from './context.js';
export { cacheOperation } from './operation.js';
