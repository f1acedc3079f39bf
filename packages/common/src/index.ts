/**
 * @cmdrecall/common - Shared types, errors, settings validation and utilities
 */

export * from './types.js';
export * from './validation.js';
export * from './utils.js';
export * from './errors.js';
