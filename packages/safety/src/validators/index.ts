/**
 * Export all validators
 */

export * from './rm-rf.js';
export * from './dangerous-commands.js';
export * from './custom-patterns.js';
