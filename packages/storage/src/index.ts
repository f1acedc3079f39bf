/**
 * @cmdrecall/storage - SQLite persistence for the command cache
 */

export { CacheDatabase } from './database.js';
export type { DatabaseOptions, StoreStats } from './database.js';
export { resolveLocation, expandHome, DEFAULT_DIR_NAME } from './location.js';
export type { StoreLocation, LocationOptions, LocationSource } from './location.js';

export * from './stores/index.js';
export { runMigrations, getSchemaVersion, verifySchema, LATEST_SCHEMA_VERSION } from './migrations.js';
export type { Migration } from './migrations.js';
