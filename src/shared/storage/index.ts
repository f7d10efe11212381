/**
 * Persistent storage
 */
export { createSqliteStore } from './sqlite-store';
export type { KeyValueStore } from './types';
