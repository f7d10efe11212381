/**
 * Shared configuration constants
 */
export * from './constants';
