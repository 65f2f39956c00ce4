/**
 * Centralized strings and messages for user-facing text
 */

export * from './labels.js';
export * from './errors.js';
