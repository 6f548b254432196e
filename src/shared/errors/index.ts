/**
 * Errors Module
 *
 * Standardized error types, handling helpers and the retry policy.
 */

export * from './handler';
export * from './types';
export * from './retryPolicy';
