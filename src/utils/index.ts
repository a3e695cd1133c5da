/**
 * Barrel export for utility functions
 */

export * from './logger';
export * from './sanitize';
