/**
 * Barrel export for all type definitions
 */

export * from './config';
export * from './queue';
export * from './issue';
export * from './pull-request';
export * from './readiness';
export * from './stage';
export * from './outcome';
