/**
 * Barrel export for all custom error classes
 */

export * from './empty-queue-error';
export * from './no-ready-pull-request-error';
export * from './merge-refused-error';
export * from './upstream-api-error';
export * from './template-corrupted-error';
export * from './queue-item-error';
export * from './validation-error';
