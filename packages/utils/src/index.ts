/**
 * @gapless/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';

// Errors
export * from './errors/ingestion-error';

// HTTP
export * from './http/fetch-json';

// Time utilities
export * from './time/interval';

// Async primitives
export * from './async/sleep';
export * from './async/keyed-mutex';

// Validation utilities
export * from './validation/env-validator';
