/**
 * Database schema exports
 */

export * from './data-points';
export * from './data-gaps';
