/**
 * @gapless/schemas
 *
 * Single source of truth for Zod schemas, inferred types and the
 * collaborator interfaces shared by every package
 */

// Market data schemas
export * from './market/interval.schema';
export * from './market/data-point.schema';

// Ingestion schemas
export * from './ingestion/gap.schema';
export * from './ingestion/fetch-task.schema';
export * from './ingestion/source-health.schema';
export * from './ingestion/alert.schema';

// Configuration
export * from './config/ingestion-config.schema';
export * from './env/config.schema';

// Collaborator interfaces
export type * from './adapter/source-adapter.schema';
export type * from './persistence/persistence-store.schema';
