/**
 * @gapless/database
 *
 * PostgreSQL schema, client and PersistenceStore
 */

export * from './client';
export * from './schema';
export * from './store/mappers';
export * from './store/postgres-store';
