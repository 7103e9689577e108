import {
  pgTable,
  serial,
  varchar,
  decimal,
  bigint,
  integer,
  doublePrecision,
  boolean,
  text,
  index,
  timestamp,
  unique,
} from 'drizzle-orm/pg-core';

/**
 * Data points table - one validated OHLCV point per series and timestamp
 */
export const dataPoints = pgTable(
  'data_points',
  {
    id: serial('id').primaryKey(),
    symbol: varchar('symbol', { length: 32 }).notNull(),
    interval: varchar('interval', { length: 5 }).notNull(),
    /** Open time, ms since epoch, aligned to the interval */
    timestamp: bigint('timestamp', { mode: 'number' }).notNull(),
    open: decimal('open', { precision: 28, scale: 10 }).notNull(),
    high: decimal('high', { precision: 28, scale: 10 }).notNull(),
    low: decimal('low', { precision: 28, scale: 10 }).notNull(),
    close: decimal('close', { precision: 28, scale: 10 }).notNull(),
    volume: decimal('volume', { precision: 28, scale: 10 }).notNull(),
    /** Adapter whose values were stored */
    sourceId: varchar('source_id', { length: 64 }).notNull(),
    /** Adapters that agreed within tolerance */
    sources: text('sources').array().notNull(),
    qualityScore: doublePrecision('quality_score').notNull(),
    validated: boolean('validated').default(false).notNull(),
    /** Optimistic concurrency counter */
    revision: integer('revision').default(1).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    uniquePoint: unique('data_points_unique').on(table.symbol, table.interval, table.timestamp),
    timestampIdx: index('data_points_timestamp_idx').on(table.timestamp),
  })
);

export type DataPointRow = typeof dataPoints.$inferSelect;
export type NewDataPointRow = typeof dataPoints.$inferInsert;
