import { pgTable, pgEnum, varchar, bigint, integer, text, index } from 'drizzle-orm/pg-core';

export const gapStatusEnum = pgEnum('gap_status', ['pending', 'in_progress', 'resolved', 'failed']);

/**
 * Data gaps table - missing ranges and their recovery state
 */
export const dataGaps = pgTable(
  'data_gaps',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    symbol: varchar('symbol', { length: 32 }).notNull(),
    interval: varchar('interval', { length: 5 }).notNull(),
    /** First missing open time (inclusive) */
    rangeStart: bigint('range_start', { mode: 'number' }).notNull(),
    /** Exclusive end */
    rangeEnd: bigint('range_end', { mode: 'number' }).notNull(),
    status: gapStatusEnum('status').default('pending').notNull(),
    attemptCount: integer('attempt_count').default(0).notNull(),
    lastAttemptAt: bigint('last_attempt_at', { mode: 'number' }),
    lastError: text('last_error'),
    detectedAt: bigint('detected_at', { mode: 'number' }).notNull(),
    updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    seriesStatusIdx: index('data_gaps_series_status_idx').on(table.symbol, table.interval, table.status),
  })
);

export type DataGapRow = typeof dataGaps.$inferSelect;
export type NewDataGapRow = typeof dataGaps.$inferInsert;
