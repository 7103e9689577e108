import { describe, it, expect } from 'vitest';
import type { DataPoint, Gap } from '@gapless/schemas';
import { ConfigurationError } from '@gapless/utils';
import { connectionOptions } from '../client';
import { fromGapRow, fromPointRow, gapColumns, toGapRow, toPointRow } from '../store/mappers';
import type { DataGapRow, DataPointRow } from '../schema';

const point: DataPoint = {
  symbol: 'BTCUSDT',
  interval: '1h',
  timestamp: 1704067200000,
  open: 42000.25,
  high: 42300,
  low: 41800.5,
  close: 42050.75,
  volume: 153.2,
  sourceId: 'binance',
  sources: ['binance', 'coinbase'],
  qualityScore: 0.9,
  validated: true,
  revision: 2,
};

describe('point mappers', () => {
  it('should write prices as decimal strings without the revision', () => {
    expect(toPointRow(point)).toEqual({
      symbol: 'BTCUSDT',
      interval: '1h',
      timestamp: 1704067200000,
      open: '42000.25',
      high: '42300',
      low: '41800.5',
      close: '42050.75',
      volume: '153.2',
      sourceId: 'binance',
      sources: ['binance', 'coinbase'],
      qualityScore: 0.9,
      validated: true,
    });
  });

  it('should read decimal columns back as numbers', () => {
    const row: DataPointRow = {
      id: 7,
      ...toPointRow(point),
      open: '42000.2500000000',
      high: '42300.0000000000',
      low: '41800.5000000000',
      close: '42050.7500000000',
      volume: '153.2000000000',
      sources: ['binance', 'coinbase'],
      qualityScore: 0.9,
      validated: true,
      revision: 2,
      createdAt: new Date(0),
      updatedAt: new Date(0),
    };

    expect(fromPointRow(row)).toEqual(point);
  });

  it('should refuse rows with an unknown interval', () => {
    const row: DataPointRow = {
      id: 1,
      ...toPointRow(point),
      interval: '7m',
      sources: ['binance'],
      qualityScore: 0.8,
      validated: true,
      revision: 1,
      createdAt: new Date(0),
      updatedAt: new Date(0),
    };

    expect(() => fromPointRow(row)).toThrow();
  });
});

describe('gap mappers', () => {
  const gap: Gap = {
    id: 'gap-1',
    symbol: 'BTCUSDT',
    interval: '1h',
    start: 1704067200000,
    end: 1704074400000,
    status: 'failed',
    attemptCount: 5,
    lastAttemptAt: 1704100000000,
    lastError: 'All sources failed: binance=timeout',
    detectedAt: 1704090000000,
    updatedAt: 1704100000000,
  };

  it('should map range bounds to their columns and back', () => {
    const row: DataGapRow = {
      id: 'gap-1',
      symbol: 'BTCUSDT',
      interval: '1h',
      rangeStart: 1704067200000,
      rangeEnd: 1704074400000,
      status: 'failed',
      attemptCount: 5,
      lastAttemptAt: 1704100000000,
      lastError: 'All sources failed: binance=timeout',
      detectedAt: 1704090000000,
      updatedAt: 1704100000000,
    };

    expect(toGapRow(gap)).toEqual(row);
    expect(fromGapRow(row)).toEqual(gap);
  });

  it('should leave the primary key out of the update columns', () => {
    expect(gapColumns(gap)).not.toHaveProperty('id');
    expect(gapColumns(gap)).toMatchObject({ rangeStart: gap.start, rangeEnd: gap.end });
  });
});

describe('connectionOptions', () => {
  const env = {
    NODE_ENV: 'test' as const,
    DATABASE_HOST: 'db.internal',
    DATABASE_PORT: 5433,
    DATABASE_NAME: 'gapless',
    DATABASE_SSL: 'require' as const,
    REDIS_PORT: 6379,
    REDIS_TLS: false,
  };

  it('should require credentials', () => {
    expect(() => connectionOptions(env)).toThrow(ConfigurationError);
  });

  it('should build pool options from the environment', () => {
    expect(
      connectionOptions({ ...env, DATABASE_USERNAME: 'gapless', DATABASE_PASSWORD: 'test-password' })
    ).toEqual({
      host: 'db.internal',
      port: 5433,
      database: 'gapless',
      username: 'gapless',
      password: 'test-password',
      ssl: 'require',
      max: 10,
      connect_timeout: 10,
    });
  });
});
