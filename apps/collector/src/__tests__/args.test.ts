import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@gapless/utils';
import { parseCliArgs } from '../cli/args';

describe('parseCliArgs', () => {
  it('should default the store to postgres', () => {
    const args = parseCliArgs(['--config', 'config/example.json']);

    expect(args.config).toBe('config/example.json');
    expect(args.store).toBe('postgres');
    expect(args.symbols).toBeUndefined();
    expect(args.duration).toBeUndefined();
  });

  it('should read every option in both spellings', () => {
    const args = parseCliArgs([
      '--config=c.json',
      '--symbols',
      'BTCUSDT, ETHUSDT',
      '--intervals=1h,1d',
      '--duration',
      '90',
      '--store',
      'memory',
    ]);

    expect(args).toEqual({
      config: 'c.json',
      symbols: ['BTCUSDT', 'ETHUSDT'],
      intervals: ['1h', '1d'],
      duration: 90,
      store: 'memory',
    });
  });

  it('should require --config', () => {
    expect(() => parseCliArgs([])).toThrow('Invalid arguments: --config: Required');
  });

  it('should reject unknown options and stray arguments', () => {
    expect(() => parseCliArgs(['--config', 'c.json', '--verbose', 'yes'])).toThrow("Unknown option '--verbose'");
    expect(() => parseCliArgs(['c.json'])).toThrow("Unexpected argument 'c.json'");
  });

  it('should reject an option without a value', () => {
    expect(() => parseCliArgs(['--config'])).toThrow("Option '--config' needs a value");
    expect(() => parseCliArgs(['--symbols', '--config', 'c.json'])).toThrow("Option '--symbols' needs a value");
  });

  it('should reject invalid values as configuration errors', () => {
    expect(() => parseCliArgs(['--config', 'c.json', '--store', 'sqlite'])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(['--config', 'c.json', '--duration', '0'])).toThrow(/--duration/);
    expect(() => parseCliArgs(['--config', 'c.json', '--intervals', '1h,7m'])).toThrow(/--intervals\.1/);
    expect(() => parseCliArgs(['--config', 'c.json', '--symbols', ' , '])).toThrow(/--symbols/);
  });
});
