/**
 * Redis key and channel names
 *
 * - `gapless:alerts` - pub/sub channel carrying IngestionAlert JSON
 * - `gapless:health:{adapterId}` - latest SourceHealth snapshot, expiring
 */

const PREFIX = 'gapless';

/**
 * @example alertsChannel() // 'gapless:alerts'
 */
export function alertsChannel(): string {
  return `${PREFIX}:alerts`;
}

/**
 * @example healthKey('binance') // 'gapless:health:binance'
 */
export function healthKey(adapterId: string): string {
  return `${PREFIX}:health:${adapterId}`;
}
