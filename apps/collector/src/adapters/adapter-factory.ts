import type { AdapterConfig, IngestionConfig, SourceAdapter } from '@gapless/schemas';
import { BinanceSourceAdapter } from '@gapless/binance-client';
import { CoinbaseSourceAdapter } from '@gapless/coinbase-client';

/**
 * Adapter instance for one configured source
 */
export function createAdapter(config: AdapterConfig, timeoutMs: number): SourceAdapter {
  switch (config.provider) {
    case 'binance':
      return new BinanceSourceAdapter(config, { timeoutMs });
    case 'coinbase':
      return new CoinbaseSourceAdapter(config, { timeoutMs });
  }
}

/**
 * Instances for every enabled adapter in the config
 */
export function createAdapters(config: IngestionConfig): SourceAdapter[] {
  return config.adapters
    .filter((adapter) => adapter.enabled)
    .map((adapter) => createAdapter(adapter, config.scheduler.requestTimeoutMs));
}
