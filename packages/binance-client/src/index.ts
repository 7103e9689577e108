export * from './rest/client';
export * from './adapter/binance-adapter';
