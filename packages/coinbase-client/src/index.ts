export * from './rest/auth';
export * from './rest/client';
export * from './adapter/coinbase-adapter';
