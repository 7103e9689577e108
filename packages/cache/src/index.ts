/**
 * @gapless/cache
 *
 * Redis client and alert/health publishing
 */

export * from './client';
export * from './keys';
export * from './alerts/redis-alert-sink';
