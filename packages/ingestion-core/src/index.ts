/**
 * @gapless/ingestion-core
 *
 * Multi-source ingestion engine: source selection with health tracking,
 * rate limiting and circuit breaking, retry scheduling, validation, gap
 * detection and backfill recovery
 */

// Per-adapter state
export * from './health/health-tracker';
export * from './breaker/circuit-breaker';
export * from './rate-limit/rate-limiter';
export * from './retry/retry-policy';

// Source selection
export * from './selection/source-selector';

// Validation
export * from './validation/data-validator';

// Gaps and recovery
export * from './gaps/ranges';
export * from './gaps/gap-detector';
export * from './recovery/recovery-orchestrator';

// Scheduling
export * from './scheduler/task-queue';
export * from './scheduler/worker-pool';

// Coordinator
export * from './coordinator/ingestion-coordinator';

// Collaborators
export * from './store/memory-store';
export * from './alerts/logging-alert-sink';
