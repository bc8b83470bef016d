/**
 * @logbridge/core
 * Pub/Sub log ingestion: translation, sinks, metrics and targets
 */

// Relabel Layer - Label rewriting rules
export * from './relabel/index.js';

// Translation Layer - Messages to entries
export * from './translation/index.js';

// Sink Layer - Downstream entry handoff
export * from './sink/index.js';

// Metrics Layer - Per-target counters
export * from './metrics/index.js';

// Targets - Push and pull ingestion
export * from './targets/index.js';
