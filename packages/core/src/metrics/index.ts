/**
 * Metrics Layer
 */

export { PromTargetMetrics, METRIC_NAMES } from './target-metrics.js';
export type { TargetMetrics, TargetIdentity, FailureReason } from './target-metrics.js';
