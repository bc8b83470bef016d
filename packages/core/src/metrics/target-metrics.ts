/**
 * Target Metrics
 * Per-target counters recorded on a caller-supplied prom-client registry
 */

import { Counter, Gauge, type Registry } from 'prom-client';

export type FailureReason = 'transport' | 'parse' | 'malformed' | 'dropped' | 'sink';

/**
 * Scoped metrics surface handed to a target
 */
export interface TargetMetrics {
  entryAccepted(): void;
  entryFailed(reason: FailureReason): void;
  /** The pull receive loop ended with an error */
  subscriptionFailed(): void;
}

export interface TargetIdentity {
  job: string;
  projectId: string;
  /** Empty for push targets */
  subscription: string;
}

type IdentityLabel = 'job' | 'project_id' | 'subscription';

const IDENTITY_LABELS = ['job', 'project_id', 'subscription'] as const;

export const METRIC_NAMES = {
  ENTRIES: 'logbridge_target_entries_total',
  ERRORS: 'logbridge_target_errors_total',
  LAST_SUCCESS_SCRAPE: 'logbridge_target_last_success_scrape',
} as const;

function getOrCreateCounter<T extends string>(
  registry: Registry,
  name: string,
  help: string,
  labelNames: readonly T[]
): Counter<T> {
  const existing = registry.getSingleMetric(name);
  if (existing instanceof Counter) return existing;
  return new Counter<T>({
    name,
    help,
    labelNames,
    registers: [registry],
  });
}

function getOrCreateGauge<T extends string>(
  registry: Registry,
  name: string,
  help: string,
  labelNames: readonly T[]
): Gauge<T> {
  const existing = registry.getSingleMetric(name);
  if (existing instanceof Gauge) return existing;
  return new Gauge<T>({
    name,
    help,
    labelNames,
    registers: [registry],
  });
}

export class PromTargetMetrics implements TargetMetrics {
  private readonly entries: Counter<IdentityLabel>;
  private readonly errors: Counter<IdentityLabel | 'reason'>;
  private readonly lastSuccessScrape: Gauge<IdentityLabel>;
  private readonly identityLabels: Record<IdentityLabel, string>;

  constructor(registry: Registry, identity: TargetIdentity) {
    this.identityLabels = {
      job: identity.job,
      project_id: identity.projectId,
      subscription: identity.subscription,
    };

    this.entries = getOrCreateCounter(
      registry,
      METRIC_NAMES.ENTRIES,
      'Entries accepted by the ingestion target',
      IDENTITY_LABELS
    );
    this.errors = getOrCreateCounter(
      registry,
      METRIC_NAMES.ERRORS,
      'Messages the ingestion target failed to handle, by reason',
      [...IDENTITY_LABELS, 'reason'] as const
    );
    this.lastSuccessScrape = getOrCreateGauge(
      registry,
      METRIC_NAMES.LAST_SUCCESS_SCRAPE,
      'Unix time the subscription receive loop last reported a failure',
      IDENTITY_LABELS
    );
  }

  entryAccepted(): void {
    this.entries.inc(this.identityLabels);
  }

  entryFailed(reason: FailureReason): void {
    this.errors.inc({ ...this.identityLabels, reason });
  }

  subscriptionFailed(): void {
    this.errors.inc({ ...this.identityLabels, reason: 'subscription' });
    this.lastSuccessScrape.setToCurrentTime(this.identityLabels);
  }
}
