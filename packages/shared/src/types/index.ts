/**
 * Core types for logbridge
 */

export * from './relabel.js';

// ===========================================
// Labels & Entries
// ===========================================

/**
 * Label name → value. Names are unique by construction.
 */
export type LabelSet = Readonly<Record<string, string>>;

export const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Labels with this prefix are internal and never leave the translator */
export const INTERNAL_LABEL_PREFIX = '__';

/** Reserved label carrying the tenant a push request was sent for */
export const TENANT_ID_LABEL = '__tenant_id__';

export function isValidLabelName(name: string): boolean {
  return LABEL_NAME_PATTERN.test(name);
}

/**
 * Internal normalized representation of one log line
 */
export interface Entry {
  readonly labels: LabelSet;
  readonly timestamp: Date;
  readonly line: string;
}

/**
 * Build a frozen entry with labels stored in name order
 */
export function createEntry(labels: Record<string, string>, timestamp: Date, line: string): Entry {
  const ordered: Record<string, string> = {};
  for (const name of Object.keys(labels).sort()) {
    ordered[name] = labels[name] ?? '';
  }
  return Object.freeze({
    labels: Object.freeze(ordered),
    timestamp: new Date(timestamp.getTime()),
    line,
  });
}

// ===========================================
// Targets
// ===========================================

export const TARGET_TYPES = {
  GCPLOG: 'gcplog',
} as const;

export type TargetType = (typeof TARGET_TYPES)[keyof typeof TARGET_TYPES];

export const SUBSCRIPTION_TYPES = {
  PULL: 'pull',
  PUSH: 'push',
} as const;

export type SubscriptionType = (typeof SUBSCRIPTION_TYPES)[keyof typeof SUBSCRIPTION_TYPES];

export const PULL_TARGET_STATES = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  CANCELLING: 'CANCELLING',
  STOPPED: 'STOPPED',
} as const;

export type PullTargetState = (typeof PULL_TARGET_STATES)[keyof typeof PULL_TARGET_STATES];
