/**
 * Translation Layer Types
 */

import type { Entry, LabelSet, RelabelRule, TranslationError } from '@logbridge/shared';

/**
 * Transport-neutral view of one Pub/Sub message
 */
export interface MessageEnvelope {
  id: string;
  data: Uint8Array;
  attributes: Readonly<Record<string, string>>;
  publishTime: Date;
  /** Subscription the message arrived on, when the transport says */
  subscription?: string;
}

export interface TranslationOptions {
  staticLabels: LabelSet;
  useIncomingTimestamp: boolean;
  relabelRules: readonly RelabelRule[];
  /** Tenant the message was sent for (push `X-Scope-OrgID`) */
  tenantId?: string;
}

export type TranslationResult =
  | { success: true; entry: Entry }
  | { success: false; error: TranslationError };

/**
 * Subset of a Cloud Logging LogEntry used for labels
 */
export interface CloudLogEntry {
  logName?: string;
  severity?: string;
  resource?: {
    type?: string;
    labels?: Record<string, string>;
  };
  labels?: Record<string, string>;
}
