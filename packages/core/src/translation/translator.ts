/**
 * Entry Translator
 * Maps Pub/Sub messages onto entries: decode, label, relabel, timestamp
 */

import { z } from 'zod';
import {
  createEntry,
  INTERNAL_LABEL_PREFIX,
  TENANT_ID_LABEL,
  TranslationError,
  type LabelSet,
} from '@logbridge/shared';
import { relabel } from '../relabel/index.js';
import type { CloudLogEntry, MessageEnvelope, TranslationOptions, TranslationResult } from './types.js';

const cloudLogEntrySchema: z.ZodType<CloudLogEntry> = z.object({
  logName: z.string().optional(),
  severity: z.string().optional(),
  resource: z
    .object({
      type: z.string().optional(),
      labels: z.record(z.string()).optional(),
    })
    .optional(),
  labels: z.record(z.string()).optional(),
});

const pushBodySchema = z.object({
  message: z.object({
    data: z.string(),
    attributes: z.record(z.string()).nullish().transform((val) => val ?? {}),
    messageId: z.string().min(1),
    publishTime: z.string().min(1),
  }),
  subscription: z.string().min(1),
});

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const RFC3339_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

/**
 * Replace every character that may not appear in a label name
 */
export function sanitizeLabelName(name: string): string {
  const sanitized = name.replace(/[^a-zA-Z0-9_]/g, '_');
  return /^[0-9]/.test(sanitized) ? `_${sanitized}` : sanitized;
}

/**
 * Parse an RFC3339 instant at millisecond resolution
 */
export function parseRfc3339(value: string): Date | null {
  if (!RFC3339_PATTERN.test(value)) return null;
  const date = new Date(value.replace(/(\.\d{3})\d+/, '$1'));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Translate one message into an entry
 */
export function translateMessage(envelope: MessageEnvelope, options: TranslationOptions): TranslationResult {
  let line: string;
  try {
    line = new TextDecoder('utf-8', { fatal: true }).decode(envelope.data);
  } catch {
    return failure(TranslationError.malformed('payload is not valid UTF-8', { messageId: envelope.id }));
  }
  if (line.length === 0) {
    return failure(TranslationError.malformed('payload is empty', { messageId: envelope.id }));
  }

  let timestamp = new Date();
  if (options.useIncomingTimestamp) {
    const publishedAt = envelope.publishTime.getTime();
    if (Number.isNaN(publishedAt)) {
      return failure(TranslationError.malformed('publish time is not a valid instant', { messageId: envelope.id }));
    }
    timestamp = new Date(publishedAt);
  }

  const merged: Record<string, string> = {
    ...messageLabels(envelope),
    ...logEntryLabels(line),
    ...options.staticLabels,
  };
  if (options.tenantId) {
    merged[TENANT_ID_LABEL] = options.tenantId;
  }

  const relabelled = relabel(merged, options.relabelRules);
  if (relabelled === null) {
    return failure(TranslationError.dropped('entry dropped by relabel rules', { messageId: envelope.id }));
  }

  return { success: true, entry: createEntry(publicLabels(relabelled, options.tenantId), timestamp, line) };
}

/**
 * Validate a parsed push request body and translate the message it wraps
 */
export function translatePushBody(body: unknown, options: TranslationOptions): TranslationResult {
  const parsed = pushBodySchema.safeParse(body);
  if (!parsed.success) {
    const details = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return failure(TranslationError.malformed(`invalid push payload: ${details.join('; ')}`));
  }

  const { message, subscription } = parsed.data;
  if (message.data.length % 4 !== 0 || !BASE64_PATTERN.test(message.data)) {
    return failure(TranslationError.malformed('message data is not valid base64', { messageId: message.messageId }));
  }
  const publishTime = parseRfc3339(message.publishTime);
  if (!publishTime) {
    return failure(
      TranslationError.malformed(`invalid publishTime '${message.publishTime}'`, { messageId: message.messageId })
    );
  }

  return translateMessage(
    {
      id: message.messageId,
      data: Buffer.from(message.data, 'base64'),
      attributes: message.attributes,
      publishTime,
      subscription,
    },
    options
  );
}

function failure(error: TranslationError): TranslationResult {
  return { success: false, error };
}

function messageLabels(envelope: MessageEnvelope): Record<string, string> {
  const labels: Record<string, string> = {
    __gcp_message_id: envelope.id,
  };
  if (envelope.subscription) {
    labels.__gcp_subscription_name = envelope.subscription;
  }
  for (const [name, value] of Object.entries(envelope.attributes)) {
    labels[`__gcp_attributes_${sanitizeLabelName(name)}`] = value;
  }
  return labels;
}

/**
 * Labels from a Cloud Logging LogEntry payload; nothing for plain text
 */
function logEntryLabels(line: string): Record<string, string> {
  if (!line.trimStart().startsWith('{')) return {};

  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return {};
  }
  const parsed = cloudLogEntrySchema.safeParse(json);
  if (!parsed.success) return {};

  const entry = parsed.data;
  const labels: Record<string, string> = {};
  if (entry.logName) labels.__gcp_logname = entry.logName;
  if (entry.severity) labels.__gcp_severity = entry.severity;
  if (entry.resource?.type) labels.__gcp_resource_type = entry.resource.type;
  for (const [name, value] of Object.entries(entry.resource?.labels ?? {})) {
    labels[`__gcp_resource_labels_${sanitizeLabelName(name)}`] = value;
  }
  for (const [name, value] of Object.entries(entry.labels ?? {})) {
    labels[`__gcp_labels_${sanitizeLabelName(name)}`] = value;
  }
  return labels;
}

function publicLabels(labels: LabelSet, tenantId: string | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(labels)) {
    if (!name.startsWith(INTERNAL_LABEL_PREFIX)) {
      result[name] = value;
    }
  }
  if (tenantId) {
    result[TENANT_ID_LABEL] = tenantId;
  }
  return result;
}
