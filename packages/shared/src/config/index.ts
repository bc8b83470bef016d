/**
 * Configuration management for logbridge
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { isValidLabelName, SUBSCRIPTION_TYPES } from '../types/index.js';

// When running via npm workspaces, CWD may be a package directory (apps/ingester)
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  dotenvConfig({ path: envPath });
}

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((val) => val === 'true');

/**
 * Parse `name=value,name2=value2` into a label set
 */
const staticLabels = z
  .string()
  .default('')
  .transform((val, ctx) => {
    const labels: Record<string, string> = {};
    for (const pair of val.split(',').map((p) => p.trim()).filter(Boolean)) {
      const eq = pair.indexOf('=');
      const name = eq < 0 ? pair : pair.slice(0, eq).trim();
      if (eq < 0 || !isValidLabelName(name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid label pair '${pair}'` });
        return z.NEVER;
      }
      labels[name] = pair.slice(eq + 1).trim();
    }
    return labels;
  });

const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Metrics / readiness server
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535).default(9080),
    host: z.string().default('0.0.0.0'),
  }),

  // Ingestion target
  target: z
    .object({
      jobName: z.string().min(1).default('gcplog'),
      subscriptionType: z.enum([SUBSCRIPTION_TYPES.PULL, SUBSCRIPTION_TYPES.PUSH]).default('pull'),
      projectId: z.string().default(''),
      subscription: z.string().default(''),
      labels: staticLabels,
      useIncomingTimestamp: booleanFlag,
      /** JSON file holding an array of relabel rules */
      relabelConfigPath: z.string().optional(),
      maxOutstandingMessages: z.coerce.number().int().positive().default(1000),
      push: z.object({
        host: z.string().default('0.0.0.0'),
        port: z.coerce.number().int().min(0).max(65535).default(8080),
        path: z.string().startsWith('/').default('/gcp/api/v1/push'),
        bodyLimit: z.coerce.number().int().positive().default(1048576),
      }),
    })
    .superRefine((target, ctx) => {
      if (target.subscriptionType !== SUBSCRIPTION_TYPES.PULL) return;
      if (!target.projectId) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['projectId'], message: 'GCPLOG_PROJECT_ID is required for pull targets' });
      }
      if (!target.subscription) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['subscription'], message: 'GCPLOG_SUBSCRIPTION is required for pull targets' });
      }
    }),

  sink: z.object({
    queueCapacity: z.coerce.number().int().positive().default(1024),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Empty strings count as unset
function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: env('NODE_ENV'),
    logLevel: env('LOG_LEVEL'),

    server: {
      port: env('PORT'),
      host: env('HOST'),
    },

    target: {
      jobName: env('GCPLOG_JOB_NAME'),
      subscriptionType: env('GCPLOG_SUBSCRIPTION_TYPE'),
      projectId: env('GCPLOG_PROJECT_ID'),
      subscription: env('GCPLOG_SUBSCRIPTION'),
      labels: env('GCPLOG_LABELS'),
      useIncomingTimestamp: env('GCPLOG_USE_INCOMING_TIMESTAMP'),
      relabelConfigPath: env('GCPLOG_RELABEL_CONFIG'),
      maxOutstandingMessages: env('GCPLOG_MAX_OUTSTANDING_MESSAGES'),
      push: {
        host: env('GCPLOG_PUSH_HOST'),
        port: env('GCPLOG_PUSH_PORT'),
        path: env('GCPLOG_PUSH_PATH'),
        bodyLimit: env('GCPLOG_PUSH_BODY_LIMIT'),
      },
    },

    sink: {
      queueCapacity: env('SINK_QUEUE_CAPACITY'),
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}
