/**
 * Build a target configuration from the process configuration
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { ConfigurationError, type Config, type RelabelRule } from '@logbridge/shared';
import { parseRelabelRules, type TargetConfig } from '@logbridge/core';

export async function loadRelabelRules(path: string | undefined): Promise<RelabelRule[]> {
  if (!path) return [];

  const file = resolve(process.cwd(), path);
  let raw: string;
  try {
    raw = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read relabel config ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Relabel config ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseRelabelRules(json);
}

export function buildTargetConfig(config: Config, relabelRules: RelabelRule[]): TargetConfig {
  const { target } = config;
  const common = {
    jobName: target.jobName,
    projectId: target.projectId,
    labels: target.labels,
    useIncomingTimestamp: target.useIncomingTimestamp,
    relabelRules,
  };

  if (target.subscriptionType === 'push') {
    return {
      ...common,
      subscriptionType: 'push',
      server: { ...target.push },
    };
  }

  return {
    ...common,
    subscriptionType: 'pull',
    subscription: target.subscription,
    maxOutstandingMessages: target.maxOutstandingMessages,
  };
}
