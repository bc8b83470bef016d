/**
 * Relabel rule validation
 */

import { z } from 'zod';
import {
  ConfigurationError,
  DEFAULT_RELABEL_RULE,
  isValidLabelName,
  RELABEL_ACTIONS,
  type RelabelRule,
} from '@logbridge/shared';
import { compileRelabelRegex } from './relabel.js';

const labelName = z.string().refine(isValidLabelName, { message: 'invalid label name' });

const relabelRuleSchema = z
  .object({
    action: z.enum(RELABEL_ACTIONS).default(DEFAULT_RELABEL_RULE.action),
    sourceLabels: z.array(labelName).default([]),
    separator: z.string().default(DEFAULT_RELABEL_RULE.separator),
    regex: z
      .string()
      .default(DEFAULT_RELABEL_RULE.regex)
      .superRefine((source, ctx) => {
        try {
          compileRelabelRegex(source);
        } catch (error) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `invalid regex: ${error instanceof Error ? error.message : String(error)}`,
          });
        }
      }),
    targetLabel: z.string().min(1).optional(),
    replacement: z.string().default(DEFAULT_RELABEL_RULE.replacement),
  })
  .superRefine((rule, ctx) => {
    const needsTarget = rule.action === 'replace' || rule.action === 'lowercase' || rule.action === 'uppercase';
    if (needsTarget && rule.targetLabel === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['targetLabel'],
        message: `targetLabel is required for action '${rule.action}'`,
      });
    }
    // replace may template its target; the others must name one directly
    if (rule.action !== 'replace' && rule.targetLabel !== undefined && !isValidLabelName(rule.targetLabel)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['targetLabel'], message: 'invalid label name' });
    }
  });

const relabelRulesSchema = z.array(relabelRuleSchema);

/**
 * Validate raw relabel rules (e.g. a parsed JSON file), filling defaults
 */
export function parseRelabelRules(raw: unknown): RelabelRule[] {
  const result = relabelRulesSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid relabel rules: ${details.join('; ')}`, { details });
  }
  return result.data;
}
