/**
 * Relabel rule types
 */

export const RELABEL_ACTIONS = [
  'replace',
  'keep',
  'drop',
  'labelmap',
  'labeldrop',
  'labelkeep',
  'lowercase',
  'uppercase',
] as const;

export type RelabelAction = (typeof RELABEL_ACTIONS)[number];

export interface RelabelRule {
  action: RelabelAction;
  sourceLabels: string[];
  separator: string;
  /** Fully anchored when applied */
  regex: string;
  targetLabel?: string;
  replacement: string;
}

export const DEFAULT_RELABEL_RULE: Omit<RelabelRule, 'targetLabel'> = {
  action: 'replace',
  sourceLabels: [],
  separator: ';',
  regex: '(.*)',
  replacement: '$1',
};
