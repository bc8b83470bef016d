/**
 * Relabeling
 * Rewrites a label set through an ordered list of rules
 */

import type { LabelSet, RelabelRule } from '@logbridge/shared';
import { isValidLabelName } from '@logbridge/shared';

const compiled = new Map<string, RegExp>();

/**
 * Compile a rule regex, fully anchored. `(?P<name>` groups are accepted.
 */
export function compileRelabelRegex(source: string): RegExp {
  let regex = compiled.get(source);
  if (!regex) {
    regex = new RegExp(`^(?:${source.replace(/\(\?P</g, '(?<')})$`);
    compiled.set(source, regex);
  }
  return regex;
}

/**
 * Expand `$1`, `${1}`, `$name`, `${name}` and `$$` against a match
 */
export function expandTemplate(template: string, match: RegExpExecArray): string {
  return template.replace(
    /\$(?:\$|\{(\w+)\}|(\w+))/g,
    (token: string, braced: string | undefined, bare: string | undefined) => {
      if (token === '$$') return '$';
      const name = braced ?? bare ?? '';
      if (/^\d+$/.test(name)) return match[Number(name)] ?? '';
      return match.groups?.[name] ?? '';
    }
  );
}

/**
 * Apply rules in order. Returns null when a rule drops the series.
 */
export function relabel(labels: LabelSet, rules: readonly RelabelRule[]): LabelSet | null {
  const builder: Record<string, string> = { ...labels };

  for (const rule of rules) {
    if (!applyRule(builder, rule)) {
      return null;
    }
  }

  return builder;
}

function applyRule(labels: Record<string, string>, rule: RelabelRule): boolean {
  const regex = compileRelabelRegex(rule.regex);
  const value = rule.sourceLabels.map((name) => labels[name] ?? '').join(rule.separator);

  switch (rule.action) {
    case 'drop':
      return !regex.test(value);

    case 'keep':
      return regex.test(value);

    case 'replace': {
      const match = regex.exec(value);
      if (!match || rule.targetLabel === undefined) break;
      const target = expandTemplate(rule.targetLabel, match);
      if (!isValidLabelName(target)) break;
      const result = expandTemplate(rule.replacement, match);
      if (result.length === 0) {
        delete labels[target];
        break;
      }
      labels[target] = result;
      break;
    }

    case 'lowercase':
      if (rule.targetLabel !== undefined) labels[rule.targetLabel] = value.toLowerCase();
      break;

    case 'uppercase':
      if (rule.targetLabel !== undefined) labels[rule.targetLabel] = value.toUpperCase();
      break;

    case 'labelmap':
      for (const [name, labelValue] of Object.entries(labels)) {
        const match = regex.exec(name);
        if (!match) continue;
        const mapped = expandTemplate(rule.replacement, match);
        if (isValidLabelName(mapped)) {
          labels[mapped] = labelValue;
        }
      }
      break;

    case 'labeldrop':
      for (const name of Object.keys(labels)) {
        if (regex.test(name)) delete labels[name];
      }
      break;

    case 'labelkeep':
      for (const name of Object.keys(labels)) {
        if (!regex.test(name)) delete labels[name];
      }
      break;
  }

  return true;
}
