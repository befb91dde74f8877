/**
 * Classification resolver: longest-prefix match of files to core/boundary.
 *
 * Every file must be won by exactly one most-specific rule, and every rule
 * must win at least one file.
 */

import { ClassificationError } from './errors.js';
import type { Classification, ClassificationMap, ClassificationRule } from './policy/schemas.js';

export type ClassificationAssignment = Map<string, Classification>;

export interface RuleMatch {
  rule: ClassificationRule;
  index: number;
}

/** All rules whose prefix matches `file`, longest first (stable on ties). */
export function matchingRules(rules: ClassificationRule[], file: string): RuleMatch[] {
  return rules
    .map((rule, index) => ({ rule, index }))
    .filter(({ rule }) => file.startsWith(rule.prefix))
    .sort((a, b) => b.rule.prefix.length - a.rule.prefix.length || a.index - b.index);
}

/**
 * Classify one file, or throw when no rule matches or the longest matches
 * disagree. Of tied rules that agree, the first wins and the rest are dead.
 */
export function classifyFile(map: ClassificationMap, file: string): RuleMatch {
  const matches = matchingRules(map.rules, file);
  if (matches.length === 0) {
    throw new ClassificationError('no-rule', file, 'no classification rule matches this file');
  }
  const [best] = matches;
  const tied = matches.filter(m => m.rule.prefix.length === best.rule.prefix.length);
  if (tied.some(m => m.rule.classification !== best.rule.classification)) {
    const described = tied
      .map(m => `rules[${m.index}] '${m.rule.prefix}' → ${m.rule.classification}`)
      .join(', ');
    throw new ClassificationError('ambiguous', file, `longest classification match is tied: ${described}`);
  }
  return best;
}

/**
 * Produce the total file → classification map for `files`.
 */
export function classifyFiles(map: ClassificationMap, files: string[]): ClassificationAssignment {
  const assignment: ClassificationAssignment = new Map();
  const winners = new Set<number>();

  for (const file of files) {
    const match = classifyFile(map, file);
    winners.add(match.index);
    assignment.set(file, match.rule.classification);
  }

  map.rules.forEach((rule, index) => {
    if (!winners.has(index)) {
      throw new ClassificationError(
        'dead-rule',
        map.path,
        `rules[${index}] '${rule.prefix}' → ${rule.classification} never wins a file`,
      );
    }
  });

  return assignment;
}

export function filesClassifiedAs(assignment: ClassificationAssignment, classification: Classification): string[] {
  return [...assignment.entries()]
    .filter(([, c]) => c === classification)
    .map(([file]) => file)
    .sort();
}
