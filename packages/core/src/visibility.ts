/**
 * Visibility rungs: the four ordered disclosure levels.
 */

export const VISIBILITY_RUNGS = ['private', 'module-scoped', 'unit-scoped', 'public'] as const;

export type VisibilityRung = typeof VISIBILITY_RUNGS[number];

const RUNG_ORDER: Record<VisibilityRung, number> = {
  private: 0,
  'module-scoped': 1,
  'unit-scoped': 2,
  public: 3,
};

/** Tokens accepted in policy documents, source modifiers included. */
const POLICY_TOKENS = new Map<string, VisibilityRung>([
  ['private', 'private'],
  ['pub(self)', 'private'],
  ['pub(super)', 'module-scoped'],
  ['module-scoped', 'module-scoped'],
  ['pub(crate)', 'unit-scoped'],
  ['unit-scoped', 'unit-scoped'],
  ['pub', 'public'],
  ['public', 'public'],
]);

export const POLICY_VISIBILITY_TOKENS = [...POLICY_TOKENS.keys()];

export function rungOrder(rung: VisibilityRung): number {
  return RUNG_ORDER[rung];
}

/** Negative when `a` discloses less than `b`. */
export function compareRungs(a: VisibilityRung, b: VisibilityRung): number {
  return RUNG_ORDER[a] - RUNG_ORDER[b];
}

export function maxRung(rungs: VisibilityRung[]): VisibilityRung {
  let best: VisibilityRung = 'private';
  for (const r of rungs) {
    if (compareRungs(r, best) > 0) best = r;
  }
  return best;
}

export function parsePolicyVisibility(token: string): VisibilityRung | null {
  return POLICY_TOKENS.get(token.replace(/\s+/g, '')) ?? null;
}

/**
 * Map a source visibility modifier (`pub`, `pub(crate)`, …, or nothing) to its rung.
 */
export function rungFromModifier(modifier: string | undefined | null): VisibilityRung {
  if (!modifier) return 'private';
  const compact = modifier.replace(/\s+/g, '');
  if (compact === 'pub') return 'public';
  if (compact === 'pub(crate)') return 'unit-scoped';
  if (compact === 'pub(self)') return 'private';
  // pub(super), pub(in path)
  return 'module-scoped';
}
