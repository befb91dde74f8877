import type { ParametricityRules } from '../policy/schemas.js';

export interface ParametricitySummary {
  bannedPatterns: number;
  requiredDisclosures: number;
}

/**
 * Parametricity rules are checked for shape only, at load time; this stage
 * reports what was declared.
 */
export function summarizeParametricityRules(rules: ParametricityRules): ParametricitySummary {
  return {
    bannedPatterns: rules.banned_patterns.length,
    requiredDisclosures: rules.required_interface_disclosures.length,
  };
}
