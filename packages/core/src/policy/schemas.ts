/**
 * Policy document schemas: one zod schema per document kind.
 *
 * Documents are validated once at the load boundary and carried as tagged
 * variants afterwards; validators never read raw tables.
 */

import { z } from 'zod';
import { POLICY_VISIBILITY_TOKENS, parsePolicyVisibility } from '../visibility.js';

// ---------------------------------------------------------------------------
// Building blocks
// ---------------------------------------------------------------------------

const text = z
  .string({ required_error: 'is missing', invalid_type_error: 'must be a non-empty string' })
  .trim()
  .min(1, 'must be a non-empty string');

function list<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item, { required_error: 'is missing', invalid_type_error: 'must be a non-empty list' })
    .min(1, 'must be a non-empty list');
}

function table<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape, { required_error: 'is missing', invalid_type_error: 'must be a table' });
}

const version = z
  .number({ required_error: 'is missing', invalid_type_error: 'must be a positive integer' })
  .int('must be a positive integer')
  .positive('must be a positive integer');

const visibilityRung = text.transform((token, ctx) => {
  const rung = parsePolicyVisibility(token);
  if (!rung) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must be one of ${POLICY_VISIBILITY_TOKENS.map(t => `'${t}'`).join(', ')}`,
    });
    return z.NEVER;
  }
  return rung;
});

/** Workspace-relative, `/`-separated, no traversal. */
const classificationPrefix = text.superRefine((prefix, ctx) => {
  if (prefix.startsWith('/') || /^[A-Za-z]:/.test(prefix)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${prefix}' must be workspace-relative` });
  } else if (prefix.includes('\\')) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${prefix}' must use '/' separators` });
  } else if (prefix.split('/').includes('..')) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${prefix}' must not contain '..'` });
  }
});

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

export const InvariantRegistrySchema = table({
  version,
  invariants: list(table({
    id: text,
    predicate: text,
    canonical_proof_type_path: text,
    authority_boundary_module_path: text,
  })),
}).superRefine((doc, ctx) => {
  const seen = new Set<string>();
  doc.invariants.forEach((entry, idx) => {
    if (seen.has(entry.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['invariants', idx, 'id'],
        message: `duplicates invariant id '${entry.id}'`,
      });
    }
    seen.add(entry.id);
  });
});

export const AuthorityBoundaryMapSchema = table({
  version,
  entries: list(table({
    controlled_type_path: text,
    boundary_module_path: text,
    constructor_paths: list(text),
    allowed_caller_module_paths: list(text),
    max_constructor_visibility_rung: visibilityRung,
  })),
});

/** Banned patterns and disclosures are either plain strings or tables. */
const ruleItem = z.union([text, z.record(z.unknown())], {
  errorMap: () => ({ message: 'must be a non-empty string or a table' }),
});

export const ParametricityRulesSchema = table({
  version,
  banned_patterns: list(ruleItem),
  required_interface_disclosures: list(ruleItem),
});

export const MoveSemanticsRulesSchema = table({
  version,
  state_bearing_types: list(table({
    type_path: text,
    consumed_transition_methods: list(table({
      method_path: text,
      consumes_self: z.literal(true, { errorMap: () => ({ message: 'must be true' }) }),
      post_move_unusability_guarantee: text,
    })),
  })),
});

export const DryProofMapSchema = table({
  version,
  entries: list(table({
    invariant_id: text,
    canonical_proof_type_path: text,
    authority_boundary_module_path: text,
  })),
});

export const ClassificationMapSchema = table({
  version,
  rules: list(table({
    prefix: classificationPrefix,
    classification: z.enum(['core', 'boundary'], {
      errorMap: () => ({ message: "must be one of 'core', 'boundary'" }),
    }),
  })),
});

// ---------------------------------------------------------------------------
// Tagged variants
// ---------------------------------------------------------------------------

export type PolicyKind =
  | 'invariant-registry'
  | 'authority-boundary-map'
  | 'parametricity-rules'
  | 'move-semantics-rules'
  | 'dry-proof-map'
  | 'classification-map';

interface Tagged<K extends PolicyKind> {
  kind: K;
  /** Workspace-relative path of the document. */
  path: string;
}

export type InvariantRegistry = Tagged<'invariant-registry'> & z.infer<typeof InvariantRegistrySchema>;
export type AuthorityBoundaryMap = Tagged<'authority-boundary-map'> & z.infer<typeof AuthorityBoundaryMapSchema>;
export type ParametricityRules = Tagged<'parametricity-rules'> & z.infer<typeof ParametricityRulesSchema>;
export type MoveSemanticsRules = Tagged<'move-semantics-rules'> & z.infer<typeof MoveSemanticsRulesSchema>;
export type DryProofMap = Tagged<'dry-proof-map'> & z.infer<typeof DryProofMapSchema>;
export type ClassificationMap = Tagged<'classification-map'> & z.infer<typeof ClassificationMapSchema>;

export type PolicyDocument =
  | InvariantRegistry
  | AuthorityBoundaryMap
  | ParametricityRules
  | MoveSemanticsRules
  | DryProofMap
  | ClassificationMap;

export type InvariantEntry = InvariantRegistry['invariants'][number];
export type AuthorityEntry = AuthorityBoundaryMap['entries'][number];
export type StateBearingType = MoveSemanticsRules['state_bearing_types'][number];
export type DryProofEntry = DryProofMap['entries'][number];
export type ClassificationRule = ClassificationMap['rules'][number];
export type Classification = ClassificationRule['classification'];

export const POLICY_FILES: Record<PolicyKind, string> = {
  'invariant-registry': 'invariant_registry.toml',
  'authority-boundary-map': 'authority_boundary_map.toml',
  'parametricity-rules': 'parametricity_rules.toml',
  'move-semantics-rules': 'move_semantics_rules.toml',
  'dry-proof-map': 'dry_proof_map.toml',
  'classification-map': 'classification_map.toml',
};
