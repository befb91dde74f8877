/**
 * Policy loader: reads and schema-validates the six policy documents.
 * Pure read: documents are never written back.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { z } from 'zod';
import { SchemaError } from '../errors.js';
import { describeParseError, type ParseToml } from './toml.js';
import {
  AuthorityBoundaryMapSchema,
  ClassificationMapSchema,
  DryProofMapSchema,
  InvariantRegistrySchema,
  MoveSemanticsRulesSchema,
  ParametricityRulesSchema,
  POLICY_FILES,
  type AuthorityBoundaryMap,
  type ClassificationMap,
  type DryProofMap,
  type InvariantRegistry,
  type MoveSemanticsRules,
  type ParametricityRules,
  type PolicyKind,
} from './schemas.js';

export interface PolicySet {
  invariantRegistry: InvariantRegistry;
  authorityBoundaryMap: AuthorityBoundaryMap;
  parametricityRules: ParametricityRules;
  moveSemanticsRules: MoveSemanticsRules;
  dryProofMap: DryProofMap;
  classificationMap: ClassificationMap;
}

/** `['invariants', 1, 'id']` → `invariants[1].id` */
export function formatFieldPath(segments: ReadonlyArray<string | number>): string {
  let out = '';
  for (const seg of segments) {
    if (typeof seg === 'number') out += `[${seg}]`;
    else out += out ? `.${seg}` : seg;
  }
  return out;
}

/**
 * Validate already-parsed document data against a schema. The first issue
 * becomes the SchemaError, located at the offending field.
 */
export function validateDocument<T extends z.ZodTypeAny>(
  schema: T,
  docPath: string,
  data: unknown,
): z.infer<T> {
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new SchemaError(docPath, null, 'top-level value must be a table');
  }
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new SchemaError(docPath, issue.path.length > 0 ? formatFieldPath(issue.path) : null, issue.message);
  }
  return result.data;
}

/** Read and parse one document's TOML; absent or unparseable documents are SchemaErrors. */
export function readPolicyTable(root: string, policyDir: string, kind: PolicyKind, parseToml: ParseToml): { docPath: string; data: unknown } {
  const docPath = path.posix.join(policyDir.split(path.sep).join('/'), POLICY_FILES[kind]);
  const absolute = path.join(root, docPath);
  if (!fs.existsSync(absolute)) {
    throw new SchemaError(docPath, null, 'document is absent');
  }
  let raw: string;
  try {
    raw = fs.readFileSync(absolute, 'utf-8');
  } catch (err) {
    throw new SchemaError(docPath, null, `cannot be read: ${describeParseError(err)}`);
  }
  try {
    return { docPath, data: parseToml(raw) };
  } catch (err) {
    throw new SchemaError(docPath, null, `is not valid TOML: ${describeParseError(err)}`);
  }
}

export interface LoadPolicyOptions {
  root: string;
  policyDir: string;
  parseToml: ParseToml;
}

/**
 * Load all six documents in a fixed order; the first problem aborts.
 */
export function loadPolicySet(opts: LoadPolicyOptions): PolicySet {
  const load = <T extends z.ZodTypeAny>(kind: PolicyKind, schema: T) => {
    const { docPath, data } = readPolicyTable(opts.root, opts.policyDir, kind, opts.parseToml);
    return { path: docPath, body: validateDocument(schema, docPath, data) };
  };

  const registry = load('invariant-registry', InvariantRegistrySchema);
  const authority = load('authority-boundary-map', AuthorityBoundaryMapSchema);
  const parametricity = load('parametricity-rules', ParametricityRulesSchema);
  const moves = load('move-semantics-rules', MoveSemanticsRulesSchema);
  const dry = load('dry-proof-map', DryProofMapSchema);
  const classification = load('classification-map', ClassificationMapSchema);

  return {
    invariantRegistry: { kind: 'invariant-registry', path: registry.path, ...registry.body },
    authorityBoundaryMap: { kind: 'authority-boundary-map', path: authority.path, ...authority.body },
    parametricityRules: { kind: 'parametricity-rules', path: parametricity.path, ...parametricity.body },
    moveSemanticsRules: { kind: 'move-semantics-rules', path: moves.path, ...moves.body },
    dryProofMap: { kind: 'dry-proof-map', path: dry.path, ...dry.body },
    classificationMap: { kind: 'classification-map', path: classification.path, ...classification.body },
  };
}
