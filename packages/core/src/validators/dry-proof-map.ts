/**
 * DRY proof map: its ids are exactly the registry's ids, each entry agrees
 * with its registry entry, and every path it names resolves.
 */

import { ConsistencyError } from '../errors.js';
import { fieldLocation, type PolicyContext } from './shared.js';

export function checkDryProofMap(ctx: PolicyContext): number {
  const { dryProofMap: dry, invariantRegistry: registry } = ctx.policies;
  const registered = new Map(registry.invariants.map(entry => [entry.id, entry]));
  const seen = new Set<string>();

  dry.entries.forEach((entry, idx) => {
    const location = fieldLocation(dry.path, ['entries', idx, 'invariant_id']);
    if (seen.has(entry.invariant_id)) {
      throw new ConsistencyError(location, `duplicates invariant id '${entry.invariant_id}'`);
    }
    seen.add(entry.invariant_id);
    if (!registered.has(entry.invariant_id)) {
      throw new ConsistencyError(location, `invariant id '${entry.invariant_id}' is not in ${registry.path}`);
    }
  });

  for (const id of registered.keys()) {
    if (!seen.has(id)) {
      throw new ConsistencyError(dry.path, `registry invariant '${id}' has no entry`);
    }
  }

  dry.entries.forEach((entry, idx) => {
    const source = registered.get(entry.invariant_id);
    if (!source) return;
    if (entry.canonical_proof_type_path !== source.canonical_proof_type_path) {
      throw new ConsistencyError(
        fieldLocation(dry.path, ['entries', idx, 'canonical_proof_type_path']),
        `'${entry.canonical_proof_type_path}' differs from registry '${source.canonical_proof_type_path}'`,
      );
    }
    if (entry.authority_boundary_module_path !== source.authority_boundary_module_path) {
      throw new ConsistencyError(
        fieldLocation(dry.path, ['entries', idx, 'authority_boundary_module_path']),
        `'${entry.authority_boundary_module_path}' differs from registry '${source.authority_boundary_module_path}'`,
      );
    }
  });

  dry.entries.forEach((entry, idx) => {
    ctx.resolver.resolveSymbol(
      entry.canonical_proof_type_path,
      fieldLocation(dry.path, ['entries', idx, 'canonical_proof_type_path']),
    );
    ctx.resolver.resolveModulePath(
      entry.authority_boundary_module_path,
      fieldLocation(dry.path, ['entries', idx, 'authority_boundary_module_path']),
    );
  });

  return dry.entries.length;
}
