/**
 * Invariant registry: every proof type resolves as a symbol and every
 * authority boundary as a module path. Id uniqueness is a schema rule.
 */

import { fieldLocation, type PolicyContext } from './shared.js';

export function checkInvariantRegistry(ctx: PolicyContext): number {
  const registry = ctx.policies.invariantRegistry;
  registry.invariants.forEach((entry, idx) => {
    ctx.resolver.resolveSymbol(
      entry.canonical_proof_type_path,
      fieldLocation(registry.path, ['invariants', idx, 'canonical_proof_type_path']),
    );
    ctx.resolver.resolveModulePath(
      entry.authority_boundary_module_path,
      fieldLocation(registry.path, ['invariants', idx, 'authority_boundary_module_path']),
    );
  });
  return registry.invariants.length;
}
