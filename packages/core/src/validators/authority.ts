/**
 * Authority boundary map checks.
 *
 * - `checkAuthorityBoundaryMap`: every referenced path resolves
 * - `checkUnforgeability`: controlled aggregates expose no public field or slot
 * - `checkConstructorVisibility`: each constructor's derived rung stays at or
 *   below the entry's ceiling
 */

import { BanViolationError, VisibilityExceedanceError } from '../errors.js';
import { compareRungs } from '../visibility.js';
import { fieldLocation, sourceLocation, type PolicyContext } from './shared.js';

export function checkAuthorityBoundaryMap(ctx: PolicyContext): number {
  const map = ctx.policies.authorityBoundaryMap;
  map.entries.forEach((entry, idx) => {
    const at = (...rest: Array<string | number>) => fieldLocation(map.path, ['entries', idx, ...rest]);
    ctx.resolver.resolveSymbol(entry.controlled_type_path, at('controlled_type_path'));
    ctx.resolver.resolveModulePath(entry.boundary_module_path, at('boundary_module_path'));
    entry.constructor_paths.forEach((ctor, j) => {
      ctx.resolver.resolveSymbol(ctor, at('constructor_paths', j));
    });
    entry.allowed_caller_module_paths.forEach((caller, j) => {
      ctx.resolver.resolveModulePath(caller, at('allowed_caller_module_paths', j));
    });
  });
  return map.entries.length;
}

/** Returns how many controlled aggregates were inspected. */
export function checkUnforgeability(ctx: PolicyContext): number {
  const map = ctx.policies.authorityBoundaryMap;
  let inspected = 0;
  map.entries.forEach((entry, idx) => {
    const location = fieldLocation(map.path, ['entries', idx, 'controlled_type_path']);
    for (const decl of ctx.resolver.findTypeDeclarations(entry.controlled_type_path, location)) {
      if (decl.kind !== 'aggregate') continue;
      inspected++;
      const exposed = decl.children.find(c =>
        (c.kind === 'field' || c.kind === 'slot') && c.visibility === 'public');
      if (exposed) {
        throw new BanViolationError('unforgeability', sourceLocation(decl.file, exposed.line),
          `controlled type '${decl.name}' exposes public ${exposed.kind} '${exposed.name}'`);
      }
    }
  });
  return inspected;
}

/** Returns how many constructor paths were checked. */
export function checkConstructorVisibility(ctx: PolicyContext): number {
  const map = ctx.policies.authorityBoundaryMap;
  let checked = 0;
  map.entries.forEach((entry, idx) => {
    const ceiling = entry.max_constructor_visibility_rung;
    entry.constructor_paths.forEach((ctor, j) => {
      const location = fieldLocation(map.path, ['entries', idx, 'constructor_paths', j]);
      const derived = ctx.resolver.constructorVisibility(ctor, location);
      checked++;
      if (compareRungs(derived.rung, ceiling) > 0) {
        throw new VisibilityExceedanceError(
          sourceLocation(derived.evidence.file, derived.evidence.line),
          `constructor '${ctor}' is ${derived.rung}, above the ${ceiling} ceiling set at ${location}`,
        );
      }
    });
  });
  return checked;
}
