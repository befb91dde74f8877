/**
 * Move semantics: every state-bearing type resolves, and each of its
 * transition methods belongs to it, resolves, and takes `self` by value.
 */

import { ConsistencyError, UnresolvedSymbolError } from '../errors.js';
import { parseSymbolPath } from '../resolver.js';
import { firstParameter } from '../scanner/index.js';
import { compactType, fieldLocation, sourceLocation, type PolicyContext } from './shared.js';

/** `self`, `mut self`, `self: Self`, `self: Box<Self>`; never `&self`. */
const CONSUMING_RECEIVER_RE = /^(?:mut)?self(?::(?:Self|Box<Self>))?$/;

export function isSelfConsuming(receiver: string | null): boolean {
  if (receiver === null) return false;
  // `mut self` compacts to `mutself`
  return CONSUMING_RECEIVER_RE.test(compactType(receiver));
}

/** Returns how many transition methods were checked. */
export function checkMoveSemantics(ctx: PolicyContext): number {
  const rules = ctx.policies.moveSemanticsRules;
  let checked = 0;

  rules.state_bearing_types.forEach((stateType, idx) => {
    ctx.resolver.resolveSymbol(
      stateType.type_path,
      fieldLocation(rules.path, ['state_bearing_types', idx, 'type_path']),
    );

    stateType.consumed_transition_methods.forEach((transition, j) => {
      const location = fieldLocation(rules.path, ['state_bearing_types', idx, 'consumed_transition_methods', j, 'method_path']);
      const methodPath = transition.method_path;
      const prefix = `${stateType.type_path}::`;
      const member = methodPath.startsWith(prefix) ? methodPath.slice(prefix.length) : '';
      if (!member || member.includes('::')) {
        throw new ConsistencyError(location, `'${methodPath}' is not a method of '${stateType.type_path}'`);
      }

      ctx.resolver.resolveSymbol(methodPath, location);
      const { inherent, viaInterface } = ctx.resolver.findMethods(parseSymbolPath(methodPath, location), location);
      const methods = [...inherent, ...viaInterface];
      if (methods.length === 0) {
        throw new UnresolvedSymbolError(location, methodPath, 'no method declaration');
      }
      for (const { decl, method } of methods) {
        const receiver = firstParameter(method.text);
        if (!isSelfConsuming(receiver)) {
          throw new ConsistencyError(
            sourceLocation(decl.file, method.line),
            `'${methodPath}' is declared consumes_self but takes ${receiver ? `'${receiver}'` : 'no receiver'}`,
          );
        }
      }
      checked++;
    });
  });
  return checked;
}
