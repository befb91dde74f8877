/**
 * Engine-scoped ban: no `bool` field dedicated to "already warned" tracking.
 * Applies to every file of an engine-scoped module, whatever its classification.
 */

import { BanViolationError } from '../errors.js';
import { isEngineModule } from '../workspace.js';
import { compactType, sourceLocation, type ScanContext } from './shared.js';

export const ENGINE_BAN_RULE = 'warned-flag';

/** Returns how many engine-scoped files were checked. */
export function checkEngineBans(ctx: ScanContext): number {
  const pattern = new RegExp(ctx.config.warnedFieldPattern);
  let checked = 0;

  for (const module of ctx.workspace.modules) {
    if (!isEngineModule(module, ctx.config)) continue;
    for (const file of module.files) {
      checked++;
      for (const decl of ctx.cache.declarations(file)) {
        if (decl.kind !== 'aggregate') continue;
        const field = decl.children.find(c =>
          c.kind === 'field' && compactType(c.text) === 'bool' && pattern.test(c.name));
        if (field) {
          throw new BanViolationError(ENGINE_BAN_RULE, sourceLocation(file, field.line),
            `aggregate '${decl.name}' tracks warnings in bool field '${field.name}'`);
        }
      }
    }
  }
  return checked;
}
