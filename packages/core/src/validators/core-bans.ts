/**
 * Structural bans on core-classified files.
 *
 * - optional-wrapper: `Option<…>` in a field, slot, variant payload, free
 *   function signature or inherent method signature
 * - parallel-boolean: an aggregate holding both a `bool` field and a field
 *   typed by an enumeration declared in the same module
 * - optional-duration-return: an interface method returning `Option<Duration>`
 * - placeholder-variant: an enumeration variant with a banned name
 *
 * Boundary files are never checked. The first violation stops the check.
 */

import { filesClassifiedAs } from '../classification.js';
import { BanViolationError } from '../errors.js';
import {
  returnType,
  typeBaseName,
  type AggregateDeclaration,
  type Declaration,
} from '../scanner/index.js';
import { moduleOfFile } from '../workspace.js';
import { compactType, sourceLocation, type CoreBanContext, type ScanContext } from './shared.js';

export type CoreBanRule =
  | 'optional-wrapper'
  | 'parallel-boolean'
  | 'optional-duration-return'
  | 'placeholder-variant';

export const CORE_BAN_RULES: readonly CoreBanRule[] = [
  'optional-wrapper',
  'parallel-boolean',
  'optional-duration-return',
  'placeholder-variant',
];

const OPTION_RE = /\bOption\s*</;
const OPTIONAL_DURATION_RE = /^Option<(?:(?:std|core)::time::)?Duration>$/;

function violation(rule: CoreBanRule, file: string, line: number, message: string): BanViolationError {
  return new BanViolationError(rule, sourceLocation(file, line), message);
}

/** Enumeration names declared anywhere in each module, keyed by module name. */
function enumerationsByModule(ctx: ScanContext): Map<string, Set<string>> {
  const byModule = new Map<string, Set<string>>();
  for (const module of ctx.workspace.modules) {
    const names = new Set<string>();
    for (const file of module.files) {
      for (const decl of ctx.cache.declarations(file)) {
        if (decl.kind === 'enumeration') names.add(decl.name);
      }
    }
    byModule.set(module.name, names);
  }
  return byModule;
}

function checkOptionalWrapper(decl: Declaration): void {
  switch (decl.kind) {
    case 'aggregate':
    case 'enumeration':
      for (const child of decl.children) {
        if (OPTION_RE.test(child.text)) {
          throw violation('optional-wrapper', decl.file, child.line,
            `${decl.kind} '${decl.name}' ${child.kind} '${child.name}' wraps a value in Option`);
        }
      }
      return;
    case 'function':
      if (OPTION_RE.test(decl.header)) {
        throw violation('optional-wrapper', decl.file, decl.line,
          `function '${decl.name}' has Option in its signature`);
      }
      return;
    case 'implementation-block':
      if (decl.traitName !== null) return;
      for (const method of decl.children) {
        if (OPTION_RE.test(method.text)) {
          throw violation('optional-wrapper', decl.file, method.line,
            `method '${decl.name}::${method.name}' has Option in its signature`);
        }
      }
      return;
    case 'interface':
      return;
  }
}

function checkParallelBoolean(decl: AggregateDeclaration, enumerations: Set<string>): void {
  const fields = decl.children.filter(c => c.kind === 'field' || c.kind === 'slot');
  const flag = fields.find(c => compactType(c.text) === 'bool');
  if (!flag) return;
  const tagged = fields.find(c => enumerations.has(typeBaseName(c.text)));
  if (!tagged) return;
  throw violation('parallel-boolean', decl.file, decl.line,
    `aggregate '${decl.name}' pairs bool '${flag.name}' with enumeration-typed '${tagged.name}' (${typeBaseName(tagged.text)})`);
}

function checkOptionalDurationReturn(decl: Declaration): void {
  if (decl.kind !== 'interface') return;
  for (const method of decl.children) {
    const ret = returnType(method.text);
    if (ret !== null && OPTIONAL_DURATION_RE.test(compactType(ret))) {
      throw violation('optional-duration-return', decl.file, method.line,
        `interface method '${decl.name}::${method.name}' returns ${ret}`);
    }
  }
}

function checkPlaceholderVariant(decl: Declaration, banned: Set<string>): void {
  if (decl.kind !== 'enumeration') return;
  for (const variant of decl.children) {
    if (banned.has(variant.name)) {
      throw violation('placeholder-variant', decl.file, variant.line,
        `enumeration '${decl.name}' declares placeholder variant '${variant.name}'`);
    }
  }
}

/**
 * Run every core ban over the core-classified files. Returns how many files
 * were checked.
 */
export function checkCoreBans(ctx: CoreBanContext): number {
  const coreFiles = filesClassifiedAs(ctx.classification, 'core');
  const enumerations = enumerationsByModule(ctx);
  const banned = new Set(ctx.config.bannedVariantNames);

  for (const file of coreFiles) {
    const moduleName = moduleOfFile(ctx.workspace, file)?.name;
    const moduleEnums = (moduleName !== undefined ? enumerations.get(moduleName) : undefined) ?? new Set<string>();
    for (const decl of ctx.cache.declarations(file)) {
      checkOptionalWrapper(decl);
      if (decl.kind === 'aggregate') checkParallelBoolean(decl, moduleEnums);
      checkOptionalDurationReturn(decl);
      checkPlaceholderVariant(decl, banned);
    }
  }
  return coreFiles.length;
}
