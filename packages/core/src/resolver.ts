/**
 * Symbol resolver: maps `module::…::symbol[::*]` references to source evidence.
 *
 * The first segment names a workspace module. Leading lowercase segments
 * narrow the search to one file when such a file exists; otherwise the whole
 * module is searched. What remains is a bare symbol or a `Type::member` pair,
 * where the member may end in `*` to match any identifier with that prefix
 * (`Type::*` matches every member of `Type`).
 */

import * as path from 'node:path';
import type { SymbolMatchMode } from './config.js';
import { UnknownModuleError, UnresolvedSymbolError } from './errors.js';
import type { SourceCache } from './source-cache.js';
import type {
  AggregateDeclaration,
  Declaration,
  DeclarationChild,
  EnumerationDeclaration,
  ImplementationBlock,
  InterfaceDeclaration,
} from './scanner/index.js';
import { maxRung, type VisibilityRung } from './visibility.js';
import { findModule, type Workspace, type WorkspaceModule } from './workspace.js';

export interface Evidence {
  file: string;
  /** 1-based; 0 when the evidence is a directory. */
  line: number;
  text: string;
}

export interface SymbolPath {
  raw: string;
  module: string;
  /** Leading lowercase segments naming a file under the source root. */
  fileSegments: string[];
  /** Set for `Type::member` references. */
  typeName: string | null;
  /** Symbol or member name; for wildcards, the prefix without `*`. */
  member: string;
  wildcard: boolean;
}

export interface MethodMatch {
  decl: ImplementationBlock | InterfaceDeclaration;
  method: DeclarationChild;
}

export interface ConstructorVisibility {
  rung: VisibilityRung;
  evidence: Evidence;
  /** How the rung was derived. */
  via: 'type' | 'function' | 'inherent' | 'interface';
}

export type TypeDeclaration = AggregateDeclaration | EnumerationDeclaration;

const SEGMENT_RE = /^(?:(?:r#)?[A-Za-z_][A-Za-z0-9_]*\*?|\*)$/;
const LOWER_SEGMENT_RE = /^[a-z_][a-z0-9_]*$/;

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function wordPattern(name: string, wildcard: boolean): RegExp {
  return wildcard
    ? new RegExp(`\\b${escapeRegex(name)}[A-Za-z0-9_]*`)
    : new RegExp(`\\b${escapeRegex(name)}\\b`);
}

function nameMatches(candidate: string, member: string, wildcard: boolean): boolean {
  return wildcard ? candidate.startsWith(member) : candidate === member;
}

/**
 * Split a reference into its parts. Malformed references are reported as
 * unresolved at `location`.
 */
export function parseSymbolPath(raw: string, location: string): SymbolPath {
  const segments = raw.split('::').map(s => s.trim());
  if (segments.length < 2 || segments.some(s => !SEGMENT_RE.test(s)) || segments.slice(0, -1).some(s => s.endsWith('*'))) {
    throw new UnresolvedSymbolError(location, raw, 'expected module::…::symbol');
  }

  const [module, ...rest] = segments;
  let i = 0;
  while (i < rest.length - 1 && LOWER_SEGMENT_RE.test(rest[i])) i++;
  const fileSegments = rest.slice(0, i);
  const remaining = rest.slice(i);
  if (remaining.length > 2) {
    throw new UnresolvedSymbolError(location, raw, 'expected a symbol or Type::member after the file path');
  }

  const last = remaining[remaining.length - 1];
  if (last === '*' && remaining.length !== 2) {
    throw new UnresolvedSymbolError(location, raw, "a bare '*' must follow a type name");
  }
  const wildcard = last.endsWith('*');
  return {
    raw,
    module,
    fileSegments,
    typeName: remaining.length === 2 ? remaining[0] : null,
    member: wildcard ? last.slice(0, -1) : last,
    wildcard,
  };
}

export interface SymbolResolverOptions {
  workspace: Workspace;
  cache: SourceCache;
  symbolMatch: SymbolMatchMode;
  sourceExtensions: string[];
}

export class SymbolResolver {
  constructor(private readonly opts: SymbolResolverOptions) {}

  private moduleFor(parsed: Pick<SymbolPath, 'raw' | 'module'>, location: string): WorkspaceModule {
    const module = findModule(this.opts.workspace, parsed.module);
    if (!module) throw new UnknownModuleError(location, parsed.raw, parsed.module);
    return module;
  }

  /** Candidate file paths for a run of lowercase segments. */
  private filesFor(module: WorkspaceModule, segments: string[]): string[] {
    const base = path.posix.join(module.sourceRoot, ...segments);
    return this.opts.sourceExtensions.flatMap(ext => [`${base}${ext}`, `${base}/mod${ext}`]);
  }

  /**
   * Files to search: the most specific existing file named by the leading
   * lowercase segments, else the whole module.
   */
  searchScope(parsed: SymbolPath, location: string): string[] {
    const module = this.moduleFor(parsed, location);
    for (let k = parsed.fileSegments.length; k > 0; k--) {
      const hit = this.filesFor(module, parsed.fileSegments.slice(0, k)).find(f => module.files.includes(f));
      if (hit) return [hit];
    }
    return module.files;
  }

  private declarationsIn(scope: string[]): Declaration[] {
    return scope.flatMap(file => this.opts.cache.declarations(file));
  }

  private textMatch(scope: string[], pattern: RegExp): Evidence | null {
    for (const file of scope) {
      const { lines } = this.opts.cache.get(file);
      const idx = lines.findIndex(l => pattern.test(l));
      if (idx !== -1) return { file, line: idx + 1, text: lines[idx].trim() };
    }
    return null;
  }

  /**
   * Methods named by a `Type::member` reference: inherent blocks, then
   * interface-implementation blocks, then the interface itself when `Type`
   * is an interface.
   */
  findMethods(parsed: SymbolPath, location: string): { inherent: MethodMatch[]; viaInterface: MethodMatch[] } {
    const scope = this.searchScope(parsed, location);
    const inherent: MethodMatch[] = [];
    const viaInterface: MethodMatch[] = [];
    if (parsed.typeName === null) return { inherent, viaInterface };

    for (const decl of this.declarationsIn(scope)) {
      const ownsMember = (decl.kind === 'implementation-block' && decl.name === parsed.typeName)
        || (decl.kind === 'interface' && decl.name === parsed.typeName);
      if (!ownsMember) continue;
      if (decl.kind !== 'implementation-block' && decl.kind !== 'interface') continue;
      for (const method of decl.children) {
        if (method.kind !== 'method' || !nameMatches(method.name, parsed.member, parsed.wildcard)) continue;
        if (decl.kind === 'implementation-block' && decl.traitName === null) inherent.push({ decl, method });
        else viaInterface.push({ decl, method });
      }
    }
    return { inherent, viaInterface };
  }

  /** Aggregate/enumeration declarations named by a bare capitalized reference. */
  findTypeDeclarations(raw: string, location: string): TypeDeclaration[] {
    const parsed = parseSymbolPath(raw, location);
    if (parsed.typeName !== null) return [];
    const scope = this.searchScope(parsed, location);
    return this.declarationsIn(scope).filter((d): d is TypeDeclaration =>
      (d.kind === 'aggregate' || d.kind === 'enumeration') && nameMatches(d.name, parsed.member, parsed.wildcard));
  }

  /**
   * Resolve a symbol reference to its first piece of evidence, or throw
   * UnknownModuleError / UnresolvedSymbolError.
   */
  resolveSymbol(raw: string, location: string): Evidence {
    const parsed = parseSymbolPath(raw, location);
    const scope = this.searchScope(parsed, location);
    const evidence = this.opts.symbolMatch === 'legacy'
      ? this.resolveLegacy(parsed, scope)
      : this.resolveScoped(parsed, scope, location);
    if (!evidence) {
      throw new UnresolvedSymbolError(location, raw, `no match in ${describeScope(scope)}`);
    }
    return evidence;
  }

  private resolveLegacy(parsed: SymbolPath, scope: string[]): Evidence | null {
    if (parsed.typeName !== null) {
      const typeHit = this.textMatch(scope, wordPattern(parsed.typeName, false));
      if (!typeHit || parsed.member === '') return typeHit;
    }
    return this.textMatch(scope, wordPattern(parsed.member, parsed.wildcard));
  }

  private resolveScoped(parsed: SymbolPath, scope: string[], location: string): Evidence | null {
    if (parsed.typeName !== null) {
      const { inherent, viaInterface } = this.findMethods(parsed, location);
      const hit = inherent[0] ?? viaInterface[0];
      if (hit) return { file: hit.decl.file, line: hit.method.line, text: hit.method.text };
      // Enumeration variants: `Kind::Variant`
      for (const decl of this.declarationsIn(scope)) {
        if (decl.kind !== 'enumeration' || decl.name !== parsed.typeName) continue;
        const variant = decl.children.find(c => nameMatches(c.name, parsed.member, parsed.wildcard));
        if (variant) return { file: decl.file, line: variant.line, text: variant.text };
      }
      return null;
    }

    const decl = this.declarationsIn(scope).find(d =>
      d.kind !== 'implementation-block' && nameMatches(d.name, parsed.member, parsed.wildcard));
    if (decl) return { file: decl.file, line: decl.line, text: decl.header };
    // Consts, statics and type aliases are not scanned as declarations
    return parsed.wildcard ? null : this.textMatch(scope, wordPattern(parsed.member, false));
  }

  /**
   * Resolve a module path (`module::a::b`) to the file or directory it names.
   */
  resolveModulePath(raw: string, location: string): Evidence {
    const segments = raw.split('::').map(s => s.trim());
    if (segments.some(s => !LOWER_SEGMENT_RE.test(s) && !/^(?:r#)?[A-Za-z_][A-Za-z0-9_]*$/.test(s))) {
      throw new UnresolvedSymbolError(location, raw, 'expected module::path');
    }
    const [moduleName, ...rest] = segments;
    const module = this.moduleFor({ raw, module: moduleName }, location);
    if (rest.length === 0) {
      return { file: module.sourceRoot, line: 0, text: module.name };
    }
    const file = this.filesFor(module, rest).find(f => module.files.includes(f));
    if (file) return { file, line: 1, text: this.opts.cache.get(file).lines[0]?.trim() ?? '' };
    const dir = path.posix.join(module.sourceRoot, ...rest);
    if (module.files.some(f => f.startsWith(`${dir}/`))) {
      return { file: dir, line: 0, text: rest.join('::') };
    }
    throw new UnresolvedSymbolError(location, raw, `no file or directory '${dir}'`);
  }

  /**
   * The authoritative visibility rung of a constructor reference.
   *
   * - `Type`: the type declaration's own visibility
   * - `function`: the free function's visibility
   * - `Type::method`: inherent blocks first; failing that, an interface
   *   implementation, which is always public
   *
   * Wildcards take the widest rung among their matches.
   */
  constructorVisibility(raw: string, location: string): ConstructorVisibility {
    const parsed = parseSymbolPath(raw, location);
    const scope = this.searchScope(parsed, location);

    if (parsed.typeName === null) {
      const isType = /^[A-Z]/.test(parsed.member);
      const matches = this.declarationsIn(scope).filter(d =>
        (isType
          ? d.kind === 'aggregate' || d.kind === 'enumeration' || d.kind === 'interface'
          : d.kind === 'function')
        && nameMatches(d.name, parsed.member, parsed.wildcard));
      if (matches.length === 0) {
        throw new UnresolvedSymbolError(location, raw, `no ${isType ? 'type' : 'function'} declaration in ${describeScope(scope)}`);
      }
      return {
        rung: maxRung(matches.map(d => d.visibility)),
        evidence: { file: matches[0].file, line: matches[0].line, text: matches[0].header },
        via: isType ? 'type' : 'function',
      };
    }

    const { inherent, viaInterface } = this.findMethods(parsed, location);
    if (inherent.length > 0) {
      const first = inherent[0];
      return {
        rung: maxRung(inherent.map(m => m.method.visibility)),
        evidence: { file: first.decl.file, line: first.method.line, text: first.method.text },
        via: 'inherent',
      };
    }
    const viaImpl = viaInterface.find(m => m.decl.kind === 'implementation-block');
    if (viaImpl) {
      return {
        rung: 'public',
        evidence: { file: viaImpl.decl.file, line: viaImpl.method.line, text: viaImpl.method.text },
        via: 'interface',
      };
    }
    throw new UnresolvedSymbolError(location, raw, `no method of '${parsed.typeName}' in ${describeScope(scope)}`);
  }
}

function describeScope(scope: string[]): string {
  if (scope.length === 1) return scope[0];
  return `${scope.length} files`;
}
