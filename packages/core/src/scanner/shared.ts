/**
 * Structural scanner types and pure text helpers.
 */

import type { VisibilityRung } from '../visibility.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SourceFile {
  /** Workspace-relative, `/`-separated. */
  path: string;
  text: string;
  /** Comment-stripped view, one entry per line of `text`. */
  lines: string[];
}

export type DeclarationKind = 'aggregate' | 'enumeration' | 'interface' | 'function' | 'implementation-block';

export type AggregateShape = 'named' | 'tuple' | 'unit';

export type ChildKind = 'field' | 'slot' | 'variant' | 'method';

export interface DeclarationChild {
  kind: ChildKind;
  /** Field/variant/method name; positional slots are named `0`, `1`, … */
  name: string;
  visibility: VisibilityRung;
  line: number;
  /** Field type, slot type, variant text, or method signature. */
  text: string;
}

interface DeclarationBase {
  file: string;
  name: string;
  visibility: VisibilityRung;
  /** 1-based line of the declaration keyword. */
  line: number;
  /** Header text up to (not including) the block opener or terminator. */
  header: string;
  /** Members at nesting depth 1 only. */
  children: DeclarationChild[];
}

export interface AggregateDeclaration extends DeclarationBase {
  kind: 'aggregate';
  shape: AggregateShape;
}

export interface EnumerationDeclaration extends DeclarationBase {
  kind: 'enumeration';
}

export interface InterfaceDeclaration extends DeclarationBase {
  kind: 'interface';
}

export interface FunctionDeclaration extends DeclarationBase {
  kind: 'function';
}

/** `name` is the implemented type; `traitName` is null for an inherent block. */
export interface ImplementationBlock extends DeclarationBase {
  kind: 'implementation-block';
  traitName: string | null;
}

export type Declaration =
  | AggregateDeclaration
  | EnumerationDeclaration
  | InterfaceDeclaration
  | FunctionDeclaration
  | ImplementationBlock;

// ---------------------------------------------------------------------------
// Regex patterns
// ---------------------------------------------------------------------------

export const IDENT = '(?:r#)?[A-Za-z_][A-Za-z0-9_]*';

/** `pub`, `pub(crate)`, `pub(super)`, `pub(self)`, `pub(in path)`. */
export const VISIBILITY = 'pub(?:\\s*\\(\\s*(?:crate|self|super|in\\s+[^)]*?)\\s*\\))?';

const QUALIFIERS = '(?:(?:const|async|unsafe|default|extern(?:\\s+"[^"]*")?)\\s+)*';

/** Leading `#[...]` / `#![...]` attributes. */
export const ATTRIBUTE_PREFIX_RE = /^(?:#!?\[[^\]]*\]\s*)+/;

export const DECLARATION_RE = new RegExp(
  `^(?:(${VISIBILITY})\\s+)?${QUALIFIERS}(struct|union|enum|trait|fn|impl|mod)\\b(.*)$`,
);

export const METHOD_RE = new RegExp(`^(?:(${VISIBILITY})\\s+)?${QUALIFIERS}fn\\s+(${IDENT})`);

export const FIELD_RE = new RegExp(`^(?:(${VISIBILITY})\\s+)?(${IDENT})\\s*:\\s*(.*)$`);

export const SLOT_RE = new RegExp(`^(?:(${VISIBILITY})(?=[\\s(])\\s*)?(.*)$`);

export const VARIANT_RE = new RegExp(`^(${IDENT})`);

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

export function stripAttributes(line: string): string {
  return line.trim().replace(ATTRIBUTE_PREFIX_RE, '').trim();
}

/** Drop a raw-identifier prefix: `r#type` → `type`. */
export function bareIdent(name: string): string {
  return name.startsWith('r#') ? name.slice(2) : name;
}

export function countBraces(line: string): number {
  let net = 0;
  for (const ch of line) {
    if (ch === '{') net++;
    else if (ch === '}') net--;
  }
  return net;
}

/**
 * Index of the first `{` or `;` outside parentheses and brackets, or -1.
 * `fn f(x: [u8; 4])` must not terminate at the array length separator.
 */
export function findTerminator(text: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[') depth++;
    else if (ch === ')' || ch === ']') depth = Math.max(0, depth - 1);
    else if (depth === 0 && (ch === '{' || ch === ';')) return i;
  }
  return -1;
}

/**
 * Split on commas that sit outside (), [], {} and <>.
 * The `>` of `->` and `=>` is not a closing angle bracket.
 */
export function splitTopLevel(text: string, separator = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[' || ch === '{' || ch === '<') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);
    else if (ch === '>' && text[i - 1] !== '-' && text[i - 1] !== '=') depth = Math.max(0, depth - 1);
    else if (ch === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts.map(p => p.trim()).filter(p => p.length > 0);
}

/** Index just past the group that opens at `open`, or -1 if it never closes. */
export function matchingClose(text: string, open: number): number {
  const opener = text[open];
  const closer = opener === '(' ? ')' : opener === '[' ? ']' : opener === '{' ? '}' : '>';
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === opener) depth++;
    else if (ch === closer && !(closer === '>' && (text[i - 1] === '-' || text[i - 1] === '='))) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/** Skip a leading `<...>` generic parameter list. */
export function skipGenerics(text: string): string {
  const trimmed = text.trimStart();
  if (!trimmed.startsWith('<')) return trimmed;
  const end = matchingClose(trimmed, 0);
  return end === -1 ? '' : trimmed.slice(end).trimStart();
}

/**
 * Base name of a type expression: `&mut crate::a::Widget<T>` → `Widget`.
 */
export function typeBaseName(typeText: string): string {
  let t = typeText.trim().replace(/^&\s*(?:'\w+\s+)?(?:mut\s+)?/, '').replace(/^(?:dyn|impl)\s+/, '');
  const angle = t.indexOf('<');
  if (angle !== -1) t = t.slice(0, angle);
  const segments = t.split('::');
  return bareIdent((segments[segments.length - 1] ?? '').trim());
}

/**
 * Start index of the parameter list in a `fn` signature, skipping the name
 * and any generic parameters (`fn map<F: Fn(u8)>(self, f: F)`).
 */
function parameterListStart(signature: string): number {
  const m = new RegExp(`\\bfn\\s+${IDENT}`).exec(signature);
  if (!m) return signature.indexOf('(');
  const afterName = m.index + m[0].length;
  const rest = signature.slice(afterName);
  const skipped = skipGenerics(rest);
  const offset = afterName + (rest.length - skipped.length);
  return skipped.startsWith('(') ? offset : -1;
}

/** Return type text after `->` at the top level of a signature, or null. */
export function returnType(signature: string): string | null {
  const open = parameterListStart(signature);
  if (open === -1) return null;
  const close = matchingClose(signature, open);
  if (close === -1) return null;
  const rest = signature.slice(close);
  const arrow = rest.indexOf('->');
  if (arrow === -1) return null;
  return rest.slice(arrow + 2).replace(/\bwhere\b[\s\S]*$/, '').trim();
}

/** First parameter of a signature, trimmed, or null when it takes none. */
export function firstParameter(signature: string): string | null {
  const open = parameterListStart(signature);
  if (open === -1) return null;
  const close = matchingClose(signature, open);
  if (close === -1) return null;
  const params = splitTopLevel(signature.slice(open + 1, close - 1));
  return params[0] ?? null;
}
