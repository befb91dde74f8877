/**
 * Structural scanner: a line-oriented quasi-parser.
 *
 * Recovers aggregates, enumerations, interfaces, free functions and
 * implementation blocks from comment-stripped source lines, with visibility
 * and depth-1 children. Brace depth is tracked per line; a declaration's
 * children are only the lines that start exactly one level inside its body,
 * so a struct-like enum variant or a field whose type carries braces never
 * leaks its inner members into the parent.
 *
 * `mod name { … }` blocks are transparent; function bodies are opaque.
 */

import { stripComments } from './strip.js';
import {
  DECLARATION_RE,
  FIELD_RE,
  IDENT,
  METHOD_RE,
  SLOT_RE,
  VARIANT_RE,
  bareIdent,
  countBraces,
  findTerminator,
  matchingClose,
  skipGenerics,
  splitTopLevel,
  stripAttributes,
  typeBaseName,
  type AggregateShape,
  type Declaration,
  type DeclarationChild,
  type ImplementationBlock,
  type InterfaceDeclaration,
  type SourceFile,
} from './shared.js';
import { rungFromModifier, type VisibilityRung } from '../visibility.js';

export * from './shared.js';
export { stripComments } from './strip.js';

export function createSourceFile(path: string, text: string): SourceFile {
  return { path, text, lines: stripComments(text) };
}

type OpenBlock =
  | { role: 'module'; bodyDepth: number }
  | { role: 'opaque'; bodyDepth: number }
  | { role: 'container'; bodyDepth: number; decl: Declaration };

interface Header {
  /** Joined header text, cut at the terminator. */
  text: string;
  /** Text following the terminator on the last header line. */
  tail: string;
  terminator: '{' | ';' | null;
  /** Index of the last line consumed. */
  end: number;
}

/**
 * Accumulate lines from `start` until a block opener or statement terminator
 * appears at the top level of the joined text.
 */
function readHeader(lines: string[], start: number, firstLine: string): Header {
  let joined = firstLine;
  let end = start;
  for (;;) {
    const at = findTerminator(joined);
    if (at !== -1) {
      const ch = joined[at];
      return {
        text: joined.slice(0, at).trim(),
        tail: joined.slice(at + 1),
        terminator: ch === '{' ? '{' : ';',
        end,
      };
    }
    if (end + 1 >= lines.length) {
      return { text: joined.trim(), tail: '', terminator: null, end };
    }
    end++;
    joined += ' ' + lines[end].trim();
  }
}

const NAME_AFTER_KEYWORD_RE = new RegExp(`^\\s*(${IDENT})`);

function parseImplHeader(afterKeyword: string): { target: string; traitName: string | null } {
  let rest = skipGenerics(afterKeyword);
  const whereAt = rest.search(/\bwhere\b/);
  if (whereAt !== -1) rest = rest.slice(0, whereAt);

  let depth = 0;
  for (let i = 0; i < rest.length; i++) {
    const ch = rest[i];
    if (ch === '<' || ch === '(' || ch === '[') depth++;
    else if ((ch === '>' && rest[i - 1] !== '-') || ch === ')' || ch === ']') depth = Math.max(0, depth - 1);
    else if (depth === 0 && /^for\s/.test(rest.slice(i)) && /\s/.test(rest[i - 1] ?? '')) {
      const traitText = rest.slice(0, i).trim().replace(/^[!?]/, '');
      return { target: typeBaseName(rest.slice(i + 3)), traitName: typeBaseName(traitText) };
    }
  }
  return { target: typeBaseName(rest), traitName: null };
}

/** Parse `(pub u32, String)` into positional slot children. */
function parseSlots(inner: string, line: number): DeclarationChild[] {
  return splitTopLevel(inner).map((slot, index): DeclarationChild => {
    const m = SLOT_RE.exec(stripAttributes(slot));
    return {
      kind: 'slot',
      name: String(index),
      visibility: rungFromModifier(m?.[1]),
      line,
      text: (m?.[2] ?? slot).trim(),
    };
  });
}

function parseFieldPieces(text: string, line: number): DeclarationChild[] {
  const children: DeclarationChild[] = [];
  for (const piece of splitTopLevel(text)) {
    const m = FIELD_RE.exec(stripAttributes(piece));
    if (!m) continue;
    children.push({
      kind: 'field',
      name: bareIdent(m[2]),
      visibility: rungFromModifier(m[1]),
      line,
      text: m[3].trim(),
    });
  }
  return children;
}

function parseVariantPieces(text: string, line: number): DeclarationChild[] {
  const children: DeclarationChild[] = [];
  for (const piece of splitTopLevel(text)) {
    const clean = stripAttributes(piece);
    const m = VARIANT_RE.exec(clean);
    if (!m) continue;
    children.push({ kind: 'variant', name: bareIdent(m[1]), visibility: 'public', line, text: clean });
  }
  return children;
}

function methodVisibility(decl: ImplementationBlock | InterfaceDeclaration, modifier: string | undefined): VisibilityRung {
  return decl.kind === 'implementation-block' && decl.traitName === null ? rungFromModifier(modifier) : 'public';
}

/**
 * Methods in body text that shares a line with its block opener:
 * `impl Gauge { pub fn new() -> Self { Gauge } }`. Other items are skipped.
 */
function parseInlineMethods(decl: ImplementationBlock | InterfaceDeclaration, text: string, line: number): DeclarationChild[] {
  const children: DeclarationChild[] = [];
  let rest = stripAttributes(text);
  while (rest.length > 0) {
    const at = findTerminator(rest);
    const m = METHOD_RE.exec(rest);
    if (m) {
      children.push({
        kind: 'method',
        name: bareIdent(m[2]),
        visibility: methodVisibility(decl, m[1]),
        line,
        text: (at === -1 ? rest : rest.slice(0, at)).trim(),
      });
    }
    if (at === -1) break;
    const next = rest[at] === '{' ? matchingClose(rest, at) : at + 1;
    if (next === -1) break;
    rest = stripAttributes(rest.slice(next));
  }
  return children;
}

/** Children from a run of member text. */
function parseMemberText(decl: Declaration, text: string, line: number): DeclarationChild[] {
  switch (decl.kind) {
    case 'aggregate':
      return parseFieldPieces(text, line);
    case 'enumeration':
      return parseVariantPieces(text, line);
    case 'interface':
    case 'implementation-block':
      return parseInlineMethods(decl, text, line);
    case 'function':
      return [];
  }
}

/**
 * Net depth of `()`, `[]` and generic `<>` groups in `text`. A `<` counts
 * only right after a path or identifier, so `1 << 4` opens nothing.
 */
function openGroups(text: string): number {
  let parens = 0;
  let angles = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[') parens++;
    else if (ch === ')' || ch === ']') parens = Math.max(0, parens - 1);
    else if (ch === '<' && /(?:[A-Za-z_][A-Za-z0-9_]*|::)$/.test(text.slice(0, i))) angles++;
    else if (ch === '>' && text[i - 1] !== '-' && text[i - 1] !== '=' && angles > 0) angles--;
  }
  return parens + angles;
}

/** A member line plus the lines that continue a group it leaves open. */
function readMember(lines: string[], start: number, firstLine: string): { text: string; end: number } {
  let text = firstLine;
  let end = start;
  while (openGroups(text) > 0 && end + 1 < lines.length) {
    end++;
    text += ' ' + stripAttributes(lines[end]);
  }
  return { text, end };
}

function buildDeclaration(file: string, header: Header, line: number): Declaration | 'module' | null {
  const match = DECLARATION_RE.exec(header.text);
  if (!match) return null;
  const [, modifier, keyword, afterKeyword] = match;
  const children: DeclarationChild[] = [];
  const base = { file, visibility: rungFromModifier(modifier), line, header: header.text, children };

  if (keyword === 'impl') {
    const { target, traitName } = parseImplHeader(afterKeyword);
    return { ...base, kind: 'implementation-block', name: target, traitName };
  }

  const nameMatch = NAME_AFTER_KEYWORD_RE.exec(afterKeyword);
  if (!nameMatch) return null;
  const name = bareIdent(nameMatch[1]);

  switch (keyword) {
    case 'mod':
      return header.terminator === '{' ? 'module' : null;
    case 'fn':
      return { ...base, kind: 'function', name };
    case 'trait':
      return { ...base, kind: 'interface', name };
    case 'enum':
      return { ...base, kind: 'enumeration', name };
    default: {
      // struct / union
      const afterName = skipGenerics(afterKeyword.slice(nameMatch[0].length));
      let shape: AggregateShape = header.terminator === '{' ? 'named' : 'unit';
      if (afterName.startsWith('(')) {
        shape = 'tuple';
        const close = matchingClose(afterName, 0);
        const inner = afterName.slice(1, close === -1 ? afterName.length : close - 1);
        children.push(...parseSlots(inner, line));
      }
      return { ...base, kind: 'aggregate', name, shape };
    }
  }
}

/**
 * Scan one source file for declarations.
 */
export function scanDeclarations(file: SourceFile): Declaration[] {
  const { lines } = file;
  const declarations: Declaration[] = [];
  const open: OpenBlock[] = [];
  let depth = 0;

  const applyDepth = (from: number, to: number) => {
    for (let k = from; k <= to; k++) {
      depth = Math.max(0, depth + countBraces(lines[k]));
    }
    while (open.length > 0 && depth < open[open.length - 1].bodyDepth) {
      open.pop();
    }
  };

  for (let i = 0; i < lines.length; i++) {
    const text = stripAttributes(lines[i]);
    const top = open.length > 0 ? open[open.length - 1] : undefined;
    const levelDepth = top ? top.bodyDepth : 0;

    if (text.length === 0 || depth !== levelDepth) {
      applyDepth(i, i);
      continue;
    }

    // Declaration level: top of file or inside a transparent module block
    if (!top || top.role === 'module') {
      if (!DECLARATION_RE.test(text)) {
        applyDepth(i, i);
        continue;
      }
      const header = readHeader(lines, i, text);
      const decl = buildDeclaration(file.path, header, i + 1);
      const depthBefore = depth;
      applyDepth(i, header.end);

      if (decl === 'module') {
        if (depth > depthBefore) open.push({ role: 'module', bodyDepth: depthBefore + 1 });
      } else if (decl) {
        declarations.push(decl);
        if (header.terminator === '{') {
          const tailText = blockOpened(header.tail, depth > depthBefore);
          if (tailText) decl.children.push(...parseMemberText(decl, tailText, header.end + 1));
          if (depth > depthBefore) {
            const isContainer = decl.kind !== 'function';
            open.push(isContainer
              ? { role: 'container', bodyDepth: depthBefore + 1, decl }
              : { role: 'opaque', bodyDepth: depthBefore + 1 });
          }
        }
      } else if (depth > depthBefore) {
        open.push({ role: 'opaque', bodyDepth: depthBefore + 1 });
      }
      i = header.end;
      continue;
    }

    if (top.role === 'opaque') {
      applyDepth(i, i);
      continue;
    }

    // Depth-1 member of a container
    const decl = top.decl;
    if (decl.kind === 'interface' || decl.kind === 'implementation-block') {
      const m = METHOD_RE.exec(text);
      if (!m) {
        applyDepth(i, i);
        continue;
      }
      const header = readHeader(lines, i, text);
      decl.children.push({
        kind: 'method',
        name: bareIdent(m[2]),
        visibility: methodVisibility(decl, m[1]),
        line: i + 1,
        text: header.text,
      });
      applyDepth(i, header.end);
      i = header.end;
      continue;
    }

    const member = readMember(lines, i, text);
    decl.children.push(...parseMemberText(decl, member.text, i + 1));
    applyDepth(i, member.end);
    i = member.end;
  }

  return declarations;
}

/**
 * Member text that follows a block opener on the header's last line.
 * When the block closes on that same line, only the text inside it counts.
 */
function blockOpened(tail: string, stillOpen: boolean): string {
  if (stillOpen) return tail.trim();
  const inner = matchingClose('{' + tail, 0);
  return (inner === -1 ? tail : tail.slice(0, inner - 2)).trim();
}
