/**
 * Comment stripping for the structural scanner.
 *
 * Produces one output line per input line: comments are removed (block
 * comments nest and keep their newlines), and string / char literal contents
 * are blanked so braces inside them never move the depth count. The quotes
 * themselves stay, so `"{"` becomes `""`.
 */

function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

/** Index just past a raw string opener (`r"`, `r#"`, `br##"`), or -1. */
function rawStringOpener(text: string, i: number): { end: number; hashes: number } {
  if (text[i] !== 'r') return { end: -1, hashes: 0 };
  const prev = text[i - 1];
  const prefixOk = !isIdentChar(prev) || (prev === 'b' && !isIdentChar(text[i - 2]));
  if (!prefixOk) return { end: -1, hashes: 0 };
  let j = i + 1;
  while (text[j] === '#') j++;
  if (text[j] !== '"') return { end: -1, hashes: 0 };
  return { end: j + 1, hashes: j - i - 1 };
}

/** Length of a char literal starting at `i` (which holds `'`), or 0 for a lifetime. */
function charLiteralLength(text: string, i: number): number {
  const next = text[i + 1];
  if (next === '\\') {
    const close = text.indexOf("'", i + 3);
    return close === -1 ? 0 : close - i + 1;
  }
  if (next === undefined || next === '\n') return 0;
  if (text[i + 2] === "'") return 3;
  // Astral-plane character: two UTF-16 units
  const code = next.charCodeAt(0);
  if (code >= 0xd800 && code <= 0xdbff && text[i + 3] === "'") return 4;
  return 0;
}

export function stripComments(text: string): string[] {
  let out = '';
  let i = 0;
  const n = text.length;

  while (i < n) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === '/' && next === '/') {
      while (i < n && text[i] !== '\n') i++;
      continue;
    }

    if (ch === '/' && next === '*') {
      let depth = 1;
      i += 2;
      out += ' ';
      while (i < n && depth > 0) {
        if (text[i] === '/' && text[i + 1] === '*') {
          depth++;
          i += 2;
        } else if (text[i] === '*' && text[i + 1] === '/') {
          depth--;
          i += 2;
        } else {
          if (text[i] === '\n') out += '\n';
          i++;
        }
      }
      continue;
    }

    const raw = rawStringOpener(text, i);
    if (raw.end !== -1) {
      const terminator = '"' + '#'.repeat(raw.hashes);
      out += '""';
      i = raw.end;
      while (i < n && !text.startsWith(terminator, i)) {
        if (text[i] === '\n') out += '\n';
        i++;
      }
      i += terminator.length;
      continue;
    }

    if (ch === '"') {
      out += '""';
      i++;
      while (i < n && text[i] !== '"') {
        if (text[i] === '\\') {
          if (text[i + 1] === '\n') out += '\n';
          i += 2;
          continue;
        }
        if (text[i] === '\n') out += '\n';
        i++;
      }
      i++;
      continue;
    }

    if (ch === "'") {
      const len = charLiteralLength(text, i);
      if (len > 0) {
        out += "''";
        i += len;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out.split(/\r?\n/);
}
