/**
 * Structured-document parser.
 *
 * The TOML parser is the gate's one runtime prerequisite. It is imported
 * once, before the (synchronous) run, and handed to everything that reads
 * a manifest or policy document.
 */

import { PrerequisiteError } from '../errors.js';

export type ParseToml = (text: string) => unknown;

export async function loadTomlParser(): Promise<ParseToml> {
  try {
    const { parse } = await import('smol-toml');
    return (text: string) => parse(text);
  } catch (err) {
    throw new PrerequisiteError(
      `TOML parser 'smol-toml' is unavailable (${err instanceof Error ? err.message : String(err)})`,
    );
  }
}

export function describeParseError(err: unknown): string {
  if (err instanceof Error) {
    // smol-toml puts a code frame after the first line
    return err.message.split('\n')[0].trim();
  }
  return String(err);
}
