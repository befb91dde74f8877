/**
 * Shared test fixtures: a two-crate workspace (`ledger` core, `engine`
 * boundary) with a passing policy set, copied into a temp dir per test.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse } from 'smol-toml';
import { DEFAULT_GATE_CONFIG, type GateConfig } from '../config.js';
import type { ParseToml } from '../policy/toml.js';

export const LEDGER_FIXTURE = fileURLToPath(new URL('./fixtures/ledger', import.meta.url));

export const parseToml: ParseToml = (text) => parse(text);

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Fresh copy of the ledger workspace. */
export function copyLedgerFixture(): string {
  const dir = makeTempDir('archgate-ledger-');
  fs.cpSync(LEDGER_FIXTURE, dir, { recursive: true });
  return dir;
}

export function writeFile(root: string, relPath: string, content: string): void {
  const full = path.join(root, relPath);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
}

export function readFile(root: string, relPath: string): string {
  return fs.readFileSync(path.join(root, relPath), 'utf-8');
}

/** Replace the first occurrence of `from` in a fixture file; fails loudly if absent. */
export function editFile(root: string, relPath: string, from: string, to: string): void {
  const text = readFile(root, relPath);
  if (!text.includes(from)) throw new Error(`${relPath} does not contain ${JSON.stringify(from)}`);
  writeFile(root, relPath, text.replace(from, to));
}

export function testConfig(overrides: Partial<GateConfig> = {}): GateConfig {
  return { ...DEFAULT_GATE_CONFIG, ...overrides };
}

/** The value `fn` throws; fails the test when it returns normally. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}
