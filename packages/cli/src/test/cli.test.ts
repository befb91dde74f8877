import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import chalk from 'chalk';
import { runCli } from '../index.js';
import { copyLedgerFixture, editFile, writeFile } from '../../../core/src/test/helpers.js';

describe('archgate CLI', () => {
  let root: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  const logged = () => logSpy.mock.calls.map(c => String(c[0]));
  const errored = () => errorSpy.mock.calls.map(c => String(c[0]));
  const cli = (...args: string[]) => runCli(['node', 'archgate', ...args]);

  beforeEach(() => {
    chalk.level = 0;
    root = copyLedgerFixture();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('check', () => {
    it('prints the success line and exits 0', async () => {
      expect(await cli('check', root)).toBe(0);
      expect(logged()).toEqual(['architecture conformance check passed.']);
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('prints one diagnostic and exits 1 on a violation', async () => {
      editFile(root, 'crates/ledger/src/lib.rs', 'pub fn seal(self)', 'pub fn seal(&self)');

      expect(await cli('check', root)).toBe(1);
      expect(errored()).toEqual([
        "error: crates/ledger/src/lib.rs:19: 'ledger::Entry::seal' is declared consumes_self but takes '&self'",
      ]);
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('reports the failing stage under --json', async () => {
      editFile(root, 'crates/ledger/src/lib.rs', 'pub fn seal(self)', 'pub fn seal(&self)');

      expect(await cli('check', root, '--json')).toBe(1);
      expect(logged()).toHaveLength(1);
      expect(JSON.parse(logged()[0])).toEqual({
        success: false,
        stage: 'move-semantics',
        kind: 'consistency',
        error: "crates/ledger/src/lib.rs:19: 'ledger::Entry::seal' is declared consumes_self but takes '&self'",
      });
    });

    it('prints a JSON success object', async () => {
      expect(await cli('check', root, '--json')).toBe(0);
      expect(logged()).toEqual(['{"success":true}']);
    });

    it('logs every stage with --verbose', async () => {
      expect(await cli('check', root, '--verbose')).toBe(0);
      const lines = logged();
      expect(lines).toHaveLength(14);
      expect(lines[0]).toBe('[debug] workspace: 2 modules, 3 source files');
      expect(lines[12]).toBe('[debug] source cache {"reads":3,"scans":3}');
      expect(lines[13]).toBe('architecture conformance check passed.');
    });

    it('reads policies from --policy-dir', async () => {
      fs.renameSync(`${root}/ifa`, `${root}/policies`);

      expect(await cli('check', root)).toBe(1);
      expect(await cli('check', root, '--policy-dir', 'policies')).toBe(0);
    });

    it('rejects a malformed configuration file', async () => {
      writeFile(root, '.archgate/config.json', '{"bogus": true}');

      expect(await cli('check', root, '--json')).toBe(1);
      expect(JSON.parse(logged()[0])).toEqual({
        success: false,
        stage: 'config',
        kind: 'config',
        error: ".archgate/config.json: Unrecognized key(s) in object: 'bogus'",
      });
    });

    it('rejects an unknown --symbol-match mode', async () => {
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      try {
        expect(await cli('check', root, '--symbol-match', 'fuzzy')).toBe(1);
        expect(stderr).toHaveBeenCalled();
      } finally {
        stderr.mockRestore();
      }
    });
  });

  describe('classify', () => {
    it('lists each file with its classification', async () => {
      expect(await cli('classify', root)).toBe(0);
      expect(logged()).toEqual([
        'boundary\tcrates/engine/src/lib.rs',
        'core\tcrates/ledger/src/lib.rs',
        'core\tcrates/ledger/src/proofs.rs',
      ]);
    });

    it('names the winning rule under --json', async () => {
      expect(await cli('classify', root, '--json')).toBe(0);
      expect(JSON.parse(logged()[0])).toEqual({
        success: true,
        files: [
          { file: 'crates/engine/src/lib.rs', classification: 'boundary', rule: 1 },
          { file: 'crates/ledger/src/lib.rs', classification: 'core', rule: 0 },
          { file: 'crates/ledger/src/proofs.rs', classification: 'core', rule: 0 },
        ],
      });
    });
  });

  describe('resolve', () => {
    it('prints the evidence and the derived rung', async () => {
      expect(await cli('resolve', 'ledger::proofs::BalancedProof::attest', '--root', root, '--rung')).toBe(0);
      expect(logged()).toEqual([
        'crates/ledger/src/proofs.rs:6\tpub(crate) fn attest(total: u64) -> Self',
        'rung: unit-scoped (inherent, crates/ledger/src/proofs.rs:6)',
      ]);
    });

    it('resolves module paths with --module', async () => {
      expect(await cli('resolve', 'ledger::proofs', '--root', root, '--module')).toBe(0);
      expect(logged()).toEqual(['crates/ledger/src/proofs.rs:1\tpub struct BalancedProof {']);
    });

    it('fails on an unresolved symbol', async () => {
      expect(await cli('resolve', 'ledger::Missing', '--root', root)).toBe(1);
      expect(errored()).toEqual([
        "error: command line: 'ledger::Missing' does not resolve (no match in 2 files)",
      ]);
    });
  });
});
