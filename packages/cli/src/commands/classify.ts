import * as path from 'node:path';
import { Command } from 'commander';
import {
  ClassificationMapSchema,
  classifyFile,
  loadWorkspace,
  readPolicyTable,
  validateDocument,
  type ClassificationMap,
} from '@archgate/core';
import {
  loadGateConfigOrExit,
  loadTomlParserOrExit,
  runOrExit,
} from '../lib/command-runtime.js';

/**
 * Print the classification of every workspace file. Read-only: no gate
 * verdict, and dead rules are not reported.
 */
export function registerClassifyCommand(program: Command): void {
  program
    .command('classify')
    .description('Show the core/boundary classification of each source file')
    .argument('[root]', 'Workspace root', '.')
    .option('--policy-dir <dir>', 'Policy document directory, relative to the root')
    .option('--json', 'Output as JSON')
    .action(async (rootArg: string, options: { policyDir?: string; json?: boolean }) => {
      const root = path.resolve(rootArg);
      const parseToml = await loadTomlParserOrExit({ json: options.json });
      const config = loadGateConfigOrExit(
        root,
        options.policyDir !== undefined ? { policyDir: options.policyDir } : {},
        { json: options.json },
      );

      const workspace = runOrExit('workspace', () => loadWorkspace({ root, config, parseToml }), options);
      const map = runOrExit('policies', (): ClassificationMap => {
        const { docPath, data } = readPolicyTable(root, config.policyDir, 'classification-map', parseToml);
        return { kind: 'classification-map', path: docPath, ...validateDocument(ClassificationMapSchema, docPath, data) };
      }, options);

      const rows = runOrExit('classification', () => workspace.files.map(file => {
        const { rule, index } = classifyFile(map, file);
        return { file, classification: rule.classification, rule: index };
      }), options);

      if (options.json) {
        console.log(JSON.stringify({ success: true, files: rows }, null, 2));
        return;
      }
      for (const row of rows) {
        console.log(`${row.classification}\t${row.file}`);
      }
    });
}
