import * as path from 'node:path';
import { Command, Option } from 'commander';
import {
  SYMBOL_MATCH_MODES,
  SourceCache,
  SymbolResolver,
  loadWorkspace,
  type Evidence,
} from '@archgate/core';
import {
  loadGateConfigOrExit,
  loadTomlParserOrExit,
  runOrExit,
} from '../lib/command-runtime.js';
import { configOverridesFrom } from './check.js';

interface ResolveOptions {
  root: string;
  module?: boolean;
  rung?: boolean;
  symbolMatch?: string;
  json?: boolean;
}

function formatEvidence(evidence: Evidence): string {
  return evidence.line > 0 ? `${evidence.file}:${evidence.line}` : evidence.file;
}

export function registerResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve a module::…::symbol reference against the workspace')
    .argument('<symbolPath>', 'Reference to resolve, e.g. widgets::Widget::new')
    .option('--root <dir>', 'Workspace root', '.')
    .option('--module', 'Resolve as a module path rather than a symbol')
    .option('--rung', 'Also derive the constructor visibility rung')
    .addOption(
      new Option('--symbol-match <mode>', 'How Type::method and wildcard references resolve')
        .choices([...SYMBOL_MATCH_MODES]),
    )
    .option('--json', 'Output as JSON')
    .action(async (symbolPath: string, options: ResolveOptions) => {
      const root = path.resolve(options.root);
      const parseToml = await loadTomlParserOrExit({ json: options.json });
      const config = loadGateConfigOrExit(root, configOverridesFrom(options), { json: options.json });
      const workspace = runOrExit('workspace', () => loadWorkspace({ root, config, parseToml }), options);
      const resolver = new SymbolResolver({
        workspace,
        cache: new SourceCache(root),
        symbolMatch: config.symbolMatch,
        sourceExtensions: config.sourceExtensions,
      });

      const location = 'command line';
      const evidence = runOrExit('resolve', () => (options.module
        ? resolver.resolveModulePath(symbolPath, location)
        : resolver.resolveSymbol(symbolPath, location)), options);
      const ctor = options.rung && !options.module
        ? runOrExit('resolve', () => resolver.constructorVisibility(symbolPath, location), options)
        : null;

      if (options.json) {
        console.log(JSON.stringify({
          success: true,
          evidence,
          ...(ctor ? { rung: ctor.rung, via: ctor.via } : {}),
        }, null, 2));
        return;
      }
      console.log(`${formatEvidence(evidence)}\t${evidence.text}`);
      if (ctor) {
        console.log(`rung: ${ctor.rung} (${ctor.via}, ${formatEvidence(ctor.evidence)})`);
      }
    });
}
