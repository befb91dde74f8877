import * as path from 'node:path';
import { Command, Option } from 'commander';
import {
  SUCCESS_MESSAGE,
  SYMBOL_MATCH_MODES,
  isSymbolMatchMode,
  runGate,
  type GateConfigOverrides,
} from '@archgate/core';
import {
  exitGateError,
  loadGateConfigOrExit,
  loadTomlParserOrExit,
} from '../lib/command-runtime.js';
import { createLogger } from '../lib/logger.js';

export interface CheckOptions {
  policyDir?: string;
  symbolMatch?: string;
  verbose?: boolean;
  json?: boolean;
}

export function configOverridesFrom(options: Pick<CheckOptions, 'policyDir' | 'symbolMatch'>): GateConfigOverrides {
  const overrides: GateConfigOverrides = {};
  if (options.policyDir !== undefined) overrides.policyDir = options.policyDir;
  if (options.symbolMatch !== undefined && isSymbolMatchMode(options.symbolMatch)) {
    overrides.symbolMatch = options.symbolMatch;
  }
  return overrides;
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Run the architecture conformance gate')
    .argument('[root]', 'Workspace root', '.')
    .option('--policy-dir <dir>', 'Policy document directory, relative to the root')
    .addOption(
      new Option('--symbol-match <mode>', 'How Type::method and wildcard references resolve')
        .choices([...SYMBOL_MATCH_MODES]),
    )
    .option('-v, --verbose', 'Log each stage as it passes')
    .option('--json', 'Output as JSON')
    .action(async (rootArg: string, options: CheckOptions) => {
      const root = path.resolve(rootArg);
      const parseToml = await loadTomlParserOrExit({ json: options.json });
      const config = loadGateConfigOrExit(root, configOverridesFrom(options), { json: options.json });
      const logger = createLogger(options.verbose === true && options.json !== true);

      const result = runGate({ root, config, parseToml, logger });
      if (!result.ok) {
        exitGateError(result.error, { json: options.json, stage: result.stage });
      }

      if (options.json) {
        console.log(JSON.stringify({ success: true }));
        return;
      }
      console.log(SUCCESS_MESSAGE);
    });
}
