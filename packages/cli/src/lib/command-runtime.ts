import chalk from 'chalk';
import {
  loadGateConfig,
  loadTomlParser,
  isGateError,
  type GateConfig,
  type GateConfigOverrides,
  type GateError,
  type ParseToml,
} from '@archgate/core';

interface ExitCommandErrorOptions {
  json?: boolean;
  message: string;
  exitCode?: number;
  jsonExtra?: Record<string, unknown>;
}

export class CommandRuntimeError extends Error {
  readonly json: boolean;
  readonly exitCode: number;
  readonly jsonExtra?: Record<string, unknown>;

  constructor(options: ExitCommandErrorOptions) {
    super(options.message);
    this.name = 'CommandRuntimeError';
    this.json = options.json ?? false;
    this.exitCode = options.exitCode ?? 1;
    this.jsonExtra = options.jsonExtra;
  }
}

export function isCommandRuntimeError(error: unknown): error is CommandRuntimeError {
  return error instanceof CommandRuntimeError;
}

export function renderCommandRuntimeError(error: CommandRuntimeError): void {
  if (error.json) {
    console.log(JSON.stringify({ success: false, ...(error.jsonExtra ?? {}), error: error.message }));
    return;
  }

  console.error(chalk.red(`error: ${error.message}`));
}

export function exitCommandError(options: ExitCommandErrorOptions): never {
  throw new CommandRuntimeError(options);
}

/** Exit code for a gate failure: 2 when a runtime prerequisite is missing, else 1. */
export function exitCodeFor(error: GateError): number {
  return error.kind === 'prerequisite' ? 2 : 1;
}

/**
 * Turn a gate error into the command's single diagnostic and exit code.
 * `stage` names where it happened (a gate stage, `config` or `prerequisite`).
 */
export function exitGateError(error: GateError, options: { json?: boolean; stage: string }): never {
  exitCommandError({
    json: options.json,
    message: error.diagnostic(),
    exitCode: exitCodeFor(error),
    jsonExtra: { stage: options.stage, kind: error.kind },
  });
}

/** Run `fn`; a GateError it throws becomes the command's exit, reported under `stage`. */
export function runOrExit<T>(stage: string, fn: () => T, options: { json?: boolean } = {}): T {
  try {
    return fn();
  } catch (err) {
    if (isGateError(err)) exitGateError(err, { json: options.json, stage });
    throw err;
  }
}

export async function loadTomlParserOrExit(options: { json?: boolean } = {}): Promise<ParseToml> {
  try {
    return await loadTomlParser();
  } catch (err) {
    if (isGateError(err)) exitGateError(err, { json: options.json, stage: 'prerequisite' });
    throw err;
  }
}

export function loadGateConfigOrExit(
  root: string,
  overrides: GateConfigOverrides,
  options: { json?: boolean } = {},
): GateConfig {
  return runOrExit('config', () => loadGateConfig(root, overrides), options);
}
