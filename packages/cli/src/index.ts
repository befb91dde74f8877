/**
 * @archgate/cli
 *
 * archgate command-line interface.
 *
 *   archgate check [root]              run the conformance gate
 *   archgate classify [root]           list core/boundary classification per file
 *   archgate resolve <path> --root .   resolve a symbol reference
 *
 * The CLI entry point is src/bin/archgate.ts
 */
import { Command, CommanderError } from 'commander';
import { registerCheckCommand } from './commands/check.js';
import { registerClassifyCommand } from './commands/classify.js';
import { registerResolveCommand } from './commands/resolve.js';
import { isCommandRuntimeError, renderCommandRuntimeError } from './lib/command-runtime.js';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('archgate')
    .description('Architecture conformance gate for multi-crate workspaces')
    .version('0.1.0')
    .exitOverride();

  registerCheckCommand(program);
  registerClassifyCommand(program);
  registerResolveCommand(program);
  return program;
}

/**
 * Parse `argv` and run the chosen command. Resolves to the process exit code;
 * command failures are rendered here, once.
 */
export async function runCli(argv: string[]): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (isCommandRuntimeError(err)) {
      renderCommandRuntimeError(err);
      return err.exitCode;
    }
    // Commander has already printed usage errors, help and version
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
}
