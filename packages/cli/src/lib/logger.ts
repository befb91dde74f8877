/**
 * Logger implementation for CLI
 */

import chalk from 'chalk';
import type { Logger } from '@archgate/core';

/**
 * Stage lines go to stdout in grey, and only with `--verbose`.
 */
export function createLogger(verbose: boolean): Logger {
  return {
    debug(msg: string, data?: Record<string, unknown>) {
      if (!verbose) return;
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      console.log(chalk.gray(`[debug] ${msg}${dataStr}`));
    },
  };
}
