/**
 * Diagnostic logging. Everything goes to stderr so stdout carries only the
 * rendered layouts.
 */

import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Print debug lines (default: false) */
  debug?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.debug ?? false;

  return {
    debug(message) {
      if (verbose) console.error(chalk.gray(`[debug] ${message}`));
    },
    warn(message) {
      console.error(chalk.yellow(`⚠️  ${message}`));
    },
    error(message) {
      console.error(chalk.red(`❌ Error: ${message}`));
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
