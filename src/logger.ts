/**
 * Console logging for library code.
 *
 * Components take a Logger so tests can silence or capture output; the CLI
 * passes a verbose console logger when asked. Debug lines go to stderr.
 */

import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

export function createConsoleLogger(options?: ConsoleLoggerOptions): Logger {
  return {
    debug(message) {
      if (options?.verbose) {
        console.error(chalk.dim(`  ${message}`));
      }
    },
    info(message) {
      console.log(message);
    },
    warn(message) {
      console.warn(chalk.yellow(`  ⚠ ${message}`));
    },
  };
}

export const consoleLogger: Logger = createConsoleLogger();

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
};
