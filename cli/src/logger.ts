/**
 * Progress logging for the sync engine.
 *
 * The engine reports through this interface and stays silent by default;
 * the CLI plugs in a console logger that writes to stderr so --json output
 * on stdout remains parseable.
 */

import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};

export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  return {
    info: (message) => console.error(message),
    warn: (message) => console.error(chalk.yellow(`⚠ ${message}`)),
    debug: (message) => {
      if (options.verbose) {
        console.error(chalk.gray(message));
      }
    },
  };
}
