/** Console logging with level tags. Debug lines only show with --verbose. */

import chalk from "chalk";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(opts: { verbose?: boolean } = {}): Logger {
  const verbose = opts.verbose ?? false;
  return {
    debug(message) {
      if (verbose) console.log(chalk.gray(`  debug: ${message}`));
    },
    info(message) {
      console.log(`  ${message}`);
    },
    warn(message) {
      console.error(chalk.yellow(`  warning: ${message}`));
    },
    error(message) {
      console.error(chalk.red(`  error: ${message}`));
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
