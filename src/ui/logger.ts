import chalk from 'chalk';

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
  header(msg: string): void;
  dim(msg: string): void;
  command(msg: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;

  return {
    info(msg: string) {
      console.log(chalk.blue('ℹ'), msg);
    },

    success(msg: string) {
      console.log(chalk.green('✔'), msg);
    },

    warn(msg: string) {
      console.log(chalk.yellow('⚠'), msg);
    },

    error(msg: string) {
      console.error(chalk.red('✖'), msg);
    },

    debug(msg: string) {
      if (verbose) {
        console.log(chalk.gray('⚙'), chalk.gray(msg));
      }
    },

    header(msg: string) {
      console.log();
      console.log(chalk.bold(msg));
      console.log();
    },

    dim(msg: string) {
      console.log(chalk.dim(msg));
    },

    command(msg: string) {
      console.log(chalk.cyan(`  ${msg}`));
    },
  };
}
