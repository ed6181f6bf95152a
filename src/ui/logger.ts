import chalk from 'chalk';
import ora from 'ora';

export interface SpinnerHandle {
  succeed(text?: string): void;
  fail(text?: string): void;
}

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only printed with --verbose. */
  debug(message: string): void;
  /** Report an action skipped because of --dry-run. */
  dryRun(action: string): void;
  /** Section heading for one phase of the run. */
  step(message: string): void;
  spin(text: string): SpinnerHandle;
  readonly verbose: boolean;
}

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
}

const noopSpinner: SpinnerHandle = {
  succeed: () => undefined,
  fail: () => undefined,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  if (options.silent) {
    return {
      info: () => undefined,
      success: () => undefined,
      warn: () => undefined,
      error: () => undefined,
      debug: () => undefined,
      dryRun: () => undefined,
      step: () => undefined,
      spin: () => noopSpinner,
      verbose,
    };
  }

  return {
    info(message) {
      console.log(`  ${message}`);
    },
    success(message) {
      console.log(chalk.green(`  ✓ ${message}`));
    },
    warn(message) {
      console.warn(chalk.yellow(`  ⚠ ${message}`));
    },
    error(message) {
      console.error(chalk.red(`  ✗ ${message}`));
    },
    debug(message) {
      if (verbose) console.log(chalk.dim(`    ${message}`));
    },
    dryRun(action) {
      console.log(chalk.cyan(`  [DRY RUN] Would ${action}`));
    },
    step(message) {
      console.log(chalk.bold(`\n  ${message}`));
    },
    spin(text) {
      const spinner = ora(`  ${text}`).start();
      return {
        succeed: (t) => { spinner.succeed(t === undefined ? undefined : `  ${t}`); },
        fail: (t) => { spinner.fail(t === undefined ? undefined : `  ${t}`); },
      };
    },
    verbose,
  };
}

export function shortSha(sha: string | null | undefined): string {
  return sha ? sha.substring(0, 12) : '(none)';
}
