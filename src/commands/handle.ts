import chalk from 'chalk';
import { PropagationError } from '../errors.js';

/** Print a failed command's error and set a non-zero exit code. */
export function reportError(err: unknown, verbose: boolean): void {
  process.exitCode = 1;
  if (err instanceof PropagationError) {
    console.error(chalk.red(`✗ ${err.message}`));
    if (verbose && err.cause instanceof Error) console.error(chalk.dim(err.cause.stack ?? err.cause.message));
    return;
  }
  const error = err instanceof Error ? err : new Error(String(err));
  console.error(chalk.red(`✗ ${error.message}`));
  if (verbose && error.stack) console.error(chalk.dim(error.stack));
}

export async function runCommand(verbose: boolean, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    reportError(err, verbose);
  }
}
