import chalk from 'chalk';
import { CommandFailedError } from '../errors.js';

/**
 * Print an error from the command action and exit. A failed build step
 * passes its own exit code on; everything else exits with 1.
 */
export function handleCommandError(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`Error: ${msg}`));
  process.exit(err instanceof CommandFailedError ? err.exitCode : 1);
}
