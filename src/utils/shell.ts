import { DRY_RUN_RESULTS_DIR } from './results-dir.js';

const PLAIN_WORD = /^[A-Za-z0-9_\/.,:=@%+-]+$/;
const PLACEHOLDER_PREFIX = `${DRY_RUN_RESULTS_DIR}/`;

/**
 * Quote a single argument for a POSIX shell. Plain words are left as they
 * are so printed command lines stay readable, and so are paths under the
 * dry-run placeholder, which never reach a shell.
 */
export function quoteArg(arg: string): string {
  if (arg === '') {
    return "''";
  }
  if (PLAIN_WORD.test(arg)) {
    return arg;
  }
  if (arg.startsWith(PLACEHOLDER_PREFIX) && PLAIN_WORD.test(arg.slice(PLACEHOLDER_PREFIX.length))) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function joinCommand(args: readonly string[]): string {
  return args.map(quoteArg).join(' ');
}
