import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const RESULTS_DIR_PREFIX = 'revcheck-';
/** Stands in for the temporary directory a real run would create. */
export const DRY_RUN_RESULTS_DIR = '<temp_dir>';

/**
 * Pick the directory the result files are copied into. A real run creates
 * it; a dry run touches nothing. The directory is never removed.
 */
export function prepareResultsDir(dryRun: boolean, requested?: string): string {
  if (requested) {
    const dir = path.resolve(requested);
    if (!dryRun) {
      fs.mkdirSync(dir, { recursive: true });
    }
    return dir;
  }

  if (dryRun) {
    return DRY_RUN_RESULTS_DIR;
  }

  return fs.mkdtempSync(path.join(os.tmpdir(), RESULTS_DIR_PREFIX));
}
