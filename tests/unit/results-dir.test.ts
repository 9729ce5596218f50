import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  DRY_RUN_RESULTS_DIR,
  RESULTS_DIR_PREFIX,
  prepareResultsDir,
} from '../../src/utils/results-dir.js';

describe('prepareResultsDir', () => {
  let tempDir: string;
  const created: string[] = [];

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'revcheck-results-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    for (const dir of created.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('creates a fresh temporary directory for a real run', () => {
    const dir = prepareResultsDir(false);
    created.push(dir);

    expect(fs.statSync(dir).isDirectory()).toBe(true);
    expect(path.dirname(dir)).toBe(os.tmpdir());
    expect(path.basename(dir).startsWith(RESULTS_DIR_PREFIX)).toBe(true);
  });

  it('creates two different directories for two runs', () => {
    const first = prepareResultsDir(false);
    const second = prepareResultsDir(false);
    created.push(first, second);

    expect(first).not.toBe(second);
  });

  it('returns a placeholder for a dry run', () => {
    expect(prepareResultsDir(true)).toBe(DRY_RUN_RESULTS_DIR);
  });

  it('creates a requested directory with its parents', () => {
    const requested = path.join(tempDir, 'a', 'b');

    const dir = prepareResultsDir(false, requested);

    expect(dir).toBe(requested);
    expect(fs.statSync(requested).isDirectory()).toBe(true);
  });

  it('does not create a requested directory during a dry run', () => {
    const requested = path.join(tempDir, 'not-yet');

    const dir = prepareResultsDir(true, requested);

    expect(dir).toBe(requested);
    expect(fs.existsSync(requested)).toBe(false);
  });
});
