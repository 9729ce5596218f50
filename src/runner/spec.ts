import * as path from 'path';
import type { BuildTestSpec, HarnessLayout, ResultFiles, Revision } from '../types.js';

export const PAIR_SUFFIXES = ['before', 'after'] as const;

export interface SpecOptions {
  sourcePath: string;
  buildPath: string;
  resultsDir: string;
  jobs: number;
  /** RUNTESTFLAGS shared by every run. */
  testFlags?: string;
  beforeTestFlags?: string;
  afterTestFlags?: string;
  testNames?: readonly string[];
}

export function combineTestFlags(...flags: Array<string | undefined>): string {
  return flags
    .map((f) => (f ?? '').trim())
    .filter((f) => f.length > 0)
    .join(' ');
}

/**
 * Suffix of the result files of the run at `index` out of `count` in
 * all-commits mode: zero-padded index plus short revision id.
 */
export function indexedSuffix(index: number, count: number, revision: Revision): string {
  const width = Math.max(2, String(Math.max(count - 1, 0)).length);
  return `${String(index).padStart(width, '0')}-${revision.shortId}`;
}

function freezeSpec(spec: BuildTestSpec): BuildTestSpec {
  Object.freeze(spec.testNames);
  Object.freeze(spec.revision);
  return Object.freeze(spec);
}

function buildSpec(
  index: number,
  suffix: string,
  revision: Revision,
  testFlags: string,
  options: SpecOptions,
): BuildTestSpec {
  return freezeSpec({
    index,
    suffix,
    sourcePath: options.sourcePath,
    buildPath: options.buildPath,
    resultsDir: options.resultsDir,
    revision: { ...revision },
    jobs: options.jobs,
    testFlags,
    testNames: [...(options.testNames ?? [])],
  });
}

/**
 * The two specs of a before/after comparison.
 */
export function createPairSpecs(
  before: Revision,
  after: Revision,
  options: SpecOptions,
): BuildTestSpec[] {
  return [
    buildSpec(
      0,
      PAIR_SUFFIXES[0],
      before,
      combineTestFlags(options.testFlags, options.beforeTestFlags),
      options,
    ),
    buildSpec(
      1,
      PAIR_SUFFIXES[1],
      after,
      combineTestFlags(options.testFlags, options.afterTestFlags),
      options,
    ),
  ];
}

/**
 * One spec per revision, in order. The first revision takes the before
 * flags, every later one the after flags.
 */
export function createRangeSpecs(
  revisions: readonly Revision[],
  options: SpecOptions,
): BuildTestSpec[] {
  return revisions.map((revision, index) =>
    buildSpec(
      index,
      indexedSuffix(index, revisions.length, revision),
      revision,
      combineTestFlags(
        options.testFlags,
        index === 0 ? options.beforeTestFlags : options.afterTestFlags,
      ),
      options,
    ),
  );
}

export function harnessDir(spec: BuildTestSpec, layout: HarnessLayout): string {
  return path.join(spec.buildPath, layout.testDir);
}

/**
 * Where the summary and log of `spec` are copied to.
 */
export function resultFilesFor(spec: BuildTestSpec, layout: HarnessLayout): ResultFiles {
  return {
    spec,
    summaryFile: path.join(
      spec.resultsDir,
      `${path.basename(layout.summaryFile)}.${spec.suffix}`,
    ),
    logFile: path.join(spec.resultsDir, `${path.basename(layout.logFile)}.${spec.suffix}`),
  };
}
