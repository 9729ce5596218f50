import { Command } from 'commander';
import { parseRunConfig, type RunConfig } from '../config/schema.js';
import { RevisionResolver } from '../git/revisions.js';
import { runPipeline } from '../runner/pipeline.js';
import { ProcessRunner, type ProcessRunnerOptions } from '../runner/process-runner.js';
import { createPairSpecs, createRangeSpecs, type SpecOptions } from '../runner/spec.js';
import { comparisonPairs, formatComparisons } from '../utils/compare.js';
import { prepareResultsDir } from '../utils/results-dir.js';
import type { HarnessLayout, ResultFiles, Revision } from '../types.js';
import { handleCommandError } from './command-error-handler.js';

export const VERSION = '1.0.0';

export interface CliDeps {
  createRunner?: (options: ProcessRunnerOptions) => ProcessRunner;
  sleep?: (ms: number) => Promise<void>;
}

interface CliOptions {
  jobs?: string;
  dryRun?: boolean;
  runtestflags?: string;
  beforeRuntestflags?: string;
  afterRuntestflags?: string;
  tests?: string[];
  source?: string;
  build?: string;
  testDir?: string;
  summaryFile?: string;
  logFile?: string;
  resultsDir?: string;
  all?: boolean;
}

function revisionLabel(index: number, count: number, all: boolean): string {
  if (!all) {
    return index === 0 ? 'A' : 'B';
  }
  return String(index).padStart(Math.max(2, String(count - 1).length), '0');
}

/**
 * Resolve both references, then build and test every revision and print
 * how to compare the collected summaries.
 */
export async function runComparison(
  config: RunConfig,
  deps: CliDeps = {},
): Promise<ResultFiles[]> {
  const resolver = new RevisionResolver(config.source);

  const before = await resolver.resolve(config.beforeRef);
  const after = await resolver.resolve(config.afterRef);

  const revisions: Revision[] = config.all
    ? await resolver.listRange(before, after)
    : [before, after];

  for (let i = 0; i < revisions.length; i++) {
    const revision = revisions[i];
    const summary = await resolver.summary(revision.id);
    const typed = revision.ref !== undefined ? ` (${revision.ref})` : '';
    console.log(
      `${revisionLabel(i, revisions.length, config.all)}: ${revision.shortId}${typed}  ${summary}`,
    );
  }

  if (revisions.length < 2) {
    console.warn(`\nNo commits between ${config.beforeRef} and ${config.afterRef}.`);
  }

  const resultsDir = prepareResultsDir(config.dryRun, config.resultsDir);
  console.log(`\nResults directory: ${resultsDir}`);

  const specOptions: SpecOptions = {
    sourcePath: config.source,
    buildPath: config.build,
    resultsDir,
    jobs: config.jobs,
    testFlags: config.runtestflags,
    beforeTestFlags: config.beforeRuntestflags,
    afterTestFlags: config.afterRuntestflags,
    testNames: config.tests,
  };
  const specs = config.all
    ? createRangeSpecs(revisions, specOptions)
    : createPairSpecs(before, after, specOptions);

  const layout: HarnessLayout = {
    testDir: config.testDir,
    summaryFile: config.summaryFile,
    logFile: config.logFile,
  };
  const createRunner =
    deps.createRunner ?? ((opts: ProcessRunnerOptions) => new ProcessRunner(opts));
  const runner = createRunner({ dryRun: config.dryRun });

  const results = await runPipeline(specs, runner, { layout, sleep: deps.sleep });

  for (const line of formatComparisons(comparisonPairs(results))) {
    console.log(line);
  }

  return results;
}

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name('revcheck')
    .description(
      'Build and test two revisions of a source tree and collect their test summaries for comparison',
    )
    .version(VERSION)
    .argument('<before-ref>', 'Baseline revision (branch, tag or hash)')
    .argument('<after-ref>', 'Revision to test')
    .option('-j, --jobs <n>', 'Parallel jobs for make when building (default: 1)')
    .option('-d, --dry-run', 'Print the commands instead of running them')
    .option('--runtestflags <flags>', 'RUNTESTFLAGS for every test run')
    .option('--before-runtestflags <flags>', 'Extra RUNTESTFLAGS for the before revision')
    .option('--after-runtestflags <flags>', 'Extra RUNTESTFLAGS for the after revision')
    .option(
      '-t, --tests <names...>',
      'Only run these tests (passed as TESTS=); put -- before the refs to end the list',
    )
    .option('-s, --source <path>', 'Source tree to check out revisions in (default: .)')
    .option('-b, --build <path>', 'Build tree to run make in (default: .)')
    .option('--test-dir <path>', 'Test harness directory inside the build tree (default: gdb)')
    .option(
      '--summary-file <path>',
      'Summary file inside the harness directory (default: testsuite/gdb.sum)',
    )
    .option(
      '--log-file <path>',
      'Log file inside the harness directory (default: testsuite/gdb.log)',
    )
    .option('-o, --results-dir <path>', 'Copy results here instead of a new temp directory')
    .option('-a, --all', 'Test every commit between the two revisions')
    .action(async (beforeRef: string, afterRef: string, options: CliOptions) => {
      try {
        const config = parseRunConfig({ beforeRef, afterRef, ...options });
        await runComparison(config, deps);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return program;
}
