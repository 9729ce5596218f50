import * as path from 'path';
import chalk from 'chalk';
import type { BuildTestSpec, HarnessLayout, ResultFiles } from '../types.js';
import type { ProcessRunner } from './process-runner.js';
import { harnessDir, resultFilesFor } from './spec.js';

/** Time the operator gets to abort after seeing the resolved revisions. */
export const PRE_RUN_DELAY_MS = 2000;

export interface PipelineOptions {
  layout: HarnessLayout;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(text: string): void {
  console.log(chalk.black.bgWhite(`>>> ${text}`));
}

export function checkoutCommand(spec: BuildTestSpec): string[] {
  return ['git', '-C', spec.sourcePath, 'checkout', spec.revision.id];
}

export function buildCommand(spec: BuildTestSpec): string[] {
  return ['make', '-C', spec.buildPath, '-j', String(spec.jobs)];
}

export function testCommand(spec: BuildTestSpec, layout: HarnessLayout): string[] {
  const args = ['make', '-C', harnessDir(spec, layout), 'check'];
  if (spec.testFlags) {
    args.push(`RUNTESTFLAGS=${spec.testFlags}`);
  }
  if (spec.testNames.length > 0) {
    args.push(`TESTS=${spec.testNames.join(' ')}`);
  }
  return args;
}

export function copyCommands(spec: BuildTestSpec, layout: HarnessLayout): string[][] {
  const dir = harnessDir(spec, layout);
  const files = resultFilesFor(spec, layout);
  return [
    ['cp', path.join(dir, layout.summaryFile), files.summaryFile],
    ['cp', path.join(dir, layout.logFile), files.logFile],
  ];
}

/**
 * Check out, build, test and collect the results of a single spec.
 */
export async function runSpec(
  spec: BuildTestSpec,
  runner: ProcessRunner,
  layout: HarnessLayout,
): Promise<ResultFiles> {
  banner(`Checking out ${spec.revision.id}`);
  await runner.run(checkoutCommand(spec));

  banner('Making');
  await runner.run(buildCommand(spec));

  // A failing test suite is an expected outcome, not a reason to stop.
  banner('Make checking');
  await runner.run(testCommand(spec, layout), { check: false });

  banner('Copying results');
  for (const command of copyCommands(spec, layout)) {
    await runner.run(command);
  }

  return resultFilesFor(spec, layout);
}

/**
 * Run every spec in order. The specs share one working tree and one build
 * tree, so they must never overlap.
 */
export async function runPipeline(
  specs: readonly BuildTestSpec[],
  runner: ProcessRunner,
  options: PipelineOptions,
): Promise<ResultFiles[]> {
  if (!runner.dryRun) {
    await (options.sleep ?? sleep)(PRE_RUN_DELAY_MS);
  }

  const results: ResultFiles[] = [];

  for (let i = 0; i < specs.length; i++) {
    const spec = specs[i];
    console.log(`\n[${i + 1}/${specs.length}] ${spec.revision.shortId} (${spec.suffix})`);
    results.push(await runSpec(spec, runner, options.layout));
  }

  return results;
}
