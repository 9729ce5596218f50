export interface Revision {
  /** Canonical commit id as reported by git. */
  id: string;
  shortId: string;
  /** Reference the user typed, when the revision came from the command line. */
  ref?: string;
}

export interface BuildTestSpec {
  readonly index: number;
  /** Appended to result file names; unique within a run. */
  readonly suffix: string;
  readonly sourcePath: string;
  readonly buildPath: string;
  readonly resultsDir: string;
  readonly revision: Revision;
  readonly jobs: number;
  readonly testFlags: string;
  readonly testNames: readonly string[];
}

export interface ResultFiles {
  spec: BuildTestSpec;
  summaryFile: string;
  logFile: string;
}

export interface HarnessLayout {
  /** Harness directory, relative to the build tree. */
  testDir: string;
  /** Summary file, relative to the harness directory. */
  summaryFile: string;
  /** Log file, relative to the harness directory. */
  logFile: string;
}

export interface CommandOutcome {
  line: string;
  /** Null in dry-run mode. */
  exitCode: number | null;
  /** Signal that ended the command, also when the shell reported it as 128 + N. */
  signal: string | null;
  executed: boolean;
}

export interface ComparisonPair {
  before: string;
  after: string;
}
