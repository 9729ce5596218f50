import { spawn } from 'child_process';
import * as os from 'os';
import chalk from 'chalk';
import { CommandFailedError } from '../errors.js';
import { joinCommand } from '../utils/shell.js';
import type { CommandOutcome } from '../types.js';

export interface RunCommandOptions {
  /** Abort on a non-zero exit. Defaults to true. */
  check?: boolean;
}

export interface ProcessRunnerOptions {
  dryRun?: boolean;
}

/** Shells report a child killed by signal N as exit code 128 + N. */
const SIGNAL_EXIT_BASE = 128;

export function signalFromExitCode(exitCode: number | null): string | null {
  if (exitCode === null || exitCode <= SIGNAL_EXIT_BASE) {
    return null;
  }
  const found = Object.entries(os.constants.signals).find(
    ([, num]) => num === exitCode - SIGNAL_EXIT_BASE,
  );
  return found ? found[0] : null;
}

function exitCodeFromSignal(signal: string): number {
  const found = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return found ? SIGNAL_EXIT_BASE + found[1] : 1;
}

/**
 * Runs one external command line at a time, or only prints it in dry-run
 * mode.
 */
export class ProcessRunner {
  readonly dryRun: boolean;

  constructor(options: ProcessRunnerOptions = {}) {
    this.dryRun = options.dryRun ?? false;
  }

  async run(args: readonly string[], options: RunCommandOptions = {}): Promise<CommandOutcome> {
    const check = options.check ?? true;
    const line = joinCommand(args);

    if (this.dryRun) {
      console.log(line);
      return { line, exitCode: null, signal: null, executed: false };
    }

    const result = await this.execute(line);
    // The direct child is the shell, which usually survives the command it ran.
    const signal = result.signal ?? signalFromExitCode(result.exitCode);
    const exitCode = result.exitCode ?? (signal !== null ? exitCodeFromSignal(signal) : 1);

    if (exitCode !== 0) {
      const status = signal !== null ? `was killed by ${signal}` : `exited with code ${exitCode}`;
      if (check) {
        throw new CommandFailedError(`Command ${status}: ${line}`, line, exitCode);
      }
      console.warn(chalk.yellow(`Command ${status}, continuing: ${line}`));
    }

    return { line, exitCode, signal, executed: true };
  }

  private execute(
    line: string,
  ): Promise<{ exitCode: number | null; signal: NodeJS.Signals | null }> {
    return new Promise((resolve, reject) => {
      const child = spawn(line, { shell: true, stdio: 'inherit' });

      child.on('error', reject);
      child.on('close', (code, signal) => {
        resolve({ exitCode: code, signal });
      });
    });
  }
}
