import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ProcessRunner, signalFromExitCode } from '../../src/runner/process-runner.js';
import { CommandFailedError } from '../../src/errors.js';

chalk.level = 0;

describe('ProcessRunner', () => {
  let logSpy: MockInstance<typeof console.log>;
  let warnSpy: MockInstance<typeof console.warn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('dry run', () => {
    it('prints the joined command line instead of running it', async () => {
      const runner = new ProcessRunner({ dryRun: true });

      const outcome = await runner.run(['git', '-C', '/src', 'checkout', 'abc123']);

      expect(logSpy).toHaveBeenCalledWith('git -C /src checkout abc123');
      expect(outcome).toEqual({
        line: 'git -C /src checkout abc123',
        exitCode: null,
        signal: null,
        executed: false,
      });
    });

    it('does not execute anything', async () => {
      const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'revcheck-runner-'));
      const marker = path.join(tempDir, 'marker');
      try {
        const runner = new ProcessRunner({ dryRun: true });

        await runner.run(['touch', marker]);

        expect(fs.existsSync(marker)).toBe(false);
      } finally {
        fs.rmSync(tempDir, { recursive: true, force: true });
      }
    });

    it('never fails, even for commands that would', async () => {
      const runner = new ProcessRunner({ dryRun: true });

      await expect(runner.run(['sh', '-c', 'exit 2'])).resolves.toMatchObject({
        executed: false,
      });
      expect(logSpy).toHaveBeenCalledWith("sh -c 'exit 2'");
    });
  });

  describe('real run', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'revcheck-runner-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('executes the command through the shell', async () => {
      const runner = new ProcessRunner();
      const marker = path.join(tempDir, 'marker');

      const outcome = await runner.run(['touch', marker]);

      expect(fs.existsSync(marker)).toBe(true);
      expect(outcome.exitCode).toBe(0);
      expect(outcome.executed).toBe(true);
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('throws CommandFailedError on a non-zero exit by default', async () => {
      const runner = new ProcessRunner();

      const error = await runner.run(['sh', '-c', 'exit 3']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommandFailedError);
      expect(error).toMatchObject({
        exitCode: 3,
        line: "sh -c 'exit 3'",
        message: "Command exited with code 3: sh -c 'exit 3'",
      });
    });

    it('warns and continues when check is off', async () => {
      const runner = new ProcessRunner();

      const outcome = await runner.run(['sh', '-c', 'exit 1'], { check: false });

      expect(outcome.exitCode).toBe(1);
      expect(warnSpy).toHaveBeenCalledWith(
        "Command exited with code 1, continuing: sh -c 'exit 1'",
      );
    });

    it('passes quoted arguments through the shell intact', async () => {
      const runner = new ProcessRunner();
      const file = path.join(tempDir, 'name with spaces');

      await runner.run(['touch', file]);

      expect(fs.existsSync(file)).toBe(true);
    });

    it('names the signal that killed the command', async () => {
      const runner = new ProcessRunner();

      const outcome = await runner.run(['sh', '-c', 'kill -TERM $$'], { check: false });

      expect(outcome.signal).toBe('SIGTERM');
      expect(outcome.exitCode).toBe(143);
      expect(warnSpy).toHaveBeenCalledWith(
        "Command was killed by SIGTERM, continuing: sh -c 'kill -TERM $$'",
      );
    });

    it('fails a checked command killed by a signal with 128 + N', async () => {
      const runner = new ProcessRunner();

      const error = await runner.run(['sh', '-c', 'kill -KILL $$']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommandFailedError);
      expect(error).toMatchObject({
        exitCode: 137,
        message: "Command was killed by SIGKILL: sh -c 'kill -KILL $$'",
      });
    });
  });
});

describe('signalFromExitCode', () => {
  it('maps shell exit codes above 128 to signal names', () => {
    expect(signalFromExitCode(130)).toBe('SIGINT');
    expect(signalFromExitCode(139)).toBe('SIGSEGV');
  });

  it('leaves ordinary exit codes alone', () => {
    expect(signalFromExitCode(0)).toBeNull();
    expect(signalFromExitCode(1)).toBeNull();
    expect(signalFromExitCode(128)).toBeNull();
    expect(signalFromExitCode(null)).toBeNull();
  });
});
