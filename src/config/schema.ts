import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors.js';

const optionalFlags = z
  .string()
  .optional()
  .transform((value) => value?.trim() ?? '');

export const RunConfigSchema = z
  .object({
    /** Reference the comparison starts from. */
    beforeRef: z.string().trim().min(1, 'before-ref must not be empty'),
    /** Reference being tested. */
    afterRef: z.string().trim().min(1, 'after-ref must not be empty'),
    /** Parallelism passed to make for the build step. */
    jobs: z
      .union([z.number(), z.string()])
      .default(1)
      .pipe(z.coerce.number().int().positive()),
    dryRun: z.boolean().default(false),
    /** RUNTESTFLAGS for every run. */
    runtestflags: optionalFlags,
    beforeRuntestflags: optionalFlags,
    afterRuntestflags: optionalFlags,
    /** Test names passed as TESTS=. */
    tests: z.array(z.string().trim().min(1)).default([]),
    /** Git work tree that gets checked out. */
    source: z.string().min(1).default('.'),
    /** Build tree where make runs. */
    build: z.string().min(1).default('.'),
    /** Harness directory, relative to the build tree. */
    testDir: z.string().min(1).default('gdb'),
    /** Summary file, relative to the harness directory. */
    summaryFile: z.string().min(1).default('testsuite/gdb.sum'),
    /** Log file, relative to the harness directory. */
    logFile: z.string().min(1).default('testsuite/gdb.log'),
    /** Use this directory instead of a fresh temporary one. */
    resultsDir: z.string().min(1).optional(),
    /** Test every commit between the two references. */
    all: z.boolean().default(false),
  })
  .refine((config) => path.basename(config.summaryFile) !== path.basename(config.logFile), {
    message: 'summary and log files must have different names',
    path: ['logFile'],
  });

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RawRunConfig = z.input<typeof RunConfigSchema>;

export function parseRunConfig(raw: RawRunConfig): RunConfig {
  const result = RunConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(
      `Invalid options:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      issues,
    );
  }
  return result.data;
}
