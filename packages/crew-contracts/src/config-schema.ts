/**
 * Zod schema for `.devcrew/config.yml`.
 */

import { z } from 'zod';

const extension = z
  .string()
  .min(1)
  .transform((value) => value.replace(/^\./, ''));

export const DevcrewConfigSchema = z.object({
  /** Extensions (without dot) of files that get a FileSummary */
  sourceExtensions: z.array(extension).min(1).default(['py']),
  /** Extensions offered to structure discovery next to sources */
  docExtensions: z.array(extension).default(['md', 'rst']),
  /** Package marker files that never get a FileSummary */
  packageMarkers: z.array(z.string()).default(['__init__.py']),
  /** Shared fixture files collected while integrating tests */
  fixtureFileNames: z.array(z.string()).default(['conftest.py']),
  /** Mirrored test file name; `{stem}` and `{ext}` are substituted */
  testFilePattern: z.string().min(1).default('test_{stem}{ext}'),
  /** Directory names skipped during enumeration */
  ignoreDirs: z
    .array(z.string())
    .default(['.git', '.devcrew', 'node_modules', '__pycache__', '.venv', 'venv', 'dist', 'build', '.tox', '.mypy_cache']),
  testTimeoutMs: z.number().int().positive().default(1_800_000),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type DevcrewConfig = z.infer<typeof DevcrewConfigSchema>;
export type DevcrewConfigInput = z.input<typeof DevcrewConfigSchema>;
