/**
 * Project structure, test configuration and the persisted snapshot.
 */

import { z } from 'zod';

/**
 * Resolved roots of a repository. Paths are absolute.
 */
export interface ProjectStructure {
  /** Repository root */
  repository: string;
  /** Where source code lives; always an existing directory */
  sourceRoot: string;
  docsRoot: string | null;
  /** Possibly empty; the first entry is the primary test root */
  testRoots: string[];
  /** Root of the mirrored summaries tree */
  summariesRoot: string;
}

export interface TestExample {
  path: string;
  snippet: string;
}

export interface TestConfig {
  framework: string;
  /** Shell command that runs the suite from the repository root */
  command: string;
  description: string;
  examples: TestExample[];
}

// ═══════════════════════════════════════════════════════════════════════════
// Snapshot (persisted as YAML, repository-relative paths)
// ═══════════════════════════════════════════════════════════════════════════

export const TestConfigSnapshotSchema = z.object({
  framework: z.string(),
  command: z.string(),
  description: z.string().default(''),
  examples: z.array(z.object({ path: z.string(), snippet: z.string() })).default([]),
});

export const ProjectSnapshotSchema = z.object({
  repository: z.string(),
  structure: z.object({
    source_root: z.string().nullable(),
    docs_root: z.string().nullable().default(null),
    test_roots: z.array(z.string()).nullable(),
    summaries_root: z.string(),
  }),
  test_config: TestConfigSnapshotSchema.nullable().default(null),
  updated_at: z.string().optional(),
});

export type ProjectSnapshot = z.infer<typeof ProjectSnapshotSchema>;
