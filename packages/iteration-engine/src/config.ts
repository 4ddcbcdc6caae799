/**
 * Engine configuration.
 *
 * Fixed engine constants live in `as const` blocks; per-repository settings
 * come from `.devcrew/config.yml` (validated with zod, defaults filled in)
 * with environment overrides on top.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { parse as parseYAML } from 'yaml';
import { ConfigError, DevcrewConfigSchema, hasErrorCode } from '@devcrew/crew-contracts';
import type { DevcrewConfig, DevcrewConfigInput } from '@devcrew/crew-contracts';

// ═══════════════════════════════════════════════════════════════════════════
// Workspace layout
// ═══════════════════════════════════════════════════════════════════════════

export const WORKSPACE_CONFIG = {
  /** Per-repository state directory */
  stateDirName: '.devcrew',
  /** Project snapshot file inside the state directory */
  snapshotFileName: 'project.yaml',
  /** Optional config file inside the state directory */
  configFileName: 'config.yml',
  /** Default summaries root inside the state directory */
  summariesDirName: 'summaries',
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Summaries
// ═══════════════════════════════════════════════════════════════════════════

export const SUMMARY_CONFIG = {
  /** Extension replacing the source extension in the summaries tree */
  summaryExtension: '.yaml',
  /** Module summary sentinel file inside each mirrored directory */
  moduleSentinel: '_module.yaml',
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Structure discovery
// ═══════════════════════════════════════════════════════════════════════════

export const DISCOVERY_CONFIG = {
  /** Files scanned for test framework signatures */
  maxScannedTestFiles: 800,
  /** Example test files attached to the test config */
  maxTestExamples: 3,
  /** Lines kept per example test file */
  exampleSnippetLines: 40,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Debug loop
// ═══════════════════════════════════════════════════════════════════════════

/** Test executions per debug loop run, the final post-fix confirmation included */
export const MAX_DEBUG_ATTEMPTS = 3;

export const TEST_RUN_CONFIG = {
  /** Exit code reported when the suite exceeds its timeout */
  timeoutExitCode: -1,
  /** Exit code reported when the command cannot be spawned */
  spawnFailureExitCode: -2,
  /** Tail of the runner output kept for analysis (characters) */
  maxOutputChars: 200_000,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Loading
// ═══════════════════════════════════════════════════════════════════════════

export function stateDir(repository: string): string {
  return path.join(repository, WORKSPACE_CONFIG.stateDirName);
}

export function resolveConfig(input: DevcrewConfigInput = {}, env: NodeJS.ProcessEnv = process.env): DevcrewConfig {
  const merged: Record<string, unknown> = { ...input };

  const logLevel = env.DEVCREW_LOG_LEVEL;
  if (logLevel) {
    merged.logLevel = logLevel;
  }
  const timeout = env.DEVCREW_TEST_TIMEOUT_MS;
  if (timeout) {
    merged.testTimeoutMs = Number(timeout);
  }

  const parsed = DevcrewConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid devcrew config: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

/**
 * Loads `<repository>/.devcrew/config.yml` when present; defaults otherwise.
 */
export async function loadConfig(repository: string, env: NodeJS.ProcessEnv = process.env): Promise<DevcrewConfig> {
  const file = path.join(stateDir(repository), WORKSPACE_CONFIG.configFileName);

  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return resolveConfig({}, env);
    }
    throw error;
  }

  let document: unknown;
  try {
    document = parseYAML(raw);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (document === null || document === undefined) {
    return resolveConfig({}, env);
  }
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigError(`${file} must contain a mapping`);
  }
  return resolveConfig({ ...document }, env);
}
