/**
 * Bounded test → analyze → fix loop.
 *
 * At most MAX_DEBUG_ATTEMPTS test executions per run. Fixes are applied only
 * between executions, so the last execution after a fix is its confirmation.
 */

import * as path from 'node:path';
import { OUTPUT_SPECS, PathTraversalError, silentLogger, tierForPoints } from '@devcrew/crew-contracts';
import type {
  BugFinding,
  Collaborator,
  FailureGroup,
  Logger,
  ProjectStructure,
  TestConfig,
} from '@devcrew/crew-contracts';
import type { ProgressReporter } from '@devcrew/progress-reporter';
import { MAX_DEBUG_ATTEMPTS } from '../config.js';
import { listFiles } from '../fs/enumerate.js';
import { pathExists, readTextOrNull, statOrNull } from '../fs/file-operations.js';
import { isWithin, resolveWithin, toRelative, toSourceRelative } from '../fs/path-guard.js';
import type { StructuredOutputLoader } from '../output/structured-output-loader.js';
import type { SummaryStore } from '../summaries/summary-store.js';
import { ChangeSet } from '../execution/change-set.js';
import type { DiffIntegrator, FileChangeStat } from '../execution/diff-integrator.js';
import type { TestRunner, TestRunResult } from './test-runner.js';

export type DebugStatus = 'passing' | 'nothing_to_fix' | 'attempts_exhausted';

export interface DebugAttempt {
  attempt: number;
  exitCode: number;
  findings: number;
  /** Source-relative files rewritten after this run */
  fixed: string[];
}

export interface DebugReport {
  status: DebugStatus;
  attempts: DebugAttempt[];
  lastRun: TestRunResult;
  fixed: FileChangeStat[];
}

export interface DebugLoopConfig {
  structure: ProjectStructure;
  testConfig: TestConfig | null;
  collaborator: Collaborator;
  loader: StructuredOutputLoader;
  runner: TestRunner;
  integrator: DiffIntegrator;
  summaries: SummaryStore;
  sourceExtensions: string[];
  ignoreDirs: string[];
  progress?: ProgressReporter;
  logger?: Logger;
}

export interface FlatFailure {
  file_path: string;
  affected_callable: string;
  error: string;
  traceback: string;
}

/** What one failing run yielded, handed to every fixer of that run */
export interface DebugContext {
  findings: BugFinding[];
  failures: FlatFailure[];
  /** Contents of the files the collaborator named as involved */
  files: Record<string, string>;
  testOutput: string;
}

/**
 * True when a test report looks like it carries structured failures.
 */
export function isSomethingToFix(report: string): boolean {
  return report.length > 2 && report.includes('{') && report.includes('}') && report.includes('error');
}

function firstOf(value: FailureGroup[keyof FailureGroup]): string {
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }
  return value ?? '';
}

export function flattenFailureGroup(group: FailureGroup): FlatFailure {
  return {
    file_path: firstOf(group.file_path),
    affected_callable: firstOf(group.affected_callable),
    error: firstOf(group.error),
    traceback: firstOf(group.traceback),
  };
}

export class DebugLoop {
  private readonly logger: Logger;

  constructor(private readonly config: DebugLoopConfig) {
    this.logger = config.logger ?? silentLogger;
  }

  async run(): Promise<DebugReport> {
    const { structure, testConfig, runner, progress } = this.config;
    const attempts: DebugAttempt[] = [];
    const fixed: FileChangeStat[] = [];

    if (structure.testRoots.length === 0 || !testConfig) {
      const lastRun = await runner.run(null);
      return { status: 'passing', attempts, lastRun, fixed };
    }

    let attempt = 0;
    for (;;) {
      attempt += 1;
      const lastRun = await runner.run(testConfig);
      progress?.debugAttempt(attempt, MAX_DEBUG_ATTEMPTS, lastRun.exitCode);

      if (lastRun.passed) {
        attempts.push({ attempt, exitCode: lastRun.exitCode, findings: 0, fixed: [] });
        return { status: 'passing', attempts, lastRun, fixed };
      }
      if (attempt >= MAX_DEBUG_ATTEMPTS) {
        attempts.push({ attempt, exitCode: lastRun.exitCode, findings: 0, fixed: [] });
        this.logger.warn('Debug attempts exhausted', { attempts: attempt });
        return { status: 'attempts_exhausted', attempts, lastRun, fixed };
      }

      const debug = await this.analyze(lastRun.output);
      if (debug.findings.length === 0) {
        attempts.push({ attempt, exitCode: lastRun.exitCode, findings: 0, fixed: [] });
        this.logger.info('Test failures carry nothing to fix');
        return { status: 'nothing_to_fix', attempts, lastRun, fixed };
      }

      const written = await this.applyFixes(debug);
      fixed.push(...written);
      attempts.push({
        attempt,
        exitCode: lastRun.exitCode,
        findings: debug.findings.length,
        fixed: written.map((stat) => stat.path),
      });
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Analysis
  // ═══════════════════════════════════════════════════════════════════════════

  private async analyze(testOutput: string): Promise<DebugContext> {
    const { collaborator, loader, summaries } = this.config;
    const empty: DebugContext = { findings: [], failures: [], files: {}, testOutput };

    const report = (await collaborator.invoke({ crew: 'test_output_report', inputs: { test_output: testOutput } })).text;
    if (!isSomethingToFix(report)) {
      return empty;
    }

    const groups = (await loader.request(OUTPUT_SPECS.failureGrouping, { report })).map(flattenFailureGroup);
    if (groups.length === 0) {
      return empty;
    }

    const involved = await loader.request(OUTPUT_SPECS.involvedFiles, {
      failures: groups,
      code_files: await summaries.listSourceFiles(),
      test_files: await this.listTestFiles(),
    });

    const files: Record<string, string> = {};
    for (const failure of involved) {
      for (const candidate of [...failure.involved_files, ...failure.file_path]) {
        if (candidate in files) {
          continue;
        }
        const content = await this.readInvolved(candidate);
        if (content !== null) {
          files[candidate] = content;
        }
      }
    }

    const findings = await loader.request(OUTPUT_SPECS.bugAnalysis, {
      failures: involved,
      files,
      test_output: testOutput,
    });
    return { findings, failures: groups, files, testOutput };
  }

  private async listTestFiles(): Promise<string[]> {
    const { structure, sourceExtensions, ignoreDirs } = this.config;
    const files: string[] = [];
    for (const root of structure.testRoots) {
      const found = await listFiles(root, sourceExtensions, ignoreDirs);
      files.push(...found.map((file) => toRelative(structure.repository, path.join(root, file))));
    }
    return files;
  }

  /**
   * Reads a collaborator-named file, trying the repository and then the
   * source root as base. Paths escaping both are ignored.
   */
  private async readInvolved(candidate: string): Promise<string | null> {
    const { structure } = this.config;
    for (const base of [structure.repository, structure.sourceRoot]) {
      const target = candidate.trim() ? this.tryResolve(base, candidate) : null;
      if (target && (await statOrNull(target))?.isFile()) {
        return readTextOrNull(target);
      }
    }
    return null;
  }

  private tryResolve(base: string, candidate: string): string | null {
    try {
      return resolveWithin(base, candidate.trim());
    } catch (error) {
      if (error instanceof PathTraversalError) {
        this.logger.debug('Ignoring path outside the repository', { path: candidate });
        return null;
      }
      throw error;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Fixing
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Source-relative path of a file a fix targets, or null when it lies
   * outside the source root.
   */
  private async toFixTarget(candidate: string): Promise<string | null> {
    const { structure } = this.config;
    const repoTarget = this.tryResolve(structure.repository, candidate);
    if (repoTarget && isWithin(structure.sourceRoot, repoTarget)) {
      return toRelative(structure.sourceRoot, repoTarget);
    }
    if (repoTarget && (await pathExists(repoTarget))) {
      return null;
    }
    const sourceRel = toSourceRelative(structure.sourceRoot, candidate);
    return this.tryResolve(structure.sourceRoot, sourceRel) ? sourceRel : null;
  }

  private async applyFixes(debug: DebugContext): Promise<FileChangeStat[]> {
    const { loader, integrator, summaries } = this.config;
    const changes = new ChangeSet();

    for (const finding of debug.findings) {
      const { tier, label } = tierForPoints(finding.points);
      this.logger.info(`Fixing bug ${finding.id}`, { tier, label, files: finding.file_paths });

      const context: Record<string, string> = {};
      for (const candidate of finding.file_paths) {
        const content = await this.readInvolved(candidate);
        if (content !== null) {
          context[candidate] = content;
        }
      }

      const diffs = await loader.request(
        OUTPUT_SPECS.bugFixer,
        {
          bug: finding,
          context,
          failures: debug.failures,
          involved_files: debug.files,
          test_output: debug.testOutput,
        },
        tier
      );
      for (const diff of diffs) {
        const target = await this.toFixTarget(diff.path);
        if (!target) {
          this.logger.warn('Skipping fix outside the source root', { path: diff.path });
          continue;
        }
        changes.add(target, diff.content_diff);
      }
    }

    if (changes.size === 0) {
      return [];
    }
    const integration = await integrator.applyChanges(changes);
    await summaries.regenerateModules(integration.dirtyModules);
    return integration.written;
  }
}
