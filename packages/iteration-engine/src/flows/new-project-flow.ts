/**
 * Greenfield pipeline: project description → generated repository.
 *
 * design → development per assignment → summaries from design → write →
 * snapshot → debug loop (when tests were generated).
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { OUTPUT_SPECS, tierForPoints } from '@devcrew/crew-contracts';
import type {
  CodeFix,
  Collaborator,
  DevcrewConfig,
  Logger,
  ProjectStructure,
  SummaryEntry,
  TaskAssignment,
} from '@devcrew/crew-contracts';
import { ProgressReporter } from '@devcrew/progress-reporter';
import { WORKSPACE_CONFIG, loadConfig, stateDir } from '../config.js';
import { DebugLoop } from '../debug/debug-loop.js';
import type { DebugReport } from '../debug/debug-loop.js';
import { TestRunner } from '../debug/test-runner.js';
import type { CommandExecutor } from '../debug/test-runner.js';
import { statOrNull, writeFileMap, writeText } from '../fs/file-operations.js';
import { toSourceRelative } from '../fs/path-guard.js';
import { createConsoleLogger } from '../logger.js';
import { sanitizeGeneratedContent } from '../output/content-sanitizer.js';
import { StructuredOutputLoader } from '../output/structured-output-loader.js';
import { SnapshotStore } from '../structure/snapshot-store.js';
import { TestConfigDetector } from '../structure/test-config-detector.js';
import { normalizeDir, renderSummary } from '../summaries/summary-store.js';
import { openWorkspace } from './workspace.js';
import type { Workspace } from './workspace.js';

export const NEW_PROJECT_LAYOUT = {
  sourceDirName: 'src',
  testsDirName: 'tests',
} as const;

export interface NewProjectResult {
  structure: ProjectStructure;
  /** Source-relative paths of generated source files */
  sourceFiles: string[];
  /** Test-root-relative paths of generated test files */
  testFiles: string[];
  fileSummaries: number;
  moduleSummaries: number;
  debug?: DebugReport;
}

export interface NewProjectFlowOptions {
  collaborator: Collaborator;
  config?: DevcrewConfig;
  logger?: Logger;
  progress?: ProgressReporter;
  env?: NodeJS.ProcessEnv;
  execute?: CommandExecutor;
}

interface GeneratedCode {
  source: Record<string, string>;
  tests: Record<string, string>;
}

function describeFix(fix: CodeFix): string {
  return fix.affected_callable ? `${fix.affected_callable}: ${fix.fix}` : fix.fix;
}

export class NewProjectFlow {
  constructor(private readonly options: NewProjectFlowOptions) {}

  async run(outputDir: string, description: string): Promise<NewProjectResult> {
    const repository = path.resolve(outputDir);
    await fs.mkdir(repository, { recursive: true });
    const config = this.options.config ?? (await loadConfig(repository, this.options.env));
    const logger = this.options.logger ?? createConsoleLogger({ level: config.logLevel, name: 'new-project' });
    const progress = this.options.progress ?? new ProgressReporter(logger);

    progress.start('new_project', description);
    try {
      const result = await this.generate(repository, description, config, logger, progress);
      progress.complete('success');
      return result;
    } catch (error) {
      progress.complete('failed');
      throw error;
    }
  }

  private async generate(
    repository: string,
    description: string,
    config: DevcrewConfig,
    logger: Logger,
    progress: ProgressReporter
  ): Promise<NewProjectResult> {
    const { collaborator } = this.options;
    const structure: ProjectStructure = {
      repository,
      sourceRoot: path.join(repository, NEW_PROJECT_LAYOUT.sourceDirName),
      docsRoot: null,
      testRoots: [],
      summariesRoot: path.join(stateDir(repository), WORKSPACE_CONFIG.summariesDirName),
    };
    await fs.mkdir(structure.sourceRoot, { recursive: true });
    await fs.mkdir(structure.summariesRoot, { recursive: true });

    const loader = new StructuredOutputLoader(collaborator, logger);
    const snapshots = new SnapshotStore(repository, logger);
    const workspace = openWorkspace({ structure, config, collaborator, loader, snapshots, logger });

    progress.phase('design', 'started');
    const assignments = [...(await loader.request(OUTPUT_SPECS.projectDesign, { new_project_prompt: description }))].sort(
      (a, b) => a.developer - b.developer
    );
    progress.phase('design', 'completed', { assignments: assignments.length });

    const code: GeneratedCode = { source: {}, tests: {} };
    const fileSummaries: SummaryEntry[] = [];
    const moduleSummaries: SummaryEntry[] = [];

    progress.phase('development', 'started');
    for (const assignment of assignments) {
      const written = await this.develop(workspace, assignment, code, logger);
      const summaries = await loader.request(OUTPUT_SPECS.summariesFromDesign, {
        project_design: assignment.set_of_files,
        code_chunk: written,
      });
      fileSummaries.push(...summaries.file_summaries);
      moduleSummaries.push(...summaries.module_summaries);
    }
    progress.phase('development', 'completed', {
      sourceFiles: Object.keys(code.source).length,
      testFiles: Object.keys(code.tests).length,
    });

    // Deterministic writes
    await writeFileMap(structure.sourceRoot, code.source);
    const testsRoot = path.join(repository, NEW_PROJECT_LAYOUT.testsDirName);
    await writeFileMap(testsRoot, code.tests);
    for (const entry of fileSummaries) {
      const relPath = toSourceRelative(structure.sourceRoot, entry.path);
      await writeText(workspace.mirror.summaryPath(relPath), renderSummary(entry.content));
    }
    for (const entry of moduleSummaries) {
      const relDir = normalizeDir(toSourceRelative(structure.sourceRoot, entry.path));
      await writeText(workspace.mirror.moduleSummaryPath(relDir), renderSummary(entry.content));
    }

    if ((await statOrNull(testsRoot))?.isDirectory()) {
      structure.testRoots = [testsRoot];
    }
    await snapshots.update(structure, null);

    const result: NewProjectResult = {
      structure,
      sourceFiles: Object.keys(code.source),
      testFiles: Object.keys(code.tests),
      fileSummaries: fileSummaries.length,
      moduleSummaries: moduleSummaries.length,
    };
    if (structure.testRoots.length === 0) {
      return result;
    }

    const testConfig = await new TestConfigDetector({ loader, snapshots, config, logger }).detect(structure);
    progress.phase('debug', 'started');
    const debug = await new DebugLoop({
      structure,
      testConfig,
      collaborator,
      loader,
      runner: new TestRunner({ repository, timeoutMs: config.testTimeoutMs, execute: this.options.execute, logger }),
      integrator: workspace.integrator,
      summaries: workspace.summaries,
      sourceExtensions: config.sourceExtensions,
      ignoreDirs: config.ignoreDirs,
      progress,
      logger,
    }).run();
    progress.phase('debug', 'completed', { attempts: debug.attempts.length });
    return { ...result, debug };
  }

  /**
   * Runs the development crew for one assignment at the developer's tier and
   * folds its fixes into the generated files. Returns the files of this
   * assignment.
   */
  private async develop(
    workspace: Workspace,
    assignment: TaskAssignment,
    code: GeneratedCode,
    logger: Logger
  ): Promise<Record<string, string>> {
    const { tier, label } = tierForPoints(assignment.developer);
    logger.info(`${label} developer working`, { developer: assignment.developer, files: assignment.set_of_files.length });

    const output = await workspace.loader.request(
      OUTPUT_SPECS.development,
      { project_design: assignment.set_of_files },
      tier
    );

    const written: Record<string, string> = {};
    for (const file of output.files) {
      const fixes = output.fixes.filter((fix) => fix.file_path === file.path).map(describeFix);
      const content =
        fixes.length > 0
          ? await workspace.integrator.integrate(file.path, file.content, fixes)
          : sanitizeGeneratedContent(file.content);

      const normalized = file.path.trim().replace(/\\/g, '/').replace(/^\.\//, '');
      const testsPrefix = `${NEW_PROJECT_LAYOUT.testsDirName}/`;
      if (normalized.startsWith(testsPrefix)) {
        code.tests[normalized.slice(testsPrefix.length)] = content;
      } else {
        code.source[toSourceRelative(workspace.structure.sourceRoot, normalized)] = content;
      }
      written[normalized] = content;
    }
    return written;
  }
}
