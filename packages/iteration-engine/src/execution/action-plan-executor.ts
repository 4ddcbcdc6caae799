/**
 * Executes an action plan against the source tree.
 *
 * Steps run strictly in order. Each step type has one handler; a failing
 * step is recorded in the report and execution moves on. Code changes are
 * collected per file during the loop and integrated once afterwards.
 */

import * as path from 'node:path';
import { OUTPUT_SPECS, describeError, silentLogger, tierForPoints } from '@devcrew/crew-contracts';
import type {
  ActionStep,
  ActionStepType,
  Collaborator,
  DevcrewConfig,
  Logger,
  OutputSpec,
  PathMappingOutput,
  ProjectStructure,
  TestConfig,
} from '@devcrew/crew-contracts';
import type { ProgressReporter } from '@devcrew/progress-reporter';
import {
  copyFile,
  createDirectories,
  deleteDirectories,
  deleteFiles,
  moveFile,
  readTextOrNull,
  renameFile,
  writeEmptyFiles,
} from '../fs/file-operations.js';
import type { FilesystemMirror, MirrorOperation } from '../fs/filesystem-mirror.js';
import { isWithin, resolveWithin, toSourceRelative } from '../fs/path-guard.js';
import type { StructuredOutputLoader } from '../output/structured-output-loader.js';
import type { SnapshotStore } from '../structure/snapshot-store.js';
import { moduleOf } from '../summaries/summary-store.js';
import type { SummaryStore } from '../summaries/summary-store.js';
import { ChangeSet } from './change-set.js';
import type { DiffIntegrator, FileChangeStat, IntegrationFailure } from './diff-integrator.js';
import { TestsIntegrator } from './tests-integrator.js';

export interface ActionPlanExecutorConfig {
  structure: ProjectStructure;
  /** Null when the project has no tests; test generation is skipped */
  testConfig: TestConfig | null;
  collaborator: Collaborator;
  loader: StructuredOutputLoader;
  mirror: FilesystemMirror;
  summaries: SummaryStore;
  integrator: DiffIntegrator;
  snapshots: SnapshotStore;
  settings: Pick<DevcrewConfig, 'fixtureFileNames' | 'sourceExtensions' | 'ignoreDirs'>;
  progress?: ProgressReporter;
  logger?: Logger;
}

export interface PathTransfer {
  from: string;
  to: string;
}

export interface StepError {
  step: number;
  /** Normalized step type, or the planner's label for unsupported steps */
  type: string;
  message: string;
}

export interface PlanExecutionReport {
  created: string[];
  deleted: string[];
  renamed: PathTransfer[];
  moved: PathTransfer[];
  copied: PathTransfer[];
  modified: FileChangeStat[];
  testsWritten: string[];
  errors: StepError[];
  /** Modified files left without a fresh FileSummary */
  summaryFailures: IntegrationFailure[];
  /** Module directories whose ModuleSummary was invalidated */
  dirtyModules: string[];
}

type StepOutcome = { status: 'done' } | { status: 'skipped'; reason: string };

type StepHandler = (step: ActionStep) => Promise<StepOutcome>;

const DONE: StepOutcome = { status: 'done' };

function emptyReport(): PlanExecutionReport {
  return {
    created: [],
    deleted: [],
    renamed: [],
    moved: [],
    copied: [],
    modified: [],
    testsWritten: [],
    errors: [],
    summaryFailures: [],
    dirtyModules: [],
  };
}

export class ActionPlanExecutor {
  private readonly logger: Logger;
  private readonly handlers: Record<ActionStepType, StepHandler>;

  // Per-run state, reset by execute()
  private report: PlanExecutionReport = emptyReport();
  private readonly changes = new ChangeSet();
  private readonly dirty = new Set<string>();
  private readonly snippets = new Map<string, string[]>();
  private readonly stepOfFile = new Map<string, number>();

  constructor(private readonly config: ActionPlanExecutorConfig) {
    this.logger = config.logger ?? silentLogger;
    this.handlers = {
      create_file: (step) => this.createFiles(step),
      create_directory: (step) => this.createDirectories(step),
      delete_file: (step) => this.deleteFiles(step),
      delete_directory: (step) => this.deleteDirectories(step),
      rename_file: (step) => this.transferFiles(step, 'rename_file'),
      move_file: (step) => this.transferFiles(step, 'move_file'),
      copy_file: (step) => this.transferFiles(step, 'copy_file'),
      modify_code: (step) => this.modifyCode(step),
    };
  }

  async execute(plan: ActionStep[]): Promise<PlanExecutionReport> {
    this.report = emptyReport();
    this.changes.clear();
    this.dirty.clear();
    this.snippets.clear();
    this.stepOfFile.clear();

    for (const step of plan) {
      await this.runStep(step);
    }

    await this.integrateChanges();
    await this.refreshModules();
    await this.integrateTests();

    this.report.dirtyModules = [...this.dirty].sort();
    return this.report;
  }

  private async runStep(step: ActionStep): Promise<void> {
    const progress = this.config.progress;
    const tier = step.type === 'modify_code' ? tierForPoints(step.points).tier : undefined;
    const info = { step: step.step, title: step.title, stepType: step.type ?? step.label, tier };

    if (step.type === null) {
      const message = `Unsupported step type "${step.label}"`;
      this.report.errors.push({ step: step.step, type: step.label, message });
      progress?.step(info, 'failed', message);
      return;
    }

    progress?.step(info, 'started');
    try {
      const outcome = await this.handlers[step.type](step);
      if (outcome.status === 'skipped') {
        this.logger.info('Step skipped', { step: step.step, reason: outcome.reason });
        progress?.step(info, 'skipped', outcome.reason);
      } else {
        progress?.step(info, 'completed');
      }
    } catch (error) {
      const message = describeError(error);
      this.report.errors.push({ step: step.step, type: step.type, message });
      progress?.step(info, 'failed', message);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Filesystem steps
  // ═══════════════════════════════════════════════════════════════════════════

  private resolveSource(relPath: string): string {
    return resolveWithin(this.config.structure.sourceRoot, relPath);
  }

  private async mirror(operation: MirrorOperation): Promise<void> {
    for (const tree of ['summaries', 'tests'] as const) {
      const result = await this.config.mirror.apply(operation, tree);
      if (!result.ok) {
        this.logger.warn('Mirror update failed', { tree, kind: operation.kind, error: result.error.message });
      }
    }
  }

  private async createFiles(step: ActionStep): Promise<StepOutcome> {
    if (step.artifacts.length === 0) {
      return { status: 'skipped', reason: 'no artifacts' };
    }
    for (const relPath of step.artifacts) {
      await writeEmptyFiles([this.resolveSource(relPath)]);
      this.report.created.push(relPath);
      await this.mirror({ kind: 'create_file', path: relPath });
      this.dirty.add(moduleOf(relPath));
    }
    return DONE;
  }

  private async deleteFiles(step: ActionStep): Promise<StepOutcome> {
    if (step.artifacts.length === 0) {
      return { status: 'skipped', reason: 'no artifacts' };
    }
    for (const relPath of step.artifacts) {
      const deleted = await deleteFiles([this.resolveSource(relPath)]);
      if (deleted.length === 0) {
        this.logger.warn('File to delete does not exist', { path: relPath });
        continue;
      }
      this.report.deleted.push(relPath);
      await this.mirror({ kind: 'delete_file', path: relPath });
      this.dirty.add(moduleOf(relPath));
    }
    return DONE;
  }

  private async createDirectories(step: ActionStep): Promise<StepOutcome> {
    if (step.artifacts.length === 0) {
      return { status: 'skipped', reason: 'no artifacts' };
    }
    for (const artifact of step.artifacts) {
      const relDir = artifact.replace(/\/+$/, '');
      await createDirectories([this.resolveSource(relDir)]);
      this.report.created.push(relDir);
      await this.mirror({ kind: 'create_directory', path: relDir });
    }
    await this.config.snapshots.update(this.config.structure);
    return DONE;
  }

  private async deleteDirectories(step: ActionStep): Promise<StepOutcome> {
    if (step.artifacts.length === 0) {
      return { status: 'skipped', reason: 'no artifacts' };
    }
    const { structure } = this.config;
    for (const artifact of step.artifacts) {
      const relDir = artifact.replace(/\/+$/, '');
      const target = this.resolveSource(relDir);
      if (path.resolve(target) === path.resolve(structure.sourceRoot)) {
        throw new Error('Refusing to delete the source root');
      }
      const deleted = await deleteDirectories([target]);
      if (deleted.length === 0) {
        this.logger.warn('Directory to delete does not exist', { path: relDir });
        continue;
      }
      this.report.deleted.push(relDir);
      await this.mirror({ kind: 'delete_directory', path: relDir });

      // Roots that lived inside the deleted directory are gone too
      structure.testRoots = structure.testRoots.filter((root) => !isWithin(target, root));
      if (structure.docsRoot && isWithin(target, structure.docsRoot)) {
        structure.docsRoot = null;
      }
    }
    await this.config.snapshots.update(structure);
    return DONE;
  }

  private async transferFiles(
    step: ActionStep,
    kind: 'rename_file' | 'move_file' | 'copy_file'
  ): Promise<StepOutcome> {
    const specs: Record<typeof kind, OutputSpec<PathMappingOutput>> = {
      rename_file: OUTPUT_SPECS.renameMapping,
      move_file: OUTPUT_SPECS.moveMapping,
      copy_file: OUTPUT_SPECS.copyMapping,
    };
    const mapping = await this.config.loader.request(specs[kind], {
      instruction: step.description || step.title,
      artifacts: step.artifacts,
      file_listing: await this.config.summaries.listSourceFiles(),
    });

    const pairs = Object.entries(mapping).map(([from, to]) => ({
      from: toSourceRelative(this.config.structure.sourceRoot, from),
      to: toSourceRelative(this.config.structure.sourceRoot, to),
    }));
    if (pairs.length === 0) {
      return { status: 'skipped', reason: 'empty path mapping' };
    }

    const transfer = kind === 'copy_file' ? copyFile : kind === 'move_file' ? moveFile : renameFile;
    const record =
      kind === 'copy_file' ? this.report.copied : kind === 'move_file' ? this.report.moved : this.report.renamed;

    for (const pair of pairs) {
      const moved = await transfer(this.resolveSource(pair.from), this.resolveSource(pair.to));
      if (!moved) {
        this.logger.warn('Source file does not exist', { kind, from: pair.from });
        continue;
      }
      record.push(pair);
      await this.mirror({ kind, from: pair.from, to: pair.to });
      if (kind !== 'copy_file') {
        this.dirty.add(moduleOf(pair.from));
      }
      this.dirty.add(moduleOf(pair.to));
    }
    return DONE;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Code changes
  // ═══════════════════════════════════════════════════════════════════════════

  private async modifyCode(step: ActionStep): Promise<StepOutcome> {
    const { loader, structure, testConfig } = this.config;
    const { tier } = tierForPoints(step.points);
    const instructions = step.description ? `${step.title}\n\n${step.description}` : step.title;

    const files: Record<string, string> = {};
    for (const relPath of step.artifacts) {
      files[relPath] = (await readTextOrNull(this.resolveSource(relPath))) ?? '';
    }

    const diffs = await loader.request(OUTPUT_SPECS.developmentDiff, { instructions, files }, tier);
    if (diffs.length === 0) {
      return { status: 'skipped', reason: 'no changes produced' };
    }
    for (const diff of diffs) {
      const relPath = toSourceRelative(structure.sourceRoot, diff.path);
      this.changes.add(relPath, diff.content_diff);
      if (!this.stepOfFile.has(relPath)) {
        this.stepOfFile.set(relPath, step.step);
      }
    }

    if (testConfig && structure.testRoots.length > 0) {
      await this.planTests(step, instructions, diffs, testConfig);
    }
    return DONE;
  }

  private async planTests(
    step: ActionStep,
    instructions: string,
    diffs: Array<{ path: string; content_diff: string }>,
    testConfig: TestConfig
  ): Promise<void> {
    const { loader, structure } = this.config;
    const testContext = {
      framework: testConfig.framework,
      command: testConfig.command,
      examples: testConfig.examples,
    };

    const plan = await loader.request(OUTPUT_SPECS.testsPlanning, {
      instructions,
      diffs,
      test_config: testContext,
    });
    if (plan.length === 0) {
      return;
    }

    const snippets = await loader.request(OUTPUT_SPECS.testsImplementation, {
      test_plan: plan,
      diffs,
      test_config: testContext,
    });

    const fallback = step.artifacts[0] ?? (diffs[0] ? toSourceRelative(structure.sourceRoot, diffs[0].path) : '');
    snippets.forEach((snippet, index) => {
      const planned = plan[index]?.src_file;
      const source = planned ? toSourceRelative(structure.sourceRoot, planned) : fallback;
      if (!source || snippet.code.trim().length === 0) {
        return;
      }
      const list = this.snippets.get(source) ?? [];
      list.push(snippet.code);
      this.snippets.set(source, list);
      if (!this.stepOfFile.has(source)) {
        this.stepOfFile.set(source, step.step);
      }
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Post-loop passes
  // ═══════════════════════════════════════════════════════════════════════════

  private async integrateChanges(): Promise<void> {
    if (this.changes.size === 0) {
      return;
    }
    this.config.progress?.phase('integration', 'started');
    const integration = await this.config.integrator.applyChanges(this.changes);
    this.report.modified.push(...integration.written);
    for (const failure of integration.failed) {
      this.report.errors.push({
        step: this.stepOfFile.get(failure.path) ?? 0,
        type: 'modify_code',
        message: `${failure.path}: ${failure.message}`,
      });
    }
    this.report.summaryFailures.push(...integration.summaryFailures);
    for (const moduleDir of integration.dirtyModules) {
      this.dirty.add(moduleDir);
    }
    this.config.progress?.phase('integration', 'completed', { files: integration.written.length });
  }

  private async refreshModules(): Promise<void> {
    if (this.dirty.size === 0) {
      return;
    }
    const rebuilt = await this.config.summaries.regenerateModules(this.dirty);
    this.logger.debug('Module summaries refreshed', { modules: rebuilt });
  }

  private async integrateTests(): Promise<void> {
    const { testConfig, settings } = this.config;
    if (!testConfig || this.snippets.size === 0) {
      return;
    }
    const integrator = new TestsIntegrator({
      structure: this.config.structure,
      testConfig,
      collaborator: this.config.collaborator,
      loader: this.config.loader,
      mirror: this.config.mirror,
      fixtureFileNames: settings.fixtureFileNames,
      sourceExtensions: settings.sourceExtensions,
      ignoreDirs: settings.ignoreDirs,
      logger: this.logger,
    });
    const result = await integrator.integrate(this.snippets);
    this.report.testsWritten.push(...result.written);
    for (const failure of result.failed) {
      this.report.errors.push({
        step: this.stepOfFile.get(failure.source) ?? 0,
        type: 'modify_code',
        message: `tests for ${failure.source}: ${failure.message}`,
      });
    }
  }
}
