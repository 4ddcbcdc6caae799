/**
 * Iterate pipeline: change request → updated repository.
 *
 * The run threads one immutable `IterationState` through its stages; each
 * stage returns a delta that is merged into a new state object.
 */

import type {
  ActionStep,
  Collaborator,
  DevcrewConfig,
  Logger,
  ProjectStructure,
  Result,
  TestConfig,
} from '@devcrew/crew-contracts';
import { ProgressReporter } from '@devcrew/progress-reporter';
import { loadConfig } from '../config.js';
import { DebugLoop } from '../debug/debug-loop.js';
import type { DebugReport } from '../debug/debug-loop.js';
import { TestRunner } from '../debug/test-runner.js';
import type { CommandExecutor } from '../debug/test-runner.js';
import { ActionPlanExecutor } from '../execution/action-plan-executor.js';
import type { PlanExecutionReport } from '../execution/action-plan-executor.js';
import { createConsoleLogger } from '../logger.js';
import { StructuredOutputLoader } from '../output/structured-output-loader.js';
import { ActionPlanner } from '../planning/action-planner.js';
import { ProjectStructureResolver } from '../structure/project-structure-resolver.js';
import { SnapshotStore } from '../structure/snapshot-store.js';
import { TestConfigDetector } from '../structure/test-config-detector.js';
import type { SyncReport } from '../summaries/summary-store.js';
import { ReleaseNotesUpdater } from './release-notes.js';
import type { ReleaseNotesOutcome } from './release-notes.js';
import { ensureRepository, openWorkspace } from './workspace.js';
import type { Workspace } from './workspace.js';

export interface IterationState {
  readonly repository: string;
  readonly userPrompt: string;
  readonly structure?: ProjectStructure;
  readonly testConfig?: TestConfig | null;
  readonly sync?: SyncReport;
  readonly plan?: readonly ActionStep[];
  readonly execution?: PlanExecutionReport;
  readonly debug?: DebugReport;
  readonly releaseNotes?: Result<ReleaseNotesOutcome>;
}

export interface IterateFlowOptions {
  collaborator: Collaborator;
  /** Loaded from `<repo>/.devcrew/config.yml` when omitted */
  config?: DevcrewConfig;
  logger?: Logger;
  progress?: ProgressReporter;
  env?: NodeJS.ProcessEnv;
  /** Test command executor, defaults to the shell */
  execute?: CommandExecutor;
  now?: () => Date;
}

function advance(state: IterationState, delta: Partial<IterationState>): IterationState {
  return Object.freeze({ ...state, ...delta });
}

function changedAnything(report: PlanExecutionReport): boolean {
  return (
    report.created.length +
      report.deleted.length +
      report.renamed.length +
      report.moved.length +
      report.copied.length +
      report.modified.length >
    0
  );
}

export class IterateFlow {
  constructor(private readonly options: IterateFlowOptions) {}

  async run(repository: string, userPrompt: string): Promise<IterationState> {
    const repo = await ensureRepository(repository);
    const config = this.options.config ?? (await loadConfig(repo, this.options.env));
    const logger = this.options.logger ?? createConsoleLogger({ level: config.logLevel, name: 'iterate' });
    const progress = this.options.progress ?? new ProgressReporter(logger);

    progress.start('iterate', userPrompt);
    try {
      const state = await this.runStages(Object.freeze({ repository: repo, userPrompt }), config, logger, progress);
      progress.complete('success');
      return state;
    } catch (error) {
      progress.complete('failed');
      throw error;
    }
  }

  private async runStages(
    initial: IterationState,
    config: DevcrewConfig,
    logger: Logger,
    progress: ProgressReporter
  ): Promise<IterationState> {
    const { collaborator } = this.options;
    const loader = new StructuredOutputLoader(collaborator, logger);
    const snapshots = new SnapshotStore(initial.repository, logger);

    // resolveStructure
    progress.phase('structure', 'started');
    const structure = await new ProjectStructureResolver({
      repository: initial.repository,
      loader,
      snapshots,
      config,
      logger,
    }).resolve();
    let state = advance(initial, { structure });
    progress.phase('structure', 'completed', { testRoots: structure.testRoots.length });

    const workspace = openWorkspace({ structure, config, collaborator, loader, snapshots, logger });

    // detectTestConfig
    const testConfig = await new TestConfigDetector({ loader, snapshots, config, logger }).detect(structure);
    state = advance(state, { testConfig });

    state = advance(state, await this.syncSummaries(workspace, progress));
    state = advance(state, await this.plan(state, workspace, logger, progress));
    state = advance(state, await this.execute(state, workspace, testConfig, logger, progress));
    state = advance(state, await this.debug(state, workspace, testConfig, logger, progress));
    state = advance(state, await this.releaseNotes(state, workspace, logger));
    return state;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Stages
  // ═══════════════════════════════════════════════════════════════════════════

  private async syncSummaries(workspace: Workspace, progress: ProgressReporter): Promise<Partial<IterationState>> {
    progress.phase('summaries', 'started');
    const sync = await workspace.summaries.sync();
    progress.phase('summaries', 'completed', {
      fileSummaries: sync.fileSummaries.length,
      moduleSummaries: sync.moduleSummaries.length,
    });
    return { sync };
  }

  private async plan(
    state: IterationState,
    workspace: Workspace,
    logger: Logger,
    progress: ProgressReporter
  ): Promise<Partial<IterationState>> {
    progress.phase('planning', 'started');
    const plan = await new ActionPlanner({
      structure: workspace.structure,
      loader: workspace.loader,
      summaries: workspace.summaries,
      logger,
    }).plan(state.userPrompt);
    progress.phase('planning', 'completed', { steps: plan.length });
    return { plan };
  }

  private async execute(
    state: IterationState,
    workspace: Workspace,
    testConfig: TestConfig | null,
    logger: Logger,
    progress: ProgressReporter
  ): Promise<Partial<IterationState>> {
    const plan = state.plan ?? [];
    if (plan.length === 0) {
      logger.info('Empty action plan, nothing to execute');
      return {};
    }
    progress.phase('execution', 'started');
    const execution = await new ActionPlanExecutor({
      structure: workspace.structure,
      testConfig,
      collaborator: workspace.collaborator,
      loader: workspace.loader,
      mirror: workspace.mirror,
      summaries: workspace.summaries,
      integrator: workspace.integrator,
      snapshots: workspace.snapshots,
      settings: workspace.config,
      progress,
      logger,
    }).execute([...plan]);
    progress.phase('execution', 'completed', {
      modified: execution.modified.length,
      errors: execution.errors.length,
    });
    return { execution };
  }

  private async debug(
    state: IterationState,
    workspace: Workspace,
    testConfig: TestConfig | null,
    logger: Logger,
    progress: ProgressReporter
  ): Promise<Partial<IterationState>> {
    if (!state.execution) {
      return {};
    }
    progress.phase('debug', 'started');
    const runner = new TestRunner({
      repository: workspace.structure.repository,
      timeoutMs: workspace.config.testTimeoutMs,
      execute: this.options.execute,
      logger,
    });
    const debug = await new DebugLoop({
      structure: workspace.structure,
      testConfig,
      collaborator: workspace.collaborator,
      loader: workspace.loader,
      runner,
      integrator: workspace.integrator,
      summaries: workspace.summaries,
      sourceExtensions: workspace.config.sourceExtensions,
      ignoreDirs: workspace.config.ignoreDirs,
      progress,
      logger,
    }).run();
    progress.phase('debug', 'completed', { attempts: debug.attempts.length });
    return { debug };
  }

  private async releaseNotes(
    state: IterationState,
    workspace: Workspace,
    logger: Logger
  ): Promise<Partial<IterationState>> {
    if (!state.execution || !changedAnything(state.execution)) {
      return {};
    }
    const releaseNotes = await new ReleaseNotesUpdater({
      structure: workspace.structure,
      collaborator: workspace.collaborator,
      integrator: workspace.integrator,
      packageMarkers: workspace.config.packageMarkers,
      logger,
      now: this.options.now,
    }).update(state.userPrompt, [...(state.plan ?? [])]);
    return { releaseNotes };
  }
}
