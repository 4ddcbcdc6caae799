// ============================================
// devcrew - Iteration Engine
// ============================================

// Configuration
export {
  WORKSPACE_CONFIG,
  SUMMARY_CONFIG,
  DISCOVERY_CONFIG,
  MAX_DEBUG_ATTEMPTS,
  TEST_RUN_CONFIG,
  stateDir,
  resolveConfig,
  loadConfig,
} from './config.js';

// Logging
export type { ConsoleLoggerOptions, ScopedLogger } from './logger.js';
export { createConsoleLogger } from './logger.js';

// Collaborator output
export type { ShapeOutcome } from './output/shape-normalizer.js';
export { normalizeShape } from './output/shape-normalizer.js';
export { sanitizeGeneratedContent } from './output/content-sanitizer.js';
export { StructuredOutputLoader } from './output/structured-output-loader.js';

// Filesystem
export { isWithin, resolveWithin, toRelative, toSourceRelative } from './fs/path-guard.js';
export {
  statOrNull,
  pathExists,
  readTextOrNull,
  writeText,
  writeFileMap,
  writeEmptyFiles,
  deleteFiles,
  createDirectories,
  deleteDirectories,
  renameFile,
  moveFile,
  copyFile,
} from './fs/file-operations.js';
export type { MirrorTree, MirrorOperation, MirrorOutcome, MirrorConfig } from './fs/filesystem-mirror.js';
export { FilesystemMirror } from './fs/filesystem-mirror.js';
export { extensionPattern, listFiles } from './fs/enumerate.js';

// Summaries
export type { SummaryStoreConfig, SyncReport } from './summaries/summary-store.js';
export { SummaryStore, moduleOf, renderSummary, normalizeDir } from './summaries/summary-store.js';

// Structure
export { SnapshotStore } from './structure/snapshot-store.js';
export type { ProjectStructureResolverConfig } from './structure/project-structure-resolver.js';
export { ProjectStructureResolver } from './structure/project-structure-resolver.js';
export type { TestConfigDetectorConfig } from './structure/test-config-detector.js';
export { TestConfigDetector, detectFrameworks } from './structure/test-config-detector.js';

// Planning & execution
export type { ActionPlannerConfig } from './planning/action-planner.js';
export { ActionPlanner, toActionStep } from './planning/action-planner.js';
export { ChangeSet } from './execution/change-set.js';
export type { LineStats } from './execution/diff-stats.js';
export { lineDiff, diffLineStats, generateUnifiedDiff } from './execution/diff-stats.js';
export type {
  DiffIntegratorConfig,
  FileChangeStat,
  IntegrationFailure,
  IntegrationReport,
} from './execution/diff-integrator.js';
export { DiffIntegrator } from './execution/diff-integrator.js';
export type { TestsIntegratorConfig, TestsIntegrationReport } from './execution/tests-integrator.js';
export { TestsIntegrator, collectFixtures } from './execution/tests-integrator.js';
export type {
  ActionPlanExecutorConfig,
  PathTransfer,
  StepError,
  PlanExecutionReport,
} from './execution/action-plan-executor.js';
export { ActionPlanExecutor } from './execution/action-plan-executor.js';

// Debugging
export type {
  CommandOutcome,
  CommandExecutor,
  TestRunResult,
  TestRunnerConfig,
} from './debug/test-runner.js';
export { TestRunner, runShellCommand, formatTestOutput } from './debug/test-runner.js';
export type { DebugStatus, DebugAttempt, DebugReport, DebugLoopConfig, DebugContext, FlatFailure } from './debug/debug-loop.js';
export { DebugLoop, isSomethingToFix, flattenFailureGroup } from './debug/debug-loop.js';

// Flows
export type { Workspace, WorkspaceOptions } from './flows/workspace.js';
export { openWorkspace, ensureRepository } from './flows/workspace.js';
export type { ReleaseNotesOutcome, ReleaseNotesUpdaterConfig } from './flows/release-notes.js';
export {
  ReleaseNotesUpdater,
  RELEASE_NOTES_CONFIG,
  findReleaseNotes,
  detectCurrentVersion,
} from './flows/release-notes.js';
export type { IterationState, IterateFlowOptions } from './flows/iterate-flow.js';
export { IterateFlow } from './flows/iterate-flow.js';
export type { NewProjectResult, NewProjectFlowOptions } from './flows/new-project-flow.js';
export { NewProjectFlow, NEW_PROJECT_LAYOUT } from './flows/new-project-flow.js';
