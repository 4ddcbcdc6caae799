// ============================================
// devcrew - Shared Contracts
// ============================================

// Logging
export type { Logger, LogLevel, LogMeta } from './logger.js';
export { silentLogger } from './logger.js';

// Errors
export type { DevcrewErrorCode, Result } from './errors.js';
export {
  DevcrewError,
  StructuredOutputError,
  ProjectStructureError,
  PathTraversalError,
  ConfigError,
  ok,
  err,
  describeError,
  toError,
  hasErrorCode,
} from './errors.js';

// Collaborators
export type {
  LLMTier,
  CrewName,
  CrewInputs,
  CollaboratorRequest,
  CollaboratorResult,
  Collaborator,
  SeniorityLabel,
  TierAssignment,
} from './collaborator.js';
export { CREW_NAMES, tierForPoints } from './collaborator.js';

// Collaborator output schemas
export type {
  ShapeKind,
  OutputSpec,
  OutputSpecKey,
  ProjectStructureOutput,
  TestsConfOutput,
  SummaryEntry,
  FileDetailOutput,
  ActionStepOutput,
  PathMappingOutput,
  DiffModification,
  TestPlanItem,
  TestSnippet,
  FailureGroup,
  InvolvedFailure,
  BugFinding,
  TaskAssignment,
  GeneratedFile,
  CodeFix,
  DevelopmentOutput,
  DesignSummariesOutput,
} from './crew-schemas.js';
export {
  OUTPUT_SPECS,
  describeCrewOutput,
  findOutputSpec,
  ProjectStructureOutputSchema,
  TestsConfOutputSchema,
  SummaryEntrySchema,
  SummaryListSchema,
  FileDetailOutputSchema,
  ActionStepOutputSchema,
  ActionPlanOutputSchema,
  PathMappingOutputSchema,
  DiffModificationSchema,
  DiffListSchema,
  TestPlanItemSchema,
  TestPlanOutputSchema,
  TestSnippetOutputSchema,
  FailureGroupSchema,
  FailureGroupListSchema,
  InvolvedFailureSchema,
  InvolvedFailureListSchema,
  BugFindingSchema,
  BugFindingListSchema,
  TaskAssignmentSchema,
  ProjectDesignOutputSchema,
  GeneratedFileSchema,
  CodeFixSchema,
  DevelopmentOutputSchema,
  DesignSummariesOutputSchema,
} from './crew-schemas.js';

// JSON text helpers
export type { JsonParseOutcome } from './json-text.js';
export { stripCodeFences, parseJsonText, unwrapRoot, isPlainObject } from './json-text.js';

// Project model
export type { ProjectStructure, TestConfig, TestExample, ProjectSnapshot } from './project.js';
export { ProjectSnapshotSchema, TestConfigSnapshotSchema } from './project.js';

// Action plan
export type { ActionStep, ActionStepType } from './action-plan.js';
export { ACTION_STEP_TYPES, normalizeStepType, looksLikeDirectory } from './action-plan.js';

// Configuration
export type { DevcrewConfig, DevcrewConfigInput } from './config-schema.js';
export { DevcrewConfigSchema } from './config-schema.js';
