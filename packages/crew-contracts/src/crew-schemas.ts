/**
 * Zod schemas for structured collaborator outputs.
 *
 * Each `OutputSpec` pairs a crew with the shape kind its output is
 * normalized through, the zod schema validating the normalized value and the
 * schema description sent to collaborators (and to the JSON repair crew).
 */

import { z } from 'zod';
import type { CrewName } from './collaborator.js';

/**
 * Shape kinds accepted by the output normalizer.
 *
 * - `list`: array, single object, or `{ items | files | root: [...] }`
 * - `record`: object map, single-item list of a map, or list of single-key maps
 * - `object`: object, or single-item list of an object
 * - `string_list`: array of strings, single string, or wrapped array
 */
export type ShapeKind = 'list' | 'record' | 'object' | 'string_list';

export interface OutputSpec<T> {
  crew: CrewName;
  shape: ShapeKind;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Human-readable schema, embedded in prompts */
  description: string;
}

const stringList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : [value]));

const optionalStringList = z
  .union([z.string(), z.array(z.string()), z.null()])
  .optional()
  .transform((value) => {
    if (value === undefined || value === null) {
      return [];
    }
    return Array.isArray(value) ? value : [value];
  });

const contentText = z.union([z.string(), z.record(z.unknown()), z.array(z.unknown())]);

const points = z.coerce.number().int().min(0).default(1);

const identifier = z.union([z.string(), z.number()]).transform((value) => String(value));

// ═══════════════════════════════════════════════════════════════════════════
// Structure discovery
// ═══════════════════════════════════════════════════════════════════════════

export const ProjectStructureOutputSchema = z.object({
  code_dir: z.string().min(1),
  docs_dir: z.string().nullish(),
  test_dirs: optionalStringList,
  summaries_dir: z.string().nullish(),
});

export const TestsConfOutputSchema = z.object({
  framework: z.string(),
  command: z.string().min(1),
  description: z.string().default(''),
});

// ═══════════════════════════════════════════════════════════════════════════
// Summaries
// ═══════════════════════════════════════════════════════════════════════════

export const SummaryEntrySchema = z.object({
  path: z.string().min(1),
  content: contentText,
});

export const SummaryListSchema = z.array(SummaryEntrySchema);

// ═══════════════════════════════════════════════════════════════════════════
// Planning
// ═══════════════════════════════════════════════════════════════════════════

export const FileDetailOutputSchema = z.object({
  summaries_only: optionalStringList,
  need_code: optionalStringList,
});

export const ActionStepOutputSchema = z.object({
  step: z.coerce.number().int(),
  title: z.string(),
  description: z.string().default(''),
  artifacts: optionalStringList,
  type: z.string(),
  points,
});

export const ActionPlanOutputSchema = z.array(ActionStepOutputSchema);

export const PathMappingOutputSchema = z.record(z.string());

export const DiffModificationSchema = z.object({
  path: z.string().min(1),
  content_diff: z.string(),
});

export const DiffListSchema = z.array(DiffModificationSchema);

// ═══════════════════════════════════════════════════════════════════════════
// Tests
// ═══════════════════════════════════════════════════════════════════════════

export const TestPlanItemSchema = z.object({
  title: z.string(),
  description: z.string().default(''),
  targets: optionalStringList,
  src_file: z.string().default(''),
  reason: z.string().default(''),
  test_type: z.string().default('unit'),
});

export const TestPlanOutputSchema = z.array(TestPlanItemSchema);

export const TestSnippetOutputSchema = z.array(z.object({ code: z.string() }));

// ═══════════════════════════════════════════════════════════════════════════
// Debugging
// ═══════════════════════════════════════════════════════════════════════════

const scalarOrList = z.union([z.string(), z.array(z.string()), z.null()]).optional();

export const FailureGroupSchema = z.object({
  file_path: scalarOrList,
  affected_callable: scalarOrList,
  error: scalarOrList,
  traceback: scalarOrList,
});

export const FailureGroupListSchema = z.array(FailureGroupSchema);

export const InvolvedFailureSchema = z.object({
  file_path: optionalStringList,
  affected_callable: optionalStringList,
  error: optionalStringList,
  traceback: optionalStringList,
  involved_files: optionalStringList,
  id: identifier.optional(),
});

export const InvolvedFailureListSchema = z.array(InvolvedFailureSchema);

export const BugFindingSchema = z.object({
  file_paths: stringList,
  affected_callables: optionalStringList,
  points,
  description: z.string(),
  fix: z.string().default(''),
  id: identifier,
});

export const BugFindingListSchema = z.array(BugFindingSchema);

// ═══════════════════════════════════════════════════════════════════════════
// Greenfield
// ═══════════════════════════════════════════════════════════════════════════

export const TaskAssignmentSchema = z.object({
  developer: z.coerce.number().int().min(1),
  set_of_files: stringList,
});

export const ProjectDesignOutputSchema = z.array(TaskAssignmentSchema);

export const GeneratedFileSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

export const CodeFixSchema = z.object({
  file_path: z.string().min(1),
  affected_callable: z.string().default(''),
  fix: z.string(),
});

export const DevelopmentOutputSchema = z.object({
  files: z.array(GeneratedFileSchema).default([]),
  fixes: z.array(CodeFixSchema).default([]),
});

export const DesignSummariesOutputSchema = z.object({
  file_summaries: SummaryListSchema.default([]),
  module_summaries: SummaryListSchema.default([]),
});

// ═══════════════════════════════════════════════════════════════════════════
// Output specs
// ═══════════════════════════════════════════════════════════════════════════

export type ProjectStructureOutput = z.infer<typeof ProjectStructureOutputSchema>;
export type TestsConfOutput = z.infer<typeof TestsConfOutputSchema>;
export type SummaryEntry = z.infer<typeof SummaryEntrySchema>;
export type FileDetailOutput = z.infer<typeof FileDetailOutputSchema>;
export type ActionStepOutput = z.infer<typeof ActionStepOutputSchema>;
export type PathMappingOutput = z.infer<typeof PathMappingOutputSchema>;
export type DiffModification = z.infer<typeof DiffModificationSchema>;
export type TestPlanItem = z.infer<typeof TestPlanItemSchema>;
export type TestSnippet = z.infer<typeof TestSnippetOutputSchema>[number];
export type FailureGroup = z.infer<typeof FailureGroupSchema>;
export type InvolvedFailure = z.infer<typeof InvolvedFailureSchema>;
export type BugFinding = z.infer<typeof BugFindingSchema>;
export type TaskAssignment = z.infer<typeof TaskAssignmentSchema>;
export type GeneratedFile = z.infer<typeof GeneratedFileSchema>;
export type CodeFix = z.infer<typeof CodeFixSchema>;
export type DevelopmentOutput = z.infer<typeof DevelopmentOutputSchema>;
export type DesignSummariesOutput = z.infer<typeof DesignSummariesOutputSchema>;

export const OUTPUT_SPECS = {
  projectStructure: {
    crew: 'project_structure',
    shape: 'object',
    schema: ProjectStructureOutputSchema,
    description:
      '{"code_dir": "<source root>", "docs_dir": "<docs root or null>", "test_dirs": ["<test root>"], "summaries_dir": "<summaries root or null>"}',
  },
  testsConf: {
    crew: 'tests_conf',
    shape: 'object',
    schema: TestsConfOutputSchema,
    description: '{"framework": "<name>", "command": "<shell command running the suite>", "description": "<notes>"}',
  },
  fileSummaries: {
    crew: 'file_summaries',
    shape: 'list',
    schema: SummaryListSchema,
    description: '[{"path": "<source file path>", "content": "<YAML summary>"}]',
  },
  moduleSummaries: {
    crew: 'module_summaries',
    shape: 'list',
    schema: SummaryListSchema,
    description: '[{"path": "<module directory>", "content": "<YAML summary>"}]',
  },
  relevantModules: {
    crew: 'relevant_modules',
    shape: 'string_list',
    schema: z.array(z.string()),
    description: '["<relevant source file path>"]',
  },
  fileDetail: {
    crew: 'file_detail',
    shape: 'object',
    schema: FileDetailOutputSchema,
    description: '{"summaries_only": ["<path>"], "need_code": ["<path>"]}',
  },
  actionPlan: {
    crew: 'action_plan',
    shape: 'list',
    schema: ActionPlanOutputSchema,
    description:
      '[{"step": 1, "title": "<title>", "description": "<what to do>", "artifacts": ["<path>"], "type": "Create new file/directory | Delete file/directory | Rename file | Move file | Copy file | Modify code", "points": 1}]',
  },
  renameMapping: {
    crew: 'rename_mapping',
    shape: 'record',
    schema: PathMappingOutputSchema,
    description: '{"<old path>": "<new path>"}',
  },
  moveMapping: {
    crew: 'move_mapping',
    shape: 'record',
    schema: PathMappingOutputSchema,
    description: '{"<old path>": "<new path>"}',
  },
  copyMapping: {
    crew: 'copy_mapping',
    shape: 'record',
    schema: PathMappingOutputSchema,
    description: '{"<source path>": "<copy path>"}',
  },
  developmentDiff: {
    crew: 'development_diff',
    shape: 'list',
    schema: DiffListSchema,
    description: '[{"path": "<file path>", "content_diff": "<diff of the change>"}]',
  },
  testsPlanning: {
    crew: 'tests_planning',
    shape: 'list',
    schema: TestPlanOutputSchema,
    description:
      '[{"title": "<title>", "description": "<what is tested>", "targets": ["<callable>"], "src_file": "<path>", "reason": "<why>", "test_type": "unit"}]',
  },
  testsImplementation: {
    crew: 'tests_implementation',
    shape: 'list',
    schema: TestSnippetOutputSchema,
    description: '[{"code": "<test code>"}]',
  },
  testsRelevance: {
    crew: 'tests_relevance',
    shape: 'string_list',
    schema: z.array(z.string()),
    description: '["<test file path>"]',
  },
  failureGrouping: {
    crew: 'failure_grouping',
    shape: 'list',
    schema: FailureGroupListSchema,
    description: '[{"file_path": "<path>", "affected_callable": "<name>", "error": ["<message>"], "traceback": ["<line>"]}]',
  },
  involvedFiles: {
    crew: 'involved_files',
    shape: 'list',
    schema: InvolvedFailureListSchema,
    description:
      '[{"file_path": ["<path>"], "affected_callable": ["<name>"], "error": ["<message>"], "traceback": ["<line>"], "involved_files": ["<path>"], "id": 1}]',
  },
  bugAnalysis: {
    crew: 'bug_analysis',
    shape: 'list',
    schema: BugFindingListSchema,
    description:
      '[{"file_paths": ["<path>"], "affected_callables": ["<name>"], "points": 1, "description": "<bug>", "fix": "<proposed fix>", "id": 1}]',
  },
  bugFixer: {
    crew: 'bug_fixer',
    shape: 'list',
    schema: DiffListSchema,
    description: '[{"path": "<file path>", "content_diff": "<diff of the fix>"}]',
  },
  projectDesign: {
    crew: 'project_design',
    shape: 'list',
    schema: ProjectDesignOutputSchema,
    description: '[{"developer": 1, "set_of_files": ["<path>"]}]',
  },
  development: {
    crew: 'development',
    shape: 'object',
    schema: DevelopmentOutputSchema,
    description:
      '{"files": [{"path": "<path>", "content": "<full file content>"}], "fixes": [{"file_path": "<path>", "affected_callable": "<name>", "fix": "<change>"}]}',
  },
  summariesFromDesign: {
    crew: 'summaries_from_design',
    shape: 'object',
    schema: DesignSummariesOutputSchema,
    description:
      '{"file_summaries": [{"path": "<path>", "content": "<YAML>"}], "module_summaries": [{"path": "<directory>", "content": "<YAML>"}]}',
  },
} satisfies Record<string, OutputSpec<unknown>>;

export type OutputSpecKey = keyof typeof OUTPUT_SPECS;

/**
 * Output spec registered for a crew, or undefined for text-only crews.
 */
export function findOutputSpec(crew: CrewName): OutputSpec<unknown> | undefined {
  const specs: OutputSpec<unknown>[] = Object.values(OUTPUT_SPECS);
  return specs.find((spec) => spec.crew === crew);
}

export function describeCrewOutput(crew: CrewName): string | undefined {
  return findOutputSpec(crew)?.description;
}
