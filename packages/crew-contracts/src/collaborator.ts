/**
 * Collaborator port.
 *
 * A collaborator is an opaque LLM-backed crew: it receives named inputs and
 * returns either pre-validated structured data or raw text. Callers must not
 * assume either is present or well formed.
 */

export type LLMTier = 'small' | 'medium' | 'large';

/**
 * Closed set of crews the pipelines invoke.
 */
export const CREW_NAMES = [
  'project_structure',
  'tests_conf',
  'file_summaries',
  'module_summaries',
  'relevant_modules',
  'file_detail',
  'action_plan',
  'rename_mapping',
  'move_mapping',
  'copy_mapping',
  'development_diff',
  'diff_integrator',
  'tests_planning',
  'tests_implementation',
  'tests_relevance',
  'tests_integrator',
  'test_output_report',
  'failure_grouping',
  'involved_files',
  'bug_analysis',
  'bug_fixer',
  'json_fixer',
  'release_notes_update',
  'project_design',
  'development',
  'summaries_from_design',
] as const;

export type CrewName = (typeof CREW_NAMES)[number];

export type CrewInputs = Record<string, unknown>;

export interface CollaboratorRequest {
  crew: CrewName;
  inputs: CrewInputs;
  /** Overrides the crew's default tier (used by point-tiered crews) */
  tier?: LLMTier;
}

export interface CollaboratorResult {
  /** Raw text output, always present (may be empty) */
  text: string;
  /** Output already validated by the collaborator, when it could do so */
  structured?: unknown;
}

export interface Collaborator {
  invoke(request: CollaboratorRequest): Promise<CollaboratorResult>;
}

// ═══════════════════════════════════════════════════════════════════════════
// Point-tiered crews
// ═══════════════════════════════════════════════════════════════════════════

export type SeniorityLabel = 'Junior' | 'Senior' | 'Lead';

export interface TierAssignment {
  tier: LLMTier;
  label: SeniorityLabel;
}

/**
 * Maps story points to a collaborator tier: <=1 junior, 2 senior, >=3 lead.
 */
export function tierForPoints(points: number): TierAssignment {
  if (!Number.isFinite(points) || points <= 1) {
    return { tier: 'small', label: 'Junior' };
  }
  if (points < 3) {
    return { tier: 'medium', label: 'Senior' };
  }
  return { tier: 'large', label: 'Lead' };
}
