/**
 * Converts a change request into an ordered action plan.
 *
 * Three narrowing calls: module summaries → relevant files → which of those
 * need full code → the plan itself.
 */

import { OUTPUT_SPECS, normalizeStepType, silentLogger } from '@devcrew/crew-contracts';
import type { ActionStep, ActionStepOutput, Logger, ProjectStructure } from '@devcrew/crew-contracts';
import { readTextOrNull } from '../fs/file-operations.js';
import { resolveWithin, toSourceRelative } from '../fs/path-guard.js';
import type { StructuredOutputLoader } from '../output/structured-output-loader.js';
import type { SummaryStore } from '../summaries/summary-store.js';

export interface ActionPlannerConfig {
  structure: ProjectStructure;
  loader: StructuredOutputLoader;
  summaries: SummaryStore;
  logger?: Logger;
}

export function toActionStep(output: ActionStepOutput): ActionStep {
  return {
    step: output.step,
    title: output.title,
    description: output.description,
    artifacts: output.artifacts,
    label: output.type,
    type: normalizeStepType(output.type, output.artifacts[0]),
    points: output.points,
  };
}

export class ActionPlanner {
  private readonly logger: Logger;

  constructor(private readonly config: ActionPlannerConfig) {
    this.logger = config.logger ?? silentLogger;
  }

  private toSourceRelative(candidate: string): string {
    return toSourceRelative(this.config.structure.sourceRoot, candidate);
  }

  async plan(userPrompt: string): Promise<ActionStep[]> {
    const { loader, summaries } = this.config;

    const moduleSummaries = await summaries.readModuleSummaries();
    const relevant = (
      await loader.request(OUTPUT_SPECS.relevantModules, {
        user_prompt: userPrompt,
        module_summaries: moduleSummaries,
      })
    )
      .map((candidate) => this.toSourceRelative(candidate))
      .filter((candidate) => candidate.length > 0);
    this.logger.debug('Relevant files selected', { count: relevant.length });

    const fileSummaries = await summaries.readFileSummaries(relevant);
    const detail = await loader.request(OUTPUT_SPECS.fileDetail, {
      user_prompt: userPrompt,
      file_summaries: fileSummaries,
    });

    const summaryContext = await summaries.readFileSummaries(detail.summaries_only.map((p) => this.toSourceRelative(p)));
    const codeContext: Record<string, string> = {};
    for (const candidate of detail.need_code) {
      const relPath = this.toSourceRelative(candidate);
      const content = await readTextOrNull(resolveWithin(this.config.structure.sourceRoot, relPath));
      if (content !== null) {
        codeContext[relPath] = content;
      }
    }

    const steps = await loader.request(OUTPUT_SPECS.actionPlan, {
      user_prompt: userPrompt,
      module_summaries: moduleSummaries,
      summaries: summaryContext,
      code: codeContext,
      file_listing: await summaries.listSourceFiles(),
    });

    // Executed in the order the crew listed them; `step` is informational
    const plan = steps.map((output) =>
      toActionStep({ ...output, artifacts: output.artifacts.map((a) => this.toSourceRelative(a)) })
    );
    this.logger.info('Action plan ready', { steps: plan.length });
    return plan;
  }
}
