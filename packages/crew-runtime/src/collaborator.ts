/**
 * @module @devcrew/crew-runtime/collaborator
 * LLM-backed implementation of the Collaborator port.
 */

import {
  DevcrewError,
  describeError,
  findOutputSpec,
  parseJsonText,
  silentLogger,
  unwrapRoot,
} from '@devcrew/crew-contracts';
import type {
  Collaborator,
  CollaboratorRequest,
  CollaboratorResult,
  Logger,
  OutputSpec,
} from '@devcrew/crew-contracts';
import { buildCrewMessages } from './prompt.js';
import type { CrewCollaboratorConfig } from './types.js';

/**
 * Runs crews against tiered LLM clients.
 *
 * A completion is retried when the call throws or returns empty content.
 * When the text already satisfies the crew's output schema it is returned
 * as `structured`; otherwise callers repair and normalize the raw text.
 *
 * @example
 * ```typescript
 * const collaborator = new LLMCrewCollaborator({
 *   resolveLLM: (tier) => clients[tier],
 *   catalogue: await loadCrewCatalogue(),
 * });
 * const result = await collaborator.invoke({ crew: 'action_plan', inputs: { user_prompt } });
 * ```
 */
export class LLMCrewCollaborator implements Collaborator {
  private readonly maxRetries: number;
  private readonly temperature: number;
  private readonly logger: Logger;

  constructor(private readonly config: CrewCollaboratorConfig) {
    this.maxRetries = config.maxRetries ?? 2;
    this.temperature = config.temperature ?? 0.1;
    this.logger = config.logger ?? silentLogger;
  }

  async invoke(request: CollaboratorRequest): Promise<CollaboratorResult> {
    const definition = this.config.catalogue.get(request.crew);
    const tier = request.tier ?? definition.tier;
    const spec = findOutputSpec(request.crew);
    const messages = buildCrewMessages(request.crew, definition, request.inputs, spec?.description);
    const llm = this.config.resolveLLM(tier);

    let lastError = 'empty completion';
    for (let attempt = 1; attempt <= this.maxRetries + 1; attempt++) {
      this.logger.debug('Crew call', { crew: request.crew, tier, attempt });
      try {
        const response = await llm.chat(messages, { temperature: this.temperature });
        const text = response.content;
        if (text.trim().length > 0) {
          return this.toResult(text, spec?.schema);
        }
        lastError = 'empty completion';
      } catch (error) {
        lastError = describeError(error);
      }
      this.logger.warn('Crew call failed', { crew: request.crew, tier, attempt, error: lastError });
    }

    throw new DevcrewError('COLLABORATOR_FAILED', `Crew ${request.crew} failed after ${this.maxRetries + 1} attempts: ${lastError}`, {
      crew: request.crew,
      tier,
    });
  }

  private toResult(
    text: string,
    schema: OutputSpec<unknown>['schema'] | undefined
  ): CollaboratorResult {
    if (!schema) {
      return { text };
    }
    const parsed = parseJsonText(text);
    if (!parsed.ok) {
      return { text };
    }
    const validated = schema.safeParse(unwrapRoot(parsed.value));
    return validated.success ? { text, structured: validated.data } : { text };
  }
}
