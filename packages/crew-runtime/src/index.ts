/**
 * @module @devcrew/crew-runtime
 * LLM-backed collaborator runtime.
 */

export { LLMCrewCollaborator } from './collaborator.js';
export { CrewCatalogue, loadCrewCatalogue, parseCrewCatalogue, DEFAULT_CATALOGUE_PATH } from './catalogue.js';
export { buildCrewMessages } from './prompt.js';

export type {
  LLMClient,
  LLMMessage,
  LLMChatOptions,
  LLMChatResponse,
  LLMResolver,
  CrewDefinition,
  CrewCollaboratorConfig,
} from './types.js';
