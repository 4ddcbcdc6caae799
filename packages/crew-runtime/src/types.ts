/**
 * @module @devcrew/crew-runtime/types
 * LLM client port and crew catalogue types.
 */

import type { LLMTier, Logger } from '@devcrew/crew-contracts';
import type { CrewCatalogue } from './catalogue.js';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMChatOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface LLMChatResponse {
  content: string;
}

/**
 * Minimal chat-completion client. Provider adapters implement this.
 */
export interface LLMClient {
  chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMChatResponse>;
}

/**
 * Resolves the client serving a tier (small, medium, large).
 */
export type LLMResolver = (tier: LLMTier) => LLMClient;

export interface CrewDefinition {
  tier: LLMTier;
  role: string;
  goal: string;
}

export interface CrewCollaboratorConfig {
  /** Maps a tier onto the LLM client that serves it */
  resolveLLM: LLMResolver;

  /** Crew catalogue; `loadCrewCatalogue()` reads the bundled one */
  catalogue: CrewCatalogue;

  /**
   * Retries after a failed or empty completion
   * @default 2
   */
  maxRetries?: number;

  /**
   * Sampling temperature
   * @default 0.1
   */
  temperature?: number;

  logger?: Logger;
}
