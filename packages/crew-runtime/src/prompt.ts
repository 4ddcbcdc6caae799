/**
 * @module @devcrew/crew-runtime/prompt
 * Prompt assembly for crew calls.
 */

import { stringify as stringifyYAML } from 'yaml';
import type { CrewInputs, CrewName } from '@devcrew/crew-contracts';
import type { CrewDefinition, LLMMessage } from './types.js';

/**
 * Builds the system + user messages for one crew call. Inputs are rendered
 * as YAML so multi-line code stays readable for the model.
 */
export function buildCrewMessages(
  crew: CrewName,
  definition: CrewDefinition,
  inputs: CrewInputs,
  outputSchema: string | undefined
): LLMMessage[] {
  const format = outputSchema
    ? `Respond with JSON only, no prose and no code fences, matching this schema:\n${outputSchema}`
    : 'Respond with the requested content only, no commentary.';

  const system = [`You are the ${definition.role} (${crew}).`, `Goal: ${definition.goal}`, '', format].join('\n');

  const user = Object.keys(inputs).length > 0 ? stringifyYAML(inputs, { lineWidth: 0 }) : '(no inputs)';

  return [
    { role: 'system', content: system },
    { role: 'user', content: user },
  ];
}
