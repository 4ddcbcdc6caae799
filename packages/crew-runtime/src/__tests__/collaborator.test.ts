import { describe, it, expect, vi } from 'vitest';
import { CREW_NAMES, DevcrewError } from '@devcrew/crew-contracts';
import type { CrewName, LLMTier } from '@devcrew/crew-contracts';
import { CrewCatalogue } from '../catalogue.js';
import { LLMCrewCollaborator } from '../collaborator.js';
import type { CrewDefinition, LLMChatOptions, LLMChatResponse, LLMClient, LLMMessage } from '../types.js';

function createCatalogue(): CrewCatalogue {
  const definitions: Partial<Record<CrewName, CrewDefinition>> = {};
  for (const name of CREW_NAMES) {
    definitions[name] = { tier: 'medium', role: `${name} role`, goal: `${name} goal` };
  }
  return CrewCatalogue.from(definitions);
}

function createMockLLM(responses: Array<string | Error>) {
  const queue = [...responses];
  const chat = vi.fn(async (_messages: LLMMessage[], _options?: LLMChatOptions): Promise<LLMChatResponse> => {
    const next = queue.shift();
    if (next === undefined) {
      throw new Error('no scripted response');
    }
    if (next instanceof Error) {
      throw next;
    }
    return { content: next };
  });
  const client: LLMClient = { chat };
  return { client, chat };
}

describe('LLMCrewCollaborator', () => {
  it('returns structured output when the text satisfies the crew schema', async () => {
    const { client } = createMockLLM(['```json\n{"pkg/a.py": "pkg/b.py"}\n```']);
    const collaborator = new LLMCrewCollaborator({ resolveLLM: () => client, catalogue: createCatalogue() });

    const result = await collaborator.invoke({ crew: 'rename_mapping', inputs: { instruction: 'rename a' } });

    expect(result.structured).toEqual({ 'pkg/a.py': 'pkg/b.py' });
    expect(result.text).toBe('```json\n{"pkg/a.py": "pkg/b.py"}\n```');
  });

  it('returns raw text when the output does not validate', async () => {
    const { client } = createMockLLM(['not json at all']);
    const collaborator = new LLMCrewCollaborator({ resolveLLM: () => client, catalogue: createCatalogue() });

    const result = await collaborator.invoke({ crew: 'action_plan', inputs: {} });

    expect(result).toEqual({ text: 'not json at all' });
  });

  it('never attaches structured output for text-only crews', async () => {
    const { client } = createMockLLM(['{"a": 1}']);
    const collaborator = new LLMCrewCollaborator({ resolveLLM: () => client, catalogue: createCatalogue() });

    const result = await collaborator.invoke({ crew: 'diff_integrator', inputs: {} });

    expect(result.structured).toBeUndefined();
  });

  it('routes to the requested tier, falling back to the crew default', async () => {
    const { client } = createMockLLM(['[]', '[]']);
    const resolveLLM = vi.fn((_tier: LLMTier) => client);
    const collaborator = new LLMCrewCollaborator({ resolveLLM, catalogue: createCatalogue() });

    await collaborator.invoke({ crew: 'bug_fixer', inputs: {}, tier: 'large' });
    await collaborator.invoke({ crew: 'bug_fixer', inputs: {} });

    expect(resolveLLM.mock.calls.map((call) => call[0])).toEqual(['large', 'medium']);
  });

  it('retries failed and empty completions', async () => {
    const { client, chat } = createMockLLM([new Error('rate limited'), '  ', '[]']);
    const collaborator = new LLMCrewCollaborator({ resolveLLM: () => client, catalogue: createCatalogue() });

    const result = await collaborator.invoke({ crew: 'bug_fixer', inputs: {} });

    expect(chat).toHaveBeenCalledTimes(3);
    expect(result.structured).toEqual([]);
  });

  it('gives up after the retry budget', async () => {
    const { client, chat } = createMockLLM([new Error('down'), new Error('down')]);
    const collaborator = new LLMCrewCollaborator({
      resolveLLM: () => client,
      catalogue: createCatalogue(),
      maxRetries: 1,
    });

    await expect(collaborator.invoke({ crew: 'json_fixer', inputs: {} })).rejects.toThrow(DevcrewError);
    expect(chat).toHaveBeenCalledTimes(2);
  });

  it('sends the crew role and output schema in the system prompt', async () => {
    const { client, chat } = createMockLLM(['{}']);
    const collaborator = new LLMCrewCollaborator({ resolveLLM: () => client, catalogue: createCatalogue() });

    await collaborator.invoke({ crew: 'copy_mapping', inputs: { artifacts: ['a.py'] } });

    const [messages] = chat.mock.calls[0] ?? [];
    expect(messages?.[0]?.content).toContain('You are the copy_mapping role (copy_mapping).');
    expect(messages?.[0]?.content).toContain('{"<source path>": "<copy path>"}');
    expect(messages?.[1]?.content).toBe('artifacts:\n  - a.py\n');
  });
});
