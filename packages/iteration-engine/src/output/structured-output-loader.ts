/**
 * Turns collaborator results into validated values.
 *
 * Order of attempts:
 * 1. pre-validated `structured` output
 * 2. raw text (too short → empty value of the shape)
 * 3. one pass through the JSON repair crew
 */

import { StructuredOutputError, parseJsonText, silentLogger, unwrapRoot } from '@devcrew/crew-contracts';
import type {
  Collaborator,
  CollaboratorResult,
  CrewInputs,
  LLMTier,
  Logger,
  OutputSpec,
} from '@devcrew/crew-contracts';
import { normalizeShape } from './shape-normalizer.js';

type Validation<T> = { ok: true; value: T } | { ok: false; reason: string };

export class StructuredOutputLoader {
  constructor(
    private readonly collaborator: Collaborator,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Invokes the spec's crew and loads its output.
   */
  async request<T>(spec: OutputSpec<T>, inputs: CrewInputs, tier?: LLMTier): Promise<T> {
    const result = await this.collaborator.invoke(tier ? { crew: spec.crew, inputs, tier } : { crew: spec.crew, inputs });
    return this.load(result, spec);
  }

  async load<T>(result: CollaboratorResult, spec: OutputSpec<T>): Promise<T> {
    if (result.structured !== undefined) {
      const validated = this.validate(result.structured, spec);
      if (validated.ok) {
        return validated.value;
      }
      this.logger.debug('Structured output rejected, falling back to text', { crew: spec.crew, reason: validated.reason });
    }

    const text = result.text.trim();
    if (text.length <= 2) {
      return this.empty(spec);
    }

    const first = this.parse(text, spec);
    if (first.ok) {
      return first.value;
    }

    this.logger.warn('Collaborator output needs repair', { crew: spec.crew, reason: first.reason });
    const repaired = await this.collaborator.invoke({
      crew: 'json_fixer',
      inputs: { broken_text: text, schema: spec.description },
    });

    const second = this.parse(repaired.text, spec);
    if (second.ok) {
      return second.value;
    }
    throw new StructuredOutputError(`Unusable output from ${spec.crew} after repair: ${second.reason}`, {
      crew: spec.crew,
      text: text.slice(0, 500),
    });
  }

  private parse<T>(text: string, spec: OutputSpec<T>): Validation<T> {
    const parsed = parseJsonText(text);
    if (!parsed.ok) {
      return { ok: false, reason: `invalid JSON: ${parsed.error}` };
    }
    return this.validate(unwrapRoot(parsed.value), spec);
  }

  private validate<T>(value: unknown, spec: OutputSpec<T>): Validation<T> {
    const shaped = normalizeShape(spec.shape, value);
    if (!shaped.ok) {
      return shaped;
    }
    const checked = spec.schema.safeParse(shaped.value);
    if (!checked.success) {
      return { ok: false, reason: checked.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ') };
    }
    return { ok: true, value: checked.data };
  }

  private empty<T>(spec: OutputSpec<T>): T {
    const blank = spec.shape === 'record' || spec.shape === 'object' ? {} : [];
    const checked = spec.schema.safeParse(blank);
    if (checked.success) {
      return checked.data;
    }
    throw new StructuredOutputError(`Empty output from ${spec.crew}`, { crew: spec.crew });
  }
}
