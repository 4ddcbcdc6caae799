/**
 * @module @devcrew/crew-runtime/catalogue
 * Loads the YAML crew catalogue.
 */

import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse as parseYAML } from 'yaml';
import { z } from 'zod';
import { CREW_NAMES, ConfigError } from '@devcrew/crew-contracts';
import type { CrewName } from '@devcrew/crew-contracts';
import type { CrewDefinition } from './types.js';

export const DEFAULT_CATALOGUE_PATH = fileURLToPath(new URL('../crews.yml', import.meta.url));

const CrewDefinitionSchema = z.object({
  tier: z.enum(['small', 'medium', 'large']),
  role: z.string().min(1),
  goal: z.string().min(1),
});

const CatalogueFileSchema = z.object({
  crews: z.record(CrewDefinitionSchema),
});

/**
 * Crew definitions keyed by crew name. Complete by construction.
 */
export class CrewCatalogue {
  private constructor(private readonly definitions: ReadonlyMap<CrewName, CrewDefinition>) {}

  /**
   * Builds a catalogue; every known crew must be defined.
   */
  static from(definitions: Partial<Record<CrewName, CrewDefinition>>, source = 'catalogue'): CrewCatalogue {
    const entries = new Map<CrewName, CrewDefinition>();
    const missing: CrewName[] = [];
    for (const name of CREW_NAMES) {
      const definition = definitions[name];
      if (definition) {
        entries.set(name, definition);
      } else {
        missing.push(name);
      }
    }
    if (missing.length > 0) {
      throw new ConfigError(`Crew catalogue ${source} is missing: ${missing.join(', ')}`, { missing });
    }
    return new CrewCatalogue(entries);
  }

  get(name: CrewName): CrewDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new ConfigError(`Crew ${name} is not defined`);
    }
    return definition;
  }
}

/**
 * Validates a parsed catalogue document.
 */
export function parseCrewCatalogue(document: unknown, source = 'catalogue'): CrewCatalogue {
  const parsed = CatalogueFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(`Invalid crew catalogue in ${source}: ${parsed.error.message}`);
  }
  const known = new Set<string>(CREW_NAMES);
  const definitions: Partial<Record<CrewName, CrewDefinition>> = {};
  for (const name of CREW_NAMES) {
    const definition = parsed.data.crews[name];
    if (definition) {
      definitions[name] = definition;
    }
  }
  const unknown = Object.keys(parsed.data.crews).filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigError(`Crew catalogue ${source} defines unknown crews: ${unknown.join(', ')}`, { unknown });
  }
  return CrewCatalogue.from(definitions, source);
}

/**
 * Reads and validates a catalogue file (defaults to the bundled `crews.yml`).
 */
export async function loadCrewCatalogue(filePath: string = DEFAULT_CATALOGUE_PATH): Promise<CrewCatalogue> {
  const raw = await fs.readFile(filePath, 'utf-8');
  return parseCrewCatalogue(parseYAML(raw), filePath);
}
