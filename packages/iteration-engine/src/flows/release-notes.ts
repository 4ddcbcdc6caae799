/**
 * Best-effort changelog update after an iteration.
 */

import * as path from 'node:path';
import { glob } from 'glob';
import { err, ok, silentLogger, toError } from '@devcrew/crew-contracts';
import type { ActionStep, Collaborator, Logger, ProjectStructure, Result } from '@devcrew/crew-contracts';
import { readTextOrNull, writeText } from '../fs/file-operations.js';
import { isWithin, toRelative } from '../fs/path-guard.js';
import type { DiffIntegrator } from '../execution/diff-integrator.js';

export const RELEASE_NOTES_CONFIG = {
  docExtensions: ['md', 'rst', 'txt', 'mdx'],
  namePattern: /\b(?:changelog|change(?:s|log)?|release[-_ ]?notes?|history|whats[-_ ]?new|news)\b/i,
  prunedDirs: ['build', 'node_modules', '.git', '.devcrew'],
  defaultVersion: 'Unreleased',
  /** Plan steps described to the collaborator */
  maxPlanSteps: 20,
} as const;

export type ReleaseNotesOutcome =
  | { status: 'updated'; path: string; version: string }
  | { status: 'not_found' }
  | { status: 'unchanged'; path: string };

export interface ReleaseNotesUpdaterConfig {
  structure: ProjectStructure;
  collaborator: Collaborator;
  integrator: DiffIntegrator;
  packageMarkers: string[];
  logger?: Logger;
  /** Injected for tests */
  now?: () => Date;
}

function depth(relPath: string): number {
  return relPath.split('/').length;
}

/**
 * First changelog-like document under `root`, shallowest first.
 */
async function scanForReleaseNotes(root: string): Promise<string | null> {
  const files = await glob(`**/*.{${RELEASE_NOTES_CONFIG.docExtensions.join(',')}}`, {
    cwd: root,
    nodir: true,
    posix: true,
    nocase: true,
    ignore: RELEASE_NOTES_CONFIG.prunedDirs.map((dir) => `**/${dir}/**`),
  });
  const ordered = files.sort((a, b) => depth(a) - depth(b) || a.localeCompare(b));
  for (const file of ordered) {
    const stem = path.posix.parse(file).name;
    if (RELEASE_NOTES_CONFIG.namePattern.test(stem)) {
      return path.join(root, file);
    }
  }
  return null;
}

/**
 * Scans from the docs root up to the repository, then the whole repository.
 */
export async function findReleaseNotes(repository: string, docsRoot: string | null): Promise<string | null> {
  const stop = path.resolve(repository);
  if (docsRoot && isWithin(stop, docsRoot)) {
    let current = path.resolve(docsRoot);
    for (;;) {
      const found = await scanForReleaseNotes(current);
      if (found) {
        return found;
      }
      if (current === stop) {
        break;
      }
      current = path.dirname(current);
    }
  }
  return scanForReleaseNotes(stop);
}

function matchVersion(text: string | null, pattern: RegExp): string | null {
  const match = text ? pattern.exec(text) : null;
  const version = match?.[1]?.trim();
  return version ? version : null;
}

function versionFromPackageJson(text: string | null): string | null {
  if (!text) {
    return null;
  }
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof document === 'object' && document !== null && 'version' in document) {
    const version = document.version;
    return typeof version === 'string' && version.trim() ? version.trim() : null;
  }
  return null;
}

function versionFromSetupCfg(text: string | null): string | null {
  if (!text) {
    return null;
  }
  let inMetadata = false;
  for (const line of text.split(/\r?\n/)) {
    const section = /^\s*\[([^\]]+)\]\s*$/.exec(line);
    if (section) {
      inMetadata = section[1]?.trim() === 'metadata';
      continue;
    }
    if (inMetadata) {
      const version = matchVersion(line, /^\s*version\s*[=:]\s*(.+?)\s*$/);
      if (version) {
        return version;
      }
    }
  }
  return null;
}

/**
 * Current project version from the usual manifests; null when none declares one.
 */
export async function detectCurrentVersion(
  repository: string,
  sourceRoot: string | null,
  packageMarkers: string[] = ['__init__.py']
): Promise<string | null> {
  const read = (name: string) => readTextOrNull(path.join(repository, name));

  const detected =
    versionFromPackageJson(await read('package.json')) ??
    matchVersion(await read('pyproject.toml'), /^version\s*=\s*['"]([^'"]+)['"]/m) ??
    versionFromSetupCfg(await read('setup.cfg')) ??
    matchVersion(await read('setup.py'), /version\s*=\s*['"]([^'"]+)['"]/);
  if (detected) {
    return detected;
  }

  if (!sourceRoot || packageMarkers.length === 0) {
    return null;
  }
  const markers = await glob(
    packageMarkers.length === 1 ? `**/${packageMarkers[0]}` : `**/{${packageMarkers.join(',')}}`,
    { cwd: sourceRoot, nodir: true, posix: true, ignore: RELEASE_NOTES_CONFIG.prunedDirs.map((dir) => `**/${dir}/**`) }
  );
  for (const marker of markers.sort()) {
    const version = matchVersion(
      await readTextOrNull(path.join(sourceRoot, marker)),
      /__version__\s*=\s*['"]([^'"]+)['"]/
    );
    if (version) {
      return version;
    }
  }
  return null;
}

export class ReleaseNotesUpdater {
  private readonly logger: Logger;

  constructor(private readonly config: ReleaseNotesUpdaterConfig) {
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Never throws; failures come back as `err`.
   */
  async update(userPrompt: string, plan: ActionStep[]): Promise<Result<ReleaseNotesOutcome>> {
    try {
      return ok(await this.updateUnsafe(userPrompt, plan));
    } catch (error) {
      const failure = toError(error);
      this.logger.warn('Release notes update failed', { error: failure.message });
      return err(failure);
    }
  }

  private async updateUnsafe(userPrompt: string, plan: ActionStep[]): Promise<ReleaseNotesOutcome> {
    const { structure, collaborator, integrator } = this.config;

    const notesPath = await findReleaseNotes(structure.repository, structure.docsRoot);
    if (!notesPath) {
      this.logger.debug('No release notes document found');
      return { status: 'not_found' };
    }
    const docPath = toRelative(structure.repository, notesPath);

    const original = (await readTextOrNull(notesPath)) ?? '';
    const version =
      (await detectCurrentVersion(structure.repository, structure.sourceRoot, this.config.packageMarkers)) ??
      RELEASE_NOTES_CONFIG.defaultVersion;
    const today = (this.config.now ?? (() => new Date()))().toISOString().slice(0, 10);

    const result = await collaborator.invoke({
      crew: 'release_notes_update',
      inputs: {
        user_prompt: userPrompt,
        action_plan: plan
          .slice(0, RELEASE_NOTES_CONFIG.maxPlanSteps)
          .map((step) => (step.description || step.title).trim())
          .join('\n'),
        current_content: original,
        version,
        date: today,
        doc_path: docPath,
      },
    });
    const diff = result.text.trim();
    if (!diff) {
      return { status: 'unchanged', path: docPath };
    }

    const updated = await integrator.integrate(docPath, original, [diff]);
    await writeText(notesPath, updated);
    this.logger.info('Release notes updated', { path: docPath, version });
    return { status: 'updated', path: docPath, version };
  }
}
