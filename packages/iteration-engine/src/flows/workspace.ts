/**
 * Services bound to one resolved project structure.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { DevcrewError } from '@devcrew/crew-contracts';
import type { Collaborator, DevcrewConfig, Logger, ProjectStructure } from '@devcrew/crew-contracts';
import { DiffIntegrator } from '../execution/diff-integrator.js';
import { statOrNull } from '../fs/file-operations.js';
import { FilesystemMirror } from '../fs/filesystem-mirror.js';
import type { StructuredOutputLoader } from '../output/structured-output-loader.js';
import type { SnapshotStore } from '../structure/snapshot-store.js';
import { SummaryStore } from '../summaries/summary-store.js';

export interface Workspace {
  structure: ProjectStructure;
  config: DevcrewConfig;
  collaborator: Collaborator;
  loader: StructuredOutputLoader;
  snapshots: SnapshotStore;
  mirror: FilesystemMirror;
  summaries: SummaryStore;
  integrator: DiffIntegrator;
}

export interface WorkspaceOptions {
  structure: ProjectStructure;
  config: DevcrewConfig;
  collaborator: Collaborator;
  loader: StructuredOutputLoader;
  snapshots: SnapshotStore;
  logger: Logger;
}

export function openWorkspace(options: WorkspaceOptions): Workspace {
  const { structure, config, collaborator, loader, logger } = options;
  const mirror = new FilesystemMirror(structure, {
    sourceExtensions: config.sourceExtensions,
    packageMarkers: config.packageMarkers,
    testFilePattern: config.testFilePattern,
  });
  const summaries = new SummaryStore({
    structure,
    mirror,
    loader,
    sourceExtensions: config.sourceExtensions,
    ignoreDirs: config.ignoreDirs,
    logger,
  });
  const integrator = new DiffIntegrator({ structure, collaborator, summaries, logger });
  return { ...options, mirror, summaries, integrator };
}

/**
 * Validates the repository argument of an iteration: an absolute path to an
 * existing, non-empty directory.
 */
export async function ensureRepository(repository: string): Promise<string> {
  if (!path.isAbsolute(repository)) {
    throw new DevcrewError('REPOSITORY_INVALID', `Repository path must be absolute: ${repository}`, { repository });
  }
  const stats = await statOrNull(repository);
  if (!stats) {
    throw new DevcrewError('REPOSITORY_INVALID', `Repository does not exist: ${repository}`, { repository });
  }
  if (!stats.isDirectory()) {
    throw new DevcrewError('NOT_A_DIRECTORY', `Repository is not a directory: ${repository}`, { repository });
  }
  const entries = await fs.readdir(repository);
  if (entries.length === 0) {
    throw new DevcrewError('REPOSITORY_INVALID', `Repository is empty: ${repository}`, { repository });
  }
  return path.resolve(repository);
}
