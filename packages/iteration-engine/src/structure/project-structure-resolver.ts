/**
 * Discovers (or recalls) where a repository keeps its source, docs and tests.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { OUTPUT_SPECS, ProjectStructureError, silentLogger } from '@devcrew/crew-contracts';
import type { DevcrewConfig, Logger, ProjectStructure } from '@devcrew/crew-contracts';
import { WORKSPACE_CONFIG, stateDir } from '../config.js';
import { listFiles } from '../fs/enumerate.js';
import { statOrNull } from '../fs/file-operations.js';
import { isWithin, resolveWithin } from '../fs/path-guard.js';
import type { StructuredOutputLoader } from '../output/structured-output-loader.js';
import type { SnapshotStore } from './snapshot-store.js';

export interface ProjectStructureResolverConfig {
  repository: string;
  loader: StructuredOutputLoader;
  snapshots: SnapshotStore;
  config: Pick<DevcrewConfig, 'sourceExtensions' | 'docExtensions' | 'ignoreDirs'>;
  logger?: Logger;
}

async function isDirectory(target: string): Promise<boolean> {
  return (await statOrNull(target))?.isDirectory() ?? false;
}

export class ProjectStructureResolver {
  private readonly logger: Logger;

  constructor(private readonly options: ProjectStructureResolverConfig) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Returns the persisted structure when the snapshot declares a source root
   * and test roots; otherwise asks the structure crew and persists its answer.
   */
  async resolve(): Promise<ProjectStructure> {
    const { snapshots } = this.options;

    const snapshot = await snapshots.load();
    const recalled = snapshot ? snapshots.toStructure(snapshot) : null;
    if (recalled && (await isDirectory(recalled.sourceRoot))) {
      this.logger.debug('Project structure recalled from snapshot', { sourceRoot: recalled.sourceRoot });
      await fs.mkdir(recalled.summariesRoot, { recursive: true });
      return recalled;
    }

    const structure = await this.discover();
    await fs.mkdir(structure.summariesRoot, { recursive: true });
    await snapshots.update(structure);
    this.logger.info('Project structure discovered', {
      sourceRoot: structure.sourceRoot,
      docsRoot: structure.docsRoot,
      testRoots: structure.testRoots,
    });
    return structure;
  }

  private async discover(): Promise<ProjectStructure> {
    const { repository, config } = this.options;

    const files = await listFiles(repository, [...config.sourceExtensions, ...config.docExtensions], config.ignoreDirs);
    const output = await this.options.loader.request(OUTPUT_SPECS.projectStructure, {
      repository: path.basename(repository),
      files,
    });

    const sourceRoot = resolveWithin(repository, output.code_dir);
    if (!(await isDirectory(sourceRoot))) {
      throw new ProjectStructureError(`Source root "${output.code_dir}" is not a directory`, {
        repository,
        code_dir: output.code_dir,
      });
    }

    let docsRoot: string | null = null;
    if (output.docs_dir) {
      const candidate = resolveWithin(repository, output.docs_dir);
      if (await isDirectory(candidate)) {
        docsRoot = candidate;
      } else {
        this.logger.warn('Ignoring missing docs root', { docs_dir: output.docs_dir });
      }
    }

    const testRoots: string[] = [];
    for (const dir of output.test_dirs) {
      const candidate = resolveWithin(repository, dir);
      if (!testRoots.includes(candidate) && (await isDirectory(candidate))) {
        testRoots.push(candidate);
      } else {
        this.logger.warn('Ignoring test root', { test_dir: dir });
      }
    }

    const defaultSummariesRoot = path.join(stateDir(repository), WORKSPACE_CONFIG.summariesDirName);
    let summariesRoot = defaultSummariesRoot;
    if (output.summaries_dir) {
      const candidate = resolveWithin(repository, output.summaries_dir);
      if (candidate === path.resolve(repository) || isWithin(sourceRoot, candidate)) {
        this.logger.warn('Summaries root must sit outside the source root, using default', {
          summaries_dir: output.summaries_dir,
        });
      } else {
        summariesRoot = candidate;
      }
    }

    return { repository, sourceRoot, docsRoot, testRoots, summariesRoot };
  }
}
