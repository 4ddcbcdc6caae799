/**
 * Persisted project snapshot (`.devcrew/project.yaml`).
 *
 * Paths are stored relative to the repository so the snapshot survives the
 * repository being moved. Updates are read-modify-write; one run per
 * repository at a time is assumed.
 */

import * as path from 'node:path';
import { parse as parseYAML, stringify as stringifyYAML } from 'yaml';
import { ProjectSnapshotSchema, silentLogger } from '@devcrew/crew-contracts';
import type { Logger, ProjectSnapshot, ProjectStructure, TestConfig } from '@devcrew/crew-contracts';
import { WORKSPACE_CONFIG, stateDir } from '../config.js';
import { readTextOrNull, writeText } from '../fs/file-operations.js';
import { toRelative } from '../fs/path-guard.js';

function toStored(repository: string, target: string): string {
  return toRelative(repository, target) || '.';
}

export class SnapshotStore {
  private readonly logger: Logger;

  constructor(
    private readonly repository: string,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  get filePath(): string {
    return path.join(stateDir(this.repository), WORKSPACE_CONFIG.snapshotFileName);
  }

  /**
   * Loads the snapshot; null when absent or unreadable.
   */
  async load(): Promise<ProjectSnapshot | null> {
    const raw = await readTextOrNull(this.filePath);
    if (raw === null) {
      return null;
    }
    let document: unknown;
    try {
      document = parseYAML(raw);
    } catch (error) {
      this.logger.warn('Ignoring unparseable project snapshot', {
        file: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    const parsed = ProjectSnapshotSchema.safeParse(document);
    if (!parsed.success) {
      this.logger.warn('Ignoring invalid project snapshot', { file: this.filePath, error: parsed.error.message });
      return null;
    }
    return parsed.data;
  }

  async save(snapshot: ProjectSnapshot): Promise<void> {
    const stamped: ProjectSnapshot = { ...snapshot, updated_at: new Date().toISOString() };
    await writeText(this.filePath, stringifyYAML(stamped));
    this.logger.debug('Project snapshot saved', { file: this.filePath });
  }

  /**
   * Read-modify-write of the persisted snapshot.
   */
  async update(
    structure: ProjectStructure,
    testConfig?: TestConfig | null
  ): Promise<ProjectSnapshot> {
    const current = await this.load();
    const snapshot = this.fromStructure(
      structure,
      testConfig === undefined ? (current ? SnapshotStore.toTestConfig(current) : null) : testConfig
    );
    await this.save(snapshot);
    return snapshot;
  }

  fromStructure(structure: ProjectStructure, testConfig: TestConfig | null): ProjectSnapshot {
    return {
      repository: this.repository,
      structure: {
        source_root: toStored(this.repository, structure.sourceRoot),
        docs_root: structure.docsRoot ? toStored(this.repository, structure.docsRoot) : null,
        test_roots: structure.testRoots.map((root) => toStored(this.repository, root)),
        summaries_root: toStored(this.repository, structure.summariesRoot),
      },
      test_config: testConfig
        ? {
            framework: testConfig.framework,
            command: testConfig.command,
            description: testConfig.description,
            examples: testConfig.examples,
          }
        : null,
    };
  }

  /**
   * Structure recorded in the snapshot, or null when it lacks a source root
   * or test roots.
   */
  toStructure(snapshot: ProjectSnapshot): ProjectStructure | null {
    const { source_root, test_roots, docs_root, summaries_root } = snapshot.structure;
    if (source_root === null || test_roots === null) {
      return null;
    }
    return {
      repository: this.repository,
      sourceRoot: path.resolve(this.repository, source_root),
      docsRoot: docs_root === null ? null : path.resolve(this.repository, docs_root),
      testRoots: test_roots.map((root) => path.resolve(this.repository, root)),
      summariesRoot: path.resolve(this.repository, summaries_root),
    };
  }

  static toTestConfig(snapshot: ProjectSnapshot): TestConfig | null {
    const stored = snapshot.test_config;
    return stored ? { ...stored } : null;
  }
}
