/**
 * Mirrors source-tree operations into the summaries tree and the primary
 * test root.
 *
 * Mirroring is best effort: every call returns a `Result` and never throws,
 * so a failed mirror update cannot abort the step that triggered it.
 */

import * as path from 'node:path';
import { err, ok, toError } from '@devcrew/crew-contracts';
import type { ProjectStructure, Result } from '@devcrew/crew-contracts';
import { SUMMARY_CONFIG } from '../config.js';
import {
  copyFile,
  createDirectories,
  deleteDirectories,
  deleteFiles,
  moveFile,
  pathExists,
  renameFile,
  writeEmptyFiles,
} from './file-operations.js';
import { resolveWithin } from './path-guard.js';

export type MirrorTree = 'summaries' | 'tests';

export type MirrorOperation =
  | { kind: 'create_file'; path: string }
  | { kind: 'delete_file'; path: string }
  | { kind: 'create_directory'; path: string }
  | { kind: 'delete_directory'; path: string }
  | { kind: 'rename_file' | 'move_file' | 'copy_file'; from: string; to: string };

/**
 * - `applied`: the mirrored operation ran
 * - `placeholder`: the mirrored source was missing; an empty file was created at the destination
 * - `skipped`: nothing to mirror (no test root, non-source file, or missing mirrored target)
 */
export type MirrorOutcome = 'applied' | 'placeholder' | 'skipped';

export interface MirrorConfig {
  sourceExtensions: string[];
  packageMarkers: string[];
  /** Mirrored test file name; `{stem}` and `{ext}` are substituted */
  testFilePattern: string;
}

export class FilesystemMirror {
  constructor(
    private readonly structure: ProjectStructure,
    private readonly config: MirrorConfig
  ) {}

  /**
   * True for files that carry a FileSummary (source extension, not a package marker).
   */
  isSummarized(relPath: string): boolean {
    const base = path.posix.basename(relPath);
    if (this.config.packageMarkers.includes(base)) {
      return false;
    }
    const ext = path.posix.extname(base).replace(/^\./, '');
    return ext.length > 0 && this.config.sourceExtensions.includes(ext);
  }

  /**
   * FileSummary location for a source-relative path.
   */
  summaryPath(relPath: string): string {
    const parsed = path.posix.parse(relPath.replace(/\\/g, '/'));
    const mirrored = path.posix.join(parsed.dir, `${parsed.name}${SUMMARY_CONFIG.summaryExtension}`);
    return resolveWithin(this.structure.summariesRoot, mirrored);
  }

  /**
   * ModuleSummary location for a source-relative directory ('' is the source root).
   */
  moduleSummaryPath(relDir: string): string {
    return resolveWithin(this.structure.summariesRoot, path.posix.join(relDir || '.', SUMMARY_CONFIG.moduleSentinel));
  }

  /**
   * Mirrored test file in the primary test root, or null without test roots.
   */
  testPath(relPath: string): string | null {
    const testRoot = this.structure.testRoots[0];
    if (!testRoot) {
      return null;
    }
    const parsed = path.posix.parse(relPath.replace(/\\/g, '/'));
    const fileName = this.config.testFilePattern.replace('{stem}', parsed.name).replace('{ext}', parsed.ext);
    return resolveWithin(testRoot, path.posix.join(parsed.dir, fileName));
  }

  private mirrorFile(relPath: string, tree: MirrorTree): string | null {
    if (!this.isSummarized(relPath)) {
      return null;
    }
    return tree === 'summaries' ? this.summaryPath(relPath) : this.testPath(relPath);
  }

  private mirrorDirectory(relDir: string, tree: MirrorTree): string | null {
    if (tree === 'summaries') {
      return resolveWithin(this.structure.summariesRoot, relDir);
    }
    const testRoot = this.structure.testRoots[0];
    return testRoot ? resolveWithin(testRoot, relDir) : null;
  }

  /**
   * Applies `operation` to the mirrored locations in `tree`.
   */
  async apply(operation: MirrorOperation, tree: MirrorTree): Promise<Result<MirrorOutcome>> {
    try {
      return ok(await this.applyUnsafe(operation, tree));
    } catch (error) {
      return err(toError(error));
    }
  }

  private async applyUnsafe(operation: MirrorOperation, tree: MirrorTree): Promise<MirrorOutcome> {
    switch (operation.kind) {
      case 'create_file': {
        const target = this.mirrorFile(operation.path, tree);
        if (!target || (await pathExists(target))) {
          return 'skipped';
        }
        await writeEmptyFiles([target]);
        return 'applied';
      }
      case 'delete_file': {
        const target = this.mirrorFile(operation.path, tree);
        if (!target) {
          return 'skipped';
        }
        const deleted = await deleteFiles([target]);
        return deleted.length > 0 ? 'applied' : 'skipped';
      }
      case 'create_directory': {
        const target = this.mirrorDirectory(operation.path, tree);
        if (!target) {
          return 'skipped';
        }
        await createDirectories([target]);
        return 'applied';
      }
      case 'delete_directory': {
        const target = this.mirrorDirectory(operation.path, tree);
        if (!target) {
          return 'skipped';
        }
        const deleted = await deleteDirectories([target]);
        return deleted.length > 0 ? 'applied' : 'skipped';
      }
      case 'rename_file':
      case 'move_file':
      case 'copy_file':
        return this.transfer(operation.kind, operation.from, operation.to, tree);
    }
  }

  private async transfer(
    kind: 'rename_file' | 'move_file' | 'copy_file',
    from: string,
    to: string,
    tree: MirrorTree
  ): Promise<MirrorOutcome> {
    const source = this.mirrorFile(from, tree);
    const destination = this.mirrorFile(to, tree);
    if (!destination) {
      // Renamed away from a summarized extension: drop the orphaned mirror.
      if (source && kind !== 'copy_file') {
        const deleted = await deleteFiles([source]);
        return deleted.length > 0 ? 'applied' : 'skipped';
      }
      return 'skipped';
    }
    if (!source || !(await pathExists(source))) {
      if (await pathExists(destination)) {
        return 'skipped';
      }
      await writeEmptyFiles([destination]);
      return 'placeholder';
    }
    const transferFn = kind === 'copy_file' ? copyFile : kind === 'move_file' ? moveFile : renameFile;
    await transferFn(source, destination);
    return 'applied';
  }
}
