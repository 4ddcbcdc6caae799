/**
 * Merges accumulated diffs into files through the diff_integrator crew and
 * keeps the knowledge base in step with what was written.
 */

import { DevcrewError, describeError, silentLogger } from '@devcrew/crew-contracts';
import type { Collaborator, Logger, ProjectStructure } from '@devcrew/crew-contracts';
import { readTextOrNull, writeText } from '../fs/file-operations.js';
import { resolveWithin } from '../fs/path-guard.js';
import { sanitizeGeneratedContent } from '../output/content-sanitizer.js';
import { moduleOf } from '../summaries/summary-store.js';
import type { SummaryStore } from '../summaries/summary-store.js';
import type { ChangeSet } from './change-set.js';
import { diffLineStats, generateUnifiedDiff } from './diff-stats.js';

export interface DiffIntegratorConfig {
  structure: ProjectStructure;
  collaborator: Collaborator;
  summaries: SummaryStore;
  logger?: Logger;
}

export interface FileChangeStat {
  path: string;
  added: number;
  removed: number;
}

export interface IntegrationFailure {
  path: string;
  message: string;
}

export interface IntegrationReport {
  written: FileChangeStat[];
  failed: IntegrationFailure[];
  /** Written files whose FileSummary could not be regenerated */
  summaryFailures: IntegrationFailure[];
  /** Module directories of every written file */
  dirtyModules: string[];
}

export class DiffIntegrator {
  private readonly logger: Logger;

  constructor(private readonly config: DiffIntegratorConfig) {
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Applies `diffs` (in order) to `original`; returns the sanitized content.
   */
  async integrate(relPath: string, original: string, diffs: string[]): Promise<string> {
    const result = await this.config.collaborator.invoke({
      crew: 'diff_integrator',
      inputs: {
        file_path: relPath,
        original_code: original,
        code_diffs: diffs,
      },
    });
    if (result.text.trim().length === 0) {
      throw new DevcrewError('COLLABORATOR_FAILED', `Integrator returned no content for ${relPath}`, { path: relPath });
    }
    return sanitizeGeneratedContent(result.text);
  }

  /**
   * For each changed file: read once, integrate, write once, regenerate its
   * FileSummary. Failures are reported per file; the remaining files proceed.
   * A written file always marks its module dirty, even when its summary
   * could not be regenerated.
   */
  async applyChanges(changes: ChangeSet): Promise<IntegrationReport> {
    const report: IntegrationReport = { written: [], failed: [], summaryFailures: [], dirtyModules: [] };
    const dirty = new Set<string>();

    for (const [relPath, diffs] of changes.entries()) {
      let updated: string;
      try {
        const target = resolveWithin(this.config.structure.sourceRoot, relPath);
        const original = (await readTextOrNull(target)) ?? '';
        updated = await this.integrate(relPath, original, diffs);
        await writeText(target, updated);

        const stats = diffLineStats(original, updated);
        report.written.push({ path: relPath, ...stats });
        this.logger.debug('File integrated', { path: relPath, diff: generateUnifiedDiff(relPath, original, updated) });
      } catch (error) {
        const message = describeError(error);
        this.logger.error(`Integration failed for ${relPath}`, { error: message });
        report.failed.push({ path: relPath, message });
        continue;
      }

      dirty.add(moduleOf(relPath));
      try {
        await this.config.summaries.regenerateFile(relPath, updated);
      } catch (error) {
        const message = describeError(error);
        this.logger.warn(`Summary regeneration failed for ${relPath}`, { error: message });
        report.summaryFailures.push({ path: relPath, message });
      }
    }

    report.dirtyModules = [...dirty].sort();
    return report;
  }
}

