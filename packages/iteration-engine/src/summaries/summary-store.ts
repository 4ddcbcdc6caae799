/**
 * Persistent knowledge base of per-file and per-module summaries.
 *
 * Layout: `summariesRoot/<dir>/<stem>.yaml` per source file and
 * `summariesRoot/<dir>/_module.yaml` per directory. A module summary is
 * built only from the file summaries next to it, never from code. A missing
 * sentinel is the only staleness signal.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import { stringify as stringifyYAML } from 'yaml';
import { OUTPUT_SPECS, hasErrorCode, silentLogger } from '@devcrew/crew-contracts';
import type { Logger, ProjectStructure, SummaryEntry } from '@devcrew/crew-contracts';
import { SUMMARY_CONFIG } from '../config.js';
import { listFiles } from '../fs/enumerate.js';
import { deleteFiles, pathExists, readTextOrNull, writeText } from '../fs/file-operations.js';
import type { FilesystemMirror } from '../fs/filesystem-mirror.js';
import { toRelative, toSourceRelative } from '../fs/path-guard.js';
import { sanitizeGeneratedContent } from '../output/content-sanitizer.js';
import type { StructuredOutputLoader } from '../output/structured-output-loader.js';

export interface SummaryStoreConfig {
  structure: ProjectStructure;
  mirror: FilesystemMirror;
  loader: StructuredOutputLoader;
  sourceExtensions: string[];
  ignoreDirs: string[];
  logger?: Logger;
}

export interface SyncReport {
  /** Source-relative paths whose FileSummary was written */
  fileSummaries: string[];
  /** Module directories whose ModuleSummary was written ('' is the source root) */
  moduleSummaries: string[];
  /** Source files the collaborator returned no summary for */
  unsummarized: string[];
}

/**
 * Source-relative directory of a source-relative file ('' for the root).
 */
export function moduleOf(relPath: string): string {
  const dir = path.posix.dirname(relPath);
  return dir === '.' ? '' : dir;
}

/**
 * On-disk text of a summary: strings sanitized, structured content as YAML.
 */
export function renderSummary(content: SummaryEntry['content']): string {
  if (typeof content === 'string') {
    return sanitizeGeneratedContent(content);
  }
  return stringifyYAML(content);
}

export function normalizeDir(dir: string): string {
  return dir.replace(/\\/g, '/').replace(/^\.\/?/, '').replace(/\/$/, '');
}

function groupByModule(relPaths: string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const relPath of relPaths) {
    const key = moduleOf(relPath);
    const group = groups.get(key) ?? [];
    group.push(relPath);
    groups.set(key, group);
  }
  return groups;
}

export class SummaryStore {
  private readonly logger: Logger;

  constructor(private readonly config: SummaryStoreConfig) {
    this.logger = config.logger ?? silentLogger;
  }

  get summariesRoot(): string {
    return this.config.structure.summariesRoot;
  }

  /**
   * Summarized source files, relative to the source root.
   */
  async listSourceFiles(): Promise<string[]> {
    const files = await listFiles(
      this.config.structure.sourceRoot,
      this.config.sourceExtensions,
      this.config.ignoreDirs
    );
    return files.filter((file) => this.config.mirror.isSummarized(file));
  }

  async readFileSummary(relPath: string): Promise<string | null> {
    return readTextOrNull(this.config.mirror.summaryPath(relPath));
  }

  /**
   * FileSummaries for the given source files; missing ones are omitted.
   */
  async readFileSummaries(relPaths: string[]): Promise<Record<string, string>> {
    const summaries: Record<string, string> = {};
    for (const relPath of relPaths) {
      const content = await this.readFileSummary(relPath);
      if (content !== null) {
        summaries[relPath] = content;
      }
    }
    return summaries;
  }

  /**
   * Every ModuleSummary keyed by module directory.
   */
  async readModuleSummaries(): Promise<Record<string, string>> {
    const sentinels = await glob(`**/${SUMMARY_CONFIG.moduleSentinel}`, {
      cwd: this.summariesRoot,
      nodir: true,
      posix: true,
    });
    const summaries: Record<string, string> = {};
    for (const sentinel of sentinels.sort()) {
      const content = await readTextOrNull(path.join(this.summariesRoot, sentinel));
      if (content !== null) {
        summaries[moduleOf(sentinel.replace(/\\/g, '/'))] = content;
      }
    }
    return summaries;
  }

  /**
   * Brings the knowledge base up to date: summarizes source files lacking a
   * FileSummary (one call per module) and builds missing ModuleSummaries.
   */
  async sync(): Promise<SyncReport> {
    const report: SyncReport = { fileSummaries: [], moduleSummaries: [], unsummarized: [] };
    const sourceFiles = await this.listSourceFiles();

    const missing: string[] = [];
    for (const relPath of sourceFiles) {
      if (!(await pathExists(this.config.mirror.summaryPath(relPath)))) {
        missing.push(relPath);
      }
    }

    for (const [moduleDir, relPaths] of groupByModule(missing)) {
      this.logger.info('Summarizing module files', { module: moduleDir || '.', files: relPaths.length });
      const written = await this.summarizeFiles(relPaths);
      report.fileSummaries.push(...written);
      report.unsummarized.push(...relPaths.filter((relPath) => !written.includes(relPath)));
    }

    const modules = [...new Set(sourceFiles.map(moduleOf))].sort();
    for (const moduleDir of modules) {
      if (await pathExists(this.config.mirror.moduleSummaryPath(moduleDir))) {
        continue;
      }
      if (await this.buildModuleSummary(moduleDir)) {
        report.moduleSummaries.push(moduleDir);
      }
    }

    return report;
  }

  /**
   * Replaces the FileSummary of a just-written source file. Returns the
   * module directory to refresh.
   */
  async regenerateFile(relPath: string, content: string): Promise<string> {
    const moduleDir = moduleOf(relPath);
    if (!this.config.mirror.isSummarized(relPath)) {
      return moduleDir;
    }
    await deleteFiles([this.config.mirror.summaryPath(relPath)]);
    const written = await this.summarizeFiles([relPath], { [relPath]: content });
    if (written.length === 0) {
      this.logger.warn('No summary returned for regenerated file', { path: relPath });
    }
    return moduleDir;
  }

  /**
   * Deletes and rebuilds the ModuleSummary of each dirty directory.
   * Returns the directories rebuilt; empty modules are skipped.
   */
  async regenerateModules(dirtyModules: Iterable<string>): Promise<string[]> {
    const rebuilt: string[] = [];
    for (const moduleDir of [...new Set(dirtyModules)].sort()) {
      await deleteFiles([this.config.mirror.moduleSummaryPath(moduleDir)]);
      if (await this.buildModuleSummary(moduleDir)) {
        rebuilt.push(moduleDir);
      }
    }
    return rebuilt;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════════════

  private async summarizeFiles(relPaths: string[], contents: Record<string, string> = {}): Promise<string[]> {
    const codeChunk: Record<string, string> = {};
    for (const relPath of relPaths) {
      codeChunk[relPath] =
        contents[relPath] ?? (await readTextOrNull(path.join(this.config.structure.sourceRoot, relPath))) ?? '';
    }

    const entries = await this.config.loader.request(OUTPUT_SPECS.fileSummaries, { code_chunk: codeChunk });

    const written: string[] = [];
    for (const entry of entries) {
      const target = this.matchRequestedPath(entry.path, relPaths);
      if (!target || written.includes(target)) {
        this.logger.debug('Ignoring summary for unrequested path', { path: entry.path });
        continue;
      }
      await writeText(this.config.mirror.summaryPath(target), renderSummary(entry.content));
      written.push(target);
    }
    return written;
  }

  private matchRequestedPath(returned: string, requested: string[]): string | undefined {
    const normalized = returned.trim().replace(/\\/g, '/').replace(/^\.\//, '');
    const withoutRoot = toSourceRelative(this.config.structure.sourceRoot, normalized);

    for (const relPath of requested) {
      const summaryRel = toRelative(this.summariesRoot, this.config.mirror.summaryPath(relPath));
      if (relPath === normalized || relPath === withoutRoot || summaryRel === normalized || summaryRel === withoutRoot) {
        return relPath;
      }
    }
    return requested.length === 1 ? requested[0] : undefined;
  }

  /**
   * FileSummaries on disk for the source files of one module directory,
   * keyed by source-relative path. Code is never read here.
   */
  private async collectModuleInputs(moduleDir: string): Promise<Record<string, string>> {
    const dir = path.join(this.config.structure.sourceRoot, moduleDir);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return {};
      }
      throw error;
    }

    const summaries: Record<string, string> = {};
    for (const name of names.sort()) {
      const relPath = path.posix.join(moduleDir, name);
      if (!this.config.mirror.isSummarized(relPath)) {
        continue;
      }
      const content = await this.readFileSummary(relPath);
      if (content !== null && content.trim().length > 0) {
        summaries[relPath] = content;
      }
    }
    return summaries;
  }

  private async buildModuleSummary(moduleDir: string): Promise<boolean> {
    const individual = await this.collectModuleInputs(moduleDir);
    if (Object.keys(individual).length === 0) {
      this.logger.debug('Skipping module without file summaries', { module: moduleDir || '.' });
      return false;
    }

    const entries = await this.config.loader.request(OUTPUT_SPECS.moduleSummaries, {
      module: moduleDir || '.',
      individual_summaries: individual,
    });
    const entry = entries.find((candidate) => normalizeDir(candidate.path) === moduleDir) ?? entries[0];
    if (!entry) {
      this.logger.warn('No module summary returned', { module: moduleDir || '.' });
      return false;
    }

    await writeText(this.config.mirror.moduleSummaryPath(moduleDir), renderSummary(entry.content));
    return true;
  }
}
