/**
 * Merges generated test snippets into the project's test files.
 */

import * as path from 'node:path';
import { OUTPUT_SPECS, describeError, silentLogger } from '@devcrew/crew-contracts';
import type { Collaborator, Logger, ProjectStructure, TestConfig } from '@devcrew/crew-contracts';
import { listFiles } from '../fs/enumerate.js';
import { pathExists, readTextOrNull, writeText } from '../fs/file-operations.js';
import type { FilesystemMirror } from '../fs/filesystem-mirror.js';
import { isWithin, resolveWithin, toRelative } from '../fs/path-guard.js';
import { sanitizeGeneratedContent } from '../output/content-sanitizer.js';
import type { StructuredOutputLoader } from '../output/structured-output-loader.js';

export interface TestsIntegratorConfig {
  structure: ProjectStructure;
  testConfig: TestConfig;
  collaborator: Collaborator;
  loader: StructuredOutputLoader;
  mirror: FilesystemMirror;
  fixtureFileNames: string[];
  sourceExtensions: string[];
  ignoreDirs: string[];
  logger?: Logger;
}

export interface TestsIntegrationReport {
  /** Repository-relative test files written */
  written: string[];
  failed: Array<{ source: string; message: string }>;
}

/**
 * Shared fixture files from the test file's directory up to the test root,
 * nearest first.
 */
export async function collectFixtures(
  testFile: string,
  testRoot: string,
  fixtureFileNames: string[]
): Promise<Array<{ path: string; content: string }>> {
  const fixtures: Array<{ path: string; content: string }> = [];
  let dir = path.dirname(testFile);
  while (isWithin(testRoot, dir)) {
    for (const name of fixtureFileNames) {
      const candidate = path.join(dir, name);
      if (candidate === testFile) {
        continue;
      }
      const content = await readTextOrNull(candidate);
      if (content !== null) {
        fixtures.push({ path: candidate, content });
      }
    }
    if (path.resolve(dir) === path.resolve(testRoot)) {
      break;
    }
    dir = path.dirname(dir);
  }
  return fixtures;
}

export class TestsIntegrator {
  private readonly logger: Logger;

  constructor(private readonly config: TestsIntegratorConfig) {
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Writes the snippets of each source file into its test file.
   */
  async integrate(snippetsBySource: Map<string, string[]>): Promise<TestsIntegrationReport> {
    const report: TestsIntegrationReport = { written: [], failed: [] };
    const { structure } = this.config;

    for (const [source, snippets] of snippetsBySource) {
      if (snippets.length === 0) {
        continue;
      }
      try {
        const testFile = await this.locateTestFile(source);
        if (!testFile) {
          this.logger.warn('No test file for source', { source });
          continue;
        }
        const testRoot = structure.testRoots.find((root) => isWithin(root, testFile)) ?? path.dirname(testFile);
        const fixtures = await collectFixtures(testFile, testRoot, this.config.fixtureFileNames);
        const original = (await readTextOrNull(testFile)) ?? '';

        const result = await this.config.collaborator.invoke({
          crew: 'tests_integrator',
          inputs: {
            test_file: toRelative(structure.repository, testFile),
            original_test_code: original,
            new_tests: snippets,
            fixtures: Object.fromEntries(
              fixtures.map((fixture) => [toRelative(structure.repository, fixture.path), fixture.content])
            ),
            test_config: {
              framework: this.config.testConfig.framework,
              command: this.config.testConfig.command,
            },
          },
        });
        if (result.text.trim().length === 0) {
          throw new Error('integrator returned no content');
        }

        await writeText(testFile, sanitizeGeneratedContent(result.text));
        report.written.push(toRelative(structure.repository, testFile));
      } catch (error) {
        const message = describeError(error);
        this.logger.error(`Test integration failed for ${source}`, { error: message });
        report.failed.push({ source, message });
      }
    }

    return report;
  }

  /**
   * Mirrored test file when it exists; otherwise the tests_relevance crew
   * picks an existing test file; otherwise the mirrored path (created).
   */
  private async locateTestFile(source: string): Promise<string | null> {
    const mirrored = this.config.mirror.testPath(source);
    if (mirrored && (await pathExists(mirrored))) {
      return mirrored;
    }

    const candidates: string[] = [];
    for (const root of this.config.structure.testRoots) {
      const files = await listFiles(root, this.config.sourceExtensions, this.config.ignoreDirs);
      candidates.push(...files.map((file) => toRelative(this.config.structure.repository, path.join(root, file))));
    }

    if (candidates.length > 0) {
      const picked = await this.config.loader.request(OUTPUT_SPECS.testsRelevance, {
        source_file: source,
        test_files: candidates,
      });
      for (const choice of picked) {
        const normalized = choice.replace(/\\/g, '/').replace(/^\.\//, '');
        if (candidates.includes(normalized)) {
          return resolveWithin(this.config.structure.repository, normalized);
        }
      }
    }

    return mirrored;
  }
}
