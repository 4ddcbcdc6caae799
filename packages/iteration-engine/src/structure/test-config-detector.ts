/**
 * Detects how a repository runs its tests.
 *
 * A local signature scan narrows the candidates before the tests_conf crew
 * decides on the framework and command. The answer is persisted in the
 * project snapshot and reused afterwards.
 */

import * as path from 'node:path';
import { OUTPUT_SPECS, silentLogger } from '@devcrew/crew-contracts';
import type { DevcrewConfig, Logger, ProjectStructure, TestConfig, TestExample } from '@devcrew/crew-contracts';
import { DISCOVERY_CONFIG } from '../config.js';
import { listFiles } from '../fs/enumerate.js';
import { readTextOrNull } from '../fs/file-operations.js';
import { toRelative } from '../fs/path-guard.js';
import type { StructuredOutputLoader } from '../output/structured-output-loader.js';
import { SnapshotStore } from './snapshot-store.js';

interface FrameworkSignature {
  framework: string;
  fileNames?: string[];
  patterns: RegExp[];
}

const FRAMEWORK_SIGNATURES: FrameworkSignature[] = [
  { framework: 'pytest', fileNames: ['conftest.py'], patterns: [/\b(?:import|from)\s+pytest\b/, /@pytest\./] },
  { framework: 'unittest', patterns: [/\b(?:import|from)\s+unittest\b/, /\bunittest\.TestCase\b/] },
  { framework: 'vitest', patterns: [/from\s+['"]vitest['"]/] },
  { framework: 'jest', patterns: [/from\s+['"]@jest\/globals['"]/, /\bjest\.(?:fn|mock)\(/] },
  { framework: 'mocha', patterns: [/(?:from\s+|require\()['"]mocha['"]/] },
];

/**
 * Frameworks whose signatures appear in the given files, most frequent first.
 */
export function detectFrameworks(files: Array<{ path: string; content: string }>): string[] {
  const hits = new Map<string, number>();
  for (const file of files) {
    const base = path.posix.basename(file.path);
    for (const signature of FRAMEWORK_SIGNATURES) {
      const matched =
        (signature.fileNames?.includes(base) ?? false) || signature.patterns.some((pattern) => pattern.test(file.content));
      if (matched) {
        hits.set(signature.framework, (hits.get(signature.framework) ?? 0) + 1);
      }
    }
  }
  return [...hits.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0])).map(([framework]) => framework);
}

export interface TestConfigDetectorConfig {
  loader: StructuredOutputLoader;
  snapshots: SnapshotStore;
  config: Pick<DevcrewConfig, 'sourceExtensions' | 'ignoreDirs'>;
  logger?: Logger;
}

export class TestConfigDetector {
  private readonly logger: Logger;

  constructor(private readonly options: TestConfigDetectorConfig) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Test configuration of the project; null when it has no test roots.
   */
  async detect(structure: ProjectStructure): Promise<TestConfig | null> {
    if (structure.testRoots.length === 0) {
      return null;
    }

    const snapshot = await this.options.snapshots.load();
    const stored = snapshot ? SnapshotStore.toTestConfig(snapshot) : null;
    if (stored) {
      return stored;
    }

    const scanned = await this.scanTestFiles(structure);
    const detected = detectFrameworks(scanned);
    const examples = this.pickExamples(scanned);

    const output = await this.options.loader.request(OUTPUT_SPECS.testsConf, {
      src_dir: toRelative(structure.repository, structure.sourceRoot) || '.',
      test_dirs: structure.testRoots.map((root) => toRelative(structure.repository, root)),
      files: scanned.map((file) => file.path).slice(0, 200),
      detected,
    });

    const testConfig: TestConfig = {
      framework: output.framework,
      command: output.command,
      description: output.description,
      examples,
    };
    await this.options.snapshots.update(structure, testConfig);
    this.logger.info('Test configuration detected', { framework: testConfig.framework, command: testConfig.command });
    return testConfig;
  }

  private async scanTestFiles(structure: ProjectStructure): Promise<Array<{ path: string; content: string }>> {
    const scanned: Array<{ path: string; content: string }> = [];
    for (const root of structure.testRoots) {
      const files = await listFiles(root, this.options.config.sourceExtensions, this.options.config.ignoreDirs);
      for (const file of files) {
        if (scanned.length >= DISCOVERY_CONFIG.maxScannedTestFiles) {
          return scanned;
        }
        const absolute = path.join(root, file);
        const content = await readTextOrNull(absolute);
        if (content !== null) {
          scanned.push({ path: toRelative(structure.repository, absolute), content });
        }
      }
    }
    return scanned;
  }

  private pickExamples(scanned: Array<{ path: string; content: string }>): TestExample[] {
    return scanned
      .filter((file) => /test/i.test(path.posix.basename(file.path)) && file.content.trim().length > 0)
      .slice(0, DISCOVERY_CONFIG.maxTestExamples)
      .map((file) => ({
        path: file.path,
        snippet: file.content.split('\n').slice(0, DISCOVERY_CONFIG.exampleSnippetLines).join('\n'),
      }));
  }
}
