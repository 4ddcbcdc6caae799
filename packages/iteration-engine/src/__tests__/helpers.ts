/**
 * Shared fixtures for iteration-engine tests.
 */

import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { vi } from 'vitest';
import { isPlainObject } from '@devcrew/crew-contracts';
import type {
  Collaborator,
  CollaboratorRequest,
  CollaboratorResult,
  CrewName,
  DevcrewConfig,
  Logger,
  ProjectStructure,
} from '@devcrew/crew-contracts';
import { resolveConfig } from '../config.js';

export const createMockLogger = () => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}) satisfies Logger;

export type ScriptedReply = string | CollaboratorResult | ((request: CollaboratorRequest) => string | CollaboratorResult);

/**
 * Collaborator answering from per-crew scripts and recording every request.
 */
export class FakeCollaborator implements Collaborator {
  readonly calls: CollaboratorRequest[] = [];
  private readonly queued = new Map<CrewName, ScriptedReply[]>();
  private readonly fallback = new Map<CrewName, ScriptedReply>();

  /** Replies consumed in order, one per call */
  on(crew: CrewName, ...replies: ScriptedReply[]): this {
    this.queued.set(crew, [...(this.queued.get(crew) ?? []), ...replies]);
    return this;
  }

  /** Reply used once the queue for the crew is empty */
  always(crew: CrewName, reply: ScriptedReply): this {
    this.fallback.set(crew, reply);
    return this;
  }

  callsTo(crew: CrewName): CollaboratorRequest[] {
    return this.calls.filter((call) => call.crew === crew);
  }

  async invoke(request: CollaboratorRequest): Promise<CollaboratorResult> {
    this.calls.push(request);
    const reply = this.queued.get(request.crew)?.shift() ?? this.fallback.get(request.crew);
    if (reply === undefined) {
      throw new Error(`Unexpected call to crew ${request.crew}`);
    }
    const value = typeof reply === 'function' ? reply(request) : reply;
    return typeof value === 'string' ? { text: value } : value;
  }
}

export const json = (value: unknown): string => JSON.stringify(value);

/** file_summaries reply: `summary of <path>` for every requested file */
export const summarizeAll = (request: CollaboratorRequest): string => {
  const chunk = request.inputs.code_chunk;
  const keys = isPlainObject(chunk) ? Object.keys(chunk) : [];
  return json(keys.map((relPath) => ({ path: relPath, content: `summary of ${relPath}` })));
};

/** module_summaries reply: `module <dir>` */
export const summarizeModule = (request: CollaboratorRequest): string =>
  json([{ path: String(request.inputs.module), content: `module ${String(request.inputs.module)}` }]);

/** Collaborator answering both summary crews */
export const summarizingCollaborator = (): FakeCollaborator =>
  new FakeCollaborator().always('file_summaries', summarizeAll).always('module_summaries', summarizeModule);

export function testConfig(overrides: Partial<DevcrewConfig> = {}): DevcrewConfig {
  return { ...resolveConfig({}, {}), ...overrides };
}

export async function createTempDir(prefix = 'devcrew-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Writes `relative path → content` under `root`.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const target = path.join(root, relPath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
  }
}

export async function readFile(target: string): Promise<string> {
  return fs.readFile(target, 'utf-8');
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Structure with `src`, optional `tests` and `.devcrew/summaries` under `repo`.
 */
export function makeStructure(repo: string, options: { tests?: boolean; docs?: boolean } = {}): ProjectStructure {
  return {
    repository: repo,
    sourceRoot: path.join(repo, 'src'),
    docsRoot: options.docs ? path.join(repo, 'docs') : null,
    testRoots: options.tests ? [path.join(repo, 'tests')] : [],
    summariesRoot: path.join(repo, '.devcrew', 'summaries'),
  };
}
