import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { ActionStep, ActionStepType, ProjectStructure, TestConfig } from '@devcrew/crew-contracts';
import { ProgressReporter } from '@devcrew/progress-reporter';
import { ActionPlanExecutor } from '../execution/action-plan-executor.js';
import { openWorkspace } from '../flows/workspace.js';
import { StructuredOutputLoader } from '../output/structured-output-loader.js';
import { SnapshotStore } from '../structure/snapshot-store.js';
import {
  FakeCollaborator,
  createMockLogger,
  createTempDir,
  exists,
  json,
  makeStructure,
  readFile,
  removeTempDir,
  summarizingCollaborator,
  testConfig,
  writeTree,
} from './helpers.js';

const pytest: TestConfig = { framework: 'pytest', command: 'pytest', description: '', examples: [] };

function step(
  number: number,
  type: ActionStepType | null,
  artifacts: string[],
  overrides: Partial<ActionStep> = {}
): ActionStep {
  return {
    step: number,
    title: `Step ${number}`,
    description: '',
    artifacts,
    label: type ?? 'Launch rocket',
    type,
    points: 1,
    ...overrides,
  };
}

function createExecutor(
  structure: ProjectStructure,
  collaborator: FakeCollaborator,
  options: { testConfig?: TestConfig | null; progress?: ProgressReporter } = {}
): ActionPlanExecutor {
  const config = testConfig();
  const logger = createMockLogger();
  const loader = new StructuredOutputLoader(collaborator);
  const snapshots = new SnapshotStore(structure.repository);
  const workspace = openWorkspace({ structure, config, collaborator, loader, snapshots, logger });
  return new ActionPlanExecutor({
    structure,
    testConfig: options.testConfig ?? null,
    collaborator,
    loader,
    mirror: workspace.mirror,
    summaries: workspace.summaries,
    integrator: workspace.integrator,
    snapshots,
    settings: config,
    progress: options.progress,
    logger,
  });
}

describe('ActionPlanExecutor', () => {
  let repo: string;

  beforeEach(async () => {
    repo = await createTempDir();
    await writeTree(repo, {
      'src/pkg/a.py': 'A = 1\n',
      'src/pkg/b.py': 'B = 2\n',
      'tests/pkg/test_b.py': 'def test_b():\n    pass\n',
      '.devcrew/summaries/pkg/a.yaml': 'sum a\n',
      '.devcrew/summaries/pkg/b.yaml': 'sum b\n',
      '.devcrew/summaries/pkg/_module.yaml': 'module pkg\n',
    });
  });

  afterEach(async () => {
    await removeTempDir(repo);
  });

  describe('file steps', () => {
    it('creates and deletes files, mirrors both trees and marks modules dirty', async () => {
      const structure = makeStructure(repo, { tests: true });
      const collaborator = summarizingCollaborator();

      const report = await createExecutor(structure, collaborator).execute([
        step(1, 'create_file', ['pkg/c.py']),
        step(2, 'delete_file', ['pkg/b.py']),
        step(3, 'delete_file', ['pkg/missing.py']),
      ]);

      expect(report.created).toEqual(['pkg/c.py']);
      expect(report.deleted).toEqual(['pkg/b.py']);
      expect(report.errors).toEqual([]);
      expect(report.dirtyModules).toEqual(['pkg']);
      expect(await readFile(path.join(repo, 'src', 'pkg', 'c.py'))).toBe('');
      expect(await exists(path.join(repo, 'tests', 'pkg', 'test_c.py'))).toBe(true);
      expect(await exists(path.join(repo, 'tests', 'pkg', 'test_b.py'))).toBe(false);
      expect(await exists(path.join(structure.summariesRoot, 'pkg', 'b.yaml'))).toBe(false);
    });

    it('rebuilds the module summary of a dirty module from its remaining files', async () => {
      const structure = makeStructure(repo, { tests: true });
      const collaborator = summarizingCollaborator();

      await createExecutor(structure, collaborator).execute([step(1, 'delete_file', ['pkg/b.py'])]);

      expect(collaborator.callsTo('module_summaries').map((call) => call.inputs)).toEqual([
        { module: 'pkg', individual_summaries: { 'pkg/a.py': 'sum a\n' } },
      ]);
      expect(await readFile(path.join(structure.summariesRoot, 'pkg', '_module.yaml'))).toBe('module pkg\n');
    });

    it('records failing steps and keeps going', async () => {
      const structure = makeStructure(repo);
      const collaborator = summarizingCollaborator();

      const report = await createExecutor(structure, collaborator).execute([
        step(1, 'create_file', ['../escape.py']),
        step(2, 'create_file', ['pkg/d.py']),
      ]);

      expect(report.errors).toEqual([
        {
          step: 1,
          type: 'create_file',
          message: `Path "../escape.py" resolves outside of "${structure.sourceRoot}"`,
        },
      ]);
      expect(report.created).toEqual(['pkg/d.py']);
    });
  });

  describe('unsupported and empty steps', () => {
    it('reports unsupported step types and skips empty path mappings', async () => {
      const structure = makeStructure(repo);
      const collaborator = new FakeCollaborator().on('rename_mapping', '{}');
      const progress = new ProgressReporter(createMockLogger());

      const report = await createExecutor(structure, collaborator, { progress }).execute([
        step(1, null, []),
        step(2, 'rename_file', ['pkg/a.py'], { title: 'Rename a' }),
      ]);

      expect(report.errors).toEqual([{ step: 1, type: 'Launch rocket', message: 'Unsupported step type "Launch rocket"' }]);
      expect(report.renamed).toEqual([]);
      expect(collaborator.calls[0]?.inputs).toEqual({
        instruction: 'Rename a',
        artifacts: ['pkg/a.py'],
        file_listing: ['pkg/a.py', 'pkg/b.py'],
      });
      expect(progress.getEvents().map((event) => event.type)).toEqual(['step_failed', 'step_started', 'step_skipped']);
    });
  });

  describe('transfers', () => {
    it('renames, copies and moves through mapping crews', async () => {
      const structure = makeStructure(repo);
      const collaborator = summarizingCollaborator()
        .on('rename_mapping', json({ 'src/pkg/a.py': 'pkg/alpha.py' }))
        .on('copy_mapping', json([{ 'pkg/b.py': 'lib/b.py' }]))
        .on('move_mapping', json({ 'pkg/nope.py': 'lib/nope.py' }));

      const report = await createExecutor(structure, collaborator).execute([
        step(1, 'rename_file', ['pkg/a.py']),
        step(2, 'copy_file', ['pkg/b.py']),
        step(3, 'move_file', ['pkg/nope.py']),
      ]);

      expect(report.renamed).toEqual([{ from: 'pkg/a.py', to: 'pkg/alpha.py' }]);
      expect(report.copied).toEqual([{ from: 'pkg/b.py', to: 'lib/b.py' }]);
      expect(report.moved).toEqual([]);
      expect(report.dirtyModules).toEqual(['lib', 'pkg']);
      expect(await readFile(path.join(repo, 'src', 'pkg', 'alpha.py'))).toBe('A = 1\n');
      expect(await readFile(path.join(repo, 'src', 'lib', 'b.py'))).toBe('B = 2\n');
      expect(await readFile(path.join(structure.summariesRoot, 'pkg', 'alpha.yaml'))).toBe('sum a\n');
      expect(await readFile(path.join(structure.summariesRoot, 'lib', 'b.yaml'))).toBe('sum b\n');
      expect(collaborator.callsTo('module_summaries').map((call) => call.inputs.module)).toEqual(['lib', 'pkg']);
    });
  });

  describe('directory steps', () => {
    it('creates directories and persists the structure', async () => {
      const structure = makeStructure(repo);
      const collaborator = new FakeCollaborator();

      const report = await createExecutor(structure, collaborator).execute([step(1, 'create_directory', ['pkg/sub/'])]);

      expect(report.created).toEqual(['pkg/sub']);
      expect(await exists(path.join(repo, 'src', 'pkg', 'sub'))).toBe(true);
      expect(await exists(path.join(structure.summariesRoot, 'pkg', 'sub'))).toBe(true);
      expect(await exists(path.join(repo, '.devcrew', 'project.yaml'))).toBe(true);
    });

    it('drops test roots that lived in a deleted directory', async () => {
      await writeTree(repo, { 'src/pkg/tests/test_a.py': '' });
      const structure = makeStructure(repo);
      structure.testRoots = [path.join(repo, 'src', 'pkg', 'tests')];
      const collaborator = new FakeCollaborator();

      const report = await createExecutor(structure, collaborator).execute([step(1, 'delete_directory', ['pkg'])]);

      expect(report.deleted).toEqual(['pkg']);
      expect(structure.testRoots).toEqual([]);
      expect(await exists(path.join(repo, 'src', 'pkg'))).toBe(false);
      const snapshot = await new SnapshotStore(repo).load();
      expect(snapshot?.structure.test_roots).toEqual([]);
    });

    it('refuses to delete the source root', async () => {
      const structure = makeStructure(repo);

      const report = await createExecutor(structure, new FakeCollaborator()).execute([
        step(1, 'delete_directory', ['']),
      ]);

      expect(report.errors).toEqual([
        { step: 1, type: 'delete_directory', message: 'Refusing to delete the source root' },
      ]);
      expect(await exists(path.join(repo, 'src', 'pkg', 'a.py'))).toBe(true);
    });
  });

  describe('code changes', () => {
    it('collects diffs per file, integrates once and merges generated tests', async () => {
      await writeTree(repo, {
        'tests/pkg/test_a.py': 'def test_old():\n    pass\n',
        'tests/conftest.py': 'import pytest\n',
      });
      const structure = makeStructure(repo, { tests: true });
      const collaborator = summarizingCollaborator()
        .on(
          'development_diff',
          json([{ path: 'src/pkg/a.py', content_diff: '-A = 1\n+A = 2' }]),
          json([{ path: 'pkg/a.py', content_diff: '+"""doc"""' }])
        )
        .on('tests_planning', json([{ title: 'checks A', src_file: 'src/pkg/a.py' }]), '[]')
        .on('tests_implementation', json([{ code: 'def test_a():\n    assert A == 2' }]))
        .on('diff_integrator', '"""doc"""\nA = 2\n')
        .on('tests_integrator', 'merged');

      const report = await createExecutor(structure, collaborator, { testConfig: pytest }).execute([
        step(1, 'modify_code', ['pkg/a.py'], { title: 'Bump A', description: 'Set A to 2', points: 2 }),
        step(2, 'modify_code', ['pkg/a.py'], { title: 'Document' }),
      ]);

      expect(collaborator.callsTo('development_diff')).toEqual([
        {
          crew: 'development_diff',
          inputs: { instructions: 'Bump A\n\nSet A to 2', files: { 'pkg/a.py': 'A = 1\n' } },
          tier: 'medium',
        },
        {
          crew: 'development_diff',
          inputs: { instructions: 'Document', files: { 'pkg/a.py': 'A = 1\n' } },
          tier: 'small',
        },
      ]);
      expect(collaborator.callsTo('tests_planning')[0]?.inputs).toEqual({
        instructions: 'Bump A\n\nSet A to 2',
        diffs: [{ path: 'src/pkg/a.py', content_diff: '-A = 1\n+A = 2' }],
        test_config: { framework: 'pytest', command: 'pytest', examples: [] },
      });
      expect(collaborator.callsTo('diff_integrator').map((call) => call.inputs)).toEqual([
        { file_path: 'pkg/a.py', original_code: 'A = 1\n', code_diffs: ['-A = 1\n+A = 2', '+"""doc"""'] },
      ]);
      expect(collaborator.callsTo('tests_integrator')[0]?.inputs).toEqual({
        test_file: 'tests/pkg/test_a.py',
        original_test_code: 'def test_old():\n    pass\n',
        new_tests: ['def test_a():\n    assert A == 2'],
        fixtures: { 'tests/conftest.py': 'import pytest\n' },
        test_config: { framework: 'pytest', command: 'pytest' },
      });
      expect(report.modified).toEqual([{ path: 'pkg/a.py', added: 2, removed: 1 }]);
      expect(report.testsWritten).toEqual(['tests/pkg/test_a.py']);
      expect(report.errors).toEqual([]);
      expect(report.dirtyModules).toEqual(['pkg']);
      expect(await readFile(path.join(repo, 'src', 'pkg', 'a.py'))).toBe('"""doc"""\nA = 2\n');
      expect(await readFile(path.join(repo, 'tests', 'pkg', 'test_a.py'))).toBe('merged\n');
    });

    it('skips steps that produce no diffs and skips tests without a test config', async () => {
      const structure = makeStructure(repo, { tests: true });
      const collaborator = new FakeCollaborator().on('development_diff', '[]');

      const report = await createExecutor(structure, collaborator).execute([step(1, 'modify_code', ['pkg/a.py'])]);

      expect(report.modified).toEqual([]);
      expect(collaborator.calls.map((call) => call.crew)).toEqual(['development_diff']);
    });

    it('refreshes the module summary when a written file cannot be summarized', async () => {
      const structure = makeStructure(repo);
      const collaborator = new FakeCollaborator()
        .on('development_diff', json([{ path: 'pkg/a.py', content_diff: '-A = 1\n+A = 2' }]))
        .on('diff_integrator', 'A = 2\n')
        .on('file_summaries', 'not a summary list')
        .on('json_fixer', 'still not a list')
        .on('module_summaries', json([{ path: 'pkg', content: 'module pkg rebuilt' }]));

      const report = await createExecutor(structure, collaborator).execute([step(1, 'modify_code', ['pkg/a.py'])]);

      expect(report.modified).toEqual([{ path: 'pkg/a.py', added: 1, removed: 1 }]);
      expect(report.errors).toEqual([]);
      expect(report.summaryFailures).toHaveLength(1);
      expect(report.summaryFailures[0]?.path).toBe('pkg/a.py');
      expect(report.summaryFailures[0]?.message).toMatch(/^Unusable output from file_summaries after repair/);
      expect(report.dirtyModules).toEqual(['pkg']);
      expect(collaborator.callsTo('module_summaries').map((call) => call.inputs)).toEqual([
        { module: 'pkg', individual_summaries: { 'pkg/b.py': 'sum b\n' } },
      ]);
      expect(await exists(path.join(structure.summariesRoot, 'pkg', 'a.yaml'))).toBe(false);
      expect(await readFile(path.join(structure.summariesRoot, 'pkg', '_module.yaml'))).toBe('module pkg rebuilt\n');
    });

    it('reports integration failures against the step that produced the diff', async () => {
      const structure = makeStructure(repo);
      const collaborator = new FakeCollaborator()
        .on('development_diff', json([{ path: 'pkg/a.py', content_diff: '+x' }]))
        .on('diff_integrator', '');

      const report = await createExecutor(structure, collaborator).execute([step(4, 'modify_code', ['pkg/a.py'])]);

      expect(report.errors).toEqual([
        { step: 4, type: 'modify_code', message: 'pkg/a.py: Integrator returned no content for pkg/a.py' },
      ]);
      expect(report.dirtyModules).toEqual([]);
      expect(await readFile(path.join(repo, 'src', 'pkg', 'a.py'))).toBe('A = 1\n');
    });
  });
});
