import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { ProjectStructure } from '@devcrew/crew-contracts';
import { FilesystemMirror } from '../fs/filesystem-mirror.js';
import { StructuredOutputLoader } from '../output/structured-output-loader.js';
import { ActionPlanner, toActionStep } from '../planning/action-planner.js';
import { SummaryStore } from '../summaries/summary-store.js';
import { FakeCollaborator, createTempDir, json, makeStructure, removeTempDir, testConfig, writeTree } from './helpers.js';

describe('toActionStep', () => {
  it('normalizes the step label', () => {
    expect(
      toActionStep({ step: 4, title: 'Add dir', description: '', artifacts: ['pkg/sub/'], type: 'Create new file/directory', points: 1 })
    ).toEqual({
      step: 4,
      title: 'Add dir',
      description: '',
      artifacts: ['pkg/sub/'],
      label: 'Create new file/directory',
      type: 'create_directory',
      points: 1,
    });
  });
});

describe('ActionPlanner', () => {
  let repo: string;
  let structure: ProjectStructure;

  beforeEach(async () => {
    repo = await createTempDir();
    structure = makeStructure(repo);
    await writeTree(repo, {
      'src/pkg/a.py': 'A = 1\n',
      'src/pkg/b.py': 'B = 2\n',
      '.devcrew/summaries/pkg/_module.yaml': 'module pkg\n',
      '.devcrew/summaries/pkg/a.yaml': 'sum a\n',
      '.devcrew/summaries/pkg/b.yaml': 'sum b\n',
    });
  });

  afterEach(async () => {
    await removeTempDir(repo);
  });

  function createPlanner(collaborator: FakeCollaborator): ActionPlanner {
    const config = testConfig();
    const loader = new StructuredOutputLoader(collaborator);
    const summaries = new SummaryStore({
      structure,
      mirror: new FilesystemMirror(structure, config),
      loader,
      sourceExtensions: config.sourceExtensions,
      ignoreDirs: config.ignoreDirs,
    });
    return new ActionPlanner({ structure, loader, summaries });
  }

  it('narrows context in three calls and keeps the listed step order', async () => {
    const collaborator = new FakeCollaborator()
      .on('relevant_modules', json(['src/pkg/a.py', './pkg/b.py', '']))
      .on('file_detail', json({ summaries_only: ['pkg/b.py'], need_code: ['src/pkg/a.py', 'pkg/missing.py'] }))
      .on(
        'action_plan',
        json([
          { step: 2, title: 'Rename b', type: 'Rename file', artifacts: ['src/pkg/b.py'] },
          { step: 1, title: 'Update a', description: 'Bump A', type: 'Modify code', artifacts: 'pkg/a.py', points: 3 },
          { step: 3, title: 'Deploy', type: 'Launch rocket', artifacts: [] },
        ])
      );

    const plan = await createPlanner(collaborator).plan('bump A');

    expect(collaborator.calls.map((call) => call.inputs)).toEqual([
      { user_prompt: 'bump A', module_summaries: { pkg: 'module pkg\n' } },
      { user_prompt: 'bump A', file_summaries: { 'pkg/a.py': 'sum a\n', 'pkg/b.py': 'sum b\n' } },
      {
        user_prompt: 'bump A',
        module_summaries: { pkg: 'module pkg\n' },
        summaries: { 'pkg/b.py': 'sum b\n' },
        code: { 'pkg/a.py': 'A = 1\n' },
        file_listing: ['pkg/a.py', 'pkg/b.py'],
      },
    ]);
    expect(plan).toEqual([
      {
        step: 2,
        title: 'Rename b',
        description: '',
        artifacts: ['pkg/b.py'],
        label: 'Rename file',
        type: 'rename_file',
        points: 1,
      },
      {
        step: 1,
        title: 'Update a',
        description: 'Bump A',
        artifacts: ['pkg/a.py'],
        label: 'Modify code',
        type: 'modify_code',
        points: 3,
      },
      { step: 3, title: 'Deploy', description: '', artifacts: [], label: 'Launch rocket', type: null, points: 1 },
    ]);
  });

  it('never reorders steps by their step number', async () => {
    const collaborator = new FakeCollaborator()
      .on('relevant_modules', '[]')
      .on('file_detail', '{}')
      .on(
        'action_plan',
        json([
          { step: 2, title: 'Create pkg/c.py', type: 'Create new file/directory', artifacts: ['pkg/c.py'] },
          { step: 1, title: 'Modify pkg/c.py', type: 'Modify code', artifacts: ['pkg/c.py'] },
        ])
      );

    const plan = await createPlanner(collaborator).plan('add c');

    expect(plan.map((step) => step.title)).toEqual(['Create pkg/c.py', 'Modify pkg/c.py']);
    expect(plan.map((step) => step.type)).toEqual(['create_file', 'modify_code']);
  });

  it('returns an empty plan when the crew proposes nothing', async () => {
    const collaborator = new FakeCollaborator()
      .on('relevant_modules', '[]')
      .on('file_detail', '{}')
      .on('action_plan', '[]');

    expect(await createPlanner(collaborator).plan('nothing to do')).toEqual([]);
  });
});
