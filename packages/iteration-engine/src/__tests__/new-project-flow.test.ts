import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { CommandExecutor } from '../debug/test-runner.js';
import { NewProjectFlow } from '../flows/new-project-flow.js';
import { SnapshotStore } from '../structure/snapshot-store.js';
import {
  FakeCollaborator,
  createMockLogger,
  createTempDir,
  exists,
  json,
  readFile,
  removeTempDir,
  testConfig,
  writeTree,
} from './helpers.js';

describe('NewProjectFlow', () => {
  let workdir: string;
  let output: string;

  beforeEach(async () => {
    workdir = await createTempDir();
    output = path.join(workdir, 'generated');
  });

  afterEach(async () => {
    await removeTempDir(workdir);
  });

  it('generates sources, tests and summaries, then debugs the result', async () => {
    const collaborator = new FakeCollaborator()
      .on(
        'project_design',
        json([
          { developer: 2, set_of_files: ['app/core.py'] },
          { developer: 1, set_of_files: ['app/main.py', 'tests/test_main.py'] },
        ])
      )
      .on(
        'development',
        json({
          files: [
            { path: 'app/main.py', content: 'print(1)\n' },
            { path: 'tests/test_main.py', content: 'def test_main():\n    assert True\n' },
          ],
          fixes: [{ file_path: 'app/main.py', affected_callable: 'main', fix: 'print 2' }],
        }),
        json({ files: [{ path: './src/app/core.py', content: 'X = 1\n' }] })
      )
      .on('diff_integrator', 'print(2)\n')
      .on(
        'summaries_from_design',
        json({
          file_summaries: [{ path: 'app/main.py', content: 'purpose: entry\n' }],
          module_summaries: [{ path: 'app/', content: 'module app' }],
        }),
        json({ file_summaries: [{ path: 'src/app/core.py', content: { purpose: 'core' } }] })
      )
      .on('tests_conf', json({ framework: 'pytest', command: 'pytest' }));
    const execute = vi.fn<CommandExecutor>(async () => ({ exitCode: 0, stdout: '1 passed', stderr: '', timedOut: false }));
    const flow = new NewProjectFlow({ collaborator, config: testConfig(), logger: createMockLogger(), execute });

    const result = await flow.run(output, 'A tiny CLI');

    expect(collaborator.callsTo('development').map((call) => call.tier)).toEqual(['small', 'medium']);
    expect(collaborator.callsTo('development')[0]?.inputs).toEqual({
      project_design: ['app/main.py', 'tests/test_main.py'],
    });
    expect(collaborator.callsTo('diff_integrator')[0]?.inputs).toEqual({
      file_path: 'app/main.py',
      original_code: 'print(1)\n',
      code_diffs: ['main: print 2'],
    });
    expect(collaborator.callsTo('summaries_from_design')[0]?.inputs).toEqual({
      project_design: ['app/main.py', 'tests/test_main.py'],
      code_chunk: {
        'app/main.py': 'print(2)\n',
        'tests/test_main.py': 'def test_main():\n    assert True\n',
      },
    });

    expect(result.sourceFiles).toEqual(['app/main.py', 'app/core.py']);
    expect(result.testFiles).toEqual(['test_main.py']);
    expect(result.fileSummaries).toBe(2);
    expect(result.moduleSummaries).toBe(1);
    expect(result.structure.testRoots).toEqual([path.join(output, 'tests')]);
    expect(result.debug?.status).toBe('passing');
    expect(execute).toHaveBeenCalledTimes(1);

    expect(await readFile(path.join(output, 'src', 'app', 'main.py'))).toBe('print(2)\n');
    expect(await readFile(path.join(output, 'src', 'app', 'core.py'))).toBe('X = 1\n');
    expect(await readFile(path.join(output, 'tests', 'test_main.py'))).toBe('def test_main():\n    assert True\n');

    const summaries = path.join(output, '.devcrew', 'summaries', 'app');
    expect(await readFile(path.join(summaries, 'main.yaml'))).toBe('purpose: entry\n');
    expect(await readFile(path.join(summaries, 'core.yaml'))).toBe('purpose: core\n');
    expect(await readFile(path.join(summaries, '_module.yaml'))).toBe('module app\n');

    const snapshot = await new SnapshotStore(output).load();
    expect(snapshot?.structure.source_root).toBe('src');
    expect(snapshot?.test_config?.framework).toBe('pytest');
  });

  it('cleans generated files that carry no fixes before writing them', async () => {
    const collaborator = new FakeCollaborator()
      .on('project_design', json([{ developer: 1, set_of_files: ['app/main.py', 'tests/test_main.py'] }]))
      .on(
        'development',
        json({
          files: [
            { path: 'app/main.py', content: '```python\nX = 1\n```' },
            { path: 'tests/test_main.py', content: 'def test_main():\n    assert True' },
          ],
        })
      )
      .on('summaries_from_design', '{}')
      .on('tests_conf', json({ framework: 'pytest', command: 'pytest' }));
    const execute = vi.fn<CommandExecutor>(async () => ({ exitCode: 0, stdout: '1 passed', stderr: '', timedOut: false }));
    const flow = new NewProjectFlow({ collaborator, config: testConfig(), logger: createMockLogger(), execute });

    await flow.run(output, 'A tiny CLI');

    expect(collaborator.callsTo('diff_integrator')).toHaveLength(0);
    expect(collaborator.callsTo('summaries_from_design')[0]?.inputs.code_chunk).toEqual({
      'app/main.py': 'X = 1\n',
      'tests/test_main.py': 'def test_main():\n    assert True\n',
    });
    expect(await readFile(path.join(output, 'src', 'app', 'main.py'))).toBe('X = 1\n');
    expect(await readFile(path.join(output, 'tests', 'test_main.py'))).toBe('def test_main():\n    assert True\n');
  });

  it('skips the debug loop when no tests were generated', async () => {
    const collaborator = new FakeCollaborator()
      .on('project_design', json([{ developer: 3, set_of_files: 'lib/util.py' }]))
      .on('development', json({ files: [{ path: 'lib/util.py', content: 'def util():\n    return 1\n' }] }))
      .on('summaries_from_design', '{}');
    const execute = vi.fn<CommandExecutor>();
    const flow = new NewProjectFlow({ collaborator, config: testConfig(), logger: createMockLogger(), execute });

    const result = await flow.run(output, 'A helper library');

    expect(collaborator.callsTo('development')[0]?.tier).toBe('large');
    expect(result).toEqual({
      structure: {
        repository: output,
        sourceRoot: path.join(output, 'src'),
        docsRoot: null,
        testRoots: [],
        summariesRoot: path.join(output, '.devcrew', 'summaries'),
      },
      sourceFiles: ['lib/util.py'],
      testFiles: [],
      fileSummaries: 0,
      moduleSummaries: 0,
    });
    expect(execute).not.toHaveBeenCalled();
    expect(await exists(path.join(output, 'tests'))).toBe(false);
    expect(await exists(path.join(output, '.devcrew', 'project.yaml'))).toBe(true);
  });

  it('writes into an existing directory', async () => {
    await writeTree(output, { 'README.md': '# Existing\n' });
    const collaborator = new FakeCollaborator().on('project_design', '[]');

    const result = await new NewProjectFlow({ collaborator, config: testConfig(), logger: createMockLogger() }).run(
      output,
      'Nothing yet'
    );

    expect(result.sourceFiles).toEqual([]);
    expect(await readFile(path.join(output, 'README.md'))).toBe('# Existing\n');
  });
});
