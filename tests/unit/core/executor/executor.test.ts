/**
 * Tests for the Write Executor and its rollback.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { WriteExecutor } from '../../../../src/core/executor/executor.js';
import { nodeFileSystem, type FileSystemAdapter } from '../../../../src/core/executor/fs-adapter.js';
import { planGeneration } from '../../../../src/core/plan/planner.js';
import type { GenerationPlan } from '../../../../src/core/plan/types.js';
import { WriteError } from '../../../../src/utils/errors.js';
import {
  captureRejection,
  createProject,
  listDirectories,
  makeDefinition,
  makeProfile,
  removeProject,
  snapshotTree,
  templateRef,
  writeFiles,
} from '../../../helpers/project.js';

const MARKER = '// @appforge generator=sample\n';

const fiveFiles = makeDefinition({
  templates: ['A', 'B', 'C', 'D', 'E'].map((name) =>
    templateRef(name, `${MARKER}struct ${name} {}\n`, { output: `${name}.swift`, directory: 'Sources/Feature/Generated' })
  ),
});

/** Node filesystem whose n-th writeFile call fails. */
function failingOnWrite(n: number, overrides: Partial<FileSystemAdapter> = {}): FileSystemAdapter {
  let writes = 0;
  return {
    ...nodeFileSystem,
    async writeFile(filePath, content) {
      writes++;
      if (writes === n) throw new Error('disk full');
      await nodeFileSystem.writeFile(filePath, content);
    },
    ...overrides,
  };
}

describe('WriteExecutor', () => {
  let root: string;

  beforeEach(async () => {
    root = await createProject({ 'Sources/App.swift': '@main\nstruct App {}\n' });
  });

  afterEach(async () => {
    await removeProject(root);
  });

  const planFor = (definition = fiveFiles): Promise<GenerationPlan> =>
    planGeneration({
      definition,
      profile: makeProfile({ root }),
      config: {},
      report: { generatorId: definition.id, entries: [] },
    });

  it('should write every artifact and create missing directories', async () => {
    const result = await new WriteExecutor().apply(await planFor());

    const expected = ['A', 'B', 'C', 'D', 'E'].map((name) => `Sources/Feature/Generated/${name}.swift`);
    expect(result.written).toEqual(expected);
    expect(result.created).toEqual(expected);
    expect(result.modified).toEqual([]);
    expect(await fs.readFile(path.join(root, 'Sources/Feature/Generated/C.swift'), 'utf-8')).toBe(`${MARKER}struct C {}\n`);
  });

  it('should write exactly the planned content', async () => {
    const plan = await planFor();

    await new WriteExecutor().apply(plan);

    const tree = await snapshotTree(root);
    for (const artifact of plan.artifacts) {
      expect(tree[artifact.path]).toBe(artifact.content);
    }
    expect(Object.keys(tree)).toHaveLength(plan.artifacts.length + 1);
  });

  it('should modify files it generated before', async () => {
    await writeFiles(root, { 'Sources/Feature/Generated/A.swift': `${MARKER}struct A { let old = 1 }\n` });
    const plan = await planFor();

    const result = await new WriteExecutor().apply(plan);

    expect(result.modified).toEqual(['Sources/Feature/Generated/A.swift']);
    expect(result.created).toHaveLength(4);
    expect(await fs.readFile(path.join(root, 'Sources/Feature/Generated/A.swift'), 'utf-8')).toBe(`${MARKER}struct A {}\n`);
  });

  it('should roll back created files and directories when a write fails', async () => {
    const before = await snapshotTree(root);
    const directoriesBefore = await listDirectories(root);
    const plan = await planFor();

    const error = await captureRejection(new WriteExecutor(failingOnWrite(3)).apply(plan));

    expect(error).toBeInstanceOf(WriteError);
    expect(error).toMatchObject({
      code: 'WRI001',
      message: 'Failed to write Sources/Feature/Generated/C.swift: disk full. Rolled back 2 file(s)',
      details: {
        failedPath: 'Sources/Feature/Generated/C.swift',
        cause: 'disk full',
        restored: [],
        removed: ['Sources/Feature/Generated/B.swift', 'Sources/Feature/Generated/A.swift'],
      },
    });
    expect(await snapshotTree(root)).toEqual(before);
    expect(await listDirectories(root)).toEqual(directoriesBefore);
  });

  it('should restore modified files when a later write fails', async () => {
    await writeFiles(root, { 'Sources/Feature/Generated/A.swift': `${MARKER}struct A { let old = 1 }\n` });
    const before = await snapshotTree(root);
    const plan = await planFor();

    const error = await captureRejection(new WriteExecutor(failingOnWrite(3)).apply(plan));

    expect(error).toMatchObject({
      details: { restored: ['Sources/Feature/Generated/A.swift'], removed: ['Sources/Feature/Generated/B.swift'] },
    });
    expect(await snapshotTree(root)).toEqual(before);
    expect(await listDirectories(root)).toEqual(['Sources', 'Sources/Feature', 'Sources/Feature/Generated']);
  });

  it('should refuse to overwrite a file that appeared after planning', async () => {
    const plan = await planFor();
    await writeFiles(root, { 'Sources/Feature/Generated/B.swift': 'struct Mine {}\n' });

    const error = await captureRejection(new WriteExecutor().apply(plan));

    expect(error).toMatchObject({
      code: 'WRI001',
      details: { failedPath: 'Sources/Feature/Generated/B.swift', cause: 'file appeared after the plan was made' },
    });
    expect(await fs.readFile(path.join(root, 'Sources/Feature/Generated/B.swift'), 'utf-8')).toBe('struct Mine {}\n');
    expect(await fs.readdir(path.join(root, 'Sources/Feature/Generated'))).toEqual(['B.swift']);
  });

  it('should report rollback steps that fail', async () => {
    const fileSystem = failingOnWrite(2, {
      unlink: async () => {
        throw new Error('read-only');
      },
    });

    const error = await captureRejection(new WriteExecutor(fileSystem).apply(await planFor()));

    expect(error).toMatchObject({
      details: {
        removed: [],
        rollbackFailures: [
          'remove Sources/Feature/Generated/A.swift: read-only',
          expect.stringMatching(/^remove directory .*\/Sources\/Feature\/Generated: /),
          expect.stringMatching(/^remove directory .*\/Sources\/Feature: /),
        ],
      },
    });
  });

  it('should reject a plan whose content no longer matches its checksum', async () => {
    const plan = await planFor();
    const tampered: GenerationPlan = {
      ...plan,
      artifacts: [{ ...plan.artifacts[0], content: 'struct Evil {}\n' }, ...plan.artifacts.slice(1)],
    };

    const error = await captureRejection(new WriteExecutor().apply(tampered));

    expect(error).toMatchObject({ code: 'WRI002', details: { paths: ['Sources/Feature/Generated/A.swift'] } });
    expect(await listDirectories(root)).toEqual(['Sources']);
  });
});
