import fs from 'fs-extra';
import path from 'path';
import { SuggestionApplier, apply, dryRun } from '../../core/suggestion/suggestion-applier';
import { DiffSide, type Position, type Suggestion, type TextEdit } from '../../core/suggestion/types';
import { SuggestionException } from '../../core/exceptions';
import { IndexManager } from '../../core/index';
import { BlobObject } from '../../core/objects';
import { MemoryWorkspace } from '../helpers/memory-workspace';
import { createTestRepo, type TestRepo } from '../helpers/repo-fixture';

const edit = (path: string, start: Position, end: Position, replacement: string): TextEdit => ({
  location: { path, side: DiffSide.HEAD, range: { start, end } },
  replacement,
});

const suggestion = (...edits: TextEdit[]): Suggestion => ({ edits });

const rejection = async (promise: Promise<unknown>): Promise<SuggestionException> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SuggestionException) return error;
    throw error;
  }
  throw new Error('expected a SuggestionException');
};

const blobSha = (text: string): string => new BlobObject(Buffer.from(text, 'utf8')).sha();

describe('SuggestionApplier with a repository', () => {
  let repo: TestRepo;

  beforeEach(async () => {
    repo = await createTestRepo();
    await repo.write('file.txt', 'line 1\nline 2\n');
    await repo.commit('initial');
  });

  afterEach(async () => {
    await repo.cleanup();
  });

  const replaceLineTwo = suggestion(
    edit('file.txt', { line: 2, column: 1 }, { line: 3, column: 1 }, 'line two\n')
  );

  test('dryRun renders a unified diff and leaves the file alone', async () => {
    const previews = await dryRun(repo.repository, replaceLineTwo);

    expect(previews).toEqual([
      {
        path: 'file.txt',
        patch:
          'diff --git a/file.txt b/file.txt\n' +
          '--- a/file.txt\n' +
          '+++ b/file.txt\n' +
          '@@ -1,2 +1,2 @@\n' +
          ' line 1\n' +
          '-line 2\n' +
          '+line two\n',
      },
    ]);
    expect(await repo.read('file.txt')).toBe('line 1\nline 2\n');
  });

  test('apply writes the file and stages it', async () => {
    const applied = await apply(repo.repository, replaceLineTwo);

    expect(applied).toEqual(['file.txt']);
    expect(await repo.read('file.txt')).toBe('line 1\nline two\n');

    const indexManager = new IndexManager(repo.repository);
    await indexManager.initialize();
    expect(indexManager.entries.find((e) => e.path === 'file.txt')?.sha).toBe(
      blobSha('line 1\nline two\n')
    );
  });

  test('an applied suggestion can be committed', async () => {
    await apply(repo.repository, replaceLineTwo);
    const result = await repo.commit('apply suggestion');
    expect(result.parentShas).toHaveLength(1);
  });

  test('a failed apply leaves the file untouched', async () => {
    const error = await rejection(
      apply(repo.repository, suggestion(edit('file.txt', { line: 5 }, { line: 5 }, 'x')))
    );
    expect(error.kind).toBe('LineOutOfBounds');
    expect(await repo.read('file.txt')).toBe('line 1\nline 2\n');
  });

  test('a dotted path stages the same entry as the plain path', async () => {
    const applied = await apply(
      repo.repository,
      suggestion(edit('./file.txt', { line: 2, column: 1 }, { line: 3, column: 1 }, 'line two\n'))
    );

    expect(applied).toEqual(['file.txt']);
    const indexManager = new IndexManager(repo.repository);
    await indexManager.initialize();
    expect(indexManager.entries.map((e) => [e.path, e.sha])).toEqual([
      ['file.txt', blobSha('line 1\nline two\n')],
    ]);
  });

  test('files are written in nested directories', async () => {
    await repo.write('src/deep/mod.ts', 'export const a = 1;\n');
    await apply(
      repo.repository,
      suggestion(edit('src/deep/mod.ts', { line: 1, column: 18 }, { line: 1, column: 19 }, '2'))
    );
    expect(await fs.readFile(path.join(repo.root, 'src/deep/mod.ts'), 'utf8')).toBe(
      'export const a = 2;\n'
    );
  });
});

describe('SuggestionApplier with an in-memory workspace', () => {
  let workspace: MemoryWorkspace;
  let applier: SuggestionApplier;

  beforeEach(() => {
    workspace = new MemoryWorkspace({
      'a.txt': 'alpha\n',
      'b.txt': 'bravo\n',
      'c.txt': 'charlie\n',
    });
    applier = new SuggestionApplier(workspace);
  });

  const rewriteAll = suggestion(
    edit('c.txt', { line: 1 }, { line: 2 }, 'CHARLIE\n'),
    edit('a.txt', { line: 1 }, { line: 2 }, 'ALPHA\n'),
    edit('b.txt', { line: 1 }, { line: 2 }, 'BRAVO\n')
  );

  test('writes files in path order and stages them in one batch', async () => {
    expect(await applier.apply(rewriteAll)).toEqual(['a.txt', 'b.txt', 'c.txt']);
    expect(workspace.writes).toEqual(['a.txt', 'b.txt', 'c.txt']);
    expect(workspace.stagedBatches).toEqual([['a.txt', 'b.txt', 'c.txt']]);
  });

  test('a no-op suggestion previews nothing and writes nothing', async () => {
    const noop = suggestion(edit('a.txt', { line: 1 }, { line: 2 }, 'alpha\n'));

    expect(await applier.dryRun(noop)).toEqual([]);
    expect(await applier.apply(noop)).toEqual([]);
    expect(workspace.writes).toEqual([]);
    expect(workspace.stagedBatches).toEqual([]);
  });

  test('unchanged files are left out of a mixed suggestion', async () => {
    const mixed = suggestion(
      edit('a.txt', { line: 1 }, { line: 2 }, 'alpha\n'),
      edit('b.txt', { line: 1 }, { line: 2 }, 'BRAVO\n')
    );

    expect((await applier.dryRun(mixed)).map((p) => p.path)).toEqual(['b.txt']);
    expect(await applier.apply(mixed)).toEqual(['b.txt']);
  });

  test('an invalid edit in any file stops the apply before anything is written', async () => {
    const error = await rejection(
      applier.apply(
        suggestion(
          edit('a.txt', { line: 1 }, { line: 2 }, 'ALPHA\n'),
          edit('b.txt', { line: 1, column: 40 }, { line: 2 }, 'BRAVO\n')
        )
      )
    );

    expect(error.kind).toBe('ColumnOutOfBounds');
    expect(workspace.writes).toEqual([]);
  });

  test('a failed write restores the files already written', async () => {
    workspace.failWriteFor.add('b.txt');

    const error = await rejection(applier.apply(rewriteAll));

    expect(error.kind).toBe('Io');
    expect(error.path).toBe('b.txt');
    expect(workspace.text('a.txt')).toBe('alpha\n');
    expect(workspace.text('b.txt')).toBe('bravo\n');
    expect(workspace.text('c.txt')).toBe('charlie\n');
    expect(workspace.stagedBatches).toEqual([]);
  });

  test('overlapping edits are rejected before any file is touched', async () => {
    const error = await rejection(
      applier.apply(
        suggestion(
          edit('a.txt', { line: 1 }, { line: 2 }, 'ALPHA\n'),
          edit('b.txt', { line: 1, column: 1 }, { line: 1, column: 4 }, 'BRA'),
          edit('b.txt', { line: 1, column: 3 }, { line: 2 }, 'AVO\n')
        )
      )
    );

    expect(error.kind).toBe('OverlappingEdits');
    expect(error.path).toBe('b.txt');
    expect(workspace.writes).toEqual([]);
    expect(workspace.text('a.txt')).toBe('alpha\n');
    expect(workspace.text('b.txt')).toBe('bravo\n');
  });

  test('edits overlapping under two spellings of one path are rejected', async () => {
    const error = await rejection(
      applier.apply(
        suggestion(
          edit('a.txt', { line: 1 }, { line: 2 }, 'ALPHA\n'),
          edit('./a.txt', { line: 1, column: 2 }, { line: 1, column: 4 }, 'LP')
        )
      )
    );

    expect(error.kind).toBe('OverlappingEdits');
    expect(error.path).toBe('a.txt');
    expect(workspace.writes).toEqual([]);
    expect(workspace.text('a.txt')).toBe('alpha\n');
  });

  test('a write cut short is restored along with earlier writes', async () => {
    workspace.partialWriteFor.set('b.txt', 2);

    const error = await rejection(applier.apply(rewriteAll));

    expect(error.kind).toBe('Io');
    expect(error.path).toBe('b.txt');
    expect(workspace.writes).toEqual(['a.txt', 'b.txt', 'a.txt']);
    expect(workspace.text('a.txt')).toBe('alpha\n');
    expect(workspace.text('b.txt')).toBe('bravo\n');
    expect(workspace.text('c.txt')).toBe('charlie\n');
    expect(workspace.stagedBatches).toEqual([]);
  });

  test('a failed stage restores every written file', async () => {
    workspace.failStaging = true;

    const error = await rejection(applier.apply(rewriteAll));

    expect(error.kind).toBe('Staging');
    expect(error.message).toBe('failed to stage a.txt, b.txt, c.txt: staging area is locked');
    expect(workspace.writes).toEqual(['a.txt', 'b.txt', 'c.txt', 'c.txt', 'b.txt', 'a.txt']);
    expect(workspace.text('a.txt')).toBe('alpha\n');
    expect(workspace.text('b.txt')).toBe('bravo\n');
    expect(workspace.text('c.txt')).toBe('charlie\n');
  });

  test('dryRun includes a section for hunks below the first line', async () => {
    workspace.files.set(
      'code.ts',
      Buffer.from('function main() {\n  one();\n  two();\n  three();\n  four();\n}\n', 'utf8')
    );

    const [preview] = await applier.dryRun(
      suggestion(edit('code.ts', { line: 5, column: 3 }, { line: 5, column: 7 }, 'FOUR'))
    );

    expect(preview?.patch).toBe(
      'diff --git a/code.ts b/code.ts\n' +
        '--- a/code.ts\n' +
        '+++ b/code.ts\n' +
        '@@ -2,5 +2,5 @@ function main() {\n' +
        '   one();\n' +
        '   two();\n' +
        '   three();\n' +
        '-  four();\n' +
        '+  FOUR();\n' +
        ' }\n'
    );
  });

  test('dryRun marks a missing final newline', async () => {
    workspace.files.set('tail.txt', Buffer.from('keep\nlast', 'utf8'));

    const [preview] = await applier.dryRun(
      suggestion(edit('tail.txt', { line: 2, column: 1 }, { line: 2, column: 5 }, 'final'))
    );

    expect(preview?.patch).toBe(
      'diff --git a/tail.txt b/tail.txt\n' +
        '--- a/tail.txt\n' +
        '+++ b/tail.txt\n' +
        '@@ -1,2 +1,2 @@\n' +
        ' keep\n' +
        '-last\n' +
        '\\ No newline at end of file\n' +
        '+final\n' +
        '\\ No newline at end of file\n'
    );
  });
});
