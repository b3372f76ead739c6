import { CommitManager } from '../../core/commit';
import { DEFAULT_CONFIG, TypedConfig } from '../../core/config';
import { RefManager } from '../../core/refs';
import { ObjectReader } from '../../core/repo';
import { CommitPerson } from '../../core/objects';
import { RepositoryException } from '../../core/exceptions';
import { createTestRepo, TEST_USER, type TestRepo } from '../helpers/repo-fixture';

describe('CommitManager', () => {
  let repo: TestRepo;
  let refs: RefManager;

  beforeEach(async () => {
    repo = await createTestRepo();
    refs = new RefManager(repo.repository);
  });

  afterEach(async () => {
    await repo.cleanup();
  });

  const manager = (): CommitManager => new CommitManager(repo.repository, repo.config);

  test('creates a root commit and moves the current branch', async () => {
    await repo.write('a.txt', 'a\n');

    const result = await repo.commit('Initial commit');

    expect(result.parentShas).toEqual([]);
    expect(result.branch).toBe('main');
    expect(result.message).toBe('Initial commit\n');
    expect(await refs.readRef('refs/heads/main')).toBe(result.sha);

    const stored = await ObjectReader.readCommit(repo.repository, result.sha);
    expect(stored.treeSha).toBe(result.treeSha);
    expect(stored.author?.name).toBe(TEST_USER.name);
    expect(stored.committer?.email).toBe(TEST_USER.email);
  });

  test('chains commits through their parent', async () => {
    await repo.write('a.txt', 'a\n');
    const first = await repo.commit('first');
    await repo.write('a.txt', 'b\n');

    const second = await repo.commit('second');

    expect(second.parentShas).toEqual([first.sha]);
    expect(await refs.resolveHead()).toBe(second.sha);
  });

  test('keeps a message that already ends in a newline', async () => {
    await repo.write('a.txt', 'a\n');
    const result = await repo.commit('Subject\n\nBody\n');
    expect(result.message).toBe('Subject\n\nBody\n');
  });

  test('uses explicit author and committer', async () => {
    await repo.write('a.txt', 'a\n');
    await repo.stage('a.txt');
    const author = new CommitPerson('Other Author', 'other@example.com', 1600000000, '+0200');

    const result = await manager().createCommit({ message: 'explicit', author });

    expect(result.author).toBe(author);
    expect(result.committer).toBe(author);
  });

  test('rejects an empty message', async () => {
    await repo.write('a.txt', 'a\n');
    await repo.stage('a.txt');
    await expect(manager().createCommit({ message: '  \n' })).rejects.toThrow(
      'Commit message cannot be empty'
    );
  });

  test('rejects an empty staging area', async () => {
    await expect(manager().createCommit({ message: 'nothing' })).rejects.toThrow(
      'No changes staged for commit'
    );
  });

  test('rejects a tree identical to the parent', async () => {
    await repo.write('a.txt', 'a\n');
    await repo.commit('first');

    await expect(repo.commit('again')).rejects.toThrow(
      'No changes to commit (tree is identical to parent)'
    );
  });

  test('requires an author identity', async () => {
    await repo.write('a.txt', 'a\n');
    await repo.stage('a.txt');
    const anonymous = new TypedConfig(
      { diff: { ...DEFAULT_CONFIG.diff }, user: {}, defaultBranch: 'main' },
      {}
    );

    await expect(
      new CommitManager(repo.repository, anonymous).createCommit({ message: 'who?' })
    ).rejects.toThrow(RepositoryException);
  });

  test('moves HEAD itself when detached', async () => {
    await repo.write('a.txt', 'a\n');
    const first = await repo.commit('first');
    await refs.updateRef(RefManager.HEAD_FILE, first.sha);
    await repo.write('a.txt', 'detached\n');

    const second = await repo.commit('on detached head');

    expect(second.branch).toBeNull();
    expect(await refs.readRef(RefManager.HEAD_FILE)).toBe(second.sha);
    expect(await refs.readRef('refs/heads/main')).toBe(first.sha);
  });
});
