import { RefManager } from '../../core/refs';
import { RepositoryException } from '../../core/exceptions';
import { createTestRepo, type TestRepo } from '../helpers/repo-fixture';

const SHA = '1'.repeat(40);
const OTHER_SHA = '2'.repeat(40);

describe('RefManager', () => {
  let repo: TestRepo;
  let refs: RefManager;

  beforeEach(async () => {
    repo = await createTestRepo();
    refs = new RefManager(repo.repository);
  });

  afterEach(async () => {
    await repo.cleanup();
  });

  test('a fresh repository has an unborn current branch', async () => {
    expect(await refs.readRef('HEAD')).toBe('ref: refs/heads/main');
    expect(await refs.currentBranch()).toBe('main');
    expect(await refs.resolveHead()).toBeNull();
  });

  test('resolves HEAD through the branch it points at', async () => {
    await refs.updateRef('refs/heads/main', SHA);

    expect(await refs.resolveHead()).toBe(SHA);
    expect(await repo.read('.hunkwise/refs/heads/main')).toBe(`${SHA}\n`);
  });

  test('switches HEAD to another branch', async () => {
    await refs.updateRef(RefManager.toBranchRef('feature'), OTHER_SHA);
    await refs.setHeadToBranch('feature');

    expect(await refs.currentBranch()).toBe('feature');
    expect(await refs.resolveHead()).toBe(OTHER_SHA);
  });

  test('reports a detached HEAD as having no branch', async () => {
    await refs.updateRef('HEAD', SHA);

    expect(await refs.currentBranch()).toBeNull();
    expect(await refs.resolveHead()).toBe(SHA);
  });

  test('rejects a ref that holds something other than a commit id', async () => {
    await refs.updateRef('refs/heads/main', 'not-a-sha');
    await expect(refs.resolveHead()).rejects.toThrow(
      'Ref refs/heads/main does not hold a commit id: not-a-sha'
    );
  });

  test('detects symbolic ref cycles', async () => {
    await refs.updateRef('refs/heads/a', 'ref: refs/heads/b');
    await refs.updateRef('refs/heads/b', 'ref: refs/heads/a');

    await expect(refs.resolveReferenceToSha('refs/heads/a')).rejects.toThrow(
      'Reference depth exceeded for refs/heads/a'
    );
  });

  test('rejects ref names that climb out of the refs directory', async () => {
    await expect(refs.readRef('refs/../../escape')).rejects.toThrow(RepositoryException);
  });

  test('deletes refs', async () => {
    await refs.updateRef('refs/heads/old', SHA);

    expect(await refs.exists('refs/heads/old')).toBe(true);
    expect(await refs.deleteRef('refs/heads/old')).toBe(true);
    expect(await refs.deleteRef('refs/heads/old')).toBe(false);
  });

  test('toBranchRef leaves full names alone', () => {
    expect(RefManager.toBranchRef('main')).toBe('refs/heads/main');
    expect(RefManager.toBranchRef('refs/heads/main')).toBe('refs/heads/main');
  });
});
