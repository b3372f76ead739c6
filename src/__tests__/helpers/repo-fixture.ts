import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { PathScurry } from 'path-scurry';
import { LocalRepository } from '../../core/repo';
import { IndexManager } from '../../core/index';
import { CommitManager, type CommitResult } from '../../core/commit';
import { DEFAULT_CONFIG, TypedConfig } from '../../core/config';

export const TEST_USER = { name: 'Test User', email: 'test@example.com' };

export interface TestRepo {
  root: string;
  repository: LocalRepository;
  config: TypedConfig;
  write(relativePath: string, content: string | Buffer): Promise<void>;
  read(relativePath: string): Promise<string>;
  /**
   * Delete from disk and from the staging area
   */
  remove(relativePath: string): Promise<void>;
  stage(...relativePaths: string[]): Promise<void>;
  /**
   * Stage everything under the root and commit it
   */
  commit(message: string): Promise<CommitResult>;
  cleanup(): Promise<void>;
}

export const createTestRepo = async (): Promise<TestRepo> => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'hunkwise-'));
  const repository = new LocalRepository();
  await repository.init(new PathScurry(root).cwd);

  const config = new TypedConfig(
    { diff: { ...DEFAULT_CONFIG.diff }, user: { ...TEST_USER }, defaultBranch: 'main' },
    {}
  );
  const indexManager = new IndexManager(repository);

  const stage = async (...relativePaths: string[]): Promise<void> => {
    const result = await indexManager.add(relativePaths);
    if (result.failed.length > 0) {
      throw new Error(`failed to stage: ${result.failed.map((f) => f.path).join(', ')}`);
    }
  };

  return {
    root,
    repository,
    config,
    write: async (relativePath, content) => {
      const absolutePath = path.join(root, relativePath);
      await fs.ensureDir(path.dirname(absolutePath));
      await fs.writeFile(absolutePath, content);
    },
    read: async (relativePath) => await fs.readFile(path.join(root, relativePath), 'utf8'),
    remove: async (relativePath) => {
      await fs.remove(path.join(root, relativePath));
      await stage(relativePath);
    },
    stage,
    commit: async (message) => {
      await stage('.');
      return await new CommitManager(repository, config).createCommit({ message });
    },
    cleanup: async () => {
      await fs.remove(root);
    },
  };
};
