import type { Repository } from '@/core/repo';
import { ObjectReader } from '@/core/repo';
import { RefManager } from '@/core/refs';
import { TreeBuilder } from '@/core/tree';
import type { TypedConfig } from '@/core/config';
import { IndexManager } from '@/core/index';
import { CommitObject, CommitPerson } from '@/core/objects';
import { RepositoryException } from '@/core/exceptions';
import { logger } from '@/utils';
import type { CommitOptions, CommitResult } from './types';

/**
 * Turns the staging area into a commit:
 * 1. Read the staged entries
 * 2. Build the tree objects bottom-up
 * 3. Take the current HEAD commit as parent (none on an unborn branch)
 * 4. Write the commit object
 * 5. Move the current branch, or HEAD itself when detached
 */
export class CommitManager {
  private readonly repository: Repository;
  private readonly config: TypedConfig;
  private readonly treeBuilder: TreeBuilder;
  private readonly refManager: RefManager;
  private readonly indexManager: IndexManager;

  constructor(repository: Repository, config: TypedConfig) {
    this.repository = repository;
    this.config = config;
    this.treeBuilder = new TreeBuilder(repository);
    this.refManager = new RefManager(repository);
    this.indexManager = new IndexManager(repository);
  }

  public async createCommit(options: CommitOptions): Promise<CommitResult> {
    if (options.message.trim().length === 0) {
      throw new RepositoryException('Commit message cannot be empty');
    }

    await this.indexManager.initialize();
    const entries = this.indexManager.entries;
    if (entries.length === 0) {
      throw new RepositoryException('No changes staged for commit');
    }

    const treeSha = await this.treeBuilder.buildTree(entries);
    const headSha = await this.refManager.resolveHead();
    const parentShas = headSha === null ? [] : [headSha];

    if (headSha !== null) {
      const parent = await ObjectReader.readCommit(this.repository, headSha);
      if (parent.treeSha === treeSha) {
        throw new RepositoryException('No changes to commit (tree is identical to parent)');
      }
    }

    const author = options.author ?? this.currentUser();
    const committer = options.committer ?? author;
    const message = options.message.endsWith('\n') ? options.message : `${options.message}\n`;

    const commit = new CommitObject({ treeSha, parentShas, author, committer, message });
    const sha = await this.repository.writeObject(commit);
    const branch = await this.updateCurrentRef(sha);

    logger.debug(`Created commit ${sha} with tree ${treeSha}`);
    return { sha, treeSha, parentShas, message, branch, author, committer };
  }

  private currentUser(): CommitPerson {
    const name = this.config.userName;
    const email = this.config.userEmail;
    if (name === null || email === null) {
      throw new RepositoryException(
        'Author identity unknown: set user.name and user.email in config.json ' +
          'or HUNKWISE_AUTHOR_NAME and HUNKWISE_AUTHOR_EMAIL'
      );
    }
    return CommitPerson.now(name, email);
  }

  /**
   * @returns the branch that moved, null when HEAD is detached
   */
  private async updateCurrentRef(commitSha: string): Promise<string | null> {
    const branch = await this.refManager.currentBranch();
    if (branch === null) {
      await this.refManager.updateRef(RefManager.HEAD_FILE, commitSha);
      return null;
    }

    await this.refManager.updateRef(RefManager.toBranchRef(branch), commitSha);
    return branch;
  }
}
