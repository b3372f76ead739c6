import type { Repository } from '@/core/repo';
import { ObjectReader } from '@/core/repo';
import { IndexManager, type WorkingTreeSnapshot } from '@/core/index';
import { TreeWalker } from '@/core/tree';
import { RevisionResolver, type RevisionRange } from '@/core/revision';
import { BackendException } from '@/core/exceptions';
import { logger } from '@/utils';
import { DiffBuilder } from './diff-builder';
import { TreeComparison } from './tree-comparison';
import { DEFAULT_DIFF_OPTIONS, type Diff, type DiffOptions } from './types';

/**
 * Builds diffs between commits of a repository, or between HEAD and the
 * working tree.
 */
export class DiffEngine {
  private readonly repository: Repository;
  private readonly options: DiffOptions;

  constructor(repository: Repository, options: Partial<DiffOptions> = {}) {
    this.repository = repository;
    this.options = { ...DEFAULT_DIFF_OPTIONS, ...options };
  }

  /**
   * Diff of HEAD against its first parent (an empty tree for a root commit).
   */
  public async diff(): Promise<Diff> {
    const range = await new RevisionResolver(this.repository).resolveRange();
    return await this.diffForRange(range);
  }

  public async diffForRange(range: RevisionRange): Promise<Diff> {
    const headTree = await this.treeOf(range.head.oid);
    const baseTree = range.base ? await this.treeOf(range.base.oid) : null;
    logger.debug(`Comparing ${baseTree ?? '(empty tree)'} -> ${headTree}`);

    const comparison = new TreeComparison(this.repository, this.options);
    const diff = await DiffBuilder.fromEvents(range, comparison.compare(baseTree, headTree));
    logger.debug(`Diff has ${diff.files.length} file(s)`);
    return diff;
  }

  /**
   * Staged and unstaged changes of tracked files against HEAD. Tracked means
   * in HEAD's tree or in the staging area; other files on disk are ignored.
   * Both sides of the returned range are HEAD.
   */
  public async diffWorkspace(): Promise<Diff> {
    const { head } = await new RevisionResolver(this.repository).resolveRange();
    const headTree = await this.treeOf(head.oid);
    const snapshot = await this.workingTree(headTree);
    logger.debug(`Comparing ${headTree} -> working tree`);

    const comparison = new TreeComparison(this.repository, this.options);
    const diff = await DiffBuilder.fromEvents(
      { base: head, head },
      comparison.compareWithWorkingTree(headTree, snapshot)
    );
    logger.debug(`Workspace diff has ${diff.files.length} file(s)`);
    return diff;
  }

  private async workingTree(headTree: string): Promise<WorkingTreeSnapshot> {
    try {
      const tracked = await new TreeWalker(this.repository).walkTree(headTree);
      return await new IndexManager(this.repository).workingTree(tracked.keys());
    } catch (error) {
      throw new BackendException('Failed to read the working tree', error);
    }
  }

  private async treeOf(commitSha: string): Promise<string> {
    try {
      const commit = await ObjectReader.readCommit(this.repository, commitSha);
      return commit.treeSha;
    } catch (error) {
      throw new BackendException(`Failed to resolve tree of ${commitSha}`, error);
    }
  }
}

export const diff = async (
  repository: Repository,
  options: Partial<DiffOptions> = {}
): Promise<Diff> => await new DiffEngine(repository, options).diff();

export const diffForRange = async (
  repository: Repository,
  range: RevisionRange,
  options: Partial<DiffOptions> = {}
): Promise<Diff> => await new DiffEngine(repository, options).diffForRange(range);

export const diffWorkspace = async (
  repository: Repository,
  options: Partial<DiffOptions> = {}
): Promise<Diff> => await new DiffEngine(repository, options).diffWorkspace();
