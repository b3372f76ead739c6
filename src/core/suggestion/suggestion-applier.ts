import type { Repository } from '@/core/repo';
import { WorkingDirectory, type Workspace } from '@/core/work-dir';
import { logger } from '@/utils';
import { ApplyCommitter } from './apply-committer';
import { EditPlanner } from './edit-planner';
import { PatchRenderer } from './patch-renderer';
import type { ApplyPreview, FileChange, Suggestion } from './types';

/**
 * Previews or applies a suggestion against a workspace.
 *
 * Both operations validate every edit of every file before producing any
 * output, and files whose content would not change are left out.
 */
export class SuggestionApplier {
  private readonly planner: EditPlanner;
  private readonly renderer = new PatchRenderer();
  private readonly committer: ApplyCommitter;

  constructor(workspace: Workspace) {
    this.planner = new EditPlanner(workspace);
    this.committer = new ApplyCommitter(workspace);
  }

  /**
   * One patch per changed file, ordered by path. Touches nothing on disk.
   */
  public async dryRun(suggestion: Suggestion): Promise<ApplyPreview[]> {
    const changes = await this.changedFiles(suggestion);
    return changes.map((change) => ({ path: change.path, patch: this.renderer.render(change) }));
  }

  /**
   * Writes and stages every changed file. Returns the paths that changed.
   */
  public async apply(suggestion: Suggestion): Promise<string[]> {
    const changes = await this.changedFiles(suggestion);
    if (changes.length === 0) {
      logger.debug('Suggestion produces no changes');
      return [];
    }
    const applied = await this.committer.commit(changes);
    logger.debug(`Applied suggestion to ${applied.length} file(s)`);
    return applied;
  }

  private async changedFiles(suggestion: Suggestion): Promise<FileChange[]> {
    const changes = await this.planner.plan(suggestion);
    return changes.filter((change) => !change.original.equals(change.updated));
  }
}

export const dryRun = async (
  repository: Repository,
  suggestion: Suggestion
): Promise<ApplyPreview[]> =>
  await new SuggestionApplier(new WorkingDirectory(repository)).dryRun(suggestion);

export const apply = async (repository: Repository, suggestion: Suggestion): Promise<string[]> =>
  await new SuggestionApplier(new WorkingDirectory(repository)).apply(suggestion);
