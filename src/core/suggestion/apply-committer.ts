import { SuggestionException } from '@/core/exceptions';
import {
  AtomicOperationManager,
  type FileOperation,
  type FileOperationHandler,
  type Workspace,
} from '@/core/work-dir';
import type { FileChange } from './types';

/**
 * Writes planned changes and stages them, all or nothing. A failed write
 * surfaces as an Io error, a failed stage as a Staging error; either way
 * every file written so far is put back to its original bytes.
 */
export class ApplyCommitter {
  private readonly atomic: AtomicOperationManager;

  constructor(private readonly workspace: Workspace) {
    this.atomic = new AtomicOperationManager(this.handler());
  }

  public async commit(changes: FileChange[]): Promise<string[]> {
    const operations: FileOperation[] = changes.map((change) => ({
      path: change.path,
      content: change.updated,
      backup: change.original,
    }));
    const paths = operations.map((operation) => operation.path);

    await this.atomic.executeAtomically(operations, async () => {
      if (paths.length === 0) return;
      try {
        await this.workspace.stagePaths(paths);
      } catch (error) {
        throw SuggestionException.staging(paths.join(', '), error);
      }
    });

    return paths;
  }

  private handler(): FileOperationHandler {
    const workspace = this.workspace;
    return {
      async write(operation) {
        try {
          await workspace.writeFile(operation.path, operation.content);
        } catch (error) {
          throw SuggestionException.io(operation.path, 'write', error);
        }
      },
      async restore(operation) {
        await workspace.writeFile(operation.path, operation.backup);
      },
    };
  }
}
