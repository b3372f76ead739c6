import { logger } from '@/utils';
import type { FileOperation, FileOperationHandler, OperationResult } from './types';

/**
 * Applies a batch of file writes followed by a finishing step. If any write
 * or the finishing step fails, every file already written is restored from
 * its backup and the original error is rethrown. A file counts as written
 * once its write starts, since a failed write may leave part of it on disk.
 */
export class AtomicOperationManager {
  constructor(private readonly handler: FileOperationHandler) {}

  public async executeAtomically(
    operations: FileOperation[],
    finish: () => Promise<void> = async () => {}
  ): Promise<OperationResult> {
    const applied: FileOperation[] = [];

    try {
      for (const operation of operations) {
        applied.push(operation);
        await this.handler.write(operation);
        logger.debug(`Wrote ${operation.path}`);
      }
      await finish();
    } catch (error) {
      logger.warn(`Operation failed after touching ${applied.length} file(s), rolling back`);
      await this.rollbackChanges(applied);
      throw error;
    }

    return { operationsApplied: applied.length, totalOperations: operations.length };
  }

  /**
   * Restore in reverse order. A failed restore is logged and the rest still run.
   */
  private async rollbackChanges(applied: FileOperation[]): Promise<void> {
    for (const operation of [...applied].reverse()) {
      try {
        await this.handler.restore(operation);
        logger.debug(`Restored ${operation.path} from backup`);
      } catch (error) {
        logger.error(`Failed to restore ${operation.path} from backup:`, error);
      }
    }
  }
}
