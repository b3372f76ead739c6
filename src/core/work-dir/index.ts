import { WorkingDirectory } from './working-directory';
import type { Workspace } from './workspace';
import {
  AtomicOperationManager,
  FileOperationService,
  type FileOperation,
  type FileOperationHandler,
  type OperationResult,
} from './internal';

export { WorkingDirectory, AtomicOperationManager, FileOperationService };
export type { Workspace, FileOperation, FileOperationHandler, OperationResult };
