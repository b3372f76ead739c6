import { FileOperationService } from './file-operation';
import { AtomicOperationManager } from './atomic-operation';
import type { FileOperation, FileOperationHandler, OperationResult } from './types';

export { FileOperationService, AtomicOperationManager };
export type { FileOperation, FileOperationHandler, OperationResult };
