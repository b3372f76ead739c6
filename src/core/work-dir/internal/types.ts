/**
 * One file to overwrite, with the bytes to put back if the batch fails.
 */
export type FileOperation = {
  path: string;
  content: Uint8Array;
  backup: Uint8Array;
};

export interface FileOperationHandler {
  write(operation: FileOperation): Promise<void>;
  restore(operation: FileOperation): Promise<void>;
}

export type OperationResult = {
  operationsApplied: number;
  totalOperations: number;
};
