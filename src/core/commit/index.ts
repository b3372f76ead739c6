import { CommitManager } from './commit-manager';
import type { CommitOptions, CommitResult } from './types';

export { CommitManager };
export type { CommitOptions, CommitResult };
