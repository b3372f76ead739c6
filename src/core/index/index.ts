import { IndexManager } from './index-manager';
import { StagingIndex } from './staging-index';
import type { AddResult, IndexEntry, WorkingTreeSnapshot } from './types';

export { IndexManager, StagingIndex };
export type { AddResult, IndexEntry, WorkingTreeSnapshot };
