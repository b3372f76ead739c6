import type { EntryType } from '@/core/objects';

/**
 * One staged path. `path` is repository-relative with forward slashes.
 */
export type IndexEntry = {
  path: string;
  sha: string;
  mode: EntryType;
};

export type AddResult = {
  added: string[];
  modified: string[];
  removed: string[];
  failed: Array<{
    path: string;
    reason: string;
  }>;
};

/**
 * Tracked files as they are on disk, keyed by path, with their content keyed
 * by blob sha. The blobs are not written to the object store.
 */
export type WorkingTreeSnapshot = {
  entries: Map<string, { sha: string; mode: EntryType }>;
  contents: Map<string, Uint8Array>;
};
