import type { Repository } from '@/core/repo';
import { ObjectReader } from '@/core/repo';
import type { EntryType } from '@/core/objects';
import { PathUtils } from '@/utils';

export type FlatEntry = {
  sha: string;
  mode: EntryType;
};

/**
 * Flattens a tree object into `path → { sha, mode }` for every file and
 * symlink below it. Submodule entries are skipped.
 */
export class TreeWalker {
  private readonly repository: Repository;

  constructor(repository: Repository) {
    this.repository = repository;
  }

  public async commitFiles(commitSha: string): Promise<Map<string, FlatEntry>> {
    const commit = await ObjectReader.readCommit(this.repository, commitSha);
    return await this.walkTree(commit.treeSha);
  }

  /**
   * Depth-first walk. Tree reads that fail are rethrown.
   */
  public async walkTree(treeSha: string, basePath: string = ''): Promise<Map<string, FlatEntry>> {
    const files = new Map<string, FlatEntry>();
    const tree = await ObjectReader.readTree(this.repository, treeSha);

    for (const entry of tree.entries) {
      const fullPath = PathUtils.normalizePath(basePath, entry.name);

      if (entry.isDirectory()) {
        const subFiles = await this.walkTree(entry.sha, fullPath);
        subFiles.forEach((flat, p) => files.set(p, flat));
        continue;
      }

      if (entry.isSubmodule()) continue;
      files.set(fullPath, { sha: entry.sha, mode: entry.mode });
    }

    return files;
  }
}
