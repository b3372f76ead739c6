import path from 'path';
import type { Repository } from '@/core/repo';
import type { IndexEntry } from '@/core/index';
import { EntryType, TreeEntry, TreeObject } from '@/core/objects';
import { RepositoryException } from '@/core/exceptions';
import { PathUtils } from '@/utils';

/**
 * Builds nested tree objects from staging entries, deepest directories
 * first so each child tree id is known before its parent is written.
 */
export class TreeBuilder {
  private readonly repository: Repository;

  constructor(repository: Repository) {
    this.repository = repository;
  }

  /**
   * @returns the id of the root tree
   */
  public async buildTree(entries: readonly IndexEntry[]): Promise<string> {
    const { filesByDirectory, allDirectories } = this.analyzeDirectoryStructure(entries);
    return await this.buildTreesBottomUp(filesByDirectory, allDirectories);
  }

  private analyzeDirectoryStructure(entries: readonly IndexEntry[]) {
    const filesByDirectory = new Map<string, IndexEntry[]>([['', []]]);
    const allDirectories = new Set<string>(['']);

    for (const entry of entries) {
      const directoryPath = PathUtils.directoryOf(entry.path);

      const siblings = filesByDirectory.get(directoryPath) ?? [];
      siblings.push(entry);
      filesByDirectory.set(directoryPath, siblings);

      for (let dir = directoryPath; dir !== ''; dir = PathUtils.directoryOf(dir)) {
        allDirectories.add(dir);
      }
    }

    return { filesByDirectory, allDirectories: [...allDirectories] };
  }

  private async buildTreesBottomUp(
    filesByDirectory: Map<string, IndexEntry[]>,
    allDirectories: string[]
  ): Promise<string> {
    const treeShaByDirectory = new Map<string, string>();

    for (const directoryPath of this.sortDirectoriesByDepth(allDirectories)) {
      const treeEntries = (filesByDirectory.get(directoryPath) ?? []).map(
        (file) => new TreeEntry(file.mode, path.posix.basename(file.path), file.sha)
      );

      for (const subdir of allDirectories) {
        if (subdir === '' || subdir === directoryPath) continue;
        if (PathUtils.directoryOf(subdir) !== directoryPath) continue;

        const subdirSha = treeShaByDirectory.get(subdir);
        if (subdirSha === undefined) continue;
        treeEntries.push(new TreeEntry(EntryType.DIRECTORY, path.posix.basename(subdir), subdirSha));
      }

      const treeSha = await this.repository.writeObject(new TreeObject(treeEntries));
      treeShaByDirectory.set(directoryPath, treeSha);
    }

    const rootSha = treeShaByDirectory.get('');
    if (rootSha === undefined) {
      throw new RepositoryException('Root tree was not built');
    }
    return rootSha;
  }

  /**
   * Deepest first: ["src/core/nested", "src/core", "src", ""]
   */
  private sortDirectoriesByDepth(directories: string[]): string[] {
    const depth = (dir: string) => (dir === '' ? 0 : dir.split('/').length);
    return [...directories].sort((a, b) => depth(b) - depth(a));
  }
}
