import path from 'path';
import fs from 'fs-extra';
import type { Repository } from '@/core/repo';
import { LocalRepository } from '@/core/repo';
import { BlobObject, EntryType } from '@/core/objects';
import { RepositoryException } from '@/core/exceptions';
import { FileUtils, PathUtils, logger } from '@/utils';
import { StagingIndex } from './staging-index';
import type { AddResult, IndexEntry, WorkingTreeSnapshot } from './types';

/**
 * Moves working tree content into the staging area. Every public operation
 * reads `.hunkwise/index.json` once and writes it at most once.
 */
export class IndexManager {
  public static readonly INDEX_FILE_NAME = 'index.json';

  private readonly repository: Repository;
  private readonly indexPath: string;
  private index: StagingIndex = new StagingIndex();

  constructor(repository: Repository) {
    this.repository = repository;
    this.indexPath = path.join(repository.metaDirectory().fullpath(), IndexManager.INDEX_FILE_NAME);
  }

  public async initialize(): Promise<void> {
    this.index = await StagingIndex.read(this.indexPath);
  }

  public get entries(): IndexEntry[] {
    return this.index.entries;
  }

  /**
   * The working tree over `trackedPaths` and every staged path, read from
   * disk. Paths missing from disk are left out. Nothing is written.
   */
  public async workingTree(trackedPaths: Iterable<string>): Promise<WorkingTreeSnapshot> {
    await this.initialize();
    const paths = new Set([...trackedPaths, ...this.index.entries.map((entry) => entry.path)]);
    const snapshot: WorkingTreeSnapshot = { entries: new Map(), contents: new Map() };

    for (const relativePath of paths) {
      const file = await this.readWorkingFile(relativePath);
      if (file === null) continue;

      const sha = new BlobObject(new Uint8Array(file.content)).sha();
      snapshot.entries.set(relativePath, { sha, mode: file.mode });
      snapshot.contents.set(sha, file.content);
    }

    logger.debug(`Read ${snapshot.entries.size} of ${paths.size} tracked path(s) from disk`);
    return snapshot;
  }

  /**
   * Stage files and directories, collecting per-path failures instead of
   * stopping at the first one. A tracked path that no longer exists on disk
   * is removed from the staging area.
   */
  public async add(filePaths: string[]): Promise<AddResult> {
    await this.initialize();
    const result: AddResult = { added: [], modified: [], removed: [], failed: [] };

    for (const filePath of filePaths) {
      try {
        const relativePath = this.toRelative(filePath);
        await this.addPath(relativePath, result);
      } catch (error) {
        result.failed.push({
          path: filePath,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (result.added.length + result.modified.length + result.removed.length > 0) {
      await this.index.write(this.indexPath);
    }
    return result;
  }

  /**
   * Stage exactly these repository-relative file paths. Any failure aborts
   * before the staging area is written, so either every path is staged or
   * none is.
   */
  public async stageFiles(relativePaths: string[]): Promise<IndexEntry[]> {
    await this.initialize();
    const staged: IndexEntry[] = [];

    for (const filePath of relativePaths) {
      const relativePath = this.toRelative(filePath);
      const entry = await this.createEntry(relativePath);
      if (entry === null) {
        throw new RepositoryException(`Cannot stage missing file: ${filePath}`);
      }
      this.index.add(entry);
      staged.push(entry);
    }

    await this.index.write(this.indexPath);
    logger.debug(`Staged ${staged.length} path(s)`);
    return staged;
  }

  private async addPath(relativePath: string, result: AddResult): Promise<void> {
    const absolutePath = this.toAbsolute(relativePath);
    const stats = await IndexManager.lstatIfExists(absolutePath);

    if (stats === null) {
      const tracked = this.index.entriesUnder(relativePath);
      if (tracked.length === 0) {
        throw new RepositoryException('File does not exist');
      }
      tracked.forEach((entry) => {
        this.index.removeEntry(entry.path);
        result.removed.push(entry.path);
      });
      return;
    }

    if (stats.isDirectory()) {
      for (const file of await this.filesInDirectory(absolutePath)) {
        await this.addPath(this.toRelative(file), result);
      }
      return;
    }

    const entry = await this.createEntry(relativePath);
    if (entry === null) {
      throw new RepositoryException('File does not exist');
    }

    const existing = this.index.getEntry(relativePath);
    if (existing && existing.sha === entry.sha && existing.mode === entry.mode) {
      return;
    }

    this.index.add(entry);
    (existing ? result.modified : result.added).push(relativePath);
  }

  /**
   * Write the path's current content as a blob.
   */
  private async createEntry(relativePath: string): Promise<IndexEntry | null> {
    const file = await this.readWorkingFile(relativePath);
    if (file === null) return null;

    const sha = await this.repository.writeObject(new BlobObject(new Uint8Array(file.content)));
    return { path: relativePath, sha, mode: file.mode };
  }

  /**
   * Content and mode of a path on disk, or null when it is gone. Symlinks
   * read as their target.
   */
  private async readWorkingFile(
    relativePath: string
  ): Promise<{ content: Buffer; mode: EntryType } | null> {
    const absolutePath = this.toAbsolute(relativePath);
    const stats = await IndexManager.lstatIfExists(absolutePath);
    if (stats === null) return null;

    if (stats.isSymbolicLink()) {
      return {
        content: Buffer.from(await fs.readlink(absolutePath), 'utf8'),
        mode: EntryType.SYMBOLIC_LINK,
      };
    }
    if (stats.isFile()) {
      return {
        content: await FileUtils.readFile(absolutePath),
        mode: (stats.mode & 0o111) !== 0 ? EntryType.EXECUTABLE_FILE : EntryType.REGULAR_FILE,
      };
    }
    throw new RepositoryException(`Not a regular file: ${relativePath}`);
  }

  private async filesInDirectory(dirPath: string): Promise<string[]> {
    const files: string[] = [];
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    for (const entry of entries) {
      if (entry.name === LocalRepository.META_DIR) continue;

      const fullPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.filesInDirectory(fullPath)));
      } else {
        files.push(fullPath);
      }
    }

    return files.sort();
  }

  private toAbsolute(relativePath: string): string {
    return path.join(this.repoRoot(), relativePath);
  }

  private toRelative(filePath: string): string {
    const absolutePath = path.isAbsolute(filePath)
      ? path.normalize(filePath)
      : path.resolve(this.repoRoot(), filePath);
    const relativePath = PathUtils.toPosix(path.relative(this.repoRoot(), absolutePath));

    if (relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
      throw new RepositoryException(`Path is outside the repository: ${filePath}`);
    }
    if (relativePath.split('/')[0] === LocalRepository.META_DIR) {
      throw new RepositoryException(`Cannot stage repository metadata: ${filePath}`);
    }
    return relativePath === '.' ? '' : relativePath;
  }

  private repoRoot(): string {
    return this.repository.workingDirectory().fullpath();
  }

  private static async lstatIfExists(filePath: string): Promise<fs.Stats | null> {
    try {
      return await fs.lstat(filePath);
    } catch (error) {
      if (FileUtils.isNotFound(error)) return null;
      throw error;
    }
  }
}
