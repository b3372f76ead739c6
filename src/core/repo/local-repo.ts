import type { Path } from 'path-scurry';
import { Repository } from './repo';
import { type ObjectStore, FileObjectStore } from '@/core/object-store';
import { RepositoryException } from '@/core/exceptions';
import type { GitObject } from '@/core/objects';
import { FileUtils, logger } from '@/utils';

/**
 * Repository kept on the local filesystem:
 *
 * ┌─ <working-directory>/
 * │ ├─ .hunkwise/
 * │ │ ├─ objects/      ← loose objects (ab/cdef123...)
 * │ │ ├─ refs/heads/   ← branch refs
 * │ │ ├─ HEAD          ← "ref: refs/heads/<branch>" or a commit id
 * │ │ ├─ index.json    ← staging area
 * │ │ └─ config.json   ← repository configuration
 * │ └─ ...working tree files
 */
export class LocalRepository extends Repository {
  public static readonly META_DIR = '.hunkwise';
  public static readonly OBJECTS_DIR = 'objects';
  public static readonly REFS_DIR = 'refs';

  private _workingDirectory: Path | null = null;
  private _metaDirectory: Path | null = null;
  private readonly _objectStore: ObjectStore;

  constructor(objectStore: ObjectStore = new FileObjectStore()) {
    super();
    this._objectStore = objectStore;
  }

  /**
   * Lay out an empty repository at `path` with HEAD on `defaultBranch`.
   */
  override async init(path: Path, defaultBranch: string = 'main'): Promise<void> {
    const workDir = path.resolve();
    if (await LocalRepository.exists(workDir)) {
      throw new RepositoryException(`Already a repository: ${workDir.fullpath()}`);
    }

    const metaDir = workDir.resolve(LocalRepository.META_DIR);
    try {
      await FileUtils.createDirectories(metaDir.resolve(LocalRepository.OBJECTS_DIR).fullpath());
      await FileUtils.createDirectories(
        metaDir.resolve(LocalRepository.REFS_DIR).resolve('heads').fullpath()
      );
      await FileUtils.createFile(
        metaDir.resolve('HEAD').fullpath(),
        `ref: refs/heads/${defaultBranch}\n`
      );
      await this.attach(workDir, metaDir);
    } catch (error) {
      if (error instanceof RepositoryException) throw error;
      throw new RepositoryException('Failed to initialize repository', error);
    }

    logger.debug(`Initialized repository at ${workDir.fullpath()}`);
  }

  override workingDirectory(): Path {
    if (!this._workingDirectory) {
      throw new RepositoryException('Repository not initialized');
    }
    return this._workingDirectory;
  }

  override metaDirectory(): Path {
    if (!this._metaDirectory) {
      throw new RepositoryException('Repository not initialized');
    }
    return this._metaDirectory;
  }

  override async readObject(sha: string): Promise<GitObject | null> {
    try {
      return await this._objectStore.readObject(sha);
    } catch (error) {
      throw new RepositoryException(`Failed to read object ${sha}`, error);
    }
  }

  override async writeObject(object: GitObject): Promise<string> {
    try {
      return await this._objectStore.writeObject(object);
    } catch (error) {
      throw new RepositoryException('Failed to write object', error);
    }
  }

  /**
   * Walk up from `startPath` until a directory holding `.hunkwise` is found.
   */
  public static async findRepository(startPath: Path): Promise<LocalRepository | null> {
    let current: Path | undefined = startPath.resolve();

    while (current) {
      if (await LocalRepository.exists(current)) {
        const repo = new LocalRepository();
        await repo.attach(current, current.resolve(LocalRepository.META_DIR));
        return repo;
      }
      current = current.parent;
    }

    return null;
  }

  static async exists(path: Path): Promise<boolean> {
    return await FileUtils.exists(path.resolve(LocalRepository.META_DIR).fullpath());
  }

  private async attach(workDir: Path, metaDir: Path): Promise<void> {
    this._workingDirectory = workDir;
    this._metaDirectory = metaDir;
    await this._objectStore.initialize(metaDir);
  }
}
