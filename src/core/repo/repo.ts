import type { Path } from 'path-scurry';
import type { GitObject } from '@/core/objects';

/**
 * What the engine needs from a repository: its two directories and object
 * reads and writes. Refs, the staging area and configuration are files under
 * `metaDirectory()` and are handled by their own managers.
 */
export abstract class Repository {
  abstract init(path: Path, defaultBranch?: string): Promise<void>;

  abstract workingDirectory(): Path;

  abstract metaDirectory(): Path;

  abstract readObject(sha: string): Promise<GitObject | null>;

  abstract writeObject(object: GitObject): Promise<string>;
}
