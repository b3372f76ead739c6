import type { Path } from 'path-scurry';
import type { GitObject } from '@/core/objects';

/**
 * Content-addressed storage. Writing the same object twice yields the same
 * id and leaves a single copy.
 */
export interface ObjectStore {
  initialize(metaDir: Path): Promise<void>;

  /**
   * @returns the SHA-1 id the object is stored under
   */
  writeObject(object: GitObject): Promise<string>;

  /**
   * null when nothing is stored under `sha` or `sha` is not a SHA-1 id
   */
  readObject(sha: string): Promise<GitObject | null>;
}
