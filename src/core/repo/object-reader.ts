import type { Repository } from './repo';
import { RepositoryException } from '@/core/exceptions';
import { BlobObject, CommitObject, GitObject, TreeObject } from '@/core/objects';

type ObjectClass<T extends GitObject> = new () => T;

/**
 * Reads an object and insists on its kind. A missing id and an id naming
 * another kind of object both throw `RepositoryException`.
 */
export class ObjectReader {
  public static async readCommit(repository: Repository, sha: string): Promise<CommitObject> {
    return await ObjectReader.readAs(repository, sha, CommitObject);
  }

  public static async readTree(repository: Repository, sha: string): Promise<TreeObject> {
    return await ObjectReader.readAs(repository, sha, TreeObject);
  }

  public static async readBlob(repository: Repository, sha: string): Promise<BlobObject> {
    return await ObjectReader.readAs(repository, sha, BlobObject);
  }

  private static async readAs<T extends GitObject>(
    repository: Repository,
    sha: string,
    kind: ObjectClass<T>
  ): Promise<T> {
    const object = await repository.readObject(sha);
    if (object === null) {
      throw new RepositoryException(`Object ${sha} not found`);
    }
    if (!(object instanceof kind)) {
      throw new RepositoryException(
        `Object ${sha} is a ${object.type()}, expected a ${new kind().type()}`
      );
    }
    return object;
  }
}
