import type { Path } from 'path-scurry';
import type { ObjectStore } from './store';
import { ObjectException } from '@/core/exceptions';
import { CompressionUtils, FileUtils, HashUtils } from '@/utils';
import {
  GitObject,
  ObjectType,
  parseObjectType,
  BlobObject,
  TreeObject,
  CommitObject,
} from '@/core/objects';

/**
 * Loose-object store. Each object is serialized, DEFLATE compressed and
 * written to a file named by its SHA-1:
 *
 * ┌─ .hunkwise/objects/
 * │ ├─ ab/            ← first 2 characters of the id
 * │ │ └─ cdef123...   ← remaining 38 characters
 * │ └─ ...
 */
export class FileObjectStore implements ObjectStore {
  private objectsPath: Path | null = null;

  public async initialize(metaDir: Path): Promise<void> {
    this.objectsPath = metaDir.resolve('objects');
    try {
      await FileUtils.createDirectories(this.objectsPath.fullpath());
    } catch (error) {
      throw new ObjectException('Failed to initialize object store', error);
    }
  }

  /**
   * Objects are immutable, so an id already on disk is not rewritten.
   */
  public async writeObject(object: GitObject): Promise<string> {
    const serialized = object.serialize();
    const sha = HashUtils.sha1Hex(serialized);
    const filePath = this.resolveObjectPath(sha);

    try {
      if (await FileUtils.exists(filePath)) {
        return sha;
      }

      const compressed = await CompressionUtils.compress(serialized);
      await FileUtils.createFile(filePath, compressed);
      return sha;
    } catch (error) {
      throw new ObjectException(`Failed to write object ${sha}`, error);
    }
  }

  public async readObject(sha: string): Promise<GitObject | null> {
    if (!HashUtils.isSha1(sha)) {
      return null;
    }

    const filePath = this.resolveObjectPath(sha);
    let compressed: Buffer | null;
    try {
      compressed = await FileUtils.readFileIfExists(filePath);
    } catch (error) {
      throw new ObjectException(`Failed to read object: ${sha}`, error);
    }
    if (compressed === null) {
      return null;
    }

    try {
      const decompressed = await CompressionUtils.decompress(compressed);
      const object = this.createObjectFromHeader(decompressed);
      object.deserialize(decompressed);
      return object;
    } catch (error) {
      throw new ObjectException(`Corrupt object: ${sha}`, error);
    }
  }

  private resolveObjectPath(sha: string): string {
    if (!this.objectsPath) {
      throw new ObjectException('Object store not initialized');
    }
    return this.objectsPath.resolve(sha.substring(0, 2)).resolve(sha.substring(2)).fullpath();
  }

  private createObjectFromHeader(data: Uint8Array): GitObject {
    const nullIndex = data.indexOf(0);
    if (nullIndex === -1) {
      throw new ObjectException('Invalid object format: no null terminator');
    }

    const header = new TextDecoder().decode(data.subarray(0, nullIndex));
    switch (parseObjectType(header)) {
      case ObjectType.BLOB:
        return new BlobObject();
      case ObjectType.TREE:
        return new TreeObject();
      case ObjectType.COMMIT:
        return new CommitObject();
    }
  }
}
