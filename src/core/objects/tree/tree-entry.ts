import { ObjectException } from '@/core/exceptions';
import { HashUtils } from '@/utils';

export enum EntryType {
  DIRECTORY = '040000',
  REGULAR_FILE = '100644',
  EXECUTABLE_FILE = '100755',
  SYMBOLIC_LINK = '120000',
  SUBMODULE = '160000',
}

/**
 * What a mode stores, ignoring permission bits. A change between two kinds
 * (file ↔ symlink) is a type change rather than a modification.
 */
export type EntryKind = 'directory' | 'file' | 'symlink' | 'submodule';

/**
 * One named entry of a tree object.
 *
 * Serialized format inside the tree content:
 * [mode] [space] [name] [null byte] [20-byte binary object id]
 */
export class TreeEntry {
  private static readonly NULL_BYTE = 0x00;
  private static readonly SPACE_BYTE = 0x20;
  private static readonly SHA_LENGTH_BYTES = 20;

  readonly mode: EntryType;
  readonly name: string;
  readonly sha: string;

  constructor(mode: string, name: string, sha: string) {
    this.mode = TreeEntry.fromMode(mode);
    this.name = TreeEntry.validateName(name);
    this.sha = TreeEntry.validateSha(sha);
  }

  static fromMode(mode: string): EntryType {
    const entryType = Object.values(EntryType).find((type) => type === mode);
    if (!entryType) {
      throw new ObjectException(`Unknown mode: ${mode}`);
    }
    return entryType;
  }

  static kindOf(mode: EntryType): EntryKind {
    switch (mode) {
      case EntryType.DIRECTORY:
        return 'directory';
      case EntryType.SYMBOLIC_LINK:
        return 'symlink';
      case EntryType.SUBMODULE:
        return 'submodule';
      case EntryType.REGULAR_FILE:
      case EntryType.EXECUTABLE_FILE:
        return 'file';
    }
  }

  get kind(): EntryKind {
    return TreeEntry.kindOf(this.mode);
  }

  isDirectory(): boolean {
    return this.mode === EntryType.DIRECTORY;
  }

  isSubmodule(): boolean {
    return this.mode === EntryType.SUBMODULE;
  }

  serialize(): Uint8Array {
    const modeNameBytes = new TextEncoder().encode(`${this.mode} ${this.name}\0`);
    const shaBytes = HashUtils.hexToBytes(this.sha);

    const result = new Uint8Array(modeNameBytes.length + shaBytes.length);
    result.set(modeNameBytes, 0);
    result.set(shaBytes, modeNameBytes.length);
    return result;
  }

  /**
   * Directories sort as if their name ended in "/", so "dir/" sorts after
   * "dir.txt" the way the stored ordering expects.
   */
  compareTo(other: TreeEntry): number {
    const thisKey = this.isDirectory() ? `${this.name}/` : this.name;
    const otherKey = other.isDirectory() ? `${other.name}/` : other.name;

    if (thisKey < otherKey) return -1;
    if (thisKey > otherKey) return 1;
    return 0;
  }

  static deserialize(data: Uint8Array, offset: number): { entry: TreeEntry; nextOffset: number } {
    const spaceIndex = data.indexOf(TreeEntry.SPACE_BYTE, offset);
    const nullIndex = spaceIndex === -1 ? -1 : data.indexOf(TreeEntry.NULL_BYTE, spaceIndex + 1);
    const shaEnd = nullIndex + 1 + TreeEntry.SHA_LENGTH_BYTES;

    if (spaceIndex === -1 || nullIndex === -1 || shaEnd > data.length) {
      throw new ObjectException('Invalid tree entry: truncated data');
    }

    const decoder = new TextDecoder();
    const mode = decoder.decode(data.subarray(offset, spaceIndex));
    const name = decoder.decode(data.subarray(spaceIndex + 1, nullIndex));
    const sha = HashUtils.bytesToHex(data.subarray(nullIndex + 1, shaEnd));

    return { entry: new TreeEntry(mode, name, sha), nextOffset: shaEnd };
  }

  private static validateName(name: string): string {
    if (name.length === 0) {
      throw new ObjectException('Name cannot be empty');
    }
    if (name.includes('/') || name.includes('\0')) {
      throw new ObjectException(`Invalid characters in name: ${name}`);
    }
    return name;
  }

  private static validateSha(sha: string): string {
    const normalized = sha.toLowerCase();
    if (!HashUtils.isSha1(normalized)) {
      throw new ObjectException(`Invalid object id: ${sha}`);
    }
    return normalized;
  }
}
