import { GitObject, ObjectType } from '../base';
import { TreeEntry } from './tree-entry';

/**
 * A directory snapshot: a sorted list of entries, each pointing at a blob
 * (file or symlink target) or at another tree.
 *
 * ┌─────────────────────────────────────────────────────────────┐
 * │ Header: "tree" SPACE size NULL                              │
 * │ Entry 1: mode SPACE name NULL [20-byte id]                  │
 * │ ...                                                         │
 * │ Entry N: mode SPACE name NULL [20-byte id]                  │
 * └─────────────────────────────────────────────────────────────┘
 */
export class TreeObject extends GitObject {
  private _entries: TreeEntry[];

  constructor(entries: TreeEntry[] = []) {
    super();
    this._entries = [...entries].sort((a, b) => a.compareTo(b));
  }

  override type(): ObjectType {
    return ObjectType.TREE;
  }

  get entries(): readonly TreeEntry[] {
    return this._entries;
  }

  isEmpty(): boolean {
    return this._entries.length === 0;
  }

  override content(): Uint8Array {
    const parts = this._entries.map((entry) => entry.serialize());
    const total = parts.reduce((acc, part) => acc + part.length, 0);

    const serialized = new Uint8Array(total);
    let offset = 0;
    for (const part of parts) {
      serialized.set(part, offset);
      offset += part.length;
    }
    return serialized;
  }

  override deserialize(data: Uint8Array): void {
    const { contentStartsAt, contentLength } = this.parseHeader(data);
    const content = data.subarray(contentStartsAt, contentStartsAt + contentLength);

    const entries: TreeEntry[] = [];
    let offset = 0;
    while (offset < content.length) {
      const { entry, nextOffset } = TreeEntry.deserialize(content, offset);
      entries.push(entry);
      offset = nextOffset;
    }

    this._entries = entries.sort((a, b) => a.compareTo(b));
  }
}
