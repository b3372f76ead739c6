import { BlobObject } from './blob/blob-object';
import { TreeObject } from './tree/tree-object';
import { TreeEntry, EntryType, type EntryKind } from './tree/tree-entry';
import { CommitObject } from './commit/commit-object';
import { CommitPerson } from './commit/commit-person';
import { GitObject, ObjectType, parseObjectType } from './base';

export {
  BlobObject,
  TreeObject,
  TreeEntry,
  EntryType,
  GitObject,
  ObjectType,
  parseObjectType,
  CommitObject,
  CommitPerson,
};
export type { EntryKind };
