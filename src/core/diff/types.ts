import type { RevisionRange } from '@/core/revision';

export enum FileStatus {
  ADDED = 'added',
  DELETED = 'deleted',
  MODIFIED = 'modified',
  RENAMED = 'renamed',
  COPIED = 'copied',
  TYPE_CHANGE = 'type-change',
}

export enum DiffLineKind {
  CONTEXT = 'context',
  ADDITION = 'addition',
  DELETION = 'deletion',
}

export interface DiffStats {
  additions: number;
  deletions: number;
}

/**
 * 1-based start and length of a hunk on each side. A zero-length side
 * starts at the line before the change.
 */
export interface DiffRange {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
}

/**
 * Byte span inside a line's text, end exclusive.
 */
export interface LineHighlight {
  start: number;
  end: number;
}

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
  baseLine?: number;
  headLine?: number;
  highlights: LineHighlight[];
}

export interface DiffHunk {
  header: DiffRange;
  section?: string;
  lines: DiffLine[];
}

export interface DiffFile {
  path: string;
  /**
   * Only for renames and copies whose source path differs from `path`
   */
  oldPath?: string;
  status: FileStatus;
  stats: DiffStats;
  isBinary: boolean;
  hunks: DiffHunk[];
}

export interface Diff {
  range: RevisionRange;
  files: DiffFile[];
}

/**
 * Change kinds as the tree comparison reports them, before they are folded
 * into a FileStatus.
 */
export type DeltaKind =
  | 'unmodified'
  | 'added'
  | 'deleted'
  | 'modified'
  | 'renamed'
  | 'copied'
  | 'ignored'
  | 'untracked'
  | 'type-changed'
  | 'unreadable'
  | 'conflicted';

/**
 * Line origin codes:
 * ' ' context, '+' addition, '-' deletion,
 * '=' follows an unchanged last line without a newline,
 * '>' a removed one (the newline was added), '<' an added one (the newline
 * was removed),
 * 'F' file header, 'H' hunk header, 'B' binary marker.
 */
export type LineOrigin = ' ' | '+' | '-' | '=' | '>' | '<' | 'F' | 'H' | 'B';

export type FileEvent = {
  type: 'file';
  delta: DeltaKind;
  oldPath?: string;
  newPath?: string;
  oldBinary: boolean;
  newBinary: boolean;
};

export type BinaryEvent = {
  type: 'binary';
};

export type HunkEvent = {
  type: 'hunk';
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  header: Uint8Array;
};

export type LineEvent = {
  type: 'line';
  origin: LineOrigin;
  content: Uint8Array;
  oldLineno?: number;
  newLineno?: number;
};

export type ComparisonEvent = FileEvent | BinaryEvent | HunkEvent | LineEvent;

export interface DiffOptions {
  contextLines: number;
  /**
   * Minimum similarity (0-100) for an added path to pair with a removed one
   */
  renameThreshold: number;
  /**
   * Minimum similarity (0-100) for an added path to pair with a surviving
   * one. 100 only matches identical content.
   */
  copyThreshold: number;
  /**
   * A modification whose old and new content are less similar than this is
   * also offered as a rename source.
   */
  rewriteThreshold: number;
  maxFileSize: number;
}

export const DEFAULT_DIFF_OPTIONS: DiffOptions = {
  contextLines: 3,
  renameThreshold: 50,
  copyThreshold: 100,
  rewriteThreshold: 50,
  maxFileSize: 0,
};
