export enum DiffSide {
  BASE = 'base',
  HEAD = 'head',
}

/**
 * 1-based line and column. Columns count characters, not bytes; a missing
 * column means the start of the line.
 */
export interface Position {
  line: number;
  column?: number;
}

/**
 * Half-open: `end` is exclusive.
 */
export interface Range {
  start: Position;
  end: Position;
}

export interface FileRange {
  path: string;
  side: DiffSide;
  range: Range;
}

export interface TextEdit {
  location: FileRange;
  replacement: string;
}

export interface Suggestion {
  title?: string;
  edits: TextEdit[];
}

/**
 * A resolved edit: UTF-8 byte offsets into the file and the bytes to put there.
 */
export interface Replacement {
  start: number;
  end: number;
  replacement: Buffer;
}

export interface FileChange {
  path: string;
  original: Buffer;
  updated: Buffer;
  /**
   * Sorted by `start`, non-overlapping
   */
  replacements: Replacement[];
}

export interface ApplyPreview {
  path: string;
  patch: string;
}
