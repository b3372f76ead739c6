import { HunkwiseException } from './base';

export type SuggestionErrorKind =
  | 'AbsolutePath'
  | 'PathTraversal'
  | 'MissingFile'
  | 'UnsupportedSide'
  | 'LineOutOfBounds'
  | 'ColumnOutOfBounds'
  | 'InvalidRange'
  | 'OverlappingEdits'
  | 'Io'
  | 'Staging';

export interface SuggestionErrorDetail {
  line?: number;
  column?: number;
  start?: number;
  end?: number;
  side?: string;
}

/**
 * Every way a suggestion can be refused or fail to land. `kind` is the
 * discriminant callers branch on; `path` is the edit's relative path.
 */
export class SuggestionException extends HunkwiseException {
  readonly kind: SuggestionErrorKind;
  readonly path: string;
  readonly detail: SuggestionErrorDetail;

  constructor(
    kind: SuggestionErrorKind,
    path: string,
    message: string,
    detail: SuggestionErrorDetail = {},
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'SuggestionException';
    this.kind = kind;
    this.path = path;
    this.detail = detail;
  }

  static absolutePath(path: string): SuggestionException {
    return new SuggestionException('AbsolutePath', path, `suggestion path must be relative: ${path}`);
  }

  static pathTraversal(path: string): SuggestionException {
    return new SuggestionException(
      'PathTraversal',
      path,
      `suggestion path must not contain parent segments: ${path}`
    );
  }

  static missingFile(path: string): SuggestionException {
    return new SuggestionException('MissingFile', path, `suggestion references missing file: ${path}`);
  }

  static unsupportedSide(path: string, side: string): SuggestionException {
    return new SuggestionException(
      'UnsupportedSide',
      path,
      `suggestion edits for ${path} must target the diff head, found ${side}`,
      { side }
    );
  }

  static lineOutOfBounds(path: string, line: number): SuggestionException {
    return new SuggestionException(
      'LineOutOfBounds',
      path,
      `line ${line} is out of bounds for ${path}`,
      { line }
    );
  }

  static columnOutOfBounds(path: string, line: number, column: number): SuggestionException {
    return new SuggestionException(
      'ColumnOutOfBounds',
      path,
      `column ${column} on line ${line} is out of bounds for ${path}`,
      { line, column }
    );
  }

  static invalidRange(path: string, start: number, end: number): SuggestionException {
    return new SuggestionException(
      'InvalidRange',
      path,
      `suggestion range is invalid in ${path} (start ${start} > end ${end})`,
      { start, end }
    );
  }

  static overlappingEdits(path: string): SuggestionException {
    return new SuggestionException('OverlappingEdits', path, `suggestion edits overlap in ${path}`);
  }

  static io(path: string, action: string, cause: unknown): SuggestionException {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new SuggestionException('Io', path, `failed to ${action} ${path}: ${reason}`, {}, cause);
  }

  static staging(path: string, cause: unknown): SuggestionException {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new SuggestionException(
      'Staging',
      path,
      `failed to stage ${path}: ${reason}`,
      {},
      cause
    );
  }
}
