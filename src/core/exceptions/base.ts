export class HunkwiseException extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'HunkwiseException';
  }
}

export class ObjectException extends HunkwiseException {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ObjectException';
  }
}

export class RepositoryException extends HunkwiseException {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'RepositoryException';
  }
}

/**
 * Raised for any failure inside the version-control backend while resolving
 * trees or enumerating a comparison.
 */
export class BackendException extends HunkwiseException {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'BackendException';
  }
}

export class NoHeadRevisionException extends HunkwiseException {
  constructor() {
    super('repository has no head revision');
    this.name = 'NoHeadRevisionException';
  }
}
