export interface Signature {
  name: string;
  email?: string;
}

/**
 * A resolved commit, with the metadata a review surface shows next to it.
 */
export interface Revision {
  oid: string;
  reference?: string;
  summary?: string;
  author?: Signature;
  committer?: Signature;
  /**
   * Committer time in seconds since the epoch
   */
  timestamp?: number;
}

export interface RevisionRange {
  base?: Revision;
  head: Revision;
}
