import type { CommitPerson } from '@/core/objects';

export interface CommitOptions {
  message: string;
  author?: CommitPerson;
  committer?: CommitPerson;
}

export interface CommitResult {
  sha: string;
  treeSha: string;
  parentShas: string[];
  message: string;
  branch: string | null;
  author: CommitPerson;
  committer: CommitPerson;
}
