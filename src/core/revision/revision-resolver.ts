import type { Repository } from '@/core/repo';
import { ObjectReader } from '@/core/repo';
import { RefManager } from '@/core/refs';
import type { CommitObject, CommitPerson } from '@/core/objects';
import { BackendException, NoHeadRevisionException } from '@/core/exceptions';
import { HashUtils, logger } from '@/utils';
import type { Revision, RevisionRange, Signature } from './types';

/**
 * Turns revision expressions into commits.
 *
 * Accepted forms: a full object id, `HEAD`, a branch name, `refs/heads/<name>`,
 * each optionally followed by any run of `~N`, `~` and `^` (first parent only).
 */
export class RevisionResolver {
  private static readonly SUFFIX = /(~\d*|\^1?)$/;

  private readonly repository: Repository;
  private readonly refManager: RefManager;

  constructor(repository: Repository) {
    this.repository = repository;
    this.refManager = new RefManager(repository);
  }

  /**
   * Head is the commit HEAD resolves to; base is its first parent.
   */
  public async resolveRange(): Promise<RevisionRange> {
    const headSha = await this.refManager.resolveHead();
    if (headSha === null) {
      throw new NoHeadRevisionException();
    }

    const branch = await this.refManager.currentBranch();
    const headCommit = await this.readCommit(headSha);
    const head = RevisionResolver.describe(headSha, headCommit, branch ?? undefined);

    const parentSha = headCommit.parentShas[0];
    if (parentSha === undefined) {
      logger.debug(`Resolved HEAD ${headSha} (root commit)`);
      return { head };
    }

    const base = RevisionResolver.describe(parentSha, await this.readCommit(parentSha));
    logger.debug(`Resolved HEAD ${headSha} with base ${parentSha}`);
    return { base, head };
  }

  /**
   * Resolve `baseSpec..headSpec`. With no base, the head's first parent is used.
   */
  public async resolveExplicitRange(headSpec: string, baseSpec?: string): Promise<RevisionRange> {
    const head = await this.resolveRevision(headSpec);
    if (baseSpec !== undefined) {
      return { base: await this.resolveRevision(baseSpec), head };
    }

    const headCommit = await this.readCommit(head.oid);
    const parentSha = headCommit.parentShas[0];
    if (parentSha === undefined) {
      return { head };
    }
    return { base: RevisionResolver.describe(parentSha, await this.readCommit(parentSha)), head };
  }

  public async resolveRevision(input: string): Promise<Revision> {
    let rest = input.trim();
    const steps: number[] = [];

    let match = RevisionResolver.SUFFIX.exec(rest);
    while (match) {
      const token = match[1] ?? '';
      const count = token.startsWith('~') && token.length > 1 ? parseInt(token.slice(1), 10) : 1;
      steps.unshift(count);
      rest = rest.slice(0, rest.length - token.length);
      match = RevisionResolver.SUFFIX.exec(rest);
    }

    const { sha, reference } = await this.resolveName(rest, input);
    let current = sha;
    for (const count of steps) {
      for (let i = 0; i < count; i++) {
        const commit = await this.readCommit(current);
        const parent = commit.parentShas[0];
        if (parent === undefined) {
          throw new BackendException(`Revision ${input} walks past a root commit`);
        }
        current = parent;
      }
    }

    const walked = steps.length > 0;
    return RevisionResolver.describe(
      current,
      await this.readCommit(current),
      walked ? undefined : reference
    );
  }

  private async resolveName(
    name: string,
    input: string
  ): Promise<{ sha: string; reference?: string }> {
    if (name === RefManager.HEAD_FILE) {
      const sha = await this.refManager.resolveHead();
      if (sha === null) throw new NoHeadRevisionException();
      const branch = await this.refManager.currentBranch();
      return branch === null ? { sha } : { sha, reference: branch };
    }

    if (HashUtils.isSha1(name)) {
      return { sha: name };
    }

    if (name.length > 0) {
      const short = name.startsWith(RefManager.HEADS_PREFIX)
        ? name.slice(RefManager.HEADS_PREFIX.length)
        : name;
      const sha = await this.refManager.resolveReferenceToSha(RefManager.toBranchRef(short));
      if (sha !== null) {
        return { sha, reference: short };
      }
    }

    throw new BackendException(`Unknown revision: ${input}`);
  }

  private async readCommit(sha: string): Promise<CommitObject> {
    try {
      return await ObjectReader.readCommit(this.repository, sha);
    } catch (error) {
      throw new BackendException(`Failed to read commit ${sha}`, error);
    }
  }

  private static describe(oid: string, commit: CommitObject, reference?: string): Revision {
    const revision: Revision = { oid };
    if (reference !== undefined) revision.reference = reference;

    const summary = commit.summary;
    if (summary !== null) revision.summary = summary;
    if (commit.author) revision.author = RevisionResolver.signature(commit.author);
    if (commit.committer) {
      revision.committer = RevisionResolver.signature(commit.committer);
      revision.timestamp = commit.committer.timestamp;
    }
    return revision;
  }

  private static signature(person: CommitPerson): Signature {
    return person.email.length > 0 ? { name: person.name, email: person.email } : { name: person.name };
  }
}
