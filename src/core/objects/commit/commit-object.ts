import { ObjectException } from '@/core/exceptions';
import { HashUtils } from '@/utils';
import { GitObject, ObjectType } from '../base';
import { CommitPerson } from './commit-person';

export type CommitCreateOptions = {
  treeSha: string;
  parentShas?: string[];
  author: CommitPerson;
  committer: CommitPerson;
  message: string;
};

/**
 * A snapshot in history: a root tree, zero or more parents, who wrote it,
 * who committed it, and a message.
 *
 * ┌─────────────────────────────────────────────────────────────────┐
 * │ "tree" SPACE tree-sha LF                                        │
 * │ "parent" SPACE parent-sha LF (zero or more)                     │
 * │ "author" SPACE name SPACE <email> SPACE timestamp SPACE tz LF   │
 * │ "committer" SPACE name SPACE <email> SPACE timestamp SPACE tz LF│
 * │ LF                                                              │
 * │ commit-message                                                  │
 * └─────────────────────────────────────────────────────────────────┘
 *
 * The root commit of a history has no parents.
 */
export class CommitObject extends GitObject {
  private _treeSha: string | null = null;
  private _parentShas: string[] = [];
  private _author: CommitPerson | null = null;
  private _committer: CommitPerson | null = null;
  private _message = '';

  constructor(commit?: CommitCreateOptions) {
    super();
    if (!commit) return;

    this._treeSha = CommitObject.validateSha(commit.treeSha);
    this._parentShas = (commit.parentShas ?? []).map((p) => CommitObject.validateSha(p));
    this._author = commit.author;
    this._committer = commit.committer;
    this._message = commit.message;
  }

  override type(): ObjectType {
    return ObjectType.COMMIT;
  }

  override content(): Uint8Array {
    if (this._treeSha === null) {
      throw new ObjectException('Tree SHA is required for commit');
    }
    if (this._author === null || this._committer === null) {
      throw new ObjectException('Author and committer are required for commit');
    }

    const lines = [`tree ${this._treeSha}`];
    for (const parentSha of this._parentShas) {
      lines.push(`parent ${parentSha}`);
    }
    lines.push(`author ${this._author.formatForGit()}`);
    lines.push(`committer ${this._committer.formatForGit()}`);

    return new TextEncoder().encode(`${lines.join('\n')}\n\n${this._message}`);
  }

  override deserialize(data: Uint8Array): void {
    const { contentStartsAt, contentLength } = this.parseHeader(data);
    const content = new TextDecoder().decode(
      data.subarray(contentStartsAt, contentStartsAt + contentLength)
    );
    this.parseCommitContent(content);
  }

  get treeSha(): string {
    if (this._treeSha === null) {
      throw new ObjectException('Commit has no tree');
    }
    return this._treeSha;
  }

  get parentShas(): readonly string[] {
    return this._parentShas;
  }

  get author(): CommitPerson | null {
    return this._author;
  }

  get committer(): CommitPerson | null {
    return this._committer;
  }

  get message(): string {
    return this._message;
  }

  /**
   * First line of the message, or null for an empty message
   */
  get summary(): string | null {
    const firstLine = this._message.split('\n', 1)[0]?.trim() ?? '';
    return firstLine.length > 0 ? firstLine : null;
  }

  private parseCommitContent(content: string): void {
    const separator = content.indexOf('\n\n');
    const headerBlock = separator === -1 ? content : content.slice(0, separator);
    const message = separator === -1 ? '' : content.slice(separator + 2);

    this._treeSha = null;
    this._parentShas = [];
    this._author = null;
    this._committer = null;

    for (const line of headerBlock.split('\n')) {
      if (line.length === 0) continue;

      const space = line.indexOf(' ');
      const key = space === -1 ? line : line.slice(0, space);
      const value = space === -1 ? '' : line.slice(space + 1);

      switch (key) {
        case 'tree':
          if (this._treeSha !== null) throw new ObjectException('Multiple tree entries found');
          this._treeSha = CommitObject.validateSha(value);
          break;
        case 'parent':
          this._parentShas.push(CommitObject.validateSha(value));
          break;
        case 'author':
          if (this._author !== null) throw new ObjectException('Multiple author entries found');
          this._author = CommitPerson.parseFromGit(value);
          break;
        case 'committer':
          if (this._committer !== null) {
            throw new ObjectException('Multiple committer entries found');
          }
          this._committer = CommitPerson.parseFromGit(value);
          break;
        default:
          throw new ObjectException(`Unknown header line: ${line}`);
      }
    }

    if (this._treeSha === null) throw new ObjectException('Tree SHA is required');
    if (this._author === null) throw new ObjectException('Author is required');
    if (this._committer === null) throw new ObjectException('Committer is required');

    this._message = message;
  }

  private static validateSha(sha: string): string {
    if (!HashUtils.isSha1(sha)) {
      throw new ObjectException(`Invalid object id: ${sha}`);
    }
    return sha;
  }
}
