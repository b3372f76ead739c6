import path from 'path';
import fs from 'fs-extra';
import type { Repository } from '@/core/repo';
import { RepositoryException } from '@/core/exceptions';
import { FileUtils, HashUtils, logger } from '@/utils';

/**
 * Named pointers to commits, stored as small text files:
 *
 * .hunkwise/
 * ├── HEAD                  "ref: refs/heads/main" or a commit id
 * └── refs/
 *     └── heads/
 *         ├── main          commit id of main's tip
 *         └── feature-x
 *
 * A symbolic ref whose target file does not exist yet is "unborn": it
 * resolves to null rather than failing.
 */
export class RefManager {
  public static readonly REFS_DIRNAME = 'refs' as const;
  public static readonly HEADS_PREFIX = 'refs/heads/' as const;
  public static readonly SYMBOLIC_REF_PREFIX = 'ref: ' as const;
  public static readonly HEAD_FILE = 'HEAD' as const;
  private static readonly MAX_DEPTH = 10;

  private readonly metaPath: string;

  constructor(repository: Repository) {
    this.metaPath = repository.metaDirectory().fullpath();
  }

  /**
   * Raw content of a ref file, trimmed; null when the file does not exist.
   */
  public async readRef(ref: string): Promise<string | null> {
    const fullPath = this.resolveReferencePath(ref);
    try {
      const content = await FileUtils.readFileIfExists(fullPath);
      return content === null ? null : content.toString('utf8').trim();
    } catch (error) {
      throw new RepositoryException(`Error reading ref ${ref}`, error);
    }
  }

  public async updateRef(ref: string, value: string): Promise<void> {
    const fullPath = this.resolveReferencePath(ref);
    try {
      await FileUtils.createFile(fullPath, `${value}\n`);
    } catch (error) {
      throw new RepositoryException(`Failed to update ref ${ref}`, error);
    }
    logger.debug(`Updated ref ${ref} to ${value}`);
  }

  /**
   * Follow symbolic refs down to a commit id. Returns null for an unborn ref.
   */
  public async resolveReferenceToSha(ref: string): Promise<string | null> {
    let currentRef = ref;

    for (let depth = 0; depth < RefManager.MAX_DEPTH; depth++) {
      const content = await this.readRef(currentRef);
      if (content === null) {
        return null;
      }

      if (content.startsWith(RefManager.SYMBOLIC_REF_PREFIX)) {
        currentRef = content.substring(RefManager.SYMBOLIC_REF_PREFIX.length).trim();
        continue;
      }

      if (HashUtils.isSha1(content)) return content;
      throw new RepositoryException(`Ref ${currentRef} does not hold a commit id: ${content}`);
    }

    throw new RepositoryException(`Reference depth exceeded for ${ref}`);
  }

  public async resolveHead(): Promise<string | null> {
    return await this.resolveReferenceToSha(RefManager.HEAD_FILE);
  }

  /**
   * Short name of the branch HEAD points at, null when HEAD is detached.
   */
  public async currentBranch(): Promise<string | null> {
    const head = await this.readRef(RefManager.HEAD_FILE);
    if (head === null) {
      throw new RepositoryException('Repository has no HEAD file');
    }

    const target = head.startsWith(RefManager.SYMBOLIC_REF_PREFIX)
      ? head.substring(RefManager.SYMBOLIC_REF_PREFIX.length).trim()
      : null;

    if (target === null || !target.startsWith(RefManager.HEADS_PREFIX)) {
      return null;
    }
    return target.substring(RefManager.HEADS_PREFIX.length);
  }

  public async setHeadToBranch(branch: string): Promise<void> {
    await this.updateRef(
      RefManager.HEAD_FILE,
      `${RefManager.SYMBOLIC_REF_PREFIX}${RefManager.toBranchRef(branch)}`
    );
  }

  public async exists(ref: string): Promise<boolean> {
    return await FileUtils.exists(this.resolveReferencePath(ref));
  }

  public async deleteRef(ref: string): Promise<boolean> {
    const fullPath = this.resolveReferencePath(ref);
    if (!(await FileUtils.exists(fullPath))) {
      return false;
    }
    await fs.unlink(fullPath);
    return true;
  }

  public static toBranchRef(branch: string): string {
    return branch.startsWith(RefManager.HEADS_PREFIX) ? branch : `${RefManager.HEADS_PREFIX}${branch}`;
  }

  /**
   * "HEAD" → .hunkwise/HEAD, "refs/heads/x" and "heads/x" → .hunkwise/refs/heads/x
   */
  private resolveReferencePath(refInput: string): string {
    const ref = refInput.trim();
    if (ref.length === 0 || ref.split('/').some((part) => part === '..')) {
      throw new RepositoryException(`Invalid ref name: ${refInput}`);
    }

    if (ref === RefManager.HEAD_FILE) {
      return path.join(this.metaPath, RefManager.HEAD_FILE);
    }

    const relative = ref.startsWith(`${RefManager.REFS_DIRNAME}/`)
      ? ref
      : `${RefManager.REFS_DIRNAME}/${ref}`;
    return path.join(this.metaPath, ...relative.split('/'));
  }
}
