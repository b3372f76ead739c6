import type { Repository } from '@/core/repo';
import { ObjectReader } from '@/core/repo';
import { TreeEntry } from '@/core/objects';
import { TreeWalker, type FlatEntry } from '@/core/tree';
import type { WorkingTreeSnapshot } from '@/core/index';
import { BackendException, HunkwiseException } from '@/core/exceptions';
import { logger } from '@/utils';
import { BinaryDetector } from './binary-detector';
import { HunkBuilder } from './hunk-builder';
import { ContentSignature, Similarity } from './similarity';
import type { ComparisonEvent, DeltaKind, DiffOptions } from './types';

type Delta = {
  kind: DeltaKind;
  oldPath?: string;
  newPath?: string;
  oldEntry?: FlatEntry;
  newEntry?: FlatEntry;
};

type Candidate = {
  path: string;
  entry: FlatEntry;
};

type Match = {
  candidate: Candidate;
  score: number;
};

/**
 * Compares two trees and streams the result as comparison events.
 *
 * 1. Flatten both trees to `path → { sha, mode }` (the head side may be a
 *    working tree snapshot instead)
 * 2. Classify every path: added, deleted, modified, type-changed or unmodified
 * 3. Pair added paths with rename and copy sources by content similarity
 * 4. Drop unmodified paths, order by path, and emit file, binary, hunk and
 *    line events per delta
 */
export class TreeComparison {
  private readonly repository: Repository;
  private readonly options: DiffOptions;
  private readonly walker: TreeWalker;
  private readonly blobs = new Map<string, Uint8Array>();
  private readonly signatures = new Map<string, ContentSignature>();

  constructor(repository: Repository, options: DiffOptions) {
    this.repository = repository;
    this.options = options;
    this.walker = new TreeWalker(repository);
  }

  /**
   * Events for `baseTreeSha` → `headTreeSha`. A null base compares against an
   * empty tree. Any failure surfaces as a BackendException.
   */
  public async *compare(
    baseTreeSha: string | null,
    headTreeSha: string
  ): AsyncGenerator<ComparisonEvent> {
    yield* this.run(async () => ({
      base: await this.flatten(baseTreeSha),
      head: await this.walker.walkTree(headTreeSha),
    }));
  }

  /**
   * Events for `baseTreeSha` → a working tree read from disk. The snapshot's
   * blobs need not be in the object store.
   */
  public async *compareWithWorkingTree(
    baseTreeSha: string | null,
    snapshot: WorkingTreeSnapshot
  ): AsyncGenerator<ComparisonEvent> {
    snapshot.contents.forEach((content, sha) => this.blobs.set(sha, content));
    yield* this.run(async () => ({
      base: await this.flatten(baseTreeSha),
      head: snapshot.entries,
    }));
  }

  private async *run(
    load: () => Promise<{ base: Map<string, FlatEntry>; head: Map<string, FlatEntry> }>
  ): AsyncGenerator<ComparisonEvent> {
    try {
      const { base, head } = await load();
      const deltas = await this.detectSimilarity(this.classify(base, head), base);
      for (const delta of deltas) {
        yield* this.emitDelta(delta);
      }
    } catch (error) {
      if (error instanceof BackendException) throw error;
      const reason = error instanceof HunkwiseException ? error.message : String(error);
      throw new BackendException(`Tree comparison failed: ${reason}`, error);
    }
  }

  private async flatten(treeSha: string | null): Promise<Map<string, FlatEntry>> {
    return treeSha === null ? new Map<string, FlatEntry>() : await this.walker.walkTree(treeSha);
  }

  private classify(base: Map<string, FlatEntry>, head: Map<string, FlatEntry>): Delta[] {
    const paths = new Set([...base.keys(), ...head.keys()]);
    const deltas: Delta[] = [];

    for (const path of [...paths].sort(comparePaths)) {
      const oldEntry = base.get(path);
      const newEntry = head.get(path);

      if (oldEntry === undefined && newEntry !== undefined) {
        deltas.push({ kind: 'added', newPath: path, newEntry });
      } else if (oldEntry !== undefined && newEntry === undefined) {
        deltas.push({ kind: 'deleted', oldPath: path, oldEntry });
      } else if (oldEntry !== undefined && newEntry !== undefined) {
        let kind: DeltaKind = 'modified';
        if (oldEntry.sha === newEntry.sha && oldEntry.mode === newEntry.mode) {
          kind = 'unmodified';
        } else if (TreeEntry.kindOf(oldEntry.mode) !== TreeEntry.kindOf(newEntry.mode)) {
          kind = 'type-changed';
        }
        deltas.push({ kind, oldPath: path, newPath: path, oldEntry, newEntry });
      }
    }

    return deltas;
  }

  /**
   * Rename sources are deletions plus modifications broken as rewrites; copy
   * sources are every path of the base tree. The first target to claim a
   * rename source is a rename, later ones are copies.
   *
   * Only identical content scores 100, so at the default copy threshold a
   * copy source is found by blob id without reading any base blob.
   */
  private async detectSimilarity(deltas: Delta[], base: Map<string, FlatEntry>): Promise<Delta[]> {
    const targets = deltas.filter((d) => d.kind === 'added');
    if (targets.length === 0) {
      return this.finalize(deltas);
    }

    const broken = new Set<Delta>();
    for (const delta of deltas) {
      if (delta.kind !== 'modified' || !delta.oldEntry || !delta.newEntry) continue;
      const score = await this.score(delta.oldEntry, delta.newEntry);
      if (score < this.options.rewriteThreshold) {
        broken.add(delta);
      }
    }

    const renameSources: Candidate[] = [];
    for (const delta of deltas) {
      const isSource = delta.kind === 'deleted' || broken.has(delta);
      if (isSource && delta.oldPath !== undefined && delta.oldEntry !== undefined) {
        renameSources.push({ path: delta.oldPath, entry: delta.oldEntry });
      }
    }
    const copySources: Candidate[] = [...base.entries()]
      .sort(([a], [b]) => comparePaths(a, b))
      .map(([path, entry]) => ({ path, entry }));
    const exactCopies = this.options.copyThreshold >= Similarity.EXACT ? byContent(copySources) : null;

    const claimed = new Set<string>();
    const renamedFrom = new Set<string>();

    for (const target of targets) {
      if (!target.newEntry) continue;

      const rename = await this.bestMatch(target.newEntry, renameSources, this.options.renameThreshold);
      if (rename && rename.score >= this.options.renameThreshold) {
        const isFirstClaim = !claimed.has(rename.candidate.path);
        claimed.add(rename.candidate.path);
        if (isFirstClaim) renamedFrom.add(rename.candidate.path);

        target.kind = isFirstClaim ? 'renamed' : 'copied';
        target.oldPath = rename.candidate.path;
        target.oldEntry = rename.candidate.entry;
        logger.debug(`${target.kind} ${rename.candidate.path} -> ${target.newPath} (${rename.score}%)`);
        continue;
      }

      const copy = exactCopies
        ? exactMatch(target.newEntry, exactCopies)
        : await this.bestMatch(target.newEntry, copySources, this.options.copyThreshold);
      if (copy && copy.score >= this.options.copyThreshold) {
        target.kind = 'copied';
        target.oldPath = copy.candidate.path;
        target.oldEntry = copy.candidate.entry;
        logger.debug(`copied ${copy.candidate.path} -> ${target.newPath} (${copy.score}%)`);
      }
    }

    const result: Delta[] = [];
    for (const delta of deltas) {
      if (delta.kind === 'deleted' && delta.oldPath !== undefined && renamedFrom.has(delta.oldPath)) {
        continue;
      }
      if (broken.has(delta) && delta.oldPath !== undefined && renamedFrom.has(delta.oldPath)) {
        result.push({ kind: 'added', newPath: delta.newPath, newEntry: delta.newEntry });
        continue;
      }
      result.push(delta);
    }

    return this.finalize(result);
  }

  private finalize(deltas: Delta[]): Delta[] {
    return deltas
      .filter((d) => d.kind !== 'unmodified')
      .sort((a, b) => comparePaths(canonicalPath(a), canonicalPath(b)));
  }

  /**
   * Highest-scoring candidate of the target's kind, the first in path order
   * on a tie. Candidates whose size alone keeps them under `threshold` are
   * not scored.
   */
  private async bestMatch(
    target: FlatEntry,
    candidates: Candidate[],
    threshold: number
  ): Promise<Match | null> {
    let best: Match | null = null;

    for (const candidate of candidates) {
      if (TreeEntry.kindOf(candidate.entry.mode) !== TreeEntry.kindOf(target.mode)) continue;
      const reachable =
        candidate.entry.sha === target.sha || (await this.canReach(candidate.entry, target, threshold));
      if (!reachable) continue;

      const score = await this.score(candidate.entry, target);
      if (best === null || score > best.score) {
        best = { candidate, score };
      }
      if (score === Similarity.EXACT) break;
    }

    return best;
  }

  /**
   * Matching bytes never exceed the smaller blob, so its share of the larger
   * one bounds the score.
   */
  private async canReach(a: FlatEntry, b: FlatEntry, threshold: number): Promise<boolean> {
    const [aContent, bContent] = await Promise.all([this.blob(a.sha), this.blob(b.sha)]);
    const larger = Math.max(aContent.length, bContent.length);
    if (larger === 0) return true;
    return Math.floor((Math.min(aContent.length, bContent.length) * 100) / larger) >= threshold;
  }

  private async score(a: FlatEntry, b: FlatEntry): Promise<number> {
    if (a.sha === b.sha) {
      return Similarity.EXACT;
    }

    const [oldContent, newContent] = await Promise.all([this.blob(a.sha), this.blob(b.sha)]);
    if (BinaryDetector.isBinary(oldContent) || BinaryDetector.isBinary(newContent)) {
      return 0;
    }
    return Similarity.score(this.signature(a.sha, oldContent), this.signature(b.sha, newContent));
  }

  private async *emitDelta(delta: Delta): AsyncGenerator<ComparisonEvent> {
    const oldContent = delta.oldEntry ? await this.blob(delta.oldEntry.sha) : new Uint8Array();
    const newContent = delta.newEntry ? await this.blob(delta.newEntry.sha) : new Uint8Array();
    const oldBinary = BinaryDetector.isBinary(oldContent);
    const newBinary = BinaryDetector.isBinary(newContent);

    yield {
      type: 'file',
      delta: delta.kind,
      ...(delta.oldPath !== undefined ? { oldPath: delta.oldPath } : {}),
      ...(delta.newPath !== undefined ? { newPath: delta.newPath } : {}),
      oldBinary,
      newBinary,
    };

    if (oldBinary || newBinary) {
      yield { type: 'binary' };
      return;
    }

    const limit = this.options.maxFileSize;
    if (limit > 0 && (oldContent.length > limit || newContent.length > limit)) {
      logger.debug(`Skipping hunks for ${canonicalPath(delta)}: larger than ${limit} bytes`);
      return;
    }

    yield* new HunkBuilder(this.options.contextLines).build(oldContent, newContent);
  }

  private async blob(sha: string): Promise<Uint8Array> {
    const cached = this.blobs.get(sha);
    if (cached) return cached;

    const blob = await ObjectReader.readBlob(this.repository, sha);
    const content = blob.content();
    this.blobs.set(sha, content);
    return content;
  }

  private signature(sha: string, content: Uint8Array): ContentSignature {
    let signature = this.signatures.get(sha);
    if (!signature) {
      signature = new ContentSignature(content);
      this.signatures.set(sha, signature);
    }
    return signature;
  }
}

const contentKey = (entry: FlatEntry): string => `${TreeEntry.kindOf(entry.mode)} ${entry.sha}`;

/**
 * First candidate in path order for each kind and blob id
 */
const byContent = (candidates: Candidate[]): Map<string, Candidate> => {
  const index = new Map<string, Candidate>();
  for (const candidate of candidates) {
    const key = contentKey(candidate.entry);
    if (!index.has(key)) index.set(key, candidate);
  }
  return index;
};

const exactMatch = (target: FlatEntry, index: Map<string, Candidate>): Match | null => {
  const candidate = index.get(contentKey(target));
  return candidate ? { candidate, score: Similarity.EXACT } : null;
};

const canonicalPath = (delta: Delta): string =>
  delta.kind === 'deleted' ? (delta.oldPath ?? '') : (delta.newPath ?? delta.oldPath ?? '');

const comparePaths = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);
