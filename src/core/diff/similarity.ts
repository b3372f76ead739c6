import { LineSplitter } from './line-splitter';

/**
 * Line fingerprint of one blob used to score how alike two blobs are.
 */
export class ContentSignature {
  readonly size: number;
  private readonly lineCounts: Map<string, number>;

  constructor(content: Uint8Array) {
    this.size = content.length;
    this.lineCounts = new Map();
    for (const line of LineSplitter.split(content)) {
      this.lineCounts.set(line.key, (this.lineCounts.get(line.key) ?? 0) + 1);
    }
  }

  /**
   * Bytes of `other`'s lines that also occur here, each occurrence matched once
   */
  matchingBytes(other: ContentSignature): number {
    let matched = 0;
    for (const [key, count] of other.lineCounts) {
      const mine = this.lineCounts.get(key) ?? 0;
      matched += Math.min(mine, count) * key.length;
    }
    return matched;
  }
}

export class Similarity {
  public static readonly EXACT = 100;

  private constructor() {}

  /**
   * Score in 0..100: matching line bytes over the larger side. Only identical
   * content reaches 100; differing content is capped at 99.
   */
  public static score(a: ContentSignature, b: ContentSignature): number {
    const larger = Math.max(a.size, b.size);
    if (larger === 0) {
      return Similarity.EXACT - 1;
    }
    const score = Math.floor((a.matchingBytes(b) * 100) / larger);
    return Math.min(score, Similarity.EXACT - 1);
  }
}
