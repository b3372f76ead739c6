export type MyersEdit = {
  type: 'insert' | 'delete' | 'equal';
  oldIndex: number;
  newIndex: number;
  length: number;
};

/**
 * Myers' O(ND) shortest edit script.
 *
 * Walks diagonals k = x - y for increasing edit distance d, keeping the
 * furthest-reaching x on each diagonal, then backtracks through the saved
 * frontiers to recover the edits.
 *
 * Time O((N+M)D), space O((N+M)D) for the trace.
 *
 * Edits come out in order and merged into runs. `oldIndex`/`newIndex` are
 * 0-based; an insert's `oldIndex` is the old position it lands before and a
 * delete's `newIndex` the new position it lands before.
 */
export class MyersDiff {
  public diff<T>(
    oldSequence: readonly T[],
    newSequence: readonly T[],
    areEqual: (a: T, b: T) => boolean = (a, b) => a === b
  ): MyersEdit[] {
    const trace = this.shortestEditTrace(oldSequence, newSequence, areEqual);
    const edits = this.backtrack(trace, oldSequence.length, newSequence.length);
    return this.mergeConsecutiveOperations(edits);
  }

  private shortestEditTrace<T>(
    a: readonly T[],
    b: readonly T[],
    areEqual: (a: T, b: T) => boolean
  ): Int32Array[] {
    const n = a.length;
    const m = b.length;
    const max = n + m;
    const offset = max + 1;
    const v = new Int32Array(2 * max + 3);
    const trace: Int32Array[] = [];

    for (let d = 0; d <= max; d++) {
      trace.push(v.slice());

      for (let k = -d; k <= d; k += 2) {
        let x =
          k === -d || (k !== d && at(v, k - 1 + offset) < at(v, k + 1 + offset))
            ? at(v, k + 1 + offset)
            : at(v, k - 1 + offset) + 1;
        let y = x - k;

        while (x < n && y < m && areEqual(item(a, x), item(b, y))) {
          x++;
          y++;
        }

        v[k + offset] = x;
        if (x >= n && y >= m) {
          return trace;
        }
      }
    }

    return trace;
  }

  private backtrack(trace: Int32Array[], n: number, m: number): MyersEdit[] {
    const offset = n + m + 1;
    const edits: MyersEdit[] = [];
    let x = n;
    let y = m;

    for (let d = trace.length - 1; d >= 0; d--) {
      const v = trace[d];
      if (v === undefined) break;
      const k = x - y;

      const prevK =
        k === -d || (k !== d && at(v, k - 1 + offset) < at(v, k + 1 + offset)) ? k + 1 : k - 1;
      const prevX = at(v, prevK + offset);
      const prevY = prevX - prevK;

      while (x > prevX && y > prevY) {
        x--;
        y--;
        edits.push(this.myersEdit('equal', x, y, 1));
      }

      if (d > 0) {
        if (x === prevX) {
          edits.push(this.myersEdit('insert', x, y - 1, 1));
        } else {
          edits.push(this.myersEdit('delete', x - 1, y, 1));
        }
      }

      x = prevX;
      y = prevY;
    }

    return edits.reverse();
  }

  /**
   * Merge single-step edits of the same type into runs
   */
  private mergeConsecutiveOperations(operations: MyersEdit[]): MyersEdit[] {
    const merged: MyersEdit[] = [];

    for (const next of operations) {
      const current = merged[merged.length - 1];
      if (current !== undefined && current.type === next.type && this.continues(current, next)) {
        current.length += next.length;
      } else {
        merged.push({ ...next });
      }
    }

    return merged;
  }

  private continues(current: MyersEdit, next: MyersEdit): boolean {
    const oldAdvance = current.type === 'insert' ? 0 : current.length;
    const newAdvance = current.type === 'delete' ? 0 : current.length;
    return (
      current.oldIndex + oldAdvance === next.oldIndex &&
      current.newIndex + newAdvance === next.newIndex
    );
  }

  private myersEdit(
    type: MyersEdit['type'],
    oldIndex: number,
    newIndex: number,
    length: number
  ): MyersEdit {
    return { type, oldIndex, newIndex, length };
  }
}

const at = (v: Int32Array, index: number): number => v[index] ?? 0;

const item = <T>(sequence: readonly T[], index: number): T => {
  const value = sequence[index];
  if (value === undefined) {
    throw new RangeError(`Sequence index ${index} out of range`);
  }
  return value;
};
