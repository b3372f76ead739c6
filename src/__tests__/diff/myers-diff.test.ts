import { MyersDiff, type MyersEdit } from '../../core/diff/myers-diff';

const count = (edits: MyersEdit[], type: MyersEdit['type']): number =>
  edits.filter((edit) => edit.type === type).reduce((sum, edit) => sum + edit.length, 0);

describe('MyersDiff', () => {
  let myers: MyersDiff;

  beforeEach(() => {
    myers = new MyersDiff();
  });

  test('identical sequences are a single equal run', () => {
    expect(myers.diff(['a', 'b', 'c'], ['a', 'b', 'c'])).toEqual([
      { type: 'equal', oldIndex: 0, newIndex: 0, length: 3 },
    ]);
  });

  test('empty inputs produce no edits', () => {
    expect(myers.diff([], [])).toEqual([]);
  });

  test('insertions into an empty sequence', () => {
    expect(myers.diff([], ['x', 'y'])).toEqual([
      { type: 'insert', oldIndex: 0, newIndex: 0, length: 2 },
    ]);
  });

  test('a replaced element is a delete followed by an insert', () => {
    expect(myers.diff(['a', 'b'], ['a', 'c'])).toEqual([
      { type: 'equal', oldIndex: 0, newIndex: 0, length: 1 },
      { type: 'delete', oldIndex: 1, newIndex: 1, length: 1 },
      { type: 'insert', oldIndex: 2, newIndex: 1, length: 1 },
    ]);
  });

  test('finds the shortest edit script', () => {
    const oldSeq = 'ABCABBA'.split('');
    const newSeq = 'CBABAC'.split('');
    const edits = myers.diff(oldSeq, newSeq);

    expect(count(edits, 'delete') + count(edits, 'insert')).toBe(5);
    expect(count(edits, 'equal')).toBe(4);
  });

  test('uses the supplied equality', () => {
    const edits = myers.diff(['A', 'b'], ['a', 'B'], (x, y) => x.toLowerCase() === y.toLowerCase());
    expect(edits).toEqual([{ type: 'equal', oldIndex: 0, newIndex: 0, length: 2 }]);
  });
});
