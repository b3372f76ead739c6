import { OffsetIndex } from '../../core/suggestion/offset-index';
import { SuggestionException } from '../../core/exceptions';

const index = (text: string): OffsetIndex => new OffsetIndex(Buffer.from(text, 'utf8'), 'file.txt');

const kindOf = (fn: () => unknown): string => {
  try {
    fn();
  } catch (error) {
    if (error instanceof SuggestionException) return error.kind;
    throw error;
  }
  throw new Error('expected a SuggestionException');
};

describe('OffsetIndex', () => {
  describe('a file ending in a newline', () => {
    const offsets = index('line 1\nline 2\n');

    test('counts the empty line after the final newline', () => {
      expect(offsets.lineCount).toBe(3);
    });

    const cases: Array<[number, number | undefined, number]> = [
      [1, 1, 0],
      [1, undefined, 0],
      [1, 3, 2],
      [2, 1, 7],
      [2, 7, 13],
      [2, 8, 14],
      [3, 1, 14],
      [4, 1, 14],
    ];

    test.each(cases)('line %s column %s → byte %s', (line, column, expected) => {
      const position = column === undefined ? { line } : { line, column };
      expect(offsets.offset(position)).toBe(expected);
    });

    test('columns more than one past the end of a line are rejected', () => {
      expect(kindOf(() => offsets.offset({ line: 2, column: 9 }))).toBe('ColumnOutOfBounds');
      expect(kindOf(() => offsets.offset({ line: 3, column: 2 }))).toBe('ColumnOutOfBounds');
      expect(kindOf(() => offsets.offset({ line: 4, column: 2 }))).toBe('ColumnOutOfBounds');
    });

    test('lines outside the file are rejected', () => {
      expect(kindOf(() => offsets.offset({ line: 0 }))).toBe('LineOutOfBounds');
      expect(kindOf(() => offsets.offset({ line: 5 }))).toBe('LineOutOfBounds');
      expect(kindOf(() => offsets.offset({ line: -1 }))).toBe('LineOutOfBounds');
    });

    test('column zero is rejected', () => {
      expect(kindOf(() => offsets.offset({ line: 1, column: 0 }))).toBe('ColumnOutOfBounds');
    });
  });

  describe('a file without a trailing newline', () => {
    const offsets = index('line 1');

    test('the line after the last one maps to the end of the text', () => {
      expect(offsets.offset({ line: 1, column: 7 })).toBe(6);
      expect(offsets.offset({ line: 2, column: 1 })).toBe(6);
    });

    test('two lines past the end are rejected', () => {
      expect(kindOf(() => offsets.offset({ line: 3, column: 1 }))).toBe('LineOutOfBounds');
    });
  });

  describe('multi-byte text', () => {
    const offsets = index('aé😀b\n');

    test.each([
      [1, 0],
      [2, 1],
      [3, 3],
      [4, 7],
      [5, 8],
      [6, 9],
    ])('column %s → byte %s', (column, expected) => {
      expect(offsets.offset({ line: 1, column })).toBe(expected);
    });

    test('columns count characters, not bytes', () => {
      expect(kindOf(() => offsets.offset({ line: 1, column: 7 }))).toBe('ColumnOutOfBounds');
    });
  });

  test('an empty file has one addressable position', () => {
    const offsets = index('');
    expect(offsets.lineCount).toBe(1);
    expect(offsets.offset({ line: 1, column: 1 })).toBe(0);
    expect(offsets.offset({ line: 2, column: 1 })).toBe(0);
    expect(kindOf(() => offsets.offset({ line: 1, column: 2 }))).toBe('ColumnOutOfBounds');
  });
});
