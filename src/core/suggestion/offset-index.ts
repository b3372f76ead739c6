import { SuggestionException } from '@/core/exceptions';
import type { Position } from './types';

/**
 * Line-start table over a file's bytes, for turning positions into UTF-8
 * byte offsets that always land on a character boundary.
 */
export class OffsetIndex {
  private readonly text: Uint8Array;
  private readonly lineStarts: number[];
  private readonly path: string;

  constructor(text: Uint8Array, path: string = '') {
    this.text = text;
    this.path = path;
    this.lineStarts = [0];
    text.forEach((byte, index) => {
      if (byte === 0x0a) this.lineStarts.push(index + 1);
    });
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /**
   * One line past the last recorded start is addressable at column 1 only
   * and maps to the end of the text.
   */
  public offset(position: Position): number {
    const { line } = position;
    const column = position.column ?? 1;

    if (!Number.isInteger(line) || line < 1) {
      throw SuggestionException.lineOutOfBounds(this.path, line);
    }

    const lineIndex = line - 1;
    if (lineIndex > this.lineStarts.length) {
      throw SuggestionException.lineOutOfBounds(this.path, line);
    }

    if (lineIndex === this.lineStarts.length) {
      if (column === 1) return this.text.length;
      throw SuggestionException.columnOutOfBounds(this.path, line, column);
    }

    const lineStart = this.lineStarts[lineIndex] ?? this.text.length;
    const lineEnd = this.lineStarts[lineIndex + 1] ?? this.text.length;

    if (column === 1) return lineStart;
    if (!Number.isInteger(column) || column < 1) {
      throw SuggestionException.columnOutOfBounds(this.path, line, column);
    }

    let offset = lineStart;
    for (let step = 1; step < column; step++) {
      if (offset >= lineEnd) {
        throw SuggestionException.columnOutOfBounds(this.path, line, column);
      }
      offset += OffsetIndex.charWidth(this.text[offset] ?? 0);
    }
    return Math.min(offset, lineEnd);
  }

  /**
   * Byte length of the UTF-8 sequence starting with `lead`
   */
  private static charWidth(lead: number): number {
    if (lead < 0x80) return 1;
    if (lead >= 0xf0) return 4;
    if (lead >= 0xe0) return 3;
    if (lead >= 0xc0) return 2;
    return 1;
  }
}
