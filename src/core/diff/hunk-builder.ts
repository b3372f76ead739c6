import { MyersDiff } from './myers-diff';
import { LineSplitter, type ContentLine } from './line-splitter';
import type { HunkEvent, LineEvent, LineOrigin } from './types';

type LineOp = {
  type: 'equal' | 'delete' | 'insert';
  oldIndex: number;
  newIndex: number;
};

/**
 * Builds unified-diff hunks between two blobs and emits them as hunk and
 * line events.
 *
 * Hunks carry `contextLines` of unchanged lines on each side and merge when
 * the unchanged run between two changes is at most twice that long.
 */
export class HunkBuilder {
  public static readonly MAX_SECTION_BYTES = 80;
  private static readonly NO_NEWLINE = Buffer.from('\n\\ No newline at end of file\n', 'utf8');
  private static readonly SECTION_START = /^[A-Za-z_$]/;

  private readonly contextLines: number;

  constructor(contextLines: number) {
    this.contextLines = Math.max(0, contextLines);
  }

  public *build(oldContent: Uint8Array, newContent: Uint8Array): Generator<HunkEvent | LineEvent> {
    const oldLines = LineSplitter.split(oldContent);
    const newLines = LineSplitter.split(newContent);
    const ops = this.lineOps(oldLines, newLines);

    for (const [start, end] of this.groupHunks(ops)) {
      yield* this.emitHunk(ops.slice(start, end), oldLines, newLines);
    }
  }

  private lineOps(oldLines: ContentLine[], newLines: ContentLine[]): LineOp[] {
    const edits = new MyersDiff().diff(
      oldLines.map((l) => l.key),
      newLines.map((l) => l.key)
    );

    const ops: LineOp[] = [];
    for (const edit of edits) {
      for (let i = 0; i < edit.length; i++) {
        ops.push({
          type: edit.type,
          oldIndex: edit.oldIndex + (edit.type === 'insert' ? 0 : i),
          newIndex: edit.newIndex + (edit.type === 'delete' ? 0 : i),
        });
      }
    }
    return ops;
  }

  /**
   * [start, end) slices of `ops`, one per hunk
   */
  private groupHunks(ops: LineOp[]): Array<[number, number]> {
    const context = this.contextLines;
    const hunks: Array<[number, number]> = [];
    let i = 0;

    while (i < ops.length) {
      if (ops[i]?.type === 'equal') {
        i++;
        continue;
      }

      const start = Math.max(0, i - context);
      let lastChange = i;
      let j = i + 1;

      while (j < ops.length) {
        if (ops[j]?.type !== 'equal') {
          lastChange = j;
          j++;
          continue;
        }

        let runEnd = j;
        while (runEnd < ops.length && ops[runEnd]?.type === 'equal') runEnd++;
        if (runEnd >= ops.length || runEnd - j > 2 * context) break;
        j = runEnd;
      }

      hunks.push([start, Math.min(ops.length, lastChange + 1 + context)]);
      i = lastChange + 1;
    }

    return hunks;
  }

  private *emitHunk(
    ops: LineOp[],
    oldLines: ContentLine[],
    newLines: ContentLine[]
  ): Generator<HunkEvent | LineEvent> {
    const first = ops[0];
    if (first === undefined) return;

    const oldCount = ops.filter((op) => op.type !== 'insert').length;
    const newCount = ops.filter((op) => op.type !== 'delete').length;
    const oldStart = oldCount > 0 ? first.oldIndex + 1 : first.oldIndex;
    const newStart = newCount > 0 ? first.newIndex + 1 : first.newIndex;

    const section = this.findSection(oldLines, first.oldIndex);
    const headerText = `@@ -${oldStart},${oldCount} +${newStart},${newCount} @@${section ? ` ${section}` : ''}\n`;

    yield {
      type: 'hunk',
      oldStart,
      oldLines: oldCount,
      newStart,
      newLines: newCount,
      header: Buffer.from(headerText, 'utf8'),
    };

    for (const op of ops) {
      yield* this.emitLine(op, oldLines, newLines);
    }
  }

  private *emitLine(
    op: LineOp,
    oldLines: ContentLine[],
    newLines: ContentLine[]
  ): Generator<LineEvent> {
    const oldLine = oldLines[op.oldIndex];
    const newLine = newLines[op.newIndex];

    switch (op.type) {
      case 'equal':
        if (oldLine === undefined) return;
        yield {
          type: 'line',
          origin: ' ',
          content: oldLine.bytes,
          oldLineno: op.oldIndex + 1,
          newLineno: op.newIndex + 1,
        };
        if (!oldLine.hasNewline) yield this.eofMarker('=');
        return;
      case 'delete':
        if (oldLine === undefined) return;
        yield { type: 'line', origin: '-', content: oldLine.bytes, oldLineno: op.oldIndex + 1 };
        if (!oldLine.hasNewline) yield this.eofMarker('>');
        return;
      case 'insert':
        if (newLine === undefined) return;
        yield { type: 'line', origin: '+', content: newLine.bytes, newLineno: op.newIndex + 1 };
        if (!newLine.hasNewline) yield this.eofMarker('<');
        return;
    }
  }

  private eofMarker(origin: LineOrigin): LineEvent {
    return { type: 'line', origin, content: HunkBuilder.NO_NEWLINE };
  }

  /**
   * Nearest line above the hunk that starts with a letter, "_" or "$",
   * trimmed and cut to at most 80 bytes on a character boundary.
   */
  private findSection(oldLines: ContentLine[], firstOldIndex: number): string | undefined {
    for (let i = Math.min(firstOldIndex, oldLines.length) - 1; i >= 0; i--) {
      const line = oldLines[i];
      if (line === undefined) continue;

      const text = Buffer.from(line.bytes).toString('utf8');
      if (!HunkBuilder.SECTION_START.test(text)) continue;

      return HunkBuilder.truncateBytes(text.trimEnd(), HunkBuilder.MAX_SECTION_BYTES);
    }
    return undefined;
  }

  private static truncateBytes(text: string, maxBytes: number): string {
    let result = '';
    let size = 0;
    for (const char of text) {
      const charSize = Buffer.byteLength(char, 'utf8');
      if (size + charSize > maxBytes) break;
      result += char;
      size += charSize;
    }
    return result.trimEnd();
  }
}
