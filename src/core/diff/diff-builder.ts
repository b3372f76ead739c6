import type { RevisionRange } from '@/core/revision';
import { LineSanitizer } from './line-sanitizer';
import { SectionExtractor } from './section-extractor';
import { StatusClassifier } from './status-classifier';
import {
  DiffLineKind,
  type ComparisonEvent,
  type Diff,
  type DiffFile,
  type FileEvent,
  type HunkEvent,
  type LineEvent,
  type LineOrigin,
} from './types';

/**
 * Folds a comparison event stream into a Diff. Files, hunks and lines keep
 * the order the events arrive in.
 */
export class DiffBuilder {
  private readonly files: DiffFile[] = [];
  private current: DiffFile | null = null;

  public static async fromEvents(
    range: RevisionRange,
    events: AsyncIterable<ComparisonEvent> | Iterable<ComparisonEvent>
  ): Promise<Diff> {
    const builder = new DiffBuilder();
    for await (const event of events) {
      builder.accept(event);
    }
    return builder.build(range);
  }

  public accept(event: ComparisonEvent): void {
    switch (event.type) {
      case 'file':
        this.startFile(event);
        break;
      case 'binary':
        this.markBinary();
        break;
      case 'hunk':
        this.startHunk(event);
        break;
      case 'line':
        this.addLine(event);
        break;
    }
  }

  public build(range: RevisionRange): Diff {
    return { range, files: this.files };
  }

  private startFile(event: FileEvent): void {
    const status = StatusClassifier.classify(event.delta);
    const path = StatusClassifier.canonicalPath(status, event.oldPath, event.newPath);
    const oldPath = StatusClassifier.sourcePath(status, path, event.oldPath);

    const file: DiffFile = {
      path,
      status,
      stats: { additions: 0, deletions: 0 },
      isBinary: event.oldBinary || event.newBinary,
      hunks: [],
    };
    if (oldPath !== undefined) file.oldPath = oldPath;

    this.files.push(file);
    this.current = file;
  }

  /**
   * Binary files carry no line detail, even if hunks were already reported.
   */
  private markBinary(): void {
    if (!this.current) return;
    this.current.isBinary = true;
    this.current.hunks = [];
    this.current.stats = { additions: 0, deletions: 0 };
  }

  private startHunk(event: HunkEvent): void {
    if (!this.current || this.current.isBinary) return;

    const section = SectionExtractor.extract(event.header);
    this.current.hunks.push({
      header: {
        oldStart: event.oldStart,
        oldLines: event.oldLines,
        newStart: event.newStart,
        newLines: event.newLines,
      },
      ...(section !== undefined ? { section } : {}),
      lines: [],
    });
  }

  private addLine(event: LineEvent): void {
    const file = this.current;
    if (!file || file.isBinary) return;

    const hunk = file.hunks[file.hunks.length - 1];
    if (!hunk) return;

    const kind = DiffBuilder.lineKind(event.origin);
    if (kind === null) return;

    if (kind === DiffLineKind.ADDITION) file.stats.additions++;
    if (kind === DiffLineKind.DELETION) file.stats.deletions++;

    hunk.lines.push({
      kind,
      text: LineSanitizer.sanitize(event.content),
      ...(kind !== DiffLineKind.ADDITION && event.oldLineno !== undefined
        ? { baseLine: event.oldLineno }
        : {}),
      ...(kind !== DiffLineKind.DELETION && event.newLineno !== undefined
        ? { headLine: event.newLineno }
        : {}),
      highlights: [],
    });
  }

  private static lineKind(origin: LineOrigin): DiffLineKind | null {
    switch (origin) {
      case ' ':
        return DiffLineKind.CONTEXT;
      case '+':
        return DiffLineKind.ADDITION;
      case '-':
        return DiffLineKind.DELETION;
      default:
        return null;
    }
  }
}
