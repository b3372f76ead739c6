import { SuggestionException } from '@/core/exceptions';
import type { Workspace } from '@/core/work-dir';
import { logger } from '@/utils';
import { OffsetIndex } from './offset-index';
import { ensureRelativePath } from './path-guard';
import { DiffSide, type FileChange, type Replacement, type Suggestion, type TextEdit } from './types';

/**
 * Resolves a suggestion into per-file changes. Every check for a file runs
 * before its updated bytes are built, and nothing is written here.
 *
 * Paths are checked and normalized while grouping. Per file: side check →
 * read → offsets → sort → overlap check → splice from the highest offset
 * down → compare.
 */
export class EditPlanner {
  private static readonly utf8 = new TextDecoder('utf-8', { fatal: true });

  constructor(private readonly workspace: Workspace) {}

  /**
   * One change per distinct normalized path, ordered by path. Changes whose
   * updated bytes equal the original are included; callers skip them.
   */
  public async plan(suggestion: Suggestion): Promise<FileChange[]> {
    const grouped = new Map<string, TextEdit[]>();
    for (const edit of suggestion.edits) {
      const path = ensureRelativePath(edit.location.path);
      const edits = grouped.get(path) ?? [];
      edits.push(edit);
      grouped.set(path, edits);
    }

    const changes: FileChange[] = [];
    for (const path of [...grouped.keys()].sort(byCodeUnit)) {
      changes.push(await this.planFile(path, grouped.get(path) ?? []));
    }
    return changes;
  }

  private async planFile(path: string, edits: TextEdit[]): Promise<FileChange> {
    for (const edit of edits) {
      if (edit.location.side !== DiffSide.HEAD) {
        throw SuggestionException.unsupportedSide(path, String(edit.location.side));
      }
    }

    const original = await this.readText(path);
    const index = new OffsetIndex(original, path);

    const replacements: Replacement[] = edits.map((edit) => {
      const start = index.offset(edit.location.range.start);
      const end = index.offset(edit.location.range.end);
      if (start > end) {
        throw SuggestionException.invalidRange(path, start, end);
      }
      return { start, end, replacement: Buffer.from(edit.replacement, 'utf8') };
    });

    replacements.sort((a, b) => a.start - b.start);
    EditPlanner.ensureNonOverlapping(path, replacements);

    let updated = original;
    for (let i = replacements.length - 1; i >= 0; i--) {
      const replacement = replacements[i];
      if (replacement === undefined) continue;
      updated = Buffer.concat([
        updated.subarray(0, replacement.start),
        replacement.replacement,
        updated.subarray(replacement.end),
      ]);
    }

    logger.debug(`Planned ${replacements.length} edit(s) for ${path}`);
    return { path, original, updated, replacements };
  }

  private async readText(path: string): Promise<Buffer> {
    let content: Buffer | null;
    try {
      content = await this.workspace.readFile(path);
    } catch (error) {
      throw SuggestionException.io(path, 'read', error);
    }
    if (content === null) {
      throw SuggestionException.missingFile(path);
    }

    try {
      EditPlanner.utf8.decode(content);
    } catch (error) {
      throw SuggestionException.io(path, 'decode', new Error('file is not valid UTF-8', { cause: error }));
    }
    return content;
  }

  /**
   * Touching ranges are allowed; an earlier range ending past a later start is not.
   */
  private static ensureNonOverlapping(path: string, replacements: Replacement[]): void {
    for (let i = 1; i < replacements.length; i++) {
      const earlier = replacements[i - 1];
      const later = replacements[i];
      if (earlier && later && earlier.end > later.start) {
        throw SuggestionException.overlappingEdits(path);
      }
    }
  }
}

const byCodeUnit = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);
