import { HunkBuilder } from '@/core/diff';
import type { FileChange } from './types';

/**
 * Unified-diff text for one planned change, with three lines of context.
 */
export class PatchRenderer {
  private static readonly CONTEXT_LINES = 3;

  private readonly hunks = new HunkBuilder(PatchRenderer.CONTEXT_LINES);

  public render(change: FileChange): string {
    const chunks: Buffer[] = [
      Buffer.from(
        `diff --git a/${change.path} b/${change.path}\n--- a/${change.path}\n+++ b/${change.path}\n`,
        'utf8'
      ),
    ];

    for (const event of this.hunks.build(change.original, change.updated)) {
      if (event.type === 'hunk') {
        chunks.push(Buffer.from(event.header));
        continue;
      }
      switch (event.origin) {
        case ' ':
        case '+':
        case '-':
          chunks.push(Buffer.from(event.origin, 'utf8'), Buffer.from(event.content));
          break;
        default:
          chunks.push(Buffer.from(event.content));
      }
    }

    return Buffer.concat(chunks).toString('utf8');
  }
}
