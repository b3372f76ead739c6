import type { Workspace } from '../../core/work-dir';

/**
 * In-process workspace for suggestion tests. Individual writes or the
 * staging step can be made to fail, and a write can be cut short after a
 * given number of bytes.
 */
export class MemoryWorkspace implements Workspace {
  readonly files = new Map<string, Buffer>();
  readonly writes: string[] = [];
  readonly stagedBatches: string[][] = [];
  failWriteFor = new Set<string>();
  partialWriteFor = new Map<string, number>();
  failStaging = false;

  constructor(files: Record<string, string | Buffer> = {}) {
    for (const [path, content] of Object.entries(files)) {
      this.files.set(path, typeof content === 'string' ? Buffer.from(content, 'utf8') : content);
    }
  }

  resolvePath(relativePath: string): string {
    return `/workspace/${relativePath}`;
  }

  async readFile(relativePath: string): Promise<Buffer | null> {
    return this.files.get(relativePath) ?? null;
  }

  async writeFile(relativePath: string, content: Uint8Array): Promise<void> {
    if (this.failWriteFor.has(relativePath)) {
      throw new Error(`disk full while writing ${relativePath}`);
    }
    const cutAt = this.partialWriteFor.get(relativePath);
    if (cutAt !== undefined) {
      this.partialWriteFor.delete(relativePath);
      this.files.set(relativePath, Buffer.from(content.subarray(0, cutAt)));
      throw new Error(`disk full after ${cutAt} bytes of ${relativePath}`);
    }
    this.writes.push(relativePath);
    this.files.set(relativePath, Buffer.from(content));
  }

  async stagePaths(relativePaths: string[]): Promise<void> {
    if (this.failStaging) {
      throw new Error('staging area is locked');
    }
    this.stagedBatches.push([...relativePaths]);
  }

  text(relativePath: string): string | undefined {
    return this.files.get(relativePath)?.toString('utf8');
  }
}
