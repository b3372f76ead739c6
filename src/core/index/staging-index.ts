import path from 'path';
import fs from 'fs-extra';
import { EntryType, TreeEntry } from '@/core/objects';
import { RepositoryException } from '@/core/exceptions';
import { FileUtils, HashUtils } from '@/utils';
import type { IndexEntry } from './types';

type IndexFile = {
  version: number;
  entries: IndexEntry[];
};

/**
 * The staging area: the set of paths that make up the next commit.
 *
 * Stored as `.hunkwise/index.json`:
 * ┌──────────────────────────────────────────────────────────┐
 * │ { "version": 1,                                          │
 * │   "entries": [ { "path", "sha", "mode" }, ... ] }        │
 * └──────────────────────────────────────────────────────────┘
 * Entries are kept sorted by path.
 */
export class StagingIndex {
  public static readonly VERSION = 1;

  private readonly _entries = new Map<string, IndexEntry>();

  constructor(entries: IndexEntry[] = []) {
    entries.forEach((entry) => this._entries.set(entry.path, entry));
  }

  public static async read(indexPath: string): Promise<StagingIndex> {
    if (!(await FileUtils.exists(indexPath))) {
      return new StagingIndex();
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(indexPath);
    } catch (error) {
      throw new RepositoryException(`Unreadable staging area: ${indexPath}`, error);
    }
    return new StagingIndex(StagingIndex.parse(raw, indexPath));
  }

  public async write(indexPath: string): Promise<void> {
    const file: IndexFile = { version: StagingIndex.VERSION, entries: this.entries };
    await FileUtils.createDirectories(path.dirname(indexPath));
    await fs.writeJson(indexPath, file, { spaces: 2 });
  }

  public get entries(): IndexEntry[] {
    return [...this._entries.values()].sort((a, b) =>
      a.path < b.path ? -1 : a.path > b.path ? 1 : 0
    );
  }

  public get size(): number {
    return this._entries.size;
  }

  public getEntry(path: string): IndexEntry | undefined {
    return this._entries.get(path);
  }

  public hasEntry(path: string): boolean {
    return this._entries.has(path);
  }

  public add(entry: IndexEntry): void {
    this._entries.set(entry.path, entry);
  }

  public removeEntry(path: string): boolean {
    return this._entries.delete(path);
  }

  /**
   * Tracked paths equal to `dir` or below it
   */
  public entriesUnder(dir: string): IndexEntry[] {
    if (dir === '') return this.entries;
    return this.entries.filter((e) => e.path === dir || e.path.startsWith(`${dir}/`));
  }

  private static parse(raw: unknown, indexPath: string): IndexEntry[] {
    if (typeof raw !== 'object' || raw === null || !('entries' in raw)) {
      throw new RepositoryException(`Malformed staging area: ${indexPath}`);
    }
    const { entries } = raw;
    if (!Array.isArray(entries)) {
      throw new RepositoryException(`Malformed staging area: ${indexPath}`);
    }

    return entries.map((item: unknown): IndexEntry => {
      if (
        typeof item !== 'object' ||
        item === null ||
        !('path' in item) ||
        !('sha' in item) ||
        !('mode' in item)
      ) {
        throw new RepositoryException(`Malformed staging entry in ${indexPath}`);
      }
      const { path: entryPath, sha, mode } = item;
      if (typeof entryPath !== 'string' || typeof sha !== 'string' || typeof mode !== 'string') {
        throw new RepositoryException(`Malformed staging entry in ${indexPath}`);
      }
      if (!HashUtils.isSha1(sha)) {
        throw new RepositoryException(`Invalid object id for ${entryPath} in ${indexPath}`);
      }
      const entryType: EntryType = TreeEntry.fromMode(mode);
      return { path: entryPath, sha, mode: entryType };
    });
  }
}
