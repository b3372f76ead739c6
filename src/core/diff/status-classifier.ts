import { FileStatus, type DeltaKind } from './types';

export class StatusClassifier {
  private constructor() {}

  public static classify(delta: DeltaKind): FileStatus {
    switch (delta) {
      case 'added':
      case 'untracked':
        return FileStatus.ADDED;
      case 'deleted':
        return FileStatus.DELETED;
      case 'renamed':
        return FileStatus.RENAMED;
      case 'copied':
        return FileStatus.COPIED;
      case 'type-changed':
        return FileStatus.TYPE_CHANGE;
      case 'modified':
      case 'ignored':
      case 'unreadable':
      case 'conflicted':
      case 'unmodified':
        return FileStatus.MODIFIED;
    }
  }

  /**
   * The path a file is listed under: the old side for deletions or when the
   * new side has no path, otherwise the new side.
   */
  public static canonicalPath(
    status: FileStatus,
    oldPath: string | undefined,
    newPath: string | undefined
  ): string {
    if (status === FileStatus.DELETED || newPath === undefined) {
      return oldPath ?? '';
    }
    return newPath;
  }

  public static sourcePath(
    status: FileStatus,
    path: string,
    oldPath: string | undefined
  ): string | undefined {
    const tracksSource = status === FileStatus.RENAMED || status === FileStatus.COPIED;
    return tracksSource && oldPath !== undefined && oldPath !== path ? oldPath : undefined;
  }
}
