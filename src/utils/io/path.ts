import path from 'path';

export class PathUtils {
  /**
   * Join a directory and a file name using forward slashes on every platform.
   */
  public static normalizePath(basePath: string, fileName: string): string {
    const fullPath = basePath ? path.join(basePath, fileName) : fileName;
    return PathUtils.toPosix(fullPath);
  }

  public static toPosix(filePath: string): string {
    return filePath.replace(/\\/g, '/');
  }

  /**
   * "src/core/file.ts" → "src/core", "README.md" → ""
   */
  public static directoryOf(filePath: string): string {
    const dir = path.posix.dirname(PathUtils.toPosix(filePath));
    return dir === '.' ? '' : dir;
  }
}
