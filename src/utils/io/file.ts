import fs from 'fs-extra';
import path from 'path';

/**
 * Utility class for file operations.
 */
export class FileUtils {
  /**
   * Creates directories for the given path if they do not exist.
   */
  public static async createDirectories(dirPath: string): Promise<void> {
    await fs.ensureDir(dirPath);
  }

  /**
   * Creates a file at the given path with the given content, creating parent
   * directories on the way.
   */
  public static async createFile(
    filePath: string,
    content: Buffer | Uint8Array | string
  ): Promise<void> {
    await this.createDirectories(path.dirname(filePath));
    await fs.writeFile(filePath, content);
  }

  public static async readFile(filePath: string): Promise<Buffer> {
    return await fs.readFile(filePath);
  }

  /**
   * Reads a file, returning null only when it does not exist. Any other
   * failure (permissions, a directory in the way) is rethrown.
   */
  public static async readFileIfExists(filePath: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (FileUtils.isNotFound(error)) return null;
      throw error;
    }
  }

  public static async exists(filePath: string): Promise<boolean> {
    return await fs.pathExists(filePath);
  }

  /**
   * Matches on `code` alone: errors raised by `fs` inside a Jest sandbox come
   * from another realm and fail `instanceof Error`.
   */
  public static isNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
  }
}
