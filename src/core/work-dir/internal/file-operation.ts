import path from 'path';
import fs from 'fs-extra';
import { FileUtils } from '@/utils';

/**
 * Plain file reads and writes confined to one working directory.
 */
export class FileOperationService {
  constructor(private readonly workingDirectory: string) {}

  public resolve(relativePath: string): string {
    return path.join(this.workingDirectory, relativePath);
  }

  public async read(relativePath: string): Promise<Buffer | null> {
    return await FileUtils.readFileIfExists(this.resolve(relativePath));
  }

  /**
   * Overwrite in place, keeping the file's permission bits.
   */
  public async write(relativePath: string, content: Uint8Array): Promise<void> {
    const absolutePath = this.resolve(relativePath);
    await FileUtils.createDirectories(path.dirname(absolutePath));
    await fs.writeFile(absolutePath, content);
  }
}
