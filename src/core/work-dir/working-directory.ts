import type { Repository } from '@/core/repo';
import { IndexManager } from '@/core/index';
import type { Workspace } from './workspace';
import { FileOperationService } from './internal';

/**
 * Workspace backed by a repository's working tree and staging area.
 */
export class WorkingDirectory implements Workspace {
  private readonly files: FileOperationService;
  private readonly indexManager: IndexManager;

  constructor(repository: Repository) {
    this.files = new FileOperationService(repository.workingDirectory().fullpath());
    this.indexManager = new IndexManager(repository);
  }

  public resolvePath(relativePath: string): string {
    return this.files.resolve(relativePath);
  }

  public async readFile(relativePath: string): Promise<Buffer | null> {
    return await this.files.read(relativePath);
  }

  public async writeFile(relativePath: string, content: Uint8Array): Promise<void> {
    await this.files.write(relativePath, content);
  }

  public async stagePaths(relativePaths: string[]): Promise<void> {
    await this.indexManager.stageFiles(relativePaths);
  }
}
