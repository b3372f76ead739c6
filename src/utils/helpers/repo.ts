import { PathScurry } from 'path-scurry';
import { LocalRepository } from '@/core/repo';
import { RepositoryException } from '@/core/exceptions';

/**
 * Find the repository containing `startDir` (the current directory by default).
 */
export const getRepo = async (startDir: string = process.cwd()): Promise<LocalRepository> => {
  const pathScurry = new PathScurry(startDir);
  const repository = await LocalRepository.findRepository(pathScurry.cwd);

  if (!repository) {
    throw new RepositoryException(
      `not a hunkwise repository (or any of the parent directories): ${startDir}`
    );
  }

  return repository;
};
