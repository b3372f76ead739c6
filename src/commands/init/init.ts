import path from 'path';
import { Command } from 'commander';
import { PathScurry } from 'path-scurry';
import { LocalRepository } from '@/core/repo';
import { displayError } from '@/utils';
import { displayAlreadyInitialized, displayInitSuccess } from './init.display';

interface InitOptions {
  branch: string;
}

export const initCommand = new Command('init')
  .description('🚀 Create an empty repository')
  .option('-b, --branch <name>', 'Name of the initial branch', 'main')
  .argument('[directory]', 'Directory to initialize', '.')
  .action(async (directory: string, options: InitOptions) => {
    try {
      const { cwd } = new PathScurry(path.resolve(directory));

      if (await LocalRepository.exists(cwd)) {
        displayAlreadyInitialized(cwd.fullpath());
        return;
      }

      const repository = new LocalRepository();
      await repository.init(cwd, options.branch);
      displayInitSuccess(repository.workingDirectory().fullpath(), options.branch);
    } catch (error) {
      displayError(error, 'Init Failed');
      process.exitCode = 1;
    }
  });
