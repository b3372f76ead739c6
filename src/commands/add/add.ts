import path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { IndexManager } from '@/core/index';
import { displayError } from '@/utils';
import { getRepo } from '@/utils/helpers';
import { displayAddResults } from './add.display';

export const addCommand = new Command('add')
  .description('➕ Add file contents to the staging area')
  .argument('<files...>', 'Files or directories to stage')
  .action(async (files: string[]) => {
    try {
      const repository = await getRepo();
      const indexManager = new IndexManager(repository);

      const spinner = ora({
        text: chalk.blue('Adding files to staging area...'),
        color: 'blue',
        spinner: 'dots',
      }).start();

      const result = await indexManager.add(files.map((file) => path.resolve(file)));

      if (result.failed.length > 0) {
        spinner.fail(chalk.red('Some files could not be added'));
        process.exitCode = 1;
      } else {
        spinner.succeed(chalk.green('Staging area updated'));
      }
      displayAddResults(result);
    } catch (error) {
      displayError(error, 'Add Failed');
      process.exitCode = 1;
    }
  });
