import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { CommitManager } from '@/core/commit';
import { TypedConfig } from '@/core/config';
import { displayError } from '@/utils';
import { getRepo, globalConfigPath } from '@/utils/helpers';
import { displayCommitResult } from './commit.display';

interface CommitCommandOptions {
  message: string;
}

export const commitCommand = new Command('commit')
  .description('📦 Record the staging area as a new commit')
  .requiredOption('-m, --message <message>', 'Commit message')
  .action(async (options: CommitCommandOptions, command: Command) => {
    const spinner = ora({ text: chalk.blue('Creating commit...'), spinner: 'dots' });
    try {
      const repository = await getRepo();
      const config = await TypedConfig.load(repository, globalConfigPath(command));

      spinner.start();
      const result = await new CommitManager(repository, config).createCommit({
        message: options.message,
      });
      spinner.succeed(chalk.green('Commit created'));

      displayCommitResult(result);
    } catch (error) {
      if (spinner.isSpinning) spinner.fail(chalk.red('Commit failed'));
      displayError(error, 'Commit Failed');
      process.exitCode = 1;
    }
  });
