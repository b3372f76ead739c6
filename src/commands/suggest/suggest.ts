import path from 'path';
import fs from 'fs-extra';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { HunkwiseException } from '@/core/exceptions';
import { SuggestionApplier, SuggestionParser, type Suggestion } from '@/core/suggestion';
import { WorkingDirectory } from '@/core/work-dir';
import { displayError } from '@/utils';
import { getRepo } from '@/utils/helpers';
import { displayApplied, displayJson, displayPreviews } from './suggest.display';

interface SuggestCommandOptions {
  dryRun?: boolean;
  json?: boolean;
}

const readSuggestion = async (file: string): Promise<Suggestion> => {
  let raw: unknown;
  try {
    raw = await fs.readJson(path.resolve(file));
  } catch (error) {
    throw new HunkwiseException(`Could not read suggestion file ${file}`, error);
  }
  return SuggestionParser.parse(raw);
};

export const suggestCommand = new Command('suggest')
  .description('🩹 Preview or apply a suggested set of edits')
  .argument('<file>', 'JSON file describing the suggestion')
  .option('-n, --dry-run', 'Show the patch without touching any file')
  .option('--json', 'Print the result as JSON')
  .action(async (file: string, options: SuggestCommandOptions) => {
    const spinner = ora({ text: chalk.blue('Checking suggestion...'), spinner: 'dots' });
    try {
      const suggestion = await readSuggestion(file);
      const repository = await getRepo();
      const applier = new SuggestionApplier(new WorkingDirectory(repository));

      if (options.dryRun) {
        const previews = await applier.dryRun(suggestion);
        if (options.json) displayJson(previews);
        else displayPreviews(previews);
        return;
      }

      if (!options.json) spinner.start();
      const applied = await applier.apply(suggestion);
      if (spinner.isSpinning) spinner.succeed(chalk.green('Suggestion applied'));

      if (options.json) displayJson({ applied });
      else displayApplied(applied);
    } catch (error) {
      if (spinner.isSpinning) spinner.fail(chalk.red('Suggestion could not be applied'));
      displayError(error, 'Suggest Failed');
      process.exitCode = 1;
    }
  });
