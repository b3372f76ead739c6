import { Command, InvalidArgumentError } from 'commander';
import { TypedConfig } from '@/core/config';
import { DiffEngine, type Diff, type DiffOptions } from '@/core/diff';
import { RevisionResolver } from '@/core/revision';
import { HunkwiseException } from '@/core/exceptions';
import { displayError } from '@/utils';
import { getRepo, globalConfigPath } from '@/utils/helpers';
import { displayDiff, displayDiffJson } from './diff.display';

interface DiffCommandOptions {
  json?: boolean;
  unified?: number;
  findRenames?: number;
  findCopies?: number;
  workspace?: boolean;
}

const parseCount = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
};

const parsePercent = (value: string): number => {
  const parsed = parseCount(value);
  if (parsed > 100) {
    throw new InvalidArgumentError('Expected a percentage between 0 and 100.');
  }
  return parsed;
};

export const diffCommand = new Command('diff')
  .description(
    '🔍 Show changes between two commits (HEAD and its parent by default), or between HEAD and the working tree'
  )
  .argument('[base]', 'Base revision')
  .argument('[head]', 'Head revision', 'HEAD')
  .option('-w, --workspace', 'Compare HEAD with tracked files in the working tree')
  .option('--json', 'Print the diff as JSON')
  .option('-U, --unified <lines>', 'Lines of context around each change', parseCount)
  .option('-M, --find-renames <percent>', 'Similarity needed to report a rename', parsePercent)
  .option('-C, --find-copies <percent>', 'Similarity needed to report a copy', parsePercent)
  .action(
    async (
      base: string | undefined,
      head: string,
      options: DiffCommandOptions,
      command: Command
    ) => {
      try {
        const repository = await getRepo();
        const config = await TypedConfig.load(repository, globalConfigPath(command));

        const diffOptions: DiffOptions = {
          ...config.diff,
          ...(options.unified !== undefined && { contextLines: options.unified }),
          ...(options.findRenames !== undefined && { renameThreshold: options.findRenames }),
          ...(options.findCopies !== undefined && { copyThreshold: options.findCopies }),
        };
        const engine = new DiffEngine(repository, diffOptions);

        const defaultRange = base === undefined && head === 'HEAD';
        if (options.workspace && !defaultRange) {
          throw new HunkwiseException(
            '--workspace compares HEAD with the working tree and takes no revisions'
          );
        }

        let diff: Diff;
        if (options.workspace) {
          diff = await engine.diffWorkspace();
        } else if (defaultRange) {
          diff = await engine.diff();
        } else {
          diff = await engine.diffForRange(
            await new RevisionResolver(repository).resolveExplicitRange(head, base)
          );
        }

        if (options.json) {
          displayDiffJson(diff);
        } else {
          displayDiff(diff, options.workspace ? 'working tree' : undefined);
        }
      } catch (error) {
        displayError(error, 'Diff Failed');
        process.exitCode = 1;
      }
    }
  );
