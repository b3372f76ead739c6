import chalk from 'chalk';
import { display, formatLabelValue } from '@/utils/cli/display';
import type { CommitResult } from '@/core/commit';

export const displayCommitResult = (result: CommitResult): void => {
  const shortSha = result.sha.substring(0, 7);
  const firstLine = result.message.split('\n')[0] ?? '';
  const where = result.branch ?? 'detached HEAD';

  const lines = [
    `${chalk.yellow(shortSha)} ${firstLine}`,
    '',
    formatLabelValue('Branch', chalk.green(where)),
    formatLabelValue('Author', `${result.author.name} <${result.author.email}>`),
    formatLabelValue('Date', new Date(result.author.timestamp * 1000).toLocaleString()),
  ];
  if (result.parentShas.length === 0) {
    lines.push('', chalk.gray('(root commit)'));
  }

  display.success(lines.join('\n'), chalk.bold.green('✅ Commit Created'));
};
