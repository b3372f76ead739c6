import chalk from 'chalk';
import { display } from '@/utils';
import type { ApplyPreview } from '@/core/suggestion';

const colorPatchLine = (line: string): string => {
  if (line.startsWith('+++') || line.startsWith('---') || line.startsWith('diff ')) {
    return chalk.bold(line);
  }
  if (line.startsWith('@@')) return chalk.cyan(line);
  if (line.startsWith('+')) return chalk.green(line);
  if (line.startsWith('-')) return chalk.red(line);
  return line;
};

export const displayPreviews = (previews: ApplyPreview[]): void => {
  if (previews.length === 0) {
    display.info('The suggestion does not change any file.', chalk.yellow('ℹ️  No Changes'));
    return;
  }
  previews.forEach((preview) => {
    console.log(preview.patch.split('\n').map(colorPatchLine).join('\n'));
  });
};

export const displayApplied = (paths: string[]): void => {
  if (paths.length === 0) {
    display.info('The suggestion does not change any file.', chalk.yellow('ℹ️  No Changes'));
    return;
  }
  const lines = paths.map((file) => `   ${chalk.green('✓')} ${file}`);
  display.success(lines.join('\n'), chalk.bold.green(`✨ Applied and staged ${paths.length} file(s)`));
};

export const displayJson = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};
