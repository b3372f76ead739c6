import chalk from 'chalk';
import { display } from '@/utils';
import type { AddResult } from '@/core/index';

const listFiles = (lines: string[], files: string[], marker: string): void => {
  files.forEach((file) => lines.push(`   ${marker} ${file}`));
  lines.push('');
};

/**
 * Display the results of the add operation
 */
export const displayAddResults = (result: AddResult): void => {
  const { added, modified, removed, failed } = result;

  if (added.length + modified.length + removed.length + failed.length === 0) {
    display.info(
      'No changes detected. All files are already up to date in the staging area.',
      chalk.yellow('ℹ️  No Changes')
    );
    return;
  }

  const lines: string[] = [];
  if (added.length > 0) {
    lines.push(chalk.green.bold(`✅ New files staged (${added.length}):`));
    listFiles(lines, added, chalk.green('+'));
  }
  if (modified.length > 0) {
    lines.push(chalk.blue.bold(`📝 Modified files updated (${modified.length}):`));
    listFiles(lines, modified, chalk.blue('M'));
  }
  if (removed.length > 0) {
    lines.push(chalk.red.bold(`🗑️  Removed from staging (${removed.length}):`));
    listFiles(lines, removed, chalk.red('-'));
  }
  if (failed.length > 0) {
    lines.push(chalk.red.bold(`❌ Failed to add (${failed.length}):`));
    failed.forEach((failure) => {
      lines.push(`   ${chalk.red('✗')} ${failure.path}`);
      lines.push(`     ${chalk.gray(failure.reason)}`);
    });
    lines.push('');
  }

  lines.push(chalk.gray('─'.repeat(50)));
  lines.push(`  ${chalk.magenta('Total staged:')} ${added.length + modified.length} changes`);

  const title =
    failed.length > 0
      ? chalk.red('⚠️  Staging Partially Failed')
      : chalk.green('✨ Staging Area Updated');
  display.info(lines.join('\n'), title);
};
