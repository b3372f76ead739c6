import chalk from 'chalk';
import { display, formatLabelValue } from '@/utils/cli/display';

export const displayInitSuccess = (workingDirectory: string, branch: string): void => {
  const lines = [
    formatLabelValue('Location', chalk.cyan(workingDirectory)),
    formatLabelValue('Metadata', chalk.cyan('.hunkwise/')),
    formatLabelValue('Branch', chalk.green(branch)),
    '',
    chalk.yellow('💡 Next steps:'),
    `  ${chalk.gray('•')} Stage files: ${chalk.green('hunkwise add <files...>')}`,
    `  ${chalk.gray('•')} Record them: ${chalk.green('hunkwise commit -m "message"')}`,
  ];
  display.success(lines.join('\n'), chalk.bold.green('🚀 Repository Initialized'));
};

export const displayAlreadyInitialized = (workingDirectory: string): void => {
  display.warning(
    `A repository already exists at ${chalk.cyan(workingDirectory)}`,
    chalk.yellow('⚠️  Nothing To Do')
  );
};
