import boxen from 'boxen';
import chalk from 'chalk';

type Theme = 'info' | 'success' | 'warning' | 'error';

const BORDER_COLORS: Record<Theme, string> = {
  info: 'blue',
  success: 'green',
  warning: 'yellow',
  error: 'red',
};

const render = (theme: Theme, content: string, title: string): string =>
  boxen(content, {
    padding: 1,
    margin: 1,
    borderStyle: 'round',
    borderColor: BORDER_COLORS[theme],
    title,
    titleAlignment: 'center',
  });

const box =
  (theme: Theme) =>
  (content: string, title: string): void => {
    console.log(render(theme, content, title));
  };

export const formatLabelValue = (label: string, value: string): string =>
  `${chalk.gray(`${label}:`)} ${value}`;

/**
 * Boxed command summaries, one per outcome.
 */
export const display = {
  info: box('info'),
  success: box('success'),
  warning: box('warning'),
};

/**
 * Error box for a failed command: the exception class, its message and,
 * for wrapped failures, the cause chain. A `SuggestionException` also shows
 * the file it is about.
 */
export const displayError = (error: unknown, title: string = 'Error'): void => {
  const err = error instanceof Error ? error : new Error(String(error));
  const lines = [
    formatLabelValue('Type', chalk.red(err.name || 'Error')),
    formatLabelValue('Message', chalk.red(err.message)),
  ];

  const path: unknown = 'path' in err ? err.path : undefined;
  if (typeof path === 'string') {
    lines.push(formatLabelValue('File', chalk.cyan(path)));
  }

  let cause = err.cause;
  while (cause instanceof Error) {
    lines.push(formatLabelValue('Cause', chalk.red(cause.message)));
    cause = cause.cause;
  }
  console.error(render('error', lines.join('\n'), chalk.bold.red(`❌ ${title}`)));
};
