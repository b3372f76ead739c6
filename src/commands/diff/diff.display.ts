import chalk from 'chalk';
import { display } from '@/utils';
import { DiffLineKind, FileStatus, type Diff, type DiffFile, type DiffHunk } from '@/core/diff';
import type { Revision } from '@/core/revision';

const STATUS_LABELS: Record<FileStatus, string> = {
  [FileStatus.ADDED]: chalk.green('added'),
  [FileStatus.DELETED]: chalk.red('deleted'),
  [FileStatus.MODIFIED]: chalk.blue('modified'),
  [FileStatus.RENAMED]: chalk.magenta('renamed'),
  [FileStatus.COPIED]: chalk.cyan('copied'),
  [FileStatus.TYPE_CHANGE]: chalk.yellow('type change'),
};

const describeRevision = (revision: Revision | undefined): string => {
  if (revision === undefined) return chalk.gray('(empty tree)');
  const label = revision.reference ? ` (${revision.reference})` : '';
  const summary = revision.summary ? ` ${chalk.gray(revision.summary)}` : '';
  return `${chalk.yellow(revision.oid.substring(0, 7))}${label}${summary}`;
};

const formatHunk = (hunk: DiffHunk): string[] => {
  const { oldStart, oldLines, newStart, newLines } = hunk.header;
  const section = hunk.section ? ` ${hunk.section}` : '';
  const lines = [chalk.cyan(`@@ -${oldStart},${oldLines} +${newStart},${newLines} @@`) + section];

  for (const line of hunk.lines) {
    switch (line.kind) {
      case DiffLineKind.ADDITION:
        lines.push(chalk.green(`+${line.text}`));
        break;
      case DiffLineKind.DELETION:
        lines.push(chalk.red(`-${line.text}`));
        break;
      default:
        lines.push(` ${line.text}`);
    }
  }
  return lines;
};

const formatFile = (file: DiffFile): string[] => {
  const title = file.oldPath ? `${file.oldPath} → ${file.path}` : file.path;
  const stats = `${chalk.green(`+${file.stats.additions}`)} ${chalk.red(`-${file.stats.deletions}`)}`;
  const lines = [`${chalk.bold(title)}  ${STATUS_LABELS[file.status]}  ${stats}`];

  if (file.isBinary) {
    lines.push(chalk.gray('  Binary files differ'));
  }
  file.hunks.forEach((hunk) => lines.push(...formatHunk(hunk)));
  lines.push('');
  return lines;
};

/**
 * `headLabel` replaces the head revision in the header, e.g. for a working tree.
 */
export const displayDiff = (diff: Diff, headLabel?: string): void => {
  const head = headLabel ? chalk.gray(`(${headLabel})`) : describeRevision(diff.range.head);
  const header = [
    `${chalk.gray('base:')} ${describeRevision(diff.range.base)}`,
    `${chalk.gray('head:')} ${head}`,
    `${chalk.gray('files:')} ${diff.files.length}`,
  ].join('\n');
  display.info(header, chalk.bold.blue('🔍 Diff'));

  if (diff.files.length === 0) {
    console.log(chalk.gray('No changes.'));
    return;
  }
  diff.files.forEach((file) => console.log(formatFile(file).join('\n')));
};

export const displayDiffJson = (diff: Diff): void => {
  console.log(JSON.stringify(diff, null, 2));
};
