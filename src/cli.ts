#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Command, CommanderError } from 'commander';
import { displayError, logger } from '@/utils';
import {
  initCommand,
  addCommand,
  commitCommand,
  diffCommand,
  suggestCommand,
} from './commands';

const readVersion = (): string => {
  const raw: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '../package.json'), 'utf8')
  );
  if (typeof raw === 'object' && raw !== null && 'version' in raw) {
    return typeof raw.version === 'string' ? raw.version : '0.0.0';
  }
  return '0.0.0';
};

const program = new Command();

program
  .name('hunkwise')
  .description('🎯 Structured diffs and reviewable edit suggestions for a local repository')
  .version(readVersion(), '-v, --version', '📋 Display version information')
  .option('-V, --verbose', '🔍 Enable verbose logging')
  .option('-q, --quiet', '🔇 Suppress output')
  .option('--config <path>', '⚙️  Read configuration from this JSON file')
  .hook('preAction', (thisCommand) => {
    const options = thisCommand.opts();

    if (options['quiet']) {
      logger.level = 'silent';
    } else if (options['verbose']) {
      logger.level = 'debug';
    }
  });

program.addCommand(initCommand);
program.addCommand(addCommand);
program.addCommand(commitCommand);
program.addCommand(diffCommand);
program.addCommand(suggestCommand);

program.exitOverride();

const main = async (): Promise<void> => {
  try {
    await program.parseAsync();
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exit(error.exitCode);
    }
    displayError(error);
    process.exit(1);
  }
};

void main();
