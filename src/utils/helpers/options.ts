import type { Command } from 'commander';

/**
 * The program-level `--config <path>` as seen from a sub-command.
 */
export const globalConfigPath = (command: Command): string | undefined => {
  const value: unknown = command.optsWithGlobals()['config'];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};
