import { InvalidArgumentError, type Command } from 'commander';
import { setLogLevel } from '../utils/logger.js';

export interface GlobalOptions {
  projectDir: string;
  debug?: boolean;
}

export interface RunOptions {
  ignoreDependencies?: boolean;
  maxConcurrency?: number;
  /** Set to false by --no-placeholders. */
  placeholders: boolean;
  dryRun?: boolean;
  yes?: boolean;
  prune?: boolean;
}

export const parseMaxConcurrency = (value: string): number => {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
};

/**
 * Options shared by every command that walks the dependency graph
 */
export const withRunOptions = (command: Command): Command =>
  command
    .option('--ignore-dependencies', 'Only act on the stacks named by the path')
    .option(
      '--max-concurrency <n>',
      'Maximum number of stacks to run at once',
      parseMaxConcurrency
    )
    .option('--no-placeholders', 'Fail instead of substituting placeholders for missing outputs')
    .option('--dry-run', 'Show the execution order without running anything');

/**
 * Read the program-level options and apply --debug
 */
export const globalOptions = (command: Command): GlobalOptions => {
  const options = command.optsWithGlobals<GlobalOptions>();
  if (options.debug) setLogLevel('debug');
  return options;
};
