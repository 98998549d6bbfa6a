import { Command } from 'commander';
import chalk from 'chalk';
import type { Operation } from '../types/index.js';
import { errorMessageOf } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { initCommand, launchCommand, listCommand, operationCommand, pruneCommand } from './commands/index.js';
import { globalOptions, withRunOptions, type RunOptions } from './options.js';

const program = new Command();

program
  .name('stackpilot')
  .description('Deploy interdependent infrastructure stacks in dependency order')
  .version('0.1.0')
  .option('-d, --project-dir <dir>', 'Project directory', process.cwd())
  .option('--debug', 'Log debug output');

/**
 * Run a command body and turn failures into exit code 1
 */
const handle = async (body: () => Promise<boolean>): Promise<void> => {
  try {
    const succeeded = await body();
    if (!succeeded) process.exitCode = 1;
  } catch (error) {
    logger.debug('Command failed', { error: error instanceof Error ? error.stack : String(error) });
    console.error(chalk.red(errorMessageOf(error)));
    process.exitCode = 1;
  }
};

program
  .command('init')
  .description('Create a project in the project directory')
  .option('--project-code <code>', 'Prefix of provider-side stack names')
  .option('--region <region>', 'Default region')
  .option('-y, --yes', 'Accept defaults without prompting')
  .action(async (options: { projectCode?: string; region?: string; yes?: boolean }, command: Command) => {
    await handle(() => initCommand({ options, global: globalOptions(command) }));
  });

program
  .command('list [path]')
  .description('Show stacks and their dependencies')
  .action(async (path: string | undefined, _options: unknown, command: Command) => {
    await handle(() => listCommand({ path, global: globalOptions(command) }));
  });

withRunOptions(
  program
    .command('launch [path]')
    .description('Create or update every stack under a path')
    .option('--prune', 'Delete obsolete stacks first')
    .option('-y, --yes', 'Do not ask for confirmation')
).action(async (path: string | undefined, options: RunOptions, command: Command) => {
  await handle(() => launchCommand({ path, options, global: globalOptions(command) }));
});

withRunOptions(
  program
    .command('prune [path]')
    .description('Delete obsolete stacks')
    .option('-y, --yes', 'Do not ask for confirmation')
).action(async (path: string | undefined, options: RunOptions, command: Command) => {
  await handle(() => pruneCommand({ path, options, global: globalOptions(command) }));
});

const OPERATION_COMMANDS: Array<{ name: string; operation: Operation; description: string }> = [
  { name: 'create', operation: 'create', description: 'Create stacks' },
  { name: 'update', operation: 'update', description: 'Update stacks' },
  { name: 'delete', operation: 'delete', description: 'Delete stacks, dependents first' },
  { name: 'describe', operation: 'describe', description: 'Describe deployed stacks' },
  { name: 'outputs', operation: 'describeOutputs', description: 'Show stack outputs' },
  { name: 'status', operation: 'getStatus', description: 'Show provider status of stacks' },
  { name: 'validate', operation: 'validate', description: 'Validate stack templates' },
  { name: 'generate', operation: 'generate', description: 'Print stack templates' },
  { name: 'dump-config', operation: 'dumpConfig', description: 'Print resolved stack config' },
  { name: 'diff', operation: 'diff', description: 'Compare generated stacks with deployed stacks' },
];

OPERATION_COMMANDS.forEach(({ name, operation, description }) => {
  const command = withRunOptions(program.command(`${name} [path]`).description(description));
  if (operation === 'delete') command.option('-y, --yes', 'Do not ask for confirmation');

  command.action(async (path: string | undefined, options: RunOptions, self: Command) => {
    await handle(() => operationCommand({ operation, path, options, global: globalOptions(self) }));
  });
});

export const run = async (argv: string[] = process.argv): Promise<void> => {
  await program.parseAsync(argv);
};

export { program };
