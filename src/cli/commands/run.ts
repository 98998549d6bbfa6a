import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import type { ExecutionReport, FailedOutcome, Operation } from '../../types/index.js';
import { executePlan, type ExecutionCallbacks } from '../../core/executor.js';
import { getLaunchOrder } from '../../core/dependency-graph.js';
import type { Plan } from '../../core/plan.js';
import type { StackActions } from '../../core/actions.js';

export const formatDuration = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};

/**
 * Print the batches a plan would run in
 */
export const showDryRun = ({ plan, title }: { plan: Plan; title: string }): void => {
  const batches = getLaunchOrder({ graph: plan.graph });

  console.log(chalk.bold(`Dry run: ${title}`));
  if (batches.length === 0) {
    console.log(chalk.dim('Nothing to do.'));
    return;
  }
  console.log(chalk.dim('Stacks in the same step run concurrently:'));
  console.log();

  batches.forEach((batch, index) => {
    console.log(`  ${chalk.cyan(`${index + 1}.`)} ${batch.join(chalk.dim(', '))}`);
  });

  console.log();
  console.log(chalk.dim(`Total: ${plan.graph.size} stacks`));
};

/**
 * Ask before a destructive run, unless --yes was given
 */
export const confirmRun = async ({
  message,
  stackIds,
  yes,
}: {
  message: string;
  stackIds: string[];
  yes?: boolean;
}): Promise<boolean> => {
  if (yes) return true;

  console.log(chalk.bold(message));
  stackIds.forEach((stackId) => console.log(`  ${chalk.red('-')} ${stackId}`));
  console.log();

  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message: 'Do you want to continue?',
      default: false,
    },
  ]);
  return confirmed;
};

/**
 * Abort the signal on Ctrl-C for the duration of a run. Running stacks are
 * left to finish; nothing new starts.
 */
export const withInterrupt = async <T>(body: (signal: AbortSignal) => Promise<T>): Promise<T> => {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error(chalk.yellow('\nInterrupted: waiting for running stacks to finish.'));
    controller.abort();
  };

  process.once('SIGINT', onInterrupt);
  try {
    return await body(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
};

/**
 * Spinner naming the stacks in flight, with one line per finished stack
 */
export const progressCallbacks = (operation: Operation): ExecutionCallbacks => {
  const spinner = ora({ spinner: 'dots', stream: process.stderr });
  const running = new Set<string>();

  const refresh = (): void => {
    if (running.size === 0) {
      spinner.stop();
      return;
    }
    spinner.start(`${operation}: ${[...running].sort().join(', ')}`);
  };

  return {
    onStackStart: (stackId) => {
      running.add(stackId);
      refresh();
    },
    onStackComplete: (stackId, outcome) => {
      running.delete(stackId);
      spinner.stopAndPersist({
        symbol: chalk.green('✓'),
        text: `${stackId} ${chalk.dim(`(${formatDuration(outcome.durationMs)})`)}`,
      });
      refresh();
    },
    onStackFailed: (stackId, outcome) => {
      const started = running.delete(stackId);
      spinner.stopAndPersist({
        symbol: started ? chalk.red('✗') : chalk.dim('○'),
        text: started
          ? `${stackId} ${chalk.dim(`(${formatDuration(outcome.durationMs)})`)}`
          : `${stackId} ${chalk.dim(`(${outcome.reason})`)}`,
      });
      refresh();
    },
  };
};

/**
 * Run a plan with a spinner for the stacks in flight
 */
export const executeWithProgress = ({
  plan,
  actions,
  maxConcurrency,
  signal,
}: {
  plan: Plan;
  actions: StackActions;
  maxConcurrency?: number;
  signal?: AbortSignal;
}): Promise<ExecutionReport> =>
  executePlan({
    plan,
    runStack: actions.runOperation,
    maxConcurrency,
    signal,
    callbacks: progressCallbacks(plan.operation),
  });

/**
 * Print completed and failed counts, then every failure with its reason
 */
export const printSummary = ({ report }: { report: ExecutionReport }): void => {
  const outcomes = [...report.outcomes.values()];
  const completed = outcomes.filter((outcome) => outcome.state === 'complete').length;
  const failed = outcomes.filter(
    (outcome): outcome is FailedOutcome => outcome.state === 'failed'
  );
  const notRun = failed.filter(
    (outcome) => outcome.reason === 'upstream-failed' || outcome.reason === 'cancelled'
  ).length;

  console.error();
  console.error(chalk.dim('─'.repeat(50)));

  if (failed.length === 0) {
    console.error(chalk.green(`✓ All ${completed} stacks completed successfully.`));
    return;
  }

  console.error(
    `${chalk.green(`${completed} completed`)} | ` +
      `${chalk.red(`${failed.length - notRun} failed`)} | ` +
      `${chalk.dim(`${notRun} not run`)}`
  );
  console.error();
  console.error(chalk.red('Failed stacks:'));
  failed
    .sort((a, b) => a.stackId.localeCompare(b.stackId))
    .forEach((outcome) => {
      console.error(`  ${chalk.red('✗')} ${outcome.stackId} ${chalk.dim(`[${outcome.reason}]`)}`);
      console.error(chalk.dim(`    ${outcome.message}`));
    });
};
