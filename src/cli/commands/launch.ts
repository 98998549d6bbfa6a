import chalk from 'chalk';
import type { Operation } from '../../types/index.js';
import { launchStacks, planLaunch, planPrune, pruneStacks } from '../../core/launcher.js';
import type { ExecutionCallbacks, StackRunner } from '../../core/executor.js';
import type { Plan } from '../../core/plan.js';
import type { GlobalOptions, RunOptions } from '../options.js';
import { createProjectActions, loadProject, type Project } from '../project.js';
import { confirmRun, printSummary, progressCallbacks, showDryRun, withInterrupt } from './run.js';

const confirmPrune = (plan: Plan, yes?: boolean): Promise<boolean> =>
  confirmRun({
    message: 'The following obsolete stacks will be deleted:',
    stackIds: [...plan.graph.keys()].sort(),
    yes,
  });

const executionFor = ({
  project,
  operation,
  options,
  signal,
}: {
  project: Project;
  operation: Operation;
  options: RunOptions;
  signal: AbortSignal;
}): {
  runStack: StackRunner;
  maxConcurrency?: number;
  signal: AbortSignal;
  callbacks: ExecutionCallbacks;
} => ({
  runStack: createProjectActions({ project, operation, noPlaceholders: !options.placeholders })
    .runOperation,
  maxConcurrency: options.maxConcurrency ?? project.settings.maxConcurrency,
  signal,
  callbacks: progressCallbacks(operation),
});

/**
 * Delete every obsolete stack under a path
 */
export const pruneCommand = async ({
  path,
  options,
  global,
}: {
  path?: string;
  options: RunOptions;
  global: GlobalOptions;
}): Promise<boolean> => {
  const project = await loadProject({ projectDir: global.projectDir });
  const { stacks } = project;
  const ignoreDependencies = options.ignoreDependencies;
  const plan = planPrune({ stacks, path, ignoreDependencies });

  if (!plan) {
    console.log(chalk.gray('No obsolete stacks to prune.'));
    return true;
  }
  if (options.dryRun) {
    showDryRun({ plan, title: `prune ${path ?? ''}`.trim() });
    return true;
  }
  if (!(await confirmPrune(plan, options.yes))) {
    console.log(chalk.yellow('Nothing pruned.'));
    return true;
  }

  const report = await withInterrupt((signal) =>
    pruneStacks({
      stacks,
      path,
      ignoreDependencies,
      ...executionFor({ project, operation: 'delete', options, signal }),
    })
  );
  if (report) printSummary({ report });
  return !report?.hasFailures;
};

/**
 * Create or update every stack under a path, pruning obsolete stacks first
 * with --prune
 */
export const launchCommand = async ({
  path,
  options,
  global,
}: {
  path?: string;
  options: RunOptions;
  global: GlobalOptions;
}): Promise<boolean> => {
  const project = await loadProject({ projectDir: global.projectDir });
  const { stacks } = project;
  const ignoreDependencies = options.ignoreDependencies;
  const prunePlan = options.prune ? planPrune({ stacks, path, ignoreDependencies }) : null;
  const launchPlan = planLaunch({ stacks, path, ignoreDependencies });

  if (options.dryRun) {
    if (prunePlan) showDryRun({ plan: prunePlan, title: `prune ${path ?? ''}`.trim() });
    showDryRun({ plan: launchPlan, title: `launch ${path ?? ''}`.trim() });
    return true;
  }

  if (prunePlan && !(await confirmPrune(prunePlan, options.yes))) {
    console.log(chalk.yellow('Launch cancelled.'));
    return true;
  }

  const result = await withInterrupt((signal) =>
    launchStacks({
      stacks,
      path,
      ignoreDependencies,
      prune: prunePlan !== null,
      ...executionFor({ project, operation: 'launch', options, signal }),
      pruneCallbacks: progressCallbacks('delete'),
    })
  );

  if (result.prune) printSummary({ report: result.prune });
  if (result.launch) {
    printSummary({ report: result.launch });
  } else {
    console.error(chalk.red('Prune failed; not launching.'));
  }
  return !result.hasFailures;
};
