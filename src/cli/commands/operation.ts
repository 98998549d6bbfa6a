import chalk from 'chalk';
import { dump as toYaml } from 'js-yaml';
import type { ExecutionReport, Operation } from '../../types/index.js';
import { planOperation } from '../../core/launcher.js';
import { isStackDiff } from '../../core/stack-diff.js';
import type { GlobalOptions, RunOptions } from '../options.js';
import { createProjectActions, loadProject } from '../project.js';
import { renderStackDiff } from './diff.js';
import { confirmRun, executeWithProgress, printSummary, showDryRun, withInterrupt } from './run.js';

const printYaml = (stackId: string, data: unknown): void => {
  console.log(chalk.bold(`${stackId}:`));
  console.log(
    toYaml(data, { skipInvalid: true, noRefs: true })
      .trimEnd()
      .split('\n')
      .map((line) => `  ${line}`)
      .join('\n')
  );
};

const PRESENTERS: Partial<Record<Operation, (stackId: string, data: unknown) => void>> = {
  describe: (stackId, data) =>
    data === null ? console.log(`${chalk.bold(`${stackId}:`)} ${chalk.dim('not deployed')}`) : printYaml(stackId, data),
  describeOutputs: (stackId, data) =>
    data === null ? console.log(`${chalk.bold(`${stackId}:`)} ${chalk.dim('not deployed')}`) : printYaml(stackId, data),
  getStatus: (stackId, data) => console.log(`${stackId}: ${String(data)}`),
  validate: printYaml,
  dumpConfig: printYaml,
  generate: (stackId, data) => {
    console.log(chalk.dim(`# ${stackId}`));
    console.log(String(data).trimEnd());
  },
  diff: (stackId, data) => {
    if (isStackDiff(data)) console.log(renderStackDiff({ stackId, diff: data }).join('\n'));
  },
};

const printResults = ({ report }: { report: ExecutionReport }): void => {
  const present = PRESENTERS[report.operation];
  if (!present) return;

  [...report.outcomes.values()]
    .sort((a, b) => a.stackId.localeCompare(b.stackId))
    .forEach((outcome) => {
      if (outcome.state === 'complete') present(outcome.stackId, outcome.result.data);
    });
};

/**
 * Run one operation over every stack under a path. Resolves to false when a
 * stack failed.
 */
export const operationCommand = async ({
  operation,
  path,
  options,
  global,
}: {
  operation: Operation;
  path?: string;
  options: RunOptions;
  global: GlobalOptions;
}): Promise<boolean> => {
  const project = await loadProject({ projectDir: global.projectDir });
  const plan = planOperation({
    stacks: project.stacks,
    path,
    operation,
    ignoreDependencies: options.ignoreDependencies,
  });

  if (options.dryRun) {
    showDryRun({ plan, title: `${operation} ${path ?? ''}`.trim() });
    return true;
  }

  if (operation === 'delete') {
    const confirmed = await confirmRun({
      message: 'The following stacks will be deleted:',
      stackIds: [...plan.graph.keys()].sort(),
      yes: options.yes,
    });
    if (!confirmed) {
      console.log(chalk.yellow('Nothing deleted.'));
      return true;
    }
  }

  const actions = createProjectActions({
    project,
    operation,
    noPlaceholders: !options.placeholders,
  });
  const report = await withInterrupt((signal) =>
    executeWithProgress({
      plan,
      actions,
      maxConcurrency: options.maxConcurrency ?? project.settings.maxConcurrency,
      signal,
    })
  );

  printResults({ report });
  printSummary({ report });
  return !report.hasFailures;
};
