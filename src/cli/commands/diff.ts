import chalk from 'chalk';
import type { ChangeKind, StackDiff, ValueChange } from '../../core/stack-diff.js';

const MARKS: Record<ChangeKind, () => string> = {
  added: () => chalk.green('+'),
  removed: () => chalk.red('-'),
  modified: () => chalk.yellow('~'),
};

const describeValue = ({ key, change, deployed, generated }: ValueChange): string => {
  if (change === 'added') return `${MARKS.added()} ${key}: ${generated ?? ''}`;
  if (change === 'removed') return `${MARKS.removed()} ${key}: ${deployed ?? ''}`;
  return `${MARKS.modified()} ${key}: ${deployed ?? ''} -> ${generated ?? ''}`;
};

/**
 * Lines describing one stack's diff, a heading followed by one line per
 * changed template entry, parameter or tag
 */
export const renderStackDiff = ({ stackId, diff }: { stackId: string; diff: StackDiff }): string[] => {
  const heading = chalk.bold(`${stackId}:`);
  if (!diff.hasChanges) return [`${heading} ${chalk.dim('no changes')}`];

  const sections: Array<[string, string[]]> = [
    ['template', diff.template.map(({ path, change }) => `${MARKS[change]()} ${path}`)],
    ['parameters', diff.parameters.map(describeValue)],
    ['tags', diff.tags.map(describeValue)],
  ];

  return [
    diff.deployed ? heading : `${heading} ${chalk.dim('not deployed')}`,
    ...sections
      .filter(([, lines]) => lines.length > 0)
      .flatMap(([title, lines]) => [`  ${title}`, ...lines.map((line) => `    ${line}`)]),
  ];
};
