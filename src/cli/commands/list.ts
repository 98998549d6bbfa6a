import chalk from 'chalk';
import type { Stack } from '../../types/index.js';
import { findRootStacks, getLaunchOrder, type StackGraph } from '../../core/dependency-graph.js';
import { planOperation } from '../../core/launcher.js';
import type { GlobalOptions } from '../options.js';
import { loadProject } from '../project.js';

const STACK_FLAGS = ['active', 'protected', 'ignored', 'obsolete'] as const;

type StackFlag = (typeof STACK_FLAGS)[number];

const FLAG_ICONS: Record<StackFlag, string> = {
  active: '●',
  protected: '◉',
  ignored: '○',
  obsolete: '✗',
};

const FLAG_COLORS: Record<StackFlag, (text: string) => string> = {
  active: chalk.green,
  protected: chalk.yellow,
  ignored: chalk.dim,
  obsolete: chalk.red,
};

const flagOf = (stack: Stack | undefined): StackFlag => {
  if (stack?.obsolete) return 'obsolete';
  if (stack?.ignore) return 'ignored';
  if (stack?.protect) return 'protected';
  return 'active';
};

interface TreeNode {
  stackId: string;
  flag: StackFlag;
  children: TreeNode[];
}

const MAX_TREE_DEPTH = 10;
const MAX_STACKS_FOR_TREE = 30;

/**
 * Tree from the root stacks down to the stacks that depend on them. A stack
 * reachable from several parents is shown under the first one only.
 */
export const buildTree = ({
  graph,
  stacks,
}: {
  graph: StackGraph;
  stacks: ReadonlyMap<string, Stack>;
}): TreeNode[] => {
  const shownInTree = new Set<string>();

  const buildNode = (stackId: string, depth: number): TreeNode | null => {
    if (shownInTree.has(stackId) || depth > MAX_TREE_DEPTH) return null;
    shownInTree.add(stackId);

    const children = [...(graph.get(stackId)?.dependentStackIds ?? [])]
      .sort()
      .map((dependentId) => buildNode(dependentId, depth + 1))
      .filter((node): node is TreeNode => node !== null);

    return { stackId, flag: flagOf(stacks.get(stackId)), children };
  };

  return findRootStacks({ graph })
    .map((rootId) => buildNode(rootId, 0))
    .filter((node): node is TreeNode => node !== null);
};

/**
 * Render tree nodes with box-drawing connectors
 */
export const renderTree = ({
  nodes,
  prefix = '',
}: {
  nodes: TreeNode[];
  prefix?: string;
}): string[] =>
  nodes.flatMap((node, index) => {
    const isLast = index === nodes.length - 1;
    const connector = prefix === '' ? '' : isLast ? '└─ ' : '├─ ';
    const icon = FLAG_COLORS[node.flag](FLAG_ICONS[node.flag]);
    const line = `${prefix}${connector}${icon} ${node.stackId}`;

    const childPrefix = prefix === '' ? '  ' : `${prefix}${isLast ? '   ' : '│  '}`;
    return [line, ...renderTree({ nodes: node.children, prefix: childPrefix })];
  });

const renderFlatList = ({
  graph,
  stacks,
}: {
  graph: StackGraph;
  stacks: ReadonlyMap<string, Stack>;
}): string[] => {
  const lines = [chalk.dim('Stacks in launch order:'), ''];
  let position = 0;

  getLaunchOrder({ graph }).forEach((batch) => {
    batch.forEach((stackId) => {
      position += 1;
      const flag = flagOf(stacks.get(stackId));
      const deps = graph.get(stackId)?.dependsOnStackIds.length ?? 0;
      lines.push(
        `${chalk.dim(`${position.toString().padStart(3)}.`)} ${FLAG_COLORS[flag](FLAG_ICONS[flag])} ${stackId}${deps > 0 ? chalk.dim(` (${deps} deps)`) : ''}`
      );
    });
  });

  return lines;
};

/**
 * Show the stacks under a path and how they depend on each other
 */
export const listCommand = async ({
  path,
  global,
}: {
  path?: string;
  global: GlobalOptions;
}): Promise<boolean> => {
  const project = await loadProject({ projectDir: global.projectDir });

  if (project.stacks.length === 0) {
    console.log(chalk.gray('No stacks found.'));
    console.log();
    console.log(`Add one under: ${chalk.cyan(project.settings.configDir)}`);
    return true;
  }

  const { graph, stacks } = planOperation({
    stacks: project.stacks,
    path,
    operation: 'launch',
  });

  console.log(chalk.bold(path ? `Stacks: ${path}` : 'Stacks:'));
  console.log();

  const lines =
    graph.size > MAX_STACKS_FOR_TREE
      ? renderFlatList({ graph, stacks })
      : renderTree({ nodes: buildTree({ graph, stacks }) });
  lines.forEach((line) => console.log(line));

  console.log();
  console.log(chalk.dim('Legend:'));
  console.log(
    `  ${STACK_FLAGS.map((flag) => `${FLAG_COLORS[flag](FLAG_ICONS[flag])} ${flag}`)
      .join('  ')}`
  );
  return true;
};
