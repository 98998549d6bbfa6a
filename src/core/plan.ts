import { OPERATIONS, type Operation, type Stack } from '../types/index.js';
import {
  buildStackGraph,
  collectAncestors,
  collectDescendants,
  filterGraph,
  reverseGraph,
  type StackGraph,
} from './dependency-graph.js';
import { CannotSkipDependencyError, UnknownPathError } from './errors.js';
import { indexStacks } from './stack.js';
import { normalizeStackId } from './stack-id.js';

export interface CommandScope {
  path: string;
  stackIds: string[];
  /** A group or the whole project, as opposed to one named stack. */
  bulk: boolean;
}

export interface Plan {
  operation: Operation;
  reverse: boolean;
  /** Executable graph: each node's dependsOnStackIds must complete first. */
  graph: StackGraph;
  /** Every stack in the project, for cross-stack lookups. */
  stacks: ReadonlyMap<string, Stack>;
}

/**
 * Resolve a command path to the stacks it names: a single stack, a stack
 * group (every stack below it) or, for an empty path, the whole project
 */
export const selectScope = ({
  stacks,
  path = '',
}: {
  stacks: Stack[];
  path?: string;
}): CommandScope => {
  const normalized = path.trim() === '' ? '' : normalizeStackId(path);
  const allIds = stacks.map((stack) => stack.stackId).sort();

  if (normalized === '' || normalized === '.') {
    return { path, stackIds: allIds, bulk: true };
  }

  if (allIds.includes(normalized)) {
    return { path, stackIds: [normalized], bulk: false };
  }

  const groupIds = allIds.filter((stackId) => stackId.startsWith(`${normalized}/`));
  if (groupIds.length === 0) {
    throw new UnknownPathError(path);
  }

  return { path, stackIds: groupIds, bulk: true };
};

/**
 * Compute the executable sub-graph for an operation on a scope.
 *
 * The scope is widened to every dependency (or, for destructive operations,
 * every dependent) unless ignoreDependencies is set. Stacks matched by
 * `exclude` are then dropped; dropping a stack that a remaining stack still
 * has to wait for is a configuration error.
 */
export const buildPlan = ({
  stacks,
  scope,
  operation,
  ignoreDependencies = false,
  exclude,
}: {
  stacks: Stack[];
  scope: Iterable<string>;
  operation: Operation;
  ignoreDependencies?: boolean;
  exclude?: (stack: Stack) => boolean;
}): Plan => {
  const stackMap = indexStacks({ stacks });
  const fullGraph = buildStackGraph({ stacks });
  const { reverse } = OPERATIONS[operation];

  const selected = new Set<string>();
  for (const stackId of scope) {
    if (!stackMap.has(stackId)) throw new UnknownPathError(stackId);
    selected.add(stackId);
  }

  if (!ignoreDependencies) {
    const related = reverse
      ? collectDescendants({ graph: fullGraph, stackIds: selected })
      : collectAncestors({ graph: fullGraph, stackIds: selected });
    related.forEach((stackId) => selected.add(stackId));
  }

  const directedGraph = reverse ? reverseGraph({ graph: fullGraph }) : fullGraph;

  const excludedIds = [...selected].filter((stackId) => {
    const stack = stackMap.get(stackId);
    return stack !== undefined && exclude !== undefined && exclude(stack);
  });
  const keptIds = new Set([...selected].filter((stackId) => !excludedIds.includes(stackId)));

  if (!ignoreDependencies) {
    excludedIds.forEach((excludedId) => {
      const waitingIds = [...keptIds].filter((stackId) =>
        directedGraph.get(stackId)?.dependsOnStackIds.includes(excludedId)
      );
      if (waitingIds.length > 0) {
        throw new CannotSkipDependencyError(excludedId, waitingIds.sort());
      }
    });
  }

  return {
    operation,
    reverse,
    graph: filterGraph({ graph: directedGraph, stackIds: keptIds }),
    stacks: stackMap,
  };
};
