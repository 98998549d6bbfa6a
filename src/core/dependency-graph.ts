import type { Stack } from '../types/index.js';
import { CircularDependencyError, UnknownDependencyError } from './errors.js';

export interface DependencyNode {
  stackId: string;
  dependsOnStackIds: string[];
  dependentStackIds: string[];
}

/** Edges point from a stack to the stacks that must finish first. */
export type StackGraph = ReadonlyMap<string, Readonly<DependencyNode>>;

interface TopologicalSortResult {
  sortedStackIds: string[];
  hasCycle: boolean;
  cycleNodes?: string[];
}

/**
 * Detect cycles in the dependency graph using DFS. The cycle is reported in
 * dependency order with its first stack repeated at the end.
 */
export const detectCycle = ({
  graph,
}: {
  graph: StackGraph;
}): { hasCycle: boolean; cycleNodes: string[] } => {
  const visited = new Set<string>();
  const cycleNodes: string[] = [];

  const dfs = (nodeId: string, path: string[]): boolean => {
    visited.add(nodeId);

    const node = graph.get(nodeId);
    if (!node) return false;

    for (const depId of node.dependsOnStackIds) {
      if (path.includes(depId)) {
        // Found a cycle
        const cycleStart = path.indexOf(depId);
        cycleNodes.push(...path.slice(cycleStart), depId);
        return true;
      }
      if (!visited.has(depId) && dfs(depId, [...path, depId])) {
        return true;
      }
    }

    return false;
  };

  for (const nodeId of [...graph.keys()].sort()) {
    if (!visited.has(nodeId) && dfs(nodeId, [nodeId])) {
      return { hasCycle: true, cycleNodes };
    }
  }

  return { hasCycle: false, cycleNodes: [] };
};

/**
 * Build the dependency graph of every stack in the project. Throws when a
 * dependency names an unknown stack or when the dependencies form a cycle.
 */
export const buildStackGraph = ({ stacks }: { stacks: Stack[] }): StackGraph => {
  const graph = new Map<string, DependencyNode>();

  // Initialize nodes for all stacks
  stacks.forEach((stack) => {
    graph.set(stack.stackId, {
      stackId: stack.stackId,
      dependsOnStackIds: [],
      dependentStackIds: [],
    });
  });

  // Build edges from declared and inferred dependencies
  stacks.forEach((stack) => {
    const node = graph.get(stack.stackId);
    if (!node) return;

    const dependencies = [...new Set(stack.dependencies)].filter(
      (depId) => depId !== stack.stackId
    );

    dependencies.forEach((depId) => {
      const depNode = graph.get(depId);
      if (!depNode) {
        throw new UnknownDependencyError(stack.stackId, depId);
      }
      node.dependsOnStackIds.push(depId);
      depNode.dependentStackIds.push(stack.stackId);
    });
  });

  const { hasCycle, cycleNodes } = detectCycle({ graph });
  if (hasCycle) {
    throw new CircularDependencyError(cycleNodes);
  }

  return graph;
};

/**
 * Swap edge direction: a stack then waits for everything that depends on it
 */
export const reverseGraph = ({ graph }: { graph: StackGraph }): StackGraph => {
  const reversed = new Map<string, DependencyNode>();

  graph.forEach((node, stackId) => {
    reversed.set(stackId, {
      stackId,
      dependsOnStackIds: [...node.dependentStackIds],
      dependentStackIds: [...node.dependsOnStackIds],
    });
  });

  return reversed;
};

const walk = ({
  graph,
  stackIds,
  next,
}: {
  graph: StackGraph;
  stackIds: Iterable<string>;
  next: (node: Readonly<DependencyNode>) => string[];
}): Set<string> => {
  const reached = new Set<string>();
  const stack = [...stackIds];

  while (stack.length > 0) {
    const stackId = stack.pop();
    if (stackId === undefined) continue;

    const node = graph.get(stackId);
    if (!node) continue;

    next(node).forEach((nextId) => {
      if (!reached.has(nextId)) {
        reached.add(nextId);
        stack.push(nextId);
      }
    });
  }

  return reached;
};

/**
 * Every stack the given stacks transitively depend on
 */
export const collectAncestors = ({
  graph,
  stackIds,
}: {
  graph: StackGraph;
  stackIds: Iterable<string>;
}): Set<string> => walk({ graph, stackIds, next: (node) => node.dependsOnStackIds });

/**
 * Every stack that transitively depends on the given stacks
 */
export const collectDescendants = ({
  graph,
  stackIds,
}: {
  graph: StackGraph;
  stackIds: Iterable<string>;
}): Set<string> => walk({ graph, stackIds, next: (node) => node.dependentStackIds });

/**
 * Sub-graph induced by a set of stacks; edges leaving the set are dropped
 */
export const filterGraph = ({
  graph,
  stackIds,
}: {
  graph: StackGraph;
  stackIds: ReadonlySet<string>;
}): StackGraph => {
  const filtered = new Map<string, DependencyNode>();

  graph.forEach((node, stackId) => {
    if (!stackIds.has(stackId)) return;
    filtered.set(stackId, {
      stackId,
      dependsOnStackIds: node.dependsOnStackIds.filter((id) => stackIds.has(id)),
      dependentStackIds: node.dependentStackIds.filter((id) => stackIds.has(id)),
    });
  });

  return filtered;
};

/**
 * Perform topological sort using Kahn's algorithm
 */
export const topologicalSort = ({ graph }: { graph: StackGraph }): TopologicalSortResult => {
  const cycleResult = detectCycle({ graph });
  if (cycleResult.hasCycle) {
    return {
      sortedStackIds: [],
      hasCycle: true,
      cycleNodes: cycleResult.cycleNodes,
    };
  }

  const inDegree = new Map<string, number>();
  const sortedStackIds: string[] = [];

  graph.forEach((node, nodeId) => {
    inDegree.set(nodeId, node.dependsOnStackIds.length);
  });

  // Find nodes with no dependencies (in-degree = 0)
  const queue: string[] = [];
  inDegree.forEach((degree, nodeId) => {
    if (degree === 0) {
      queue.push(nodeId);
    }
  });
  queue.sort();

  // Process nodes in topological order
  while (queue.length > 0) {
    const nodeId = queue.shift();
    if (!nodeId) continue;

    sortedStackIds.push(nodeId);

    const node = graph.get(nodeId);
    if (!node) continue;

    // Reduce in-degree of dependent nodes
    node.dependentStackIds.forEach((depId) => {
      const newDegree = (inDegree.get(depId) ?? 0) - 1;
      inDegree.set(depId, newDegree);

      if (newDegree === 0) {
        queue.push(depId);
      }
    });
  }

  return {
    sortedStackIds,
    hasCycle: false,
  };
};

/**
 * Group stacks into batches where each batch only depends on earlier ones
 */
export const getLaunchOrder = ({ graph }: { graph: StackGraph }): string[][] => {
  const { sortedStackIds } = topologicalSort({ graph });
  const depth = new Map<string, number>();
  const batches: string[][] = [];

  sortedStackIds.forEach((stackId) => {
    const node = graph.get(stackId);
    const level = Math.max(
      -1,
      ...(node?.dependsOnStackIds ?? []).map((depId) => depth.get(depId) ?? 0)
    ) + 1;
    depth.set(stackId, level);
    (batches[level] ??= []).push(stackId);
  });

  return batches.map((batch) => batch.sort());
};

/**
 * Find root stacks (stacks with no dependencies in the graph)
 */
export const findRootStacks = ({ graph }: { graph: StackGraph }): string[] => {
  const rootStackIds: string[] = [];

  graph.forEach((node, nodeId) => {
    if (node.dependsOnStackIds.length === 0) {
      rootStackIds.push(nodeId);
    }
  });

  return rootStackIds.sort();
};
