import type { ExecutionReport, Operation, Stack } from '../types/index.js';
import { buildStackGraph } from './dependency-graph.js';
import { CannotPruneStackError } from './errors.js';
import { executePlan, type ExecutionCallbacks, type StackRunner } from './executor.js';
import { buildPlan, selectScope, type Plan } from './plan.js';

interface PlanOptions {
  stacks: Stack[];
  /** Stack id, stack group, or empty for the whole project. */
  path?: string;
  ignoreDependencies?: boolean;
}

interface ExecuteOptions {
  runStack: StackRunner;
  maxConcurrency?: number;
  signal?: AbortSignal;
  callbacks?: ExecutionCallbacks;
}

export interface LaunchReport {
  prune: ExecutionReport | null;
  launch: ExecutionReport | null;
  hasFailures: boolean;
}

/**
 * Plan an operation on every stack under a path
 */
export const planOperation = ({
  stacks,
  path,
  operation,
  ignoreDependencies = false,
}: PlanOptions & { operation: Operation }): Plan => {
  const scope = selectScope({ stacks, path });
  return buildPlan({ stacks, scope: scope.stackIds, operation, ignoreDependencies });
};

/**
 * Plan the deletion of every obsolete stack under a path, or null when there
 * is none. A stack that is kept may not depend on one that is pruned.
 */
export const planPrune = ({
  stacks,
  path,
  ignoreDependencies = false,
}: PlanOptions): Plan | null => {
  const scope = selectScope({ stacks, path });
  const byId = new Map(stacks.map((stack) => [stack.stackId, stack]));
  const obsoleteIds = scope.stackIds.filter((stackId) => byId.get(stackId)?.obsolete);
  if (obsoleteIds.length === 0) return null;

  if (!ignoreDependencies) {
    const graph = buildStackGraph({ stacks });
    obsoleteIds.forEach((stackId) => {
      const keptDependents = (graph.get(stackId)?.dependentStackIds ?? []).filter(
        (dependentId) => !byId.get(dependentId)?.obsolete
      );
      if (keptDependents.length > 0) {
        throw new CannotPruneStackError(stackId, keptDependents.sort());
      }
    });
  }

  return buildPlan({ stacks, scope: obsoleteIds, operation: 'delete', ignoreDependencies: true });
};

/**
 * Plan a launch. For a stack group or the whole project, ignored and
 * obsolete stacks are left out; naming a stack directly launches it anyway.
 */
export const planLaunch = ({ stacks, path, ignoreDependencies = false }: PlanOptions): Plan => {
  const scope = selectScope({ stacks, path });
  return buildPlan({
    stacks,
    scope: scope.stackIds,
    operation: 'launch',
    ignoreDependencies,
    exclude: scope.bulk ? (stack) => stack.ignore || stack.obsolete : undefined,
  });
};

export const runStacks = ({
  stacks,
  path,
  operation,
  ignoreDependencies,
  ...execution
}: PlanOptions & ExecuteOptions & { operation: Operation }): Promise<ExecutionReport> =>
  executePlan({
    plan: planOperation({ stacks, path, operation, ignoreDependencies }),
    ...execution,
  });

/**
 * Delete obsolete stacks, dependents first
 */
export const pruneStacks = async ({
  stacks,
  path,
  ignoreDependencies,
  ...execution
}: PlanOptions & ExecuteOptions): Promise<ExecutionReport | null> => {
  const plan = planPrune({ stacks, path, ignoreDependencies });
  return plan ? executePlan({ plan, ...execution }) : null;
};

/**
 * Launch every stack under a path, optionally pruning obsolete stacks first.
 * Both plans are validated before anything runs; a failed prune stops the
 * launch from starting. `pruneCallbacks` replace `callbacks` for the prune.
 */
export const launchStacks = async ({
  stacks,
  path,
  ignoreDependencies,
  prune = false,
  pruneCallbacks,
  ...execution
}: PlanOptions &
  ExecuteOptions & { prune?: boolean; pruneCallbacks?: ExecutionCallbacks }): Promise<LaunchReport> => {
  const prunePlan = prune ? planPrune({ stacks, path, ignoreDependencies }) : null;
  const launchPlan = planLaunch({ stacks, path, ignoreDependencies });

  const pruneReport = prunePlan
    ? await executePlan({
        plan: prunePlan,
        ...execution,
        callbacks: pruneCallbacks ?? execution.callbacks,
      })
    : null;
  if (pruneReport?.hasFailures) {
    return { prune: pruneReport, launch: null, hasFailures: true };
  }

  const launchReport = await executePlan({ plan: launchPlan, ...execution });
  return { prune: pruneReport, launch: launchReport, hasFailures: launchReport.hasFailures };
};
