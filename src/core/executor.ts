import PQueue from 'p-queue';
import type {
  CompletedOutcome,
  ExecutionReport,
  FailedOutcome,
  NodeState,
  Operation,
  OperationResult,
  Stack,
  StackOutcome,
} from '../types/index.js';
import { errorMessageOf, failureReasonOf } from './errors.js';
import type { Plan } from './plan.js';

export interface ExecutionCallbacks {
  onStackStart?: (stackId: string) => void;
  onStackComplete?: (stackId: string, outcome: CompletedOutcome) => void;
  onStackFailed?: (stackId: string, outcome: FailedOutcome) => void;
}

export type StackRunner = (input: {
  stack: Stack;
  operation: Operation;
}) => Promise<OperationResult>;

interface ExecutePlanOptions {
  plan: Plan;
  runStack: StackRunner;
  /** Upper bound on stacks running at once; unset, zero or negative means unbounded. */
  maxConcurrency?: number;
  /** Once aborted, no further stack starts; running stacks finish. */
  signal?: AbortSignal;
  callbacks?: ExecutionCallbacks;
}

export const normalizeConcurrency = (maxConcurrency?: number): number =>
  maxConcurrency !== undefined && Number.isFinite(maxConcurrency) && maxConcurrency >= 1
    ? Math.floor(maxConcurrency)
    : Number.POSITIVE_INFINITY;

/**
 * Execute an operation over every stack of a plan.
 *
 * A stack starts once all of its prerequisites in the plan graph have
 * completed; independent stacks run concurrently, bounded by maxConcurrency.
 * A failed stack fails everything waiting on it without running it. The
 * returned report holds one outcome per stack; the run itself only rejects
 * on a programming error in a callback.
 */
export const executePlan = ({
  plan,
  runStack,
  maxConcurrency,
  signal,
  callbacks,
}: ExecutePlanOptions): Promise<ExecutionReport> => {
  const { graph, operation } = plan;
  const states = new Map<string, NodeState>();
  const outcomes = new Map<string, StackOutcome>();

  graph.forEach((_, stackId) => states.set(stackId, 'pending'));

  const queue = new PQueue({ concurrency: normalizeConcurrency(maxConcurrency) });

  // State transitions below run synchronously between awaits, so readiness
  // checks from sibling completions never interleave.
  return new Promise<ExecutionReport>((resolve, reject) => {
    const isTerminal = (stackId: string): boolean => {
      const state = states.get(stackId);
      return state === 'complete' || state === 'failed';
    };

    const finishIfDone = (): void => {
      if (outcomes.size < graph.size) return;
      signal?.removeEventListener('abort', onAbort);
      resolve({
        operation,
        outcomes,
        hasFailures: [...outcomes.values()].some((outcome) => outcome.state === 'failed'),
      });
    };

    const fail = (outcome: FailedOutcome): void => {
      const { stackId } = outcome;
      if (isTerminal(stackId)) return;

      states.set(stackId, 'failed');
      outcomes.set(stackId, outcome);
      callbacks?.onStackFailed?.(stackId, outcome);

      graph.get(stackId)?.dependentStackIds.forEach((dependentId) => {
        if (states.get(dependentId) !== 'pending') return;
        const cancelled = outcome.reason === 'cancelled';
        fail({
          stackId: dependentId,
          state: 'failed',
          reason: cancelled ? 'cancelled' : 'upstream-failed',
          message: cancelled
            ? 'Cancelled before it started.'
            : `Not run because dependency '${stackId}' failed.`,
          failedDependencyIds: [stackId],
          durationMs: 0,
        });
      });
    };

    const cancel = (stackId: string): void => {
      fail({
        stackId,
        state: 'failed',
        reason: 'cancelled',
        message: 'Cancelled before it started.',
        durationMs: 0,
      });
    };

    const isReady = (stackId: string): boolean =>
      (graph.get(stackId)?.dependsOnStackIds ?? []).every(
        (depId) => states.get(depId) === 'complete'
      );

    const run = async (stackId: string): Promise<void> => {
      if (signal?.aborted || states.get(stackId) !== 'ready') {
        cancel(stackId);
        finishIfDone();
        return;
      }

      const stack = plan.stacks.get(stackId);
      states.set(stackId, 'running');
      callbacks?.onStackStart?.(stackId);
      const startTime = Date.now();

      try {
        if (!stack) {
          throw new Error(`Stack '${stackId}' is not part of the plan.`);
        }
        const result = await runStack({ stack, operation });
        const durationMs = Date.now() - startTime;

        if (result.status === 'complete') {
          complete({ stackId, state: 'complete', result, durationMs });
        } else {
          fail({
            stackId,
            state: 'failed',
            reason: result.timedOut ? 'timeout' : 'operation-error',
            message: result.timedOut
              ? `Timed out; stack is '${result.status}'.`
              : `Stack finished in status '${result.status}'.`,
            durationMs,
          });
        }
      } catch (error) {
        fail({
          stackId,
          state: 'failed',
          reason: failureReasonOf(error),
          message: errorMessageOf(error),
          error: error instanceof Error ? error : undefined,
          durationMs: Date.now() - startTime,
        });
      }

      finishIfDone();
    };

    const schedule = (stackId: string): void => {
      if (signal?.aborted) {
        cancel(stackId);
        return;
      }
      states.set(stackId, 'ready');
      queue.add(() => run(stackId)).catch(reject);
    };

    const complete = (outcome: CompletedOutcome): void => {
      const { stackId } = outcome;
      states.set(stackId, 'complete');
      outcomes.set(stackId, outcome);
      callbacks?.onStackComplete?.(stackId, outcome);

      graph.get(stackId)?.dependentStackIds.forEach((dependentId) => {
        if (states.get(dependentId) === 'pending' && isReady(dependentId)) {
          schedule(dependentId);
        }
      });
    };

    function onAbort(): void {
      queue.clear();
      states.forEach((state, stackId) => {
        if (state === 'pending' || state === 'ready') cancel(stackId);
      });
      finishIfDone();
    }

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    [...graph.keys()].filter(isReady).forEach(schedule);
    finishIfDone();
  });
};
