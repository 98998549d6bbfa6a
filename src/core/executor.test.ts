import { describe, it, expect, vi } from 'vitest';
import type {
  FailedOutcome,
  Operation,
  OperationResult,
  Stack,
  StackConfigInput,
  StackOutcome,
} from '../types/index.js';
import { ProviderError, ResolutionError } from './errors.js';
import { executePlan, normalizeConcurrency, type StackRunner } from './executor.js';
import { buildPlan, type Plan } from './plan.js';
import { createStack } from './stack.js';

const stack = (stackId: string, dependencies: string[] = [], config: StackConfigInput = {}): Stack =>
  createStack({ stackId, config: { ...config, dependencies } });

const planFor = (stacks: Stack[], operation: Operation = 'launch'): Plan =>
  buildPlan({ stacks, scope: stacks.map((s) => s.stackId), operation });

const complete: OperationResult = { status: 'complete' };

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const failedOutcome = (outcome: StackOutcome | undefined): FailedOutcome => {
  if (outcome?.state === 'failed') return outcome;
  throw new Error(`Expected a failed outcome, got ${JSON.stringify(outcome)}`);
};

describe('normalizeConcurrency', () => {
  it('treats missing, zero and negative values as unbounded', () => {
    expect(normalizeConcurrency()).toBe(Number.POSITIVE_INFINITY);
    expect(normalizeConcurrency(0)).toBe(Number.POSITIVE_INFINITY);
    expect(normalizeConcurrency(-2)).toBe(Number.POSITIVE_INFINITY);
    expect(normalizeConcurrency(3)).toBe(3);
  });
});

describe('executePlan', () => {
  it('runs each stack after its dependencies', async () => {
    const events: string[] = [];
    const runStack: StackRunner = async ({ stack: target }) => {
      events.push(`start:${target.stackId}`);
      await delay(1);
      events.push(`end:${target.stackId}`);
      return complete;
    };

    const report = await executePlan({
      plan: planFor([stack('a'), stack('b', ['a']), stack('c', ['b'])]),
      runStack,
    });

    expect(events).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
    expect(report.hasFailures).toBe(false);
    expect([...report.outcomes.values()].map((outcome) => outcome.state)).toEqual([
      'complete',
      'complete',
      'complete',
    ]);
  });

  it('runs dependents before their dependencies when deleting', async () => {
    const started: string[] = [];
    const runStack: StackRunner = async ({ stack: target, operation }) => {
      started.push(`${operation}:${target.stackId}`);
      return complete;
    };

    await executePlan({ plan: planFor([stack('vpc'), stack('app', ['vpc'])], 'delete'), runStack });

    expect(started).toEqual(['delete:app', 'delete:vpc']);
  });

  it('fails everything downstream of a failed stack without running it', async () => {
    const runStack = vi.fn<StackRunner>(async ({ stack: target }) => {
      if (target.stackId === 'a') throw new Error('boom');
      return complete;
    });

    const report = await executePlan({
      plan: planFor([stack('a'), stack('b', ['a']), stack('c', ['b']), stack('x')]),
      runStack,
    });

    expect(runStack.mock.calls.map(([input]) => input.stack.stackId).sort()).toEqual(['a', 'x']);
    expect(report.hasFailures).toBe(true);
    expect(report.outcomes.get('x')?.state).toBe('complete');

    const a = failedOutcome(report.outcomes.get('a'));
    expect(a.reason).toBe('operation-error');
    expect(a.message).toBe('boom');

    const b = failedOutcome(report.outcomes.get('b'));
    expect(b.reason).toBe('upstream-failed');
    expect(b.failedDependencyIds).toEqual(['a']);
    expect(b.message).toBe("Not run because dependency 'a' failed.");

    const c = failedOutcome(report.outcomes.get('c'));
    expect(c.reason).toBe('upstream-failed');
    expect(c.failedDependencyIds).toEqual(['b']);
  });

  it('runs a stack with several dependencies once, after all of them', async () => {
    const events: string[] = [];
    const runStack = vi.fn<StackRunner>(async ({ stack: target }) => {
      events.push(target.stackId);
      await delay(target.stackId === 'b' ? 5 : 1);
      return complete;
    });

    await executePlan({
      plan: planFor([stack('a'), stack('b', ['a']), stack('c', ['a']), stack('d', ['b', 'c'])]),
      runStack,
    });

    expect(runStack).toHaveBeenCalledTimes(4);
    expect(events[0]).toBe('a');
    expect(events[3]).toBe('d');
  });

  it('runs independent stacks concurrently unless limited', async () => {
    const measure = async (maxConcurrency?: number): Promise<number> => {
      let active = 0;
      let peak = 0;
      const runStack: StackRunner = async () => {
        active += 1;
        peak = Math.max(peak, active);
        await delay(5);
        active -= 1;
        return complete;
      };
      await executePlan({
        plan: planFor([stack('x'), stack('y'), stack('z')]),
        runStack,
        maxConcurrency,
      });
      return peak;
    };

    expect(await measure()).toBe(3);
    expect(await measure(1)).toBe(1);
    expect(await measure(0)).toBe(3);
  });

  it('treats a result that is not complete as a failure', async () => {
    const runStack: StackRunner = async ({ stack: target }) =>
      target.stackId === 'slow'
        ? { status: 'in-progress', timedOut: true }
        : { status: 'failed' };

    const report = await executePlan({
      plan: planFor([stack('slow'), stack('broken')]),
      runStack,
    });

    const slow = failedOutcome(report.outcomes.get('slow'));
    expect(slow.reason).toBe('timeout');
    expect(slow.message).toBe("Timed out; stack is 'in-progress'.");

    const broken = failedOutcome(report.outcomes.get('broken'));
    expect(broken.reason).toBe('operation-error');
    expect(broken.message).toBe("Stack finished in status 'failed'.");
  });

  it('classifies resolution errors', async () => {
    const report = await executePlan({
      plan: planFor([stack('a')]),
      runStack: async () => {
        throw new ResolutionError('no such output');
      },
    });

    expect(failedOutcome(report.outcomes.get('a')).reason).toBe('resolution-error');
  });

  it('classifies provider errors and other thrown errors', async () => {
    const report = await executePlan({
      plan: planFor([stack('a'), stack('b')]),
      runStack: async ({ stack: target }) => {
        if (target.stackId === 'a') throw new ProviderError('Throttling', 'Rate exceeded');
        throw new Error('Timed out waiting');
      },
    });

    expect(failedOutcome(report.outcomes.get('a')).reason).toBe('provider-error');
    expect(failedOutcome(report.outcomes.get('b')).reason).toBe('operation-error');
  });

  it('starts nothing new once aborted and lets running stacks finish', async () => {
    const controller = new AbortController();
    const runStack = vi.fn<StackRunner>(async () => {
      controller.abort();
      await delay(1);
      return complete;
    });

    const report = await executePlan({
      plan: planFor([stack('a'), stack('b', ['a'])]),
      runStack,
      signal: controller.signal,
    });

    expect(runStack).toHaveBeenCalledTimes(1);
    expect(report.outcomes.get('a')?.state).toBe('complete');
    const b = failedOutcome(report.outcomes.get('b'));
    expect(b.reason).toBe('cancelled');
    expect(b.message).toBe('Cancelled before it started.');
  });

  it('cancels every stack when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const runStack = vi.fn<StackRunner>(async () => complete);

    const report = await executePlan({
      plan: planFor([stack('a'), stack('b')]),
      runStack,
      signal: controller.signal,
    });

    expect(runStack).not.toHaveBeenCalled();
    expect([...report.outcomes.values()].map((outcome) => outcome.state)).toEqual(['failed', 'failed']);
  });

  it('reports start, completion and failure through callbacks', async () => {
    const onStackStart = vi.fn();
    const onStackComplete = vi.fn();
    const onStackFailed = vi.fn();

    await executePlan({
      plan: planFor([stack('ok'), stack('bad')]),
      runStack: async ({ stack: target }) => {
        if (target.stackId === 'bad') throw new Error('nope');
        return complete;
      },
      callbacks: { onStackStart, onStackComplete, onStackFailed },
    });

    expect(onStackStart).toHaveBeenCalledTimes(2);
    expect(onStackComplete).toHaveBeenCalledWith('ok', expect.objectContaining({ state: 'complete' }));
    expect(onStackFailed).toHaveBeenCalledWith('bad', expect.objectContaining({ message: 'nope' }));
  });

  it('resolves at once for an empty plan', async () => {
    const report = await executePlan({
      plan: buildPlan({ stacks: [stack('a')], scope: [], operation: 'launch' }),
      runStack: async () => complete,
    });

    expect(report.outcomes.size).toBe(0);
    expect(report.hasFailures).toBe(false);
  });
});
