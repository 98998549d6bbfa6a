import type { Operation } from './operation.js';

/** Simplified provider-side status of a stack after an operation. */
export type StackStatus = 'complete' | 'failed' | 'in-progress' | 'pending';

export type NodeState = 'pending' | 'ready' | 'running' | 'complete' | 'failed';

export type FailureReason =
  | 'operation-error'
  | 'provider-error'
  | 'resolution-error'
  | 'hook-error'
  | 'timeout'
  | 'upstream-failed'
  | 'cancelled';

export interface OperationResult {
  status: StackStatus;
  data?: unknown;
  timedOut?: boolean;
}

export interface CompletedOutcome {
  stackId: string;
  state: 'complete';
  result: OperationResult;
  durationMs: number;
}

export interface FailedOutcome {
  stackId: string;
  state: 'failed';
  reason: FailureReason;
  message: string;
  error?: Error;
  failedDependencyIds?: string[];
  durationMs: number;
}

export type StackOutcome = CompletedOutcome | FailedOutcome;

export interface ExecutionReport {
  operation: Operation;
  outcomes: Map<string, StackOutcome>;
  hasFailures: boolean;
}
