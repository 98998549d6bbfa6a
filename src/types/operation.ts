export type Operation =
  | 'create'
  | 'update'
  | 'launch'
  | 'delete'
  | 'describe'
  | 'describeOutputs'
  | 'getStatus'
  | 'validate'
  | 'generate'
  | 'dumpConfig'
  | 'diff';

export interface OperationInfo {
  /** Torn down dependents-first: the graph is walked in reverse. */
  reverse: boolean;
  /** Sends a template to the provider and changes remote state. */
  deploys: boolean;
  /** Whether unresolvable cross-stack references get placeholders by default. */
  placeholders: boolean;
}

export const OPERATIONS: Record<Operation, OperationInfo> = {
  create: { reverse: false, deploys: true, placeholders: false },
  update: { reverse: false, deploys: true, placeholders: false },
  launch: { reverse: false, deploys: true, placeholders: false },
  delete: { reverse: true, deploys: false, placeholders: false },
  describe: { reverse: false, deploys: false, placeholders: false },
  describeOutputs: { reverse: false, deploys: false, placeholders: false },
  getStatus: { reverse: false, deploys: false, placeholders: false },
  validate: { reverse: false, deploys: false, placeholders: true },
  generate: { reverse: false, deploys: false, placeholders: true },
  dumpConfig: { reverse: false, deploys: false, placeholders: true },
  diff: { reverse: false, deploys: false, placeholders: true },
};

export const isOperation = (value: string): value is Operation =>
  Object.prototype.hasOwnProperty.call(OPERATIONS, value);
