import type { ActionHook } from './hook.js';
import type { ConfigValue } from './resolver.js';

export type OnFailure = 'DO_NOTHING' | 'ROLLBACK' | 'DELETE';

export interface StackConfig {
  template?: string;
  stackName?: string;
  region?: string;
  profile?: string;
  parameters: Record<string, ConfigValue>;
  userData: Record<string, ConfigValue>;
  tags: Record<string, ConfigValue>;
  dependencies: string[];
  hooks: Record<string, ActionHook[]>;
  protect: boolean;
  ignore: boolean;
  obsolete: boolean;
  timeoutMinutes?: number;
  disableRollback: boolean;
  onFailure?: OnFailure;
}

export type StackConfigInput = Partial<StackConfig>;

export interface StackOwner {
  readonly stackId: string;
}

export interface Stack extends StackOwner {
  readonly externalName: string;
  readonly config: Readonly<StackConfig>;
  /** Explicit and inferred prerequisites, sorted, without the stack itself. */
  readonly dependencies: readonly string[];
  readonly region?: string;
  readonly profile?: string;
  readonly protect: boolean;
  readonly ignore: boolean;
  readonly obsolete: boolean;
}
