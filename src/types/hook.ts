import type { Logger } from 'winston';
import type { ConfigValue, ResolutionContext } from './resolver.js';
import type { Stack, StackOwner } from './stack.js';

export const HOOK_BRAND: unique symbol = Symbol('stackpilot.hook');

export interface HookContext {
  readonly stack: Stack;
  readonly hookPoint: string;
  readonly resolution: ResolutionContext;
  readonly logger: Logger;
}

export interface ActionHook {
  readonly [HOOK_BRAND]: true;
  readonly tag: string;
  readonly argument: ConfigValue;
  bind(owner: StackOwner): void;
  collectDependencies(): string[];
  run(context: HookContext): Promise<void>;
}

export type HookFactory = (argument: ConfigValue) => ActionHook;
