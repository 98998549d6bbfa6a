import {
  HOOK_BRAND,
  type ActionHook,
  type ConfigValue,
  type HookContext,
  type ResolvedValue,
  type StackOwner,
} from '../types/index.js';
import { materializeValue } from '../resolvers/materialize.js';
import { bindValue, collectValueDependencies } from '../resolvers/resolver.js';

export const isActionHook = (value: unknown): value is ActionHook =>
  typeof value === 'object' &&
  value !== null &&
  HOOK_BRAND in value &&
  value[HOOK_BRAND] === true;

export interface HookDefinition {
  tag: string;
  argument: ConfigValue;
  run: (input: {
    /** The argument with every nested resolver resolved. */
    argument: ResolvedValue | undefined;
    context: HookContext;
  }) => Promise<void>;
}

/**
 * Build an ActionHook from a definition. Resolvers inside the argument are
 * bound with the hook and resolved right before it runs.
 */
export const defineHook = (definition: HookDefinition): ActionHook => {
  let owner: StackOwner | null = null;

  return {
    [HOOK_BRAND]: true,
    tag: definition.tag,
    argument: definition.argument,
    bind(stack) {
      owner = stack;
      bindValue({ value: definition.argument, owner: stack });
    },
    collectDependencies() {
      return collectValueDependencies(definition.argument);
    },
    async run(context) {
      if (owner === null) {
        throw new Error(`Hook '!${definition.tag}' was run before being bound to a stack.`);
      }
      const argument = await materializeValue({
        value: definition.argument,
        context: context.resolution,
      });
      await definition.run({ argument, context });
    },
  };
};
