import type { ConfigValue, ResolverFactory, Stack, ValueResolver } from '../types/index.js';
import { InvalidResolverArgumentError } from '../core/errors.js';
import { materializeValue } from './materialize.js';
import { defineResolver, isValueResolver } from './resolver.js';

const STACK_ATTRIBUTES: Record<string, (stack: Stack) => ConfigValue> = {
  stack_id: (stack) => stack.stackId,
  stack_name: (stack) => stack.externalName,
  template: (stack) => stack.config.template ?? null,
  region: (stack) => stack.region ?? null,
  profile: (stack) => stack.profile ?? null,
  parameters: (stack) => stack.config.parameters,
  user_data: (stack) => stack.config.userData,
  tags: (stack) => stack.config.tags,
  stack_tags: (stack) => stack.config.tags,
  dependencies: (stack) => [...stack.dependencies],
  protect: (stack) => stack.protect,
  timeout: (stack) => stack.config.timeoutMinutes ?? null,
};

const childOf = (value: ConfigValue, segment: string): ConfigValue | undefined => {
  if (Array.isArray(value)) {
    const index = Number(segment);
    return Number.isInteger(index) ? value[index] : undefined;
  }
  if (value !== null && typeof value === 'object' && !isValueResolver(value)) {
    return value[segment];
  }
  return undefined;
};

/**
 * `!stack_attr parameters.VpcCidr` - another attribute of the same stack,
 * addressed by a dotted path
 */
export const stackAttr: ResolverFactory = (argument) => {
  const resolver: ValueResolver = defineResolver({
    tag: 'stack_attr',
    argument,
    resolve: async ({ context, resolveArgument }) => {
      const path = await resolveArgument();
      if (typeof path !== 'string' || path === '') {
        throw new InvalidResolverArgumentError('!stack_attr requires a dotted attribute path.');
      }

      const [attribute, ...segments] = path.split('.');
      const read = STACK_ATTRIBUTES[attribute];
      if (!read) {
        throw new InvalidResolverArgumentError(
          `!stack_attr cannot read '${attribute}'; known attributes: ${Object.keys(STACK_ATTRIBUTES).join(', ')}.`
        );
      }

      let current: ConfigValue = read(context.stack);
      for (const segment of segments) {
        if (isValueResolver(current)) {
          // a resolver part-way along the path has to be resolved to go deeper
          current = (await materializeValue({ value: current, context })) ?? null;
        }
        const next = childOf(current, segment);
        if (next === undefined) {
          throw new InvalidResolverArgumentError(`!stack_attr could not find '${path}'.`);
        }
        current = next;
      }

      if (current === resolver) {
        throw new InvalidResolverArgumentError(`!stack_attr '${path}' refers to itself.`);
      }
      return (await materializeValue({ value: current, context })) ?? null;
    },
  });

  return resolver;
};
