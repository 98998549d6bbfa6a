import type { ResolvedValue, ResolverFactory } from '../types/index.js';
import { InvalidResolverArgumentError } from '../core/errors.js';
import { defineResolver } from './resolver.js';

const USAGE =
  'The argument to !select must be a two-element list, where the first element is the ' +
  'index or key to select with and the second element is the list or mapping to select from.';

const selectFromList = (items: ResolvedValue[], index: number | string): ResolvedValue => {
  const position = typeof index === 'number' ? index : Number(index);
  if (!Number.isInteger(position)) {
    throw new InvalidResolverArgumentError(`Could not select with index ${JSON.stringify(index)}: not an integer.`);
  }

  // negative indexes count from the end
  const item = items.at(position);
  if (item === undefined) {
    throw new InvalidResolverArgumentError(`Could not select with index ${position}: out of range.`);
  }
  return item;
};

/**
 * `!select [-1, [a, b, c]]` or `!select [key, {key: value}]`
 */
export const select: ResolverFactory = (argument) =>
  defineResolver({
    tag: 'select',
    argument,
    resolve: async ({ resolveArgument }) => {
      const resolved = await resolveArgument();
      if (!Array.isArray(resolved) || resolved.length !== 2) {
        throw new InvalidResolverArgumentError(USAGE);
      }

      const [index, items] = resolved;
      if (typeof index !== 'number' && typeof index !== 'string') {
        throw new InvalidResolverArgumentError(USAGE);
      }

      if (Array.isArray(items)) {
        return selectFromList(items, index);
      }

      if (items !== null && typeof items === 'object') {
        const value = items[String(index)];
        if (value === undefined) {
          throw new InvalidResolverArgumentError(`Could not select with key '${index}': no such key.`);
        }
        return value;
      }

      throw new InvalidResolverArgumentError(USAGE);
    },
  });
