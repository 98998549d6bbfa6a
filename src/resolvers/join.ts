import type { ResolvedValue, ResolverFactory } from '../types/index.js';
import { InvalidResolverArgumentError } from '../core/errors.js';
import { defineResolver } from './resolver.js';

const isScalar = (value: ResolvedValue): value is string | number | boolean =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

/**
 * `!join [",", [a, b, c]]` - items joined with a delimiter; null items and
 * items resolving to no value are left out
 */
export const join: ResolverFactory = (argument) =>
  defineResolver({
    tag: 'join',
    argument,
    resolve: async ({ resolveArgument }) => {
      const resolved = await resolveArgument();
      const [delimiter, items] = Array.isArray(resolved) && resolved.length === 2 ? resolved : [];
      if (typeof delimiter !== 'string' || !Array.isArray(items)) {
        throw new InvalidResolverArgumentError(
          'The argument to !join must be a two-element list: a delimiter and a list of items.'
        );
      }

      return items
        .filter((item) => item !== null)
        .map((item) => {
          if (!isScalar(item)) {
            throw new InvalidResolverArgumentError(
              `!join can only join scalar values, got ${JSON.stringify(item)}.`
            );
          }
          return String(item);
        })
        .join(delimiter);
    },
  });
