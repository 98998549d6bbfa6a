import type { ResolverFactory } from '../types/index.js';
import { InvalidResolverArgumentError } from '../core/errors.js';
import { defineResolver } from './resolver.js';

/**
 * `!split ["/", "a/b/c"]` - a string split on a delimiter
 */
export const split: ResolverFactory = (argument) =>
  defineResolver({
    tag: 'split',
    argument,
    resolve: async ({ resolveArgument }) => {
      const resolved = await resolveArgument();
      const [delimiter, text] = Array.isArray(resolved) && resolved.length === 2 ? resolved : [];
      if (typeof delimiter !== 'string' || typeof text !== 'string') {
        throw new InvalidResolverArgumentError(
          'The argument to !split must be a two-element list: a delimiter and the string to split.'
        );
      }

      return text.split(delimiter);
    },
  });
