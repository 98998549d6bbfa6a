import type { ResolverFactory } from '../types/index.js';
import {
  InvalidResolverArgumentError,
  MissingEnvironmentVariableError,
} from '../core/errors.js';
import { defineResolver } from './resolver.js';

/**
 * `!env NAME` - value of an environment variable of the current process
 */
export const environmentVariable: ResolverFactory = (argument) =>
  defineResolver({
    tag: 'env',
    argument,
    resolve: async ({ resolveArgument }) => {
      const name = await resolveArgument();
      if (typeof name !== 'string' || name === '') {
        throw new InvalidResolverArgumentError(
          '!env requires the name of an environment variable.'
        );
      }

      const value = process.env[name];
      if (value === undefined) {
        throw new MissingEnvironmentVariableError(name);
      }
      return value;
    },
  });
