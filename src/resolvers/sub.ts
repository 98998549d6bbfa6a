import type { ResolverFactory } from '../types/index.js';
import { InvalidResolverArgumentError } from '../core/errors.js';
import { defineResolver } from './resolver.js';

/**
 * `!sub ["{env}-bucket", {env: !env STAGE}]` - `{name}` fields substituted
 * from a mapping of variables
 */
export const sub: ResolverFactory = (argument) =>
  defineResolver({
    tag: 'sub',
    argument,
    resolve: async ({ resolveArgument }) => {
      const resolved = await resolveArgument();
      if (!Array.isArray(resolved) || resolved.length !== 2) {
        throw new InvalidResolverArgumentError(
          'The argument to !sub must be a two-element list: a format string and a mapping of variables.'
        );
      }

      const [template, variables] = resolved;
      if (
        typeof template !== 'string' ||
        variables === null ||
        typeof variables !== 'object' ||
        Array.isArray(variables)
      ) {
        throw new InvalidResolverArgumentError(
          'The argument to !sub must be a two-element list: a format string and a mapping of variables.'
        );
      }

      return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
        const value = variables[name];
        if (value === undefined) {
          throw new InvalidResolverArgumentError(`!sub has no variable named '${name}'.`);
        }
        return typeof value === 'string' ? value : JSON.stringify(value);
      });
    },
  });
